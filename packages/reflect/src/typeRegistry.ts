import {
  InstantiationCache,
  NOOP_LOGGER,
  ScaleDefinitionError,
  instantiateShape,
  isUnsignedPrimitive,
} from "@scale-kit/codec";
import type { CodecLogger, CodecShape, ShapeResolver, TypeRefShape } from "@scale-kit/codec";
import type { TypeDefinition, TypeDocument } from "./typeDocument";
import { parseTypeDocument } from "./typeDocument";

export interface TypeRegistryOptions {
  /** Receives registry loading and cache-miss events (default: NOOP_LOGGER). */
  logger?: CodecLogger;
  /** Instantiation memo; each registry gets its own unless one is passed. */
  cache?: InstantiationCache<CodecShape>;
}

export class TypeRegistry {
  private readonly types = new Map<string, TypeDefinition>();
  private readonly cache: InstantiationCache<CodecShape>;
  readonly logger: CodecLogger;

  constructor(definitions: Iterable<TypeDefinition>, options: TypeRegistryOptions = {}) {
    for (const def of definitions) {
      this.types.set(def.name, def);
    }
    this.logger = options.logger ?? NOOP_LOGGER;
    this.cache = options.cache ?? new InstantiationCache<CodecShape>({ logger: this.logger });
  }

  get size(): number {
    return this.types.size;
  }

  get(typeName: string): TypeDefinition {
    const definition = this.types.get(typeName);
    if (!definition) {
      throw new ScaleDefinitionError(`Type '${typeName}' is not defined in this registry`, { typeName });
    }
    return definition;
  }

  has(typeName: string): boolean {
    return this.types.has(typeName);
  }

  entries(): IterableIterator<[string, TypeDefinition]> {
    return this.types.entries();
  }

  /** Concrete shape of a reference, instantiated with its arguments. */
  resolve(ref: TypeRefShape): CodecShape {
    return instantiateShape(this.get(ref.name), ref.args, this.cache);
  }

  readonly resolver: ShapeResolver = (ref) => this.resolve(ref);
}

export function buildTypeRegistry(document: TypeDocument, options: TypeRegistryOptions = {}): TypeRegistry {
  const registry = new TypeRegistry(document.types, options);
  for (const [, type] of registry.entries()) {
    validateShapeReferences(type.shape, registry, type.name);
  }
  detectUnguardedCycles(registry);
  return registry;
}

/** Parses, validates and indexes a YAML registry document. */
export function loadTypeRegistry(yamlText: string, options: TypeRegistryOptions = {}): TypeRegistry {
  const document = parseTypeDocument(yamlText, { logger: options.logger });
  const registry = buildTypeRegistry(document, options);
  registry.logger.info("loaded type registry", { types: registry.size });
  return registry;
}

/**
 * Checks every reference in `shape` names a known type with the right number
 * of arguments, and that directly written `Compact<T>` targets are unsigned.
 */
export function validateShapeReferences(shape: CodecShape, registry: TypeRegistry | undefined, context: string) {
  switch (shape.kind) {
    case "type-ref": {
      if (!registry || !registry.has(shape.name)) {
        throw new ScaleDefinitionError(`Type '${context}' references unknown type '${shape.name}'`, {
          typeName: context,
          referencedType: shape.name,
        });
      }
      const expected = registry.get(shape.name).params.length;
      if (shape.args.length !== expected) {
        throw new ScaleDefinitionError(
          `Type '${context}' passes ${shape.args.length} arguments to '${shape.name}', which takes ${expected}`,
          { typeName: context, referencedType: shape.name },
        );
      }
      shape.args.forEach((arg) => validateShapeReferences(arg, registry, context));
      break;
    }
    case "compact":
      if (shape.inner.kind === "primitive" && !isUnsignedPrimitive(shape.inner.primitive)) {
        throw new ScaleDefinitionError(`Type '${context}' uses Compact<${shape.inner.primitive}>`, {
          typeName: context,
        });
      }
      validateShapeReferences(shape.inner, registry, context);
      break;
    case "option":
      validateShapeReferences(shape.inner, registry, context);
      break;
    case "fixed-array":
    case "sequence":
      validateShapeReferences(shape.element, registry, context);
      break;
    case "tuple":
      shape.elements.forEach((element) => validateShapeReferences(element, registry, context));
      break;
    case "result":
      validateShapeReferences(shape.ok, registry, context);
      validateShapeReferences(shape.err, registry, context);
      break;
    case "struct":
      shape.fields.forEach((field) => validateShapeReferences(field.shape, registry, `${context}.${field.name}`));
      break;
    case "enum":
      shape.variants.forEach(
        (variant) => variant.payload && validateShapeReferences(variant.payload, registry, `${context}.${variant.name}`),
      );
      break;
    case "primitive":
    case "str":
    case "param":
      break;
    default:
      shape satisfies never;
  }
}

interface UnguardedReach {
  refs: Set<string>;
  params: Set<string>;
}

/**
 * Recursion must pass through something that consumes input before recursing
 * (a length prefix or a tag byte). A cycle made only of struct fields, tuple
 * elements, fixed arrays or aliases can never terminate and is rejected.
 */
function detectUnguardedCycles(registry: TypeRegistry) {
  const paramMemo = new Map<string, Set<string>>();
  const edges = new Map<string, Set<string>>();
  for (const [typeName, type] of registry.entries()) {
    edges.set(typeName, reachUnguarded(type.shape, registry, paramMemo).refs);
  }

  const visiting = new Set<string>();
  const visited = new Set<string>();

  const visit = (typeName: string, stack: string[]) => {
    if (visited.has(typeName)) {
      return;
    }
    if (visiting.has(typeName)) {
      const cyclePath = [...stack, typeName];
      throw new ScaleDefinitionError(`Unguarded recursive type: ${cyclePath.join(" -> ")}`, { cycle: cyclePath });
    }
    visiting.add(typeName);
    for (const referenced of edges.get(typeName) ?? []) {
      visit(referenced, [...stack, typeName]);
    }
    visiting.delete(typeName);
    visited.add(typeName);
  };

  for (const [typeName] of registry.entries()) {
    visit(typeName, []);
  }
}

function unguardedParams(typeName: string, registry: TypeRegistry, memo: Map<string, Set<string>>): Set<string> {
  const known = memo.get(typeName);
  if (known) return known;
  // Self-references see the empty placeholder; the cycle walk reports them.
  memo.set(typeName, new Set());
  const params = reachUnguarded(registry.get(typeName).shape, registry, memo).params;
  memo.set(typeName, params);
  return params;
}

function reachUnguarded(
  shape: CodecShape,
  registry: TypeRegistry,
  memo: Map<string, Set<string>>,
  reach: UnguardedReach = { refs: new Set(), params: new Set() },
): UnguardedReach {
  switch (shape.kind) {
    case "type-ref": {
      reach.refs.add(shape.name);
      const definition = registry.get(shape.name);
      const open = unguardedParams(shape.name, registry, memo);
      shape.args.forEach((arg, position) => {
        if (open.has(definition.params[position])) {
          reachUnguarded(arg, registry, memo, reach);
        }
      });
      break;
    }
    case "param":
      reach.params.add(shape.name);
      break;
    case "compact":
      reachUnguarded(shape.inner, registry, memo, reach);
      break;
    case "fixed-array":
      reachUnguarded(shape.element, registry, memo, reach);
      break;
    case "tuple":
      shape.elements.forEach((element) => reachUnguarded(element, registry, memo, reach));
      break;
    case "struct":
      shape.fields.forEach((field) => !field.skip && reachUnguarded(field.shape, registry, memo, reach));
      break;
    case "sequence":
    case "option":
    case "result":
    case "enum":
    case "primitive":
    case "str":
      break;
    default:
      shape satisfies never;
  }
  return reach;
}
