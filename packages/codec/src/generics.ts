import type { Codec } from "./codec";
import { ScaleDefinitionError } from "./errors";
import type { CodecLogger } from "./logger";
import { NOOP_LOGGER } from "./logger";
import type { CodecShape } from "./shape";
import { describeShape, shapeKey } from "./shape";

export interface InstantiationCacheOptions {
  /** Receives a debug entry for every cache miss (default: NOOP_LOGGER). */
  logger?: CodecLogger;
}

/**
 * Memo of generic instantiations keyed by definition and bindings. Entries are
 * created on first use and live as long as the cache; nothing is evicted.
 */
export class InstantiationCache<V> {
  private readonly entries = new Map<string, V>();
  private readonly logger: CodecLogger;

  constructor(options: InstantiationCacheOptions = {}) {
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrCreate(key: string, create: () => V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.logger.debug("instantiating generic", { key });
    const created = create();
    this.entries.set(key, created);
    return created;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}

const codecIds = new WeakMap<object, number>();
let nextCodecId = 1;

function codecIdentity(codec: Codec<unknown>): number {
  let id = codecIds.get(codec);
  if (id === undefined) {
    id = nextCodecId++;
    codecIds.set(codec, id);
  }
  return id;
}

function isCodec(value: unknown): value is Codec<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "encodeTo" in value &&
    typeof value.encodeTo === "function" &&
    "decodeFrom" in value &&
    typeof value.decodeFrom === "function"
  );
}

/** `Name<A, B>` for an instantiation of `name` over `args`. */
export function genericName(name: string, args: readonly Codec<unknown>[]): string {
  return `${name}<${args.map((arg) => arg.name).join(", ")}>`;
}

/**
 * Wraps a codec factory parameterised over codecs. Each distinct tuple of
 * argument codecs is built once; every binding named in `params` must be
 * supplied, and no more.
 */
export function generic<A extends readonly Codec<unknown>[], R extends Codec<unknown>>(
  name: string,
  params: readonly string[],
  build: (...args: A) => R,
  options: InstantiationCacheOptions = {},
): (...args: A) => R {
  const cache = new InstantiationCache<R>(options);

  return (...args: A): R => {
    if (args.length !== params.length) {
      throw new ScaleDefinitionError(`'${name}' takes ${params.length} type arguments, got ${args.length}`, {
        params,
      });
    }
    args.forEach((arg, position) => {
      if (!isCodec(arg)) {
        throw new ScaleDefinitionError(`'${name}' is missing a binding for ${params[position]}`, {
          param: params[position],
        });
      }
    });
    const key = `${name}<${args.map(codecIdentity).join(",")}>`;
    return cache.getOrCreate(key, () => build(...args));
  };
}

/** A shape parameterised over named type variables (`_0`, `_1`, …). */
export interface GenericDefinition {
  name: string;
  params: readonly string[];
  shape: CodecShape;
}

/** Names of every `param` node reachable in `shape`, in first-seen order. */
export function collectParams(shape: CodecShape, found: Set<string> = new Set()): Set<string> {
  switch (shape.kind) {
    case "param":
      found.add(shape.name);
      break;
    case "compact":
    case "option":
      collectParams(shape.inner, found);
      break;
    case "fixed-array":
    case "sequence":
      collectParams(shape.element, found);
      break;
    case "tuple":
      shape.elements.forEach((element) => collectParams(element, found));
      break;
    case "result":
      collectParams(shape.ok, found);
      collectParams(shape.err, found);
      break;
    case "struct":
      shape.fields.forEach((field) => collectParams(field.shape, found));
      break;
    case "enum":
      shape.variants.forEach((variant) => variant.payload && collectParams(variant.payload, found));
      break;
    case "type-ref":
      shape.args.forEach((arg) => collectParams(arg, found));
      break;
    case "primitive":
    case "str":
      break;
    default:
      shape satisfies never;
  }
  return found;
}

/**
 * Replaces every `param` node with its binding. An unbound parameter is a
 * definition error; nothing is decoded against a partially resolved shape.
 */
export function substituteShape(
  shape: CodecShape,
  bindings: ReadonlyMap<string, CodecShape>,
  context = "generic",
): CodecShape {
  const recur = (inner: CodecShape): CodecShape => substituteShape(inner, bindings, context);

  switch (shape.kind) {
    case "param": {
      const bound = bindings.get(shape.name);
      if (!bound) {
        throw new ScaleDefinitionError(`No binding for type parameter '${shape.name}' in '${context}'`, {
          param: shape.name,
          bound: Array.from(bindings.keys()),
        });
      }
      return bound;
    }
    case "compact":
      return { kind: "compact", inner: recur(shape.inner) };
    case "option":
      return { kind: "option", inner: recur(shape.inner) };
    case "fixed-array":
      return { kind: "fixed-array", element: recur(shape.element), length: shape.length };
    case "sequence":
      return shape.bound === undefined
        ? { kind: "sequence", element: recur(shape.element) }
        : { kind: "sequence", element: recur(shape.element), bound: shape.bound };
    case "tuple":
      return { kind: "tuple", elements: shape.elements.map(recur) };
    case "result":
      return { kind: "result", ok: recur(shape.ok), err: recur(shape.err) };
    case "struct":
      return {
        kind: "struct",
        name: shape.name,
        fields: shape.fields.map((field) => ({ name: field.name, shape: recur(field.shape), skip: field.skip })),
      };
    case "enum":
      return {
        kind: "enum",
        name: shape.name,
        variants: shape.variants.map((variant) => ({
          index: variant.index,
          name: variant.name,
          payload: variant.payload ? recur(variant.payload) : null,
        })),
      };
    case "type-ref":
      return { kind: "type-ref", name: shape.name, args: shape.args.map(recur) };
    case "primitive":
    case "str":
      return shape;
    default:
      shape satisfies never;
      throw new Error("Unsupported shape kind");
  }
}

const definitionIds = new WeakMap<GenericDefinition, number>();
let nextDefinitionId = 1;

function definitionIdentity(definition: GenericDefinition): number {
  let id = definitionIds.get(definition);
  if (id === undefined) {
    id = nextDefinitionId++;
    definitionIds.set(definition, id);
  }
  return id;
}

/** Memo used by `instantiateShape` when no cache is passed explicitly. */
export const defaultShapeCache = new InstantiationCache<CodecShape>();

/**
 * Concrete shape of `definition` instantiated with `args`, memoised per
 * definition object and argument shapes. Two definitions sharing a name
 * never share an entry.
 */
export function instantiateShape(
  definition: GenericDefinition,
  args: readonly CodecShape[],
  cache: InstantiationCache<CodecShape> = defaultShapeCache,
): CodecShape {
  if (args.length !== definition.params.length) {
    throw new ScaleDefinitionError(
      `'${definition.name}' takes ${definition.params.length} type arguments, got ${args.length}`,
      { params: definition.params },
    );
  }

  const argKeys = args.map(shapeKey).join(",");
  const key = `${definition.name}@${definitionIdentity(definition)}<${argKeys}>`;
  return cache.getOrCreate(key, () => {
    const bindings = new Map(definition.params.map((param, position): [string, CodecShape] => [param, args[position]]));
    const instance = substituteShape(definition.shape, bindings, `${definition.name}<${argKeys}>`);
    const name = args.length === 0 ? definition.name : `${definition.name}<${args.map(describeShape).join(", ")}>`;
    return instance.kind === "struct" || instance.kind === "enum" ? { ...instance, name } : instance;
  });
}

