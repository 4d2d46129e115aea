import { ScaleDefinitionError, UNIT_SHAPE } from "@scale-kit/codec";
import type { CodecLogger, CodecShape, EnumVariantShape, StructFieldShape } from "@scale-kit/codec";
import YAML from "yaml";
import { z } from "zod";
import { ScaleParseError } from "./errors";
import { BUILTIN_TYPE_NAMES, parseTypeExpression } from "./typeExpression";

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier");

const fieldSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().min(1),
    skip: z.boolean().optional(),
    compact: z.boolean().optional(),
    docs: z.string().optional(),
  })
  .strict();

const variantSchema = z
  .object({
    name: identifier,
    index: z.number().int().min(0).max(255).optional(),
    type: z.string().min(1).optional(),
    types: z.array(z.string().min(1)).optional(),
    fields: z.array(fieldSchema).optional(),
    ignore: z.boolean().optional(),
    docs: z.string().optional(),
  })
  .strict()
  .refine((variant) => [variant.type, variant.types, variant.fields].filter((entry) => entry !== undefined).length <= 1, {
    message: "a variant takes at most one of 'type', 'types' or 'fields'",
  });

const kindSchema = z.union([
  z.string().min(1),
  z.object({ struct: z.array(fieldSchema) }).strict(),
  z.object({ enum: z.array(variantSchema) }).strict(),
  z.object({ tuple: z.array(z.string().min(1)) }).strict(),
  z.object({ newtype: z.string().min(1) }).strict(),
]);

const typeEntrySchema = z
  .object({
    name: identifier,
    params: z.array(identifier).default([]),
    docs: z.string().optional(),
    kind: kindSchema,
  })
  .strict();

const documentSchema = z.object({ types: z.array(typeEntrySchema) }).strict();

type FieldEntry = z.infer<typeof fieldSchema>;
type VariantEntry = z.infer<typeof variantSchema>;
type TypeEntry = z.infer<typeof typeEntrySchema>;

/** One named type of a registry document, with its layout parsed into a shape. */
export interface TypeDefinition {
  name: string;
  params: string[];
  shape: CodecShape;
  docs?: string;
}

export interface TypeDocument {
  types: TypeDefinition[];
}

export interface ParseDocumentOptions {
  logger?: CodecLogger;
}

export function parseTypeDocument(yamlText: string, options: ParseDocumentOptions = {}): TypeDocument {
  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlText);
  } catch (error) {
    throw new ScaleParseError("Failed to parse type document YAML", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return buildTypeDocument(parsed, options);
}

/** Validates an already-parsed document object, e.g. one loaded from JSON. */
export function buildTypeDocument(input: unknown, options: ParseDocumentOptions = {}): TypeDocument {
  const result = documentSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ScaleParseError(`Invalid type document:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`, {
      issues,
    });
  }

  const types = result.data.types.map((entry) => toDefinition(entry, options.logger));
  ensureNamesUsable(types);
  return { types };
}

function toDefinition(entry: TypeEntry, logger: CodecLogger | undefined): TypeDefinition {
  const definition: TypeDefinition = {
    name: entry.name,
    params: entry.params,
    shape: kindToShape(entry, logger),
  };
  if (entry.docs !== undefined) {
    definition.docs = entry.docs;
  }
  return definition;
}

function kindToShape(entry: TypeEntry, logger: CodecLogger | undefined): CodecShape {
  const { kind, name, params } = entry;
  if (typeof kind === "string") {
    return parseTypeExpression(kind, params);
  }
  if ("struct" in kind) {
    return { kind: "struct", name, fields: kind.struct.map((field) => toFieldShape(field, params)) };
  }
  if ("enum" in kind) {
    return { kind: "enum", name, variants: toVariantShapes(name, kind.enum, params, logger) };
  }
  if ("tuple" in kind) {
    return { kind: "tuple", elements: kind.tuple.map((element) => parseTypeExpression(element, params)) };
  }
  return { kind: "struct", name, fields: [{ name: "0", shape: parseTypeExpression(kind.newtype, params), skip: false }] };
}

function toFieldShape(field: FieldEntry, params: string[]): StructFieldShape {
  const parsed = parseTypeExpression(field.type, params);
  return {
    name: field.name,
    shape: field.compact ? { kind: "compact", inner: parsed } : parsed,
    skip: field.skip ?? false,
  };
}

function isIgnored(variant: VariantEntry): boolean {
  return variant.ignore === true || variant.name === "__Ignore";
}

function toVariantShapes(
  enumName: string,
  variants: VariantEntry[],
  params: string[],
  logger: CodecLogger | undefined,
): EnumVariantShape[] {
  const shapes: EnumVariantShape[] = [];
  const seen = new Map<number, string>();

  for (const variant of variants) {
    if (isIgnored(variant)) {
      logger?.debug("dropping ignored variant from wire table", { enum: enumName, variant: variant.name });
      continue;
    }
    if (variant.index === undefined) {
      throw new ScaleParseError(`Variant '${enumName}::${variant.name}' is missing its index`, {
        enum: enumName,
        variant: variant.name,
      });
    }
    const previous = seen.get(variant.index);
    if (previous !== undefined) {
      throw new ScaleDefinitionError(
        `Variants '${previous}' and '${variant.name}' of '${enumName}' share index ${variant.index}`,
        { enum: enumName, index: variant.index },
      );
    }
    seen.set(variant.index, variant.name);
    shapes.push({ index: variant.index, name: variant.name, payload: variantPayload(enumName, variant, params) });
  }

  return shapes;
}

function variantPayload(enumName: string, variant: VariantEntry, params: string[]): CodecShape | null {
  if (variant.type !== undefined) {
    return parseTypeExpression(variant.type, params);
  }
  if (variant.types !== undefined) {
    return variant.types.length === 0
      ? UNIT_SHAPE
      : { kind: "tuple", elements: variant.types.map((element) => parseTypeExpression(element, params)) };
  }
  if (variant.fields !== undefined) {
    return {
      kind: "struct",
      name: `${enumName}::${variant.name}`,
      fields: variant.fields.map((field) => toFieldShape(field, params)),
    };
  }
  return null;
}

function ensureNamesUsable(types: TypeDefinition[]) {
  const seen = new Set<string>();
  for (const type of types) {
    if (BUILTIN_TYPE_NAMES.has(type.name)) {
      throw new ScaleDefinitionError(`Type '${type.name}' shadows a built-in type`, { typeName: type.name });
    }
    if (seen.has(type.name)) {
      throw new ScaleDefinitionError(`Type '${type.name}' is defined more than once`, { typeName: type.name });
    }
    seen.add(type.name);
    const duplicateParam = type.params.find((param, index) => type.params.indexOf(param) !== index);
    if (duplicateParam !== undefined) {
      throw new ScaleDefinitionError(`Type '${type.name}' declares parameter '${duplicateParam}' twice`, {
        typeName: type.name,
      });
    }
  }
}
