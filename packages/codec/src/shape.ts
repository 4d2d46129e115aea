export type UnsignedPrimitive = "u8" | "u16" | "u32" | "u64" | "u128";
export type SignedPrimitive = "i8" | "i16" | "i32" | "i64" | "i128";
export type PrimitiveName = "bool" | UnsignedPrimitive | SignedPrimitive;

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = [
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
];

export const PRIMITIVE_WIDTHS: Record<PrimitiveName, number> = {
  bool: 1,
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  i8: 1,
  i16: 2,
  i32: 4,
  i64: 8,
  i128: 16,
};

export function isPrimitiveName(value: string): value is PrimitiveName {
  return PRIMITIVE_NAMES.some((name) => name === value);
}

export function isUnsignedPrimitive(value: string): value is UnsignedPrimitive {
  return value === "u8" || value === "u16" || value === "u32" || value === "u64" || value === "u128";
}

export interface PrimitiveShape {
  kind: "primitive";
  primitive: PrimitiveName;
}

/** `inner` must resolve to an unsigned primitive once generics and references are resolved. */
export interface CompactShape {
  kind: "compact";
  inner: CodecShape;
}

export interface StrShape {
  kind: "str";
}

export interface FixedArrayShape {
  kind: "fixed-array";
  element: CodecShape;
  length: number;
}

export interface SequenceShape {
  kind: "sequence";
  element: CodecShape;
  /** Declared maximum length. Informational only; the wire format does not carry or enforce it. */
  bound?: number;
}

export interface TupleShape {
  kind: "tuple";
  elements: CodecShape[];
}

export interface OptionShape {
  kind: "option";
  inner: CodecShape;
}

export interface ResultShape {
  kind: "result";
  ok: CodecShape;
  err: CodecShape;
}

export interface StructFieldShape {
  name: string;
  shape: CodecShape;
  skip: boolean;
}

export interface StructShape {
  kind: "struct";
  name?: string;
  fields: StructFieldShape[];
}

export interface EnumVariantShape {
  index: number;
  name: string;
  payload: CodecShape | null;
}

export interface EnumShape {
  kind: "enum";
  name?: string;
  variants: EnumVariantShape[];
}

/** A generic type variable such as `_0`; only valid inside a generic definition. */
export interface ParamShape {
  kind: "param";
  name: string;
}

/** A named type resolved through a registry, optionally instantiated with generic arguments. */
export interface TypeRefShape {
  kind: "type-ref";
  name: string;
  args: CodecShape[];
}

export type CodecShape =
  | PrimitiveShape
  | CompactShape
  | StrShape
  | FixedArrayShape
  | SequenceShape
  | TupleShape
  | OptionShape
  | ResultShape
  | StructShape
  | EnumShape
  | ParamShape
  | TypeRefShape;

export const UNIT_SHAPE: TupleShape = { kind: "tuple", elements: [] };

export function primitiveShape(primitive: PrimitiveName): PrimitiveShape {
  return { kind: "primitive", primitive };
}

export function isByteShape(shape: CodecShape): boolean {
  return shape.kind === "primitive" && shape.primitive === "u8";
}

/**
 * Short human-readable form of a shape, e.g. `Vec<(u32, bool)>` or `[u8; 32]`.
 * Named structs and enums are printed by name only.
 */
export function describeShape(shape: CodecShape): string {
  switch (shape.kind) {
    case "primitive":
      return shape.primitive;
    case "compact":
      return `Compact<${describeShape(shape.inner)}>`;
    case "str":
      return "str";
    case "fixed-array":
      return `[${describeShape(shape.element)}; ${shape.length}]`;
    case "sequence":
      return `Vec<${describeShape(shape.element)}>`;
    case "tuple":
      if (shape.elements.length === 1) return `(${describeShape(shape.elements[0])},)`;
      return `(${shape.elements.map(describeShape).join(", ")})`;
    case "option":
      return `Option<${describeShape(shape.inner)}>`;
    case "result":
      return `Result<${describeShape(shape.ok)}, ${describeShape(shape.err)}>`;
    case "struct":
      return shape.name ?? `{ ${shape.fields.map((field) => `${field.name}: ${describeShape(field.shape)}`).join(", ")} }`;
    case "enum":
      return shape.name ?? `enum { ${shape.variants.map((variant) => variant.name).join(" | ")} }`;
    case "param":
      return shape.name;
    case "type-ref":
      return shape.args.length === 0 ? shape.name : `${shape.name}<${shape.args.map(describeShape).join(", ")}>`;
    default:
      shape satisfies never;
      throw new Error("Unsupported shape kind");
  }
}

/**
 * Canonical, structural key of a shape. Two shapes with the same key have the
 * same wire layout.
 */
export function shapeKey(shape: CodecShape): string {
  switch (shape.kind) {
    case "struct": {
      const fields = shape.fields.map((field) => `${field.skip ? "!" : ""}${field.name}:${shapeKey(field.shape)}`);
      return `${shape.name ?? ""}{${fields.join(",")}}`;
    }
    case "enum": {
      const variants = shape.variants.map(
        (variant) => `${variant.index}=${variant.name}${variant.payload ? `(${shapeKey(variant.payload)})` : ""}`,
      );
      return `${shape.name ?? ""}enum{${variants.join("|")}}`;
    }
    case "compact":
      return `Compact<${shapeKey(shape.inner)}>`;
    case "fixed-array":
      return `[${shapeKey(shape.element)};${shape.length}]`;
    case "sequence":
      return shape.bound === undefined
        ? `Vec<${shapeKey(shape.element)}>`
        : `Vec<${shapeKey(shape.element)};${shape.bound}>`;
    case "tuple":
      return `(${shape.elements.map(shapeKey).join(",")})`;
    case "option":
      return `Option<${shapeKey(shape.inner)}>`;
    case "result":
      return `Result<${shapeKey(shape.ok)},${shapeKey(shape.err)}>`;
    case "param":
      return `$${shape.name}`;
    case "type-ref":
      return `@${shape.name}<${shape.args.map(shapeKey).join(",")}>`;
    case "primitive":
    case "str":
      return describeShape(shape);
    default:
      shape satisfies never;
      throw new Error("Unsupported shape kind");
  }
}

export type ShapeResolver = (ref: TypeRefShape) => CodecShape;

/**
 * Smallest number of bytes any value of the shape can occupy on the wire.
 * References are followed through `resolve` when given and counted as zero otherwise.
 */
export function minEncodedSize(shape: CodecShape, resolve?: ShapeResolver, visiting: Set<string> = new Set()): number {
  switch (shape.kind) {
    case "primitive":
      return PRIMITIVE_WIDTHS[shape.primitive];
    case "compact":
    case "str":
    case "sequence":
    case "option":
    case "result":
    case "enum":
      return 1;
    case "fixed-array":
      return shape.length * minEncodedSize(shape.element, resolve, visiting);
    case "tuple":
      return shape.elements.reduce((total, element) => total + minEncodedSize(element, resolve, visiting), 0);
    case "struct":
      return shape.fields.reduce(
        (total, field) => (field.skip ? total : total + minEncodedSize(field.shape, resolve, visiting)),
        0,
      );
    case "param":
      return 0;
    case "type-ref": {
      const key = shapeKey(shape);
      if (!resolve || visiting.has(key)) return 0;
      visiting.add(key);
      const size = minEncodedSize(resolve(shape), resolve, visiting);
      visiting.delete(key);
      return size;
    }
    default:
      shape satisfies never;
      return 0;
  }
}
