import type { PrimitiveName, UnsignedPrimitive } from "@scale-kit/codec";

type DecodedValueKind =
  | "primitive"
  | "compact"
  | "string"
  | "bytes"
  | "sequence"
  | "array"
  | "tuple"
  | "option"
  | "result"
  | "struct"
  | "enum";

interface BaseDecodedValue {
  kind: DecodedValueKind;
  typeName?: string;
  byteOffset: number;
  byteLength: number;
  /** Lowercase hex of the bytes this value was read from; absent when `includeRawHex` is off. */
  rawHex?: string;
}

export interface DecodedPrimitiveValue extends BaseDecodedValue {
  kind: "primitive";
  primitiveType: PrimitiveName;
  value: number | bigint | boolean;
}

export interface DecodedCompactValue extends BaseDecodedValue {
  kind: "compact";
  target: UnsignedPrimitive;
  value: bigint;
}

export interface DecodedStringValue extends BaseDecodedValue {
  kind: "string";
  value: string;
}

/** A `Vec<u8>` or `[u8; N]`, kept as raw bytes. */
export interface DecodedBytesValue extends BaseDecodedValue {
  kind: "bytes";
  value: Uint8Array;
}

export interface DecodedSequenceValue extends BaseDecodedValue {
  kind: "sequence";
  length: number;
  elements: DecodedValue[];
  bound?: number;
}

export interface DecodedArrayValue extends BaseDecodedValue {
  kind: "array";
  length: number;
  elements: DecodedValue[];
}

export interface DecodedTupleValue extends BaseDecodedValue {
  kind: "tuple";
  elements: DecodedValue[];
}

export interface DecodedOptionValue extends BaseDecodedValue {
  kind: "option";
  value: DecodedValue | null;
}

export interface DecodedResultValue extends BaseDecodedValue {
  kind: "result";
  ok: boolean;
  value: DecodedValue;
}

export interface DecodedField {
  name: string;
  value: DecodedValue;
}

export interface DecodedStructValue extends BaseDecodedValue {
  kind: "struct";
  fields: Record<string, DecodedValue>;
  fieldOrder: DecodedField[];
  /** Fields declared `skip`; they occupy no bytes and carry no value. */
  skippedFields: string[];
}

export interface DecodedEnumValue extends BaseDecodedValue {
  kind: "enum";
  index: number;
  variantName: string;
  value: DecodedValue | null;
}

export type DecodedValue =
  | DecodedPrimitiveValue
  | DecodedCompactValue
  | DecodedStringValue
  | DecodedBytesValue
  | DecodedSequenceValue
  | DecodedArrayValue
  | DecodedTupleValue
  | DecodedOptionValue
  | DecodedResultValue
  | DecodedStructValue
  | DecodedEnumValue;
