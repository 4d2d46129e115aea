import type { Codec } from "./codec";
import { defineCodec } from "./codec";
import { readLength, encodeCompactTo } from "./compact";
import { InvalidTagError, InvalidUtf8Error, ScaleEncodeError } from "./errors";
import type { PrimitiveName } from "./shape";
import { PRIMITIVE_WIDTHS, UNIT_SHAPE, primitiveShape } from "./shape";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export type PrimitiveValue<K extends PrimitiveName> = K extends "bool"
  ? boolean
  : K extends "u64" | "u128" | "i64" | "i128"
    ? bigint
    : number;

function assertIntegerInRange(name: string, value: number, min: number, max: number): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new ScaleEncodeError(`${name} expects an integer in ${min}..=${max}`, { value: String(value) });
  }
}

function assertBigIntInRange(name: string, value: bigint, min: bigint, max: bigint): void {
  if (typeof value !== "bigint" || value < min || value > max) {
    throw new ScaleEncodeError(`${name} expects a bigint in ${min}..=${max}`, { value: String(value) });
  }
}

function bigintBounds(name: PrimitiveName): { min: bigint; max: bigint } {
  const bits = BigInt(PRIMITIVE_WIDTHS[name] * 8);
  if (name.startsWith("i")) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

export const u8: Codec<number> = defineCodec<number>({
  name: "u8",
  shape: primitiveShape("u8"),
  encodeTo(value, writer) {
    assertIntegerInRange("u8", value, 0, 0xff);
    writer.writeByte(value);
  },
  decodeFrom: (reader) => reader.readByte("u8"),
});

export const u16: Codec<number> = defineCodec<number>({
  name: "u16",
  shape: primitiveShape("u16"),
  encodeTo(value, writer) {
    assertIntegerInRange("u16", value, 0, 0xffff);
    writer.writeUint16(value);
  },
  decodeFrom: (reader) => reader.readUint16("u16"),
});

export const u32: Codec<number> = defineCodec<number>({
  name: "u32",
  shape: primitiveShape("u32"),
  encodeTo(value, writer) {
    assertIntegerInRange("u32", value, 0, 0xffff_ffff);
    writer.writeUint32(value);
  },
  decodeFrom: (reader) => reader.readUint32("u32"),
});

export const u64: Codec<bigint> = defineCodec<bigint>({
  name: "u64",
  shape: primitiveShape("u64"),
  encodeTo(value, writer) {
    const { min, max } = bigintBounds("u64");
    assertBigIntInRange("u64", value, min, max);
    writer.writeBigUint64(value);
  },
  decodeFrom: (reader) => reader.readBigUint64("u64"),
});

export const u128: Codec<bigint> = defineCodec<bigint>({
  name: "u128",
  shape: primitiveShape("u128"),
  encodeTo(value, writer) {
    const { min, max } = bigintBounds("u128");
    assertBigIntInRange("u128", value, min, max);
    writer.writeBigUintLE(value, 16);
  },
  decodeFrom: (reader) => reader.readBigUintLE(16, "u128"),
});

export const i8: Codec<number> = defineCodec<number>({
  name: "i8",
  shape: primitiveShape("i8"),
  encodeTo(value, writer) {
    assertIntegerInRange("i8", value, -0x80, 0x7f);
    writer.writeInt8(value);
  },
  decodeFrom: (reader) => reader.readInt8("i8"),
});

export const i16: Codec<number> = defineCodec<number>({
  name: "i16",
  shape: primitiveShape("i16"),
  encodeTo(value, writer) {
    assertIntegerInRange("i16", value, -0x8000, 0x7fff);
    writer.writeInt16(value);
  },
  decodeFrom: (reader) => reader.readInt16("i16"),
});

export const i32: Codec<number> = defineCodec<number>({
  name: "i32",
  shape: primitiveShape("i32"),
  encodeTo(value, writer) {
    assertIntegerInRange("i32", value, -0x8000_0000, 0x7fff_ffff);
    writer.writeInt32(value);
  },
  decodeFrom: (reader) => reader.readInt32("i32"),
});

export const i64: Codec<bigint> = defineCodec<bigint>({
  name: "i64",
  shape: primitiveShape("i64"),
  encodeTo(value, writer) {
    const { min, max } = bigintBounds("i64");
    assertBigIntInRange("i64", value, min, max);
    writer.writeBigInt64(value);
  },
  decodeFrom: (reader) => reader.readBigInt64("i64"),
});

export const i128: Codec<bigint> = defineCodec<bigint>({
  name: "i128",
  shape: primitiveShape("i128"),
  encodeTo(value, writer) {
    const { min, max } = bigintBounds("i128");
    assertBigIntInRange("i128", value, min, max);
    writer.writeBigUintLE(value < 0n ? (1n << 128n) + value : value, 16);
  },
  decodeFrom(reader) {
    const raw = reader.readBigUintLE(16, "i128");
    return raw >= 1n << 127n ? raw - (1n << 128n) : raw;
  },
});

/** One byte, `0x00` or `0x01`; any other byte fails with `InvalidTagError`. */
export const bool: Codec<boolean> = defineCodec<boolean>({
  name: "bool",
  shape: primitiveShape("bool"),
  encodeTo(value, writer) {
    if (typeof value !== "boolean") {
      throw new ScaleEncodeError("bool expects a boolean", { value: String(value) });
    }
    writer.writeByte(value ? 1 : 0);
  },
  decodeFrom(reader) {
    const byte = reader.readByte("bool");
    if (byte === 0) return false;
    if (byte === 1) return true;
    throw new InvalidTagError(byte, "bool");
  },
});

export const PRIMITIVE_CODECS: { readonly [K in PrimitiveName]: Codec<PrimitiveValue<K>> } = {
  bool,
  u8,
  u16,
  u32,
  u64,
  u128,
  i8,
  i16,
  i32,
  i64,
  i128,
};

/** `[u8; N]`: exactly `length` raw bytes, no prefix. */
export function fixedBytes(length: number, name = `[u8; ${length}]`): Codec<Uint8Array> {
  return defineCodec<Uint8Array>({
    name,
    shape: { kind: "fixed-array", element: primitiveShape("u8"), length },
    encodeTo(value, writer) {
      if (!(value instanceof Uint8Array) || value.length !== length) {
        throw new ScaleEncodeError(`${name} expects a Uint8Array of ${length} bytes`, {
          actualLength: value instanceof Uint8Array ? value.length : undefined,
        });
      }
      writer.writeBytes(value);
    },
    decodeFrom: (reader) => reader.readBytes(length, name),
  });
}

/** `Vec<u8>` exposed as a `Uint8Array`. */
export const bytes: Codec<Uint8Array> = defineCodec<Uint8Array>({
  name: "Bytes",
  shape: { kind: "sequence", element: primitiveShape("u8") },
  encodeTo(value, writer) {
    if (!(value instanceof Uint8Array)) {
      throw new ScaleEncodeError("Bytes expects a Uint8Array");
    }
    encodeCompactTo(BigInt(value.length), writer);
    writer.writeBytes(value);
  },
  decodeFrom(reader) {
    const length = readLength(reader, "Bytes");
    return reader.readBytes(length, "Bytes");
  },
});

/** UTF-8 text behind a compact byte-length prefix. */
export const str: Codec<string> = defineCodec<string>({
  name: "str",
  shape: { kind: "str" },
  encodeTo(value, writer) {
    if (typeof value !== "string") {
      throw new ScaleEncodeError("str expects a string");
    }
    const encoded = textEncoder.encode(value);
    encodeCompactTo(BigInt(encoded.length), writer);
    writer.writeBytes(encoded);
  },
  decodeFrom(reader) {
    const length = readLength(reader, "str");
    const raw = reader.readBytes(length, "str");
    try {
      return textDecoder.decode(raw);
    } catch (error) {
      throw new InvalidUtf8Error("str", error);
    }
  },
});

/** `()`: no bytes on the wire. */
export const unit: Codec<null> = defineCodec<null>({
  name: "()",
  shape: UNIT_SHAPE,
  encodeTo: () => undefined,
  decodeFrom: () => null,
});
