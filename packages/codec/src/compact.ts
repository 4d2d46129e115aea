import type { Codec } from "./codec";
import { defineCodec } from "./codec";
import { InvalidCompactLengthError, ScaleEncodeError } from "./errors";
import { ByteReader } from "./io/reader";
import { ByteWriter } from "./io/writer";
import type { UnsignedPrimitive } from "./shape";
import { PRIMITIVE_WIDTHS, primitiveShape } from "./shape";

const SINGLE_BYTE_LIMIT = 1n << 6n;
const TWO_BYTE_LIMIT = 1n << 14n;
const FOUR_BYTE_LIMIT = 1n << 30n;

/** The big-integer prefix stores `byteCount - 4` in six bits. */
export const MAX_COMPACT_BYTES = 4 + 0b111111;

function minimalByteLength(value: bigint): number {
  let length = 0;
  let remaining = value;
  while (remaining > 0n) {
    remaining >>= 8n;
    length++;
  }
  return Math.max(length, 4);
}

/** Number of bytes the canonical compact encoding of `value` occupies. */
export function compactLength(value: bigint): number {
  if (value < SINGLE_BYTE_LIMIT) return 1;
  if (value < TWO_BYTE_LIMIT) return 2;
  if (value < FOUR_BYTE_LIMIT) return 4;
  return 1 + minimalByteLength(value);
}

/** Writes `value` using the smallest of the four size classes. */
export function encodeCompactTo(value: bigint, writer: ByteWriter): void {
  if (value < 0n) {
    throw new ScaleEncodeError("Compact integers must be non-negative", { value: value.toString() });
  }
  if (value < SINGLE_BYTE_LIMIT) {
    writer.writeByte(Number(value) << 2);
    return;
  }
  if (value < TWO_BYTE_LIMIT) {
    writer.writeUint16((Number(value) << 2) | 0b01);
    return;
  }
  if (value < FOUR_BYTE_LIMIT) {
    writer.writeUint32(Number(value) * 4 + 0b10);
    return;
  }
  const byteLength = minimalByteLength(value);
  if (byteLength > MAX_COMPACT_BYTES) {
    throw new ScaleEncodeError(`Compact integers are limited to ${MAX_COMPACT_BYTES} bytes`, {
      byteLength,
    });
  }
  writer.writeByte(((byteLength - 4) << 2) | 0b11);
  writer.writeBigUintLE(value, byteLength);
}

/**
 * Reads a compact integer in any of the four modes. Non-minimal encodings are
 * accepted. A big-integer prefix announcing more than `maxByteLength` bytes is
 * rejected before any of those bytes are read.
 */
export function decodeCompactFrom(reader: ByteReader, maxByteLength = MAX_COMPACT_BYTES, context = "Compact"): bigint {
  const first = reader.readByte(context);
  switch (first & 0b11) {
    case 0b00:
      return BigInt(first >> 2);
    case 0b01: {
      const second = reader.readByte(context);
      return BigInt(((second << 8) | first) >> 2);
    }
    case 0b10: {
      const rest = reader.readBytes(3, context);
      const word = (first | (rest[0] << 8) | (rest[1] << 16) | (rest[2] << 24)) >>> 0;
      return BigInt(word >>> 2);
    }
    default: {
      const byteLength = (first >> 2) + 4;
      if (byteLength > maxByteLength) {
        throw new InvalidCompactLengthError(
          `Compact prefix of '${context}' declares ${byteLength} bytes, at most ${maxByteLength} are allowed`,
          { byteLength, maxByteLength },
        );
      }
      return reader.readBigUintLE(byteLength, context);
    }
  }
}

export function encodeCompact(value: bigint | number): Uint8Array {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new ScaleEncodeError("Compact integers must be safe integers or bigints", { value });
  }
  const writer = new ByteWriter(8);
  encodeCompactTo(BigInt(value), writer);
  return writer.finish();
}

/** Decodes a compact integer from the start of `bytes`. */
export function decodeCompact(bytes: Uint8Array): { value: bigint; bytesRead: number } {
  const reader = new ByteReader(bytes);
  const value = decodeCompactFrom(reader);
  return { value, bytesRead: reader.offset };
}

function unsignedMax(target: UnsignedPrimitive): bigint {
  return (1n << BigInt(PRIMITIVE_WIDTHS[target] * 8)) - 1n;
}

/**
 * Reads a compact integer whose value must fit `target`. The big-integer prefix
 * may announce at most `max(4, width)` bytes.
 */
export function decodeCompactAs(reader: ByteReader, target: UnsignedPrimitive, context = `Compact<${target}>`): bigint {
  const value = decodeCompactFrom(reader, Math.max(4, PRIMITIVE_WIDTHS[target]), context);
  if (value > unsignedMax(target)) {
    throw new InvalidCompactLengthError(`Compact value of '${context}' does not fit in ${target}`, {
      value: value.toString(),
      target,
    });
  }
  return value;
}

export function compact(target: "u8" | "u16" | "u32"): Codec<number>;
export function compact(target: "u64" | "u128"): Codec<bigint>;
export function compact(target: UnsignedPrimitive): Codec<number> | Codec<bigint> {
  const name = `Compact<${target}>`;
  const shape = { kind: "compact" as const, inner: primitiveShape(target) };
  const max = unsignedMax(target);

  if (target === "u64" || target === "u128") {
    return defineCodec<bigint>({
      name,
      shape,
      encodeTo(value, writer) {
        if (typeof value !== "bigint" || value < 0n || value > max) {
          throw new ScaleEncodeError(`${name} expects a bigint in 0..=${max}`, { value: String(value) });
        }
        encodeCompactTo(value, writer);
      },
      decodeFrom(reader) {
        return decodeCompactAs(reader, target, name);
      },
    });
  }

  return defineCodec<number>({
    name,
    shape,
    encodeTo(value, writer) {
      if (!Number.isInteger(value) || value < 0 || BigInt(value) > max) {
        throw new ScaleEncodeError(`${name} expects an integer in 0..=${max}`, { value });
      }
      encodeCompactTo(BigInt(value), writer);
    },
    decodeFrom(reader) {
      return Number(decodeCompactAs(reader, target, name));
    },
  });
}

/** Compact-encoded length prefix used by sequences and strings. */
export function readLength(reader: ByteReader, context: string): number {
  const length = decodeCompactFrom(reader, MAX_COMPACT_BYTES, context);
  if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new InvalidCompactLengthError(`Length prefix of '${context}' is out of range`, {
      length: length.toString(),
    });
  }
  return Number(length);
}
