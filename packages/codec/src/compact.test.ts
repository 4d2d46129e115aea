import { describe, expect, it } from "vitest";
import { compact, compactLength, decodeCompact, encodeCompact } from "./compact";
import { ScaleError } from "./errors";

const bytes = (...values: number[]) => Uint8Array.from(values);

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScaleError) return error.code;
    throw error;
  }
  return undefined;
}

describe("compact encoding", () => {
  it("picks the smallest size class at each boundary", () => {
    expect(encodeCompact(0)).toEqual(bytes(0x00));
    expect(encodeCompact(1)).toEqual(bytes(0x04));
    expect(encodeCompact(63)).toEqual(bytes(0xfc));
    expect(encodeCompact(64)).toEqual(bytes(0x01, 0x01));
    expect(encodeCompact(16383)).toEqual(bytes(0xfd, 0xff));
    expect(encodeCompact(16384)).toEqual(bytes(0x02, 0x00, 0x01, 0x00));
    expect(encodeCompact(2 ** 30 - 1)).toEqual(bytes(0xfe, 0xff, 0xff, 0xff));
    expect(encodeCompact(2 ** 30)).toEqual(bytes(0x03, 0x00, 0x00, 0x00, 0x40));
  });

  it("stores the byte count minus four in the big-integer prefix", () => {
    const encoded = encodeCompact((1n << 64n) - 1n);
    expect(encoded[0]).toBe(0x13);
    expect(Array.from(encoded.subarray(1))).toEqual(new Array(8).fill(0xff));
  });

  it("keeps values below 64 in single-byte mode", () => {
    for (let value = 0; value < 64; value++) {
      const encoded = encodeCompact(value);
      expect(encoded.length).toBe(1);
      expect(encoded[0] & 0b11).toBe(0);
    }
  });

  it("reports the encoded length without encoding", () => {
    expect(compactLength(63n)).toBe(1);
    expect(compactLength(64n)).toBe(2);
    expect(compactLength(16384n)).toBe(4);
    expect(compactLength(1n << 30n)).toBe(5);
    expect(compactLength(1n << 127n)).toBe(17);
  });

  it("rejects negative values", () => {
    expect(codeOf(() => encodeCompact(-1))).toBe("ENCODE_ERROR");
    expect(codeOf(() => encodeCompact(1.5))).toBe("ENCODE_ERROR");
  });
});

describe("compact decoding", () => {
  it("accepts non-minimal encodings in every wider mode", () => {
    expect(decodeCompact(bytes(0x05, 0x00))).toEqual({ value: 1n, bytesRead: 2 });
    expect(decodeCompact(bytes(0x06, 0x00, 0x00, 0x00))).toEqual({ value: 1n, bytesRead: 4 });
    expect(decodeCompact(bytes(0x03, 0x01, 0x00, 0x00, 0x00))).toEqual({ value: 1n, bytesRead: 5 });
  });

  it("fails with UNEXPECTED_EOF when the big-integer body is cut short", () => {
    expect(codeOf(() => decodeCompact(bytes(0x03, 0x01)))).toBe("UNEXPECTED_EOF");
    expect(codeOf(() => decodeCompact(bytes()))).toBe("UNEXPECTED_EOF");
  });

  it("round-trips u128 amounts", () => {
    const amount = 340_282_366_920_938_463_463_374_607_431_768_211_455n;
    const codec = compact("u128");
    const encoded = codec.encode(amount);
    expect(encoded.length).toBe(17);
    expect(codec.decode(encoded)).toBe(amount);
  });
});

describe("compact(target)", () => {
  it("decodes to number for widths up to 32 bits", () => {
    const codec = compact("u32");
    expect(codec.encode(16384)).toEqual(bytes(0x02, 0x00, 0x01, 0x00));
    expect(codec.decode(bytes(0x02, 0x00, 0x01, 0x00))).toBe(16384);
    expect(codec.name).toBe("Compact<u32>");
    expect(codec.shape).toEqual({ kind: "compact", inner: { kind: "primitive", primitive: "u32" } });
  });

  it("accepts a four-byte big-integer body for narrow targets", () => {
    expect(compact("u8").decode(bytes(0x03, 0x01, 0x00, 0x00, 0x00))).toBe(1);
  });

  it("rejects values that overflow the target", () => {
    expect(codeOf(() => compact("u8").decode(bytes(0x01, 0x04)))).toBe("INVALID_COMPACT_LENGTH");
    expect(codeOf(() => compact("u8").encode(256))).toBe("ENCODE_ERROR");
  });

  it("rejects a prefix declaring more bytes than the target holds", () => {
    const input = bytes(0x07, 0x01, 0x00, 0x00, 0x00, 0x00);
    expect(codeOf(() => compact("u32").decode(input))).toBe("INVALID_COMPACT_LENGTH");
  });
});
