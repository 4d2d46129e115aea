import { describe, expect, it } from "vitest";
import type { Codec } from "./codec";
import { compact } from "./compact";
import { ScaleError } from "./errors";
import { fixedBytes, u8 } from "./primitives";
import { newtype, phantom, skip, struct } from "./struct";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScaleError) return error.code;
    throw error;
  }
  return undefined;
}

const Header = struct("Header", {
  parentHash: fixedBytes(4),
  number: compact("u32"),
  marker: phantom(),
});

describe("struct", () => {
  it("concatenates non-skipped fields in declaration order", () => {
    const encoded = Header.encode({ parentHash: Uint8Array.from([1, 2, 3, 4]), number: 64, marker: undefined });
    expect(encoded).toEqual(Uint8Array.from([1, 2, 3, 4, 0x01, 0x01]));
  });

  it("fabricates skipped fields without consuming input", () => {
    const { value, bytesRead } = Header.decodePrefix(Uint8Array.from([1, 2, 3, 4, 0x01, 0x01, 0xee]));
    expect(bytesRead).toBe(6);
    expect(value).toEqual({ parentHash: Uint8Array.from([1, 2, 3, 4]), number: 64, marker: undefined });
  });

  it("fills skipped fields from their factory", () => {
    const Counter = struct("Counter", { count: u8, seen: skip(() => new Set<number>()) });
    const decoded = Counter.decode(Uint8Array.from([3]));
    expect(decoded.count).toBe(3);
    expect(decoded.seen).toEqual(new Set());
    expect(Counter.encode({ count: 3, seen: new Set([1, 2]) })).toEqual(Uint8Array.from([3]));
  });

  it("describes skipped fields in its shape", () => {
    expect(Header.shape).toEqual({
      kind: "struct",
      name: "Header",
      fields: [
        { name: "parentHash", shape: { kind: "fixed-array", element: { kind: "primitive", primitive: "u8" }, length: 4 }, skip: false },
        { name: "number", shape: { kind: "compact", inner: { kind: "primitive", primitive: "u32" } }, skip: false },
        { name: "marker", shape: { kind: "tuple", elements: [] }, skip: true },
      ],
    });
  });

  it("aborts on a truncated field", () => {
    expect(codeOf(() => Header.decode(Uint8Array.from([1, 2, 3, 4])))).toBe("UNEXPECTED_EOF");
  });

  it("rejects values missing a field", () => {
    const loose: Codec<unknown> = Header;
    expect(codeOf(() => loose.encode({ parentHash: new Uint8Array(4) }))).toBe("ENCODE_ERROR");
    expect(codeOf(() => loose.encode(42))).toBe("ENCODE_ERROR");
  });

  it("rejects integer-like field names", () => {
    expect(codeOf(() => struct("Pair", { "0": u8, "1": u8 }))).toBe("DEFINITION_ERROR");
  });
});

describe("newtype", () => {
  it("adds no bytes around the inner value", () => {
    const AccountId32 = newtype("AccountId32", fixedBytes(32));
    const account = new Uint8Array(32).fill(7);
    expect(AccountId32.encode(account)).toEqual(account);
    expect(AccountId32.decode(account)).toEqual(account);
    expect(AccountId32.shape).toEqual({
      kind: "struct",
      name: "AccountId32",
      fields: [{ name: "0", shape: { kind: "fixed-array", element: { kind: "primitive", primitive: "u8" }, length: 32 }, skip: false }],
    });
  });
});
