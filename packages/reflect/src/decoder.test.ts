import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ScaleDefinitionError, primitiveShape } from "@scale-kit/codec";
import type { CodecLogger } from "@scale-kit/codec";
import { concatBytes } from "@scale-kit/helpers";
import { describe, expect, it, vi } from "vitest";
import type { DecodedValue } from "./decodedValue";
import { decodeAsType, decodeData } from "./decoder";
import { ReflectDecodeError } from "./errors";
import { formatDecoded } from "./format";
import { loadTypeRegistry } from "./typeRegistry";

const here = fileURLToPath(new URL(".", import.meta.url));
const fixture = fs.readFileSync(path.resolve(here, "../test/fixtures/runtime-types.yaml"), "utf8");
const registry = loadTypeRegistry(fixture);

type DecodedOfKind<K extends DecodedValue["kind"]> = Extract<DecodedValue, { kind: K }>;

function isKind<K extends DecodedValue["kind"]>(value: DecodedValue, kind: K): value is DecodedOfKind<K> {
  return value.kind === kind;
}

function asKind<K extends DecodedValue["kind"]>(value: DecodedValue | null | undefined, kind: K): DecodedOfKind<K> {
  if (!value || !isKind(value, kind)) {
    throw new Error(`Expected a ${kind} node, got ${value?.kind ?? "nothing"}`);
  }
  return value;
}

function decodeError(fn: () => unknown): ReflectDecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ReflectDecodeError) return error;
    throw error;
  }
  throw new Error("Expected decoding to fail");
}

function recordingLogger(): CodecLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const eventRecordBytes = concatBytes([
  Uint8Array.of(0x00, 0x07, 0x00, 0x00, 0x00),
  Uint8Array.of(0x03, 0x08, 0xde, 0xad),
  Uint8Array.of(0x04),
  new Uint8Array(32).fill(0x11),
]);

describe("decodeAsType", () => {
  it("decodes a struct of enums and sequences", () => {
    const record = asKind(decodeData(fixture, "EventRecord", eventRecordBytes), "struct");

    expect(record.typeName).toBe("EventRecord");
    expect(record.byteOffset).toBe(0);
    expect(record.byteLength).toBe(42);
    expect(record.fieldOrder.map((field) => field.name)).toEqual(["phase", "event", "topics"]);

    const phase = asKind(record.fields.phase, "enum");
    expect(phase.typeName).toBe("Phase");
    expect(phase.variantName).toBe("ApplyExtrinsic");
    expect(phase.rawHex).toBe("0007000000");
    expect(asKind(phase.value, "primitive").value).toBe(7);

    const remark = asKind(asKind(record.fields.event, "enum").value, "bytes");
    expect(remark.byteOffset).toBe(6);
    expect(remark.byteLength).toBe(3);
    expect(remark.rawHex).toBe("08dead");

    const topics = asKind(record.fields.topics, "sequence");
    expect(topics.length).toBe(1);
    expect(asKind(topics.elements[0], "bytes").typeName).toBe("H256");

    expect(formatDecoded(record)).toEqual({
      phase: { variant: "ApplyExtrinsic", value: 7 },
      event: { variant: "Remark", value: "0xdead" },
      topics: [`0x${"11".repeat(32)}`],
    });
  });

  it("selects sparse discriminants by index", () => {
    const unsupported = asKind(decodeAsType(Uint8Array.of(0xff), "RuntimeEvent", registry), "enum");
    expect(unsupported.index).toBe(255);
    expect(unsupported.variantName).toBe("Unsupported");
    expect(formatDecoded(unsupported)).toEqual({ variant: "Unsupported", value: null });

    const error = decodeError(() => decodeAsType(Uint8Array.of(0x02), "RuntimeEvent", registry));
    expect(error.code).toBe("UNKNOWN_VARIANT");
    expect(error.path).toBe("RuntimeEvent");
    expect(error.details).toEqual({ discriminant: 2, availableIndices: [0, 3, 255], path: "RuntimeEvent" });
  });

  it("leaves ignored variants out of the wire table", () => {
    expect(asKind(decodeAsType(Uint8Array.of(0xff), "Status", registry), "enum").variantName).toBe("Unsupported");
    const error = decodeError(() => decodeAsType(Uint8Array.of(0x02), "Status", registry));
    expect(error.details?.availableIndices).toEqual([0, 1, 255]);
  });

  it("instantiates generic structs with compact fields and skips phantoms", () => {
    const bytes = concatBytes([new Uint8Array(32), Uint8Array.of(0x91, 0x01)]);
    const header = asKind(decodeAsType(bytes, "Header<u32, Balance>", registry), "struct");

    expect(header.typeName).toBe("Header<u32, Balance>");
    expect(header.byteLength).toBe(34);
    expect(header.skippedFields).toEqual(["hashing"]);
    const number = asKind(header.fields.number, "compact");
    expect(number.value).toBe(100n);
    expect(number.target).toBe("u32");
    expect(formatDecoded(header)).toEqual({ parentHash: `0x${"00".repeat(32)}`, number: 100 });
  });

  it("unwraps newtypes inside generic enums when formatting", () => {
    const bytes = concatBytes([Uint8Array.of(0x01), new Uint8Array(32).fill(0xaa)]);
    const node = asKind(decodeAsType(bytes, "GasNodeId<MessageId, AccountId32>", registry), "enum");

    expect(node.typeName).toBe("GasNodeId<MessageId, AccountId32>");
    expect(formatDecoded(node)).toEqual({ variant: "Reservation", value: `0x${"aa".repeat(32)}` });
  });

  it("decodes options, results, bounded vectors and tuples", () => {
    const bytes = Uint8Array.of(
      0x02, 0x09, 0x3d, 0x00, // weight: Compact<Weight> = 1_000_000
      0x01, 0x08, 0x68, 0x69, // memo: Some("hi")
      0x01, 0x05, // outcome: Err(5)
      0x08, 0x01, 0x00, 0x02, 0x00, // limits: [1, 2]
      0x01, 0xfe, 0xff, // pair: (true, -2)
    );
    const dispatch = asKind(decodeAsType(bytes, "Dispatch", registry), "struct");

    expect(asKind(dispatch.fields.limits, "sequence").bound).toBe(4);
    expect(asKind(dispatch.fields.outcome, "result").ok).toBe(false);
    expect(formatDecoded(dispatch)).toEqual({
      weight: 1_000_000n,
      memo: "hi",
      outcome: { err: 5 },
      limits: [1, 2],
      pair: [true, -2],
    });
  });

  it("decodes guarded recursive types", () => {
    const tree = decodeAsType(Uint8Array.of(0x01, 0x04, 0x02, 0x00), "Tree", registry);
    expect(formatDecoded(tree)).toEqual({ value: 1, children: [{ value: 2, children: [] }] });
  });

  it("decodes plain shapes without a registry", () => {
    const sequence = asKind(
      decodeAsType(Uint8Array.of(0x08, 0x01, 0x00, 0x02, 0x00), { kind: "sequence", element: primitiveShape("u16") }),
      "sequence",
    );
    expect(sequence.typeName).toBeUndefined();
    const second = asKind(sequence.elements[1], "primitive");
    expect(second.byteOffset).toBe(3);
    expect(second.rawHex).toBe("0200");

    expect(asKind(decodeAsType(new Uint8Array(16).fill(0xff), "i128"), "primitive").value).toBe(-1n);
    expect(asKind(decodeAsType(Uint8Array.of(0x01), "bool"), "primitive").value).toBe(true);
  });

  it("omits raw hex when asked to", () => {
    const value = decodeAsType(Uint8Array.of(0x2a), "u8", undefined, { includeRawHex: false });
    expect(value.rawHex).toBeUndefined();
    expect(value.byteLength).toBe(1);
  });

  it("labels aliases with their registry name", () => {
    const balance = asKind(decodeAsType(Uint8Array.of(0x0a, ...new Uint8Array(15)), "Balance", registry), "primitive");
    expect(balance.typeName).toBe("Balance");
    expect(balance.value).toBe(10n);
  });
});

describe("decodeAsType failures", () => {
  it("reports truncated input with the path of the failing field", () => {
    const error = decodeError(() => decodeAsType(eventRecordBytes.subarray(0, 3), "EventRecord", registry));
    expect(error.code).toBe("UNEXPECTED_EOF");
    expect(error.path).toBe("EventRecord.phase.ApplyExtrinsic");

    const short = decodeError(() => decodeAsType(eventRecordBytes.subarray(0, 20), "EventRecord", registry));
    expect(short.path).toBe("EventRecord.topics");
    expect(short.details).toMatchObject({ requested: 32, remaining: 10 });
  });

  it("fails on every truncation of a composite", () => {
    for (let length = 0; length < eventRecordBytes.length; length++) {
      expect(decodeError(() => decodeAsType(eventRecordBytes.subarray(0, length), "EventRecord", registry)).code).toBe(
        "UNEXPECTED_EOF",
      );
    }
  });

  it("caps the count of zero-sized elements", () => {
    const error = decodeError(() => decodeAsType(Uint8Array.of(0x02, 0x09, 0x3d, 0x00), "Vec<()>"));
    expect(error.code).toBe("INVALID_COMPACT_LENGTH");
    expect(error.path).toBe("Vec<()>");
    expect(error.details).toMatchObject({ count: 1000000, limit: 65536 });

    expect(asKind(decodeAsType(Uint8Array.of(0x08), "Vec<()>"), "sequence").length).toBe(2);
  });

  it("rejects option tags other than 0 and 1", () => {
    const error = decodeError(() => decodeAsType(Uint8Array.of(0x00, 0x02), "Dispatch", registry));
    expect(error.code).toBe("INVALID_TAG");
    expect(error.path).toBe("Dispatch.memo");
  });

  it("rejects invalid UTF-8 in strings", () => {
    const error = decodeError(() => decodeAsType(Uint8Array.of(0x00, 0x01, 0x04, 0xff), "Dispatch", registry));
    expect(error.code).toBe("INVALID_UTF8");
    expect(error.path).toBe("Dispatch.memo.Some");
    expect(error.cause).toBeInstanceOf(Error);
  });

  it("rejects trailing bytes unless allowed", () => {
    const error = decodeError(() => decodeAsType(Uint8Array.of(0x01, 0x02), "u8"));
    expect(error.code).toBe("TRAILING_BYTES");
    expect(error.path).toBe("u8");

    const logger = recordingLogger();
    const value = decodeAsType(Uint8Array.of(0x01, 0x02), "u8", undefined, { allowTrailingBytes: true, logger });
    expect(formatDecoded(value)).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("ignoring trailing bytes after decoded value", { type: "u8", remaining: 1 });
  });

  it("refuses descriptors it cannot resolve before reading any bytes", () => {
    expect(() => decodeAsType(Uint8Array.of(0x00), "Phase")).toThrow("Type 'Phase' references unknown type 'Phase'");
    expect(() => decodeAsType(Uint8Array.of(0x00), { kind: "param", name: "T" })).toThrow(ScaleDefinitionError);
    expect(() => decodeAsType(Uint8Array.of(0x00), "Compact<i8>")).toThrow(ScaleDefinitionError);
    expect(() => decodeData(fixture, "  ", Uint8Array.of(0x00))).toThrow("decodeData requires a non-empty typeName");
  });
});
