import { describe, expect, it } from "vitest";
import {
  ScaleDecodeError,
  UnexpectedEofError,
  compact,
  enumeration,
  fixedBytes,
  generic,
  genericName,
  keyedVec,
  newtype,
  option,
  phantom,
  struct,
  u128,
  u32,
  u64,
  variant,
  vec,
} from "./index";
import type { Codec, CodecType } from "./index";

const AccountId32 = newtype("AccountId32", fixedBytes(32));
const MessageId = newtype("MessageId", fixedBytes(32));

const Phase = enumeration("Phase", {
  ApplyExtrinsic: variant(0, u32),
  Finalization: variant(1),
  Initialization: variant(2),
});

const GasNodeId = generic("GasNodeId", ["_0", "_1"], <M, R>(node: Codec<M>, reservation: Codec<R>) =>
  enumeration(genericName("GasNodeId", [node, reservation]), {
    Node: variant(0, node),
    Reservation: variant(1, reservation),
  }),
);

const Header = generic("Header", ["_0"], <N>(number: Codec<N>) =>
  struct(genericName("Header", [number]), {
    parentHash: fixedBytes(32),
    number,
    hash: phantom(),
  }),
);

const EventRecord = struct("EventRecord", {
  phase: Phase,
  topics: vec(fixedBytes(32)),
});

describe("wire scenarios", () => {
  it("encodes Option::Some(AccountId32([1; 32])) as 33 bytes", () => {
    const codec = option(AccountId32);
    const account = new Uint8Array(32).fill(0x01);
    const encoded = codec.encode(account);

    expect(encoded.length).toBe(33);
    expect(Array.from(encoded)).toEqual(new Array(33).fill(0x01));

    const { value, remaining } = codec.decodePrefix(encoded);
    expect(value).toEqual(account);
    expect(remaining.length).toBe(0);
  });

  it("encodes Phase::ApplyExtrinsic(7)", () => {
    expect(Array.from(Phase.encode({ variant: "ApplyExtrinsic", value: 7 }))).toEqual([0x00, 0x07, 0x00, 0x00, 0x00]);
  });

  it("decodes a generic enum over newtypes", () => {
    const codec = GasNodeId(MessageId, AccountId32);
    const reservation = new Uint8Array(32).fill(0xaa);
    const encoded = codec.encode({ variant: "Reservation", value: reservation });

    expect(encoded[0]).toBe(1);
    expect(codec.decode(encoded)).toEqual({ variant: "Reservation", value: reservation });
  });

  it("compacts the block number of a header and skips its phantom", () => {
    const codec = Header(compact("u32"));
    const value: CodecType<typeof codec> = { parentHash: new Uint8Array(32), number: 100, hash: undefined };
    const encoded = codec.encode(value);

    expect(encoded.length).toBe(32 + 2);
    expect(Array.from(encoded.subarray(32))).toEqual([0x91, 0x01]);
    expect(codec.decode(encoded)).toEqual(value);
  });

  it("keeps keyed vector order through nested containers", () => {
    const codec = keyedVec(AccountId32, option(u128));
    const first = new Uint8Array(32).fill(2);
    const second = new Uint8Array(32).fill(1);
    const entries: Array<[Uint8Array, bigint | null]> = [
      [first, 10n],
      [second, null],
    ];
    expect(codec.decode(codec.encode(entries))).toEqual(entries);
  });

  it("reports truncated composites as UnexpectedEof", () => {
    const encoded = EventRecord.encode({
      phase: { variant: "Finalization" },
      topics: [new Uint8Array(32).fill(3)],
    });

    for (let length = 0; length < encoded.length; length++) {
      expect(() => EventRecord.decode(encoded.subarray(0, length))).toThrow(UnexpectedEofError);
    }
    expect(() => Header(u64).decode(new Uint8Array(39))).toThrow(ScaleDecodeError);
  });
});
