import { bytesToHex, compareBytes } from "@scale-kit/helpers";
import type { Codec } from "./codec";
import { defineCodec } from "./codec";
import { encodeCompactTo, readLength } from "./compact";
import {
  InvalidCompactLengthError,
  InvalidTagError,
  ScaleError,
  ScaleDefinitionError,
  ScaleEncodeError,
  UnexpectedEofError,
} from "./errors";
import type { ByteReader } from "./io/reader";
import type { CodecShape, SequenceShape, TupleShape } from "./shape";
import { minEncodedSize } from "./shape";

/** `Result<T, E>` as a plain tagged object. */
export type ResultValue<T, E> = { ok: T } | { err: E };

/** Inner shapes whose own value can be `null`, which `option` could not tell apart from `None`. */
function decodesToNull(shape: CodecShape): boolean {
  return shape.kind === "option" || (shape.kind === "tuple" && shape.elements.length === 0);
}

/**
 * `Option<T>`: tag `0x00` for `None`, `0x01` followed by the payload for
 * `Some`. `None` is `null`; inner types that can themselves be `null`
 * (`()` and other options) go through `nestedOption` instead.
 */
export function option<T>(inner: Codec<T>): Codec<T | null> {
  const name = `Option<${inner.name}>`;
  if (decodesToNull(inner.shape)) {
    throw new ScaleDefinitionError(`${name} cannot tell Some from None; use nestedOption`, { inner: inner.name });
  }
  return defineCodec<T | null>({
    name,
    shape: { kind: "option", inner: inner.shape },
    encodeTo(value, writer) {
      if (value === null || value === undefined) {
        writer.writeByte(0);
        return;
      }
      writer.writeByte(1);
      inner.encodeTo(value, writer);
    },
    decodeFrom(reader) {
      const tag = reader.readByte(name);
      if (tag === 0) return null;
      if (tag === 1) return inner.decodeFrom(reader);
      throw new InvalidTagError(tag, name);
    },
  });
}

/**
 * `Option<T>` with `Some` boxed as `{ some }`, for inner types that decode to
 * `null`. Same bytes as `option`.
 */
export function nestedOption<T>(inner: Codec<T>): Codec<{ some: T } | null> {
  const name = `Option<${inner.name}>`;
  return defineCodec<{ some: T } | null>({
    name,
    shape: { kind: "option", inner: inner.shape },
    encodeTo(value, writer) {
      if (value === null || value === undefined) {
        writer.writeByte(0);
        return;
      }
      if (typeof value !== "object" || !("some" in value)) {
        throw new ScaleEncodeError(`${name} expects null or { some }`);
      }
      writer.writeByte(1);
      inner.encodeTo(value.some, writer);
    },
    decodeFrom(reader) {
      const tag = reader.readByte(name);
      if (tag === 0) return null;
      if (tag === 1) return { some: inner.decodeFrom(reader) };
      throw new InvalidTagError(tag, name);
    },
  });
}

export function result<T, E>(ok: Codec<T>, err: Codec<E>): Codec<ResultValue<T, E>> {
  const name = `Result<${ok.name}, ${err.name}>`;
  return defineCodec<ResultValue<T, E>>({
    name,
    shape: { kind: "result", ok: ok.shape, err: err.shape },
    encodeTo(value, writer) {
      if (typeof value !== "object" || value === null) {
        throw new ScaleEncodeError(`${name} expects { ok } or { err }`);
      }
      if ("ok" in value) {
        writer.writeByte(0);
        ok.encodeTo(value.ok, writer);
        return;
      }
      if ("err" in value) {
        writer.writeByte(1);
        err.encodeTo(value.err, writer);
        return;
      }
      throw new ScaleEncodeError(`${name} expects { ok } or { err }`);
    },
    decodeFrom(reader) {
      const tag = reader.readByte(name);
      if (tag === 0) return { ok: ok.decodeFrom(reader) };
      if (tag === 1) return { err: err.decodeFrom(reader) };
      throw new InvalidTagError(tag, name);
    },
  });
}

/** Most elements a sequence of zero-sized values (`()`, phantoms) may declare. */
export const MAX_ZERO_SIZED_ELEMENTS = 65_536;

/**
 * Refuses a declared element count the remaining input cannot hold. Elements
 * that take no bytes cannot be checked against the input, so their count is
 * capped at `MAX_ZERO_SIZED_ELEMENTS`.
 */
export function ensureSequenceFits(count: number, minElementSize: number, reader: ByteReader, context: string) {
  if (minElementSize === 0) {
    if (count > MAX_ZERO_SIZED_ELEMENTS) {
      throw new InvalidCompactLengthError(
        `'${context}' declares ${count} zero-sized elements, more than the limit of ${MAX_ZERO_SIZED_ELEMENTS}`,
        { count, limit: MAX_ZERO_SIZED_ELEMENTS, context },
      );
    }
    return;
  }
  const needed = count * minElementSize;
  if (needed > reader.remaining) {
    throw new UnexpectedEofError(needed, reader.remaining, context);
  }
}

/** Reads a compact element count and checks it against the remaining input. */
export function readSequenceLength(reader: ByteReader, element: CodecShape, context: string): number {
  const count = readLength(reader, context);
  ensureSequenceFits(count, minEncodedSize(element), reader, context);
  return count;
}

function sequence<T>(element: Codec<T>, name: string, shape: SequenceShape): Codec<T[]> {
  return defineCodec<T[]>({
    name,
    shape,
    encodeTo(value, writer) {
      if (!Array.isArray(value)) {
        throw new ScaleEncodeError(`${name} expects an array`);
      }
      encodeCompactTo(BigInt(value.length), writer);
      for (const item of value) {
        element.encodeTo(item, writer);
      }
    },
    decodeFrom(reader) {
      const count = readSequenceLength(reader, element.shape, name);
      const items: T[] = [];
      for (let index = 0; index < count; index++) {
        items.push(element.decodeFrom(reader));
      }
      return items;
    },
  });
}

/** `Vec<T>`: compact element count, then the elements back to back. */
export function vec<T>(element: Codec<T>): Codec<T[]> {
  return sequence(element, `Vec<${element.name}>`, { kind: "sequence", element: element.shape });
}

/**
 * `BoundedVec<T, S>`. The bound is recorded on the shape for tooling; the
 * codec accepts whatever count the bytes declare.
 */
export function boundedVec<T>(element: Codec<T>, bound: number): Codec<T[]> {
  return sequence(element, `BoundedVec<${element.name}, ${bound}>`, {
    kind: "sequence",
    element: element.shape,
    bound,
  });
}

export function weakBoundedVec<T>(element: Codec<T>, bound: number): Codec<T[]> {
  return sequence(element, `WeakBoundedVec<${element.name}, ${bound}>`, {
    kind: "sequence",
    element: element.shape,
    bound,
  });
}

/** `[T; N]`: exactly `length` elements, no prefix. */
export function array<T>(element: Codec<T>, length: number): Codec<T[]> {
  const name = `[${element.name}; ${length}]`;
  return defineCodec<T[]>({
    name,
    shape: { kind: "fixed-array", element: element.shape, length },
    encodeTo(value, writer) {
      if (!Array.isArray(value) || value.length !== length) {
        throw new ScaleEncodeError(`${name} expects an array of ${length} elements`, {
          actualLength: Array.isArray(value) ? value.length : undefined,
        });
      }
      for (const item of value) {
        element.encodeTo(item, writer);
      }
    },
    decodeFrom(reader) {
      const items: T[] = [];
      for (let index = 0; index < length; index++) {
        items.push(element.decodeFrom(reader));
      }
      return items;
    },
  });
}

/** Positional concatenation, e.g. `tuple(u32, bool)` for `(u32, bool)`. */
export function tuple<T extends readonly unknown[]>(...elements: { [K in keyof T]: Codec<T[K]> }): Codec<T> {
  const codecs: readonly Codec<unknown>[] = elements;
  const shape: TupleShape = { kind: "tuple", elements: codecs.map((codec) => codec.shape) };
  const name = codecs.length === 1 ? `(${codecs[0].name},)` : `(${codecs.map((codec) => codec.name).join(", ")})`;

  return defineCodec<T>({
    name,
    shape,
    encodeTo(value, writer) {
      if (!Array.isArray(value) || value.length !== codecs.length) {
        throw new ScaleEncodeError(`${name} expects a tuple of ${codecs.length} elements`);
      }
      codecs.forEach((codec, index) => codec.encodeTo(value[index], writer));
    },
    decodeFrom(reader) {
      return codecs.map((codec) => codec.decodeFrom(reader)) as unknown as T;
    },
  });
}

/**
 * `KeyedVec<K, V>`: a `Vec<(K, V)>` whose entry order is the caller's
 * insertion order, kept as-is in both directions.
 */
export function keyedVec<K, V>(key: Codec<K>, value: Codec<V>): Codec<Array<[K, V]>> {
  const entry = tuple<[K, V]>(key, value);
  return sequence(entry, `KeyedVec<${key.name}, ${value.name}>`, { kind: "sequence", element: entry.shape });
}

/** Orders two keys; negative when `left` sorts first. */
export type KeyComparator<K> = (left: K, right: K) => number;

const utf8 = new TextEncoder();

function isInteger(value: unknown): value is number | bigint {
  return typeof value === "bigint" || (typeof value === "number" && Number.isInteger(value));
}

/**
 * Natural ordering of the key values codecs produce: integers by value,
 * `false` before `true`, strings by their UTF-8 bytes, byte arrays
 * lexicographically, and tuples element by element. Structs and enums need
 * an explicit comparator.
 */
export function defaultKeyOrder(left: unknown, right: unknown): number {
  if (isInteger(left) && isInteger(right)) {
    if (typeof left === "number" && typeof right === "number") return left - right;
    const a = BigInt(left);
    const b = BigInt(right);
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  if (typeof left === "string" && typeof right === "string") {
    return compareBytes(utf8.encode(left), utf8.encode(right));
  }
  if (left instanceof Uint8Array && right instanceof Uint8Array) {
    return compareBytes(left, right);
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    const length = Math.min(left.length, right.length);
    for (let index = 0; index < length; index++) {
      const order = defaultKeyOrder(left[index], right[index]);
      if (order !== 0) return order;
    }
    return left.length - right.length;
  }
  throw new ScaleEncodeError("Keys have no natural order; pass a key comparator", {
    left: typeof left,
    right: typeof right,
  });
}

/** Hex of the key's encoding, or undefined when the value is not a valid key. */
function slotOf<K>(codec: Codec<K>, key: K): string | undefined {
  try {
    return bytesToHex(codec.encode(key));
  } catch (error) {
    if (error instanceof ScaleError) return undefined;
    throw error;
  }
}

/**
 * Map returned by `btreeMap` decoding. Keys are matched by their encoding,
 * so a byte-array or tuple key can be looked up with an equal copy.
 */
export class EncodedKeyMap<K, V> extends Map<K, V> {
  private readonly slots = new Map<string, K>();
  private readonly keyCodec: Codec<K>;

  constructor(keyCodec: Codec<K>) {
    super();
    this.keyCodec = keyCodec;
  }

  override get(key: K): V | undefined {
    const slot = slotOf(this.keyCodec, key);
    const stored = slot === undefined ? undefined : this.slots.get(slot);
    return stored === undefined ? undefined : super.get(stored);
  }

  override has(key: K): boolean {
    const slot = slotOf(this.keyCodec, key);
    return slot !== undefined && this.slots.has(slot);
  }

  override set(key: K, value: V): this {
    const slot = bytesToHex(this.keyCodec.encode(key));
    const stored = this.slots.get(slot);
    if (stored !== undefined) {
      super.set(stored, value);
      return this;
    }
    this.slots.set(slot, key);
    return super.set(key, value);
  }

  override delete(key: K): boolean {
    const slot = slotOf(this.keyCodec, key);
    const stored = slot === undefined ? undefined : this.slots.get(slot);
    if (slot === undefined || stored === undefined) return false;
    this.slots.delete(slot);
    return super.delete(stored);
  }

  override clear(): void {
    this.slots.clear();
    super.clear();
  }
}

/** Set returned by `btreeSet` decoding; members are matched by their encoding. */
export class EncodedKeySet<T> extends Set<T> {
  private readonly members = new Map<string, T>();
  private readonly memberCodec: Codec<T>;

  constructor(memberCodec: Codec<T>) {
    super();
    this.memberCodec = memberCodec;
  }

  override has(member: T): boolean {
    const slot = slotOf(this.memberCodec, member);
    return slot !== undefined && this.members.has(slot);
  }

  override add(member: T): this {
    const slot = bytesToHex(this.memberCodec.encode(member));
    if (this.members.has(slot)) return this;
    this.members.set(slot, member);
    return super.add(member);
  }

  override delete(member: T): boolean {
    const slot = slotOf(this.memberCodec, member);
    const stored = slot === undefined ? undefined : this.members.get(slot);
    if (slot === undefined || stored === undefined) return false;
    this.members.delete(slot);
    return super.delete(stored);
  }

  override clear(): void {
    this.members.clear();
    super.clear();
  }
}

/** Encodes the key of every item and fails on two keys with the same encoding. */
function encodeUnique<E, K>(
  codec: Codec<K>,
  items: Iterable<E>,
  keyOf: (item: E) => K,
  name: string,
): Array<{ item: E; key: K; encoded: Uint8Array }> {
  const seen = new Set<string>();
  const result: Array<{ item: E; key: K; encoded: Uint8Array }> = [];
  for (const item of items) {
    const key = keyOf(item);
    const encoded = codec.encode(key);
    const slot = bytesToHex(encoded);
    if (seen.has(slot)) {
      throw new ScaleEncodeError(`${name} has two keys encoding to 0x${slot}`, { key: slot });
    }
    seen.add(slot);
    result.push({ item, key, encoded });
  }
  return result;
}

/**
 * `BTreeMap<K, V>`: entries written in ascending key order. `compareKeys`
 * defaults to `defaultKeyOrder`; keys with equal encodings are rejected.
 */
export function btreeMap<K, V>(
  key: Codec<K>,
  value: Codec<V>,
  compareKeys: KeyComparator<K> = defaultKeyOrder,
): Codec<Map<K, V>> {
  const name = `BTreeMap<${key.name}, ${value.name}>`;
  const entryShape: TupleShape = { kind: "tuple", elements: [key.shape, value.shape] };

  return defineCodec<Map<K, V>>({
    name,
    shape: { kind: "sequence", element: entryShape },
    encodeTo(map, writer) {
      if (!(map instanceof Map)) {
        throw new ScaleEncodeError(`${name} expects a Map`);
      }
      const entries = encodeUnique(key, map, ([entryKey]) => entryKey, name);
      entries.sort((left, right) => compareKeys(left.key, right.key));
      encodeCompactTo(BigInt(entries.length), writer);
      for (const { item, encoded } of entries) {
        writer.writeBytes(encoded);
        value.encodeTo(item[1], writer);
      }
    },
    decodeFrom(reader) {
      const count = readSequenceLength(reader, entryShape, name);
      const map = new EncodedKeyMap<K, V>(key);
      for (let index = 0; index < count; index++) {
        const entryKey = key.decodeFrom(reader);
        map.set(entryKey, value.decodeFrom(reader));
      }
      return map;
    },
  });
}

/** `BTreeSet<T>`: members written in ascending order, duplicates by encoding rejected. */
export function btreeSet<T>(element: Codec<T>, compareMembers: KeyComparator<T> = defaultKeyOrder): Codec<Set<T>> {
  const name = `BTreeSet<${element.name}>`;

  return defineCodec<Set<T>>({
    name,
    shape: { kind: "sequence", element: element.shape },
    encodeTo(set, writer) {
      if (!(set instanceof Set)) {
        throw new ScaleEncodeError(`${name} expects a Set`);
      }
      const members = encodeUnique(element, set, (member) => member, name);
      members.sort((left, right) => compareMembers(left.key, right.key));
      encodeCompactTo(BigInt(members.length), writer);
      for (const member of members) {
        writer.writeBytes(member.encoded);
      }
    },
    decodeFrom(reader) {
      const count = readSequenceLength(reader, element.shape, name);
      const set = new EncodedKeySet<T>(element);
      for (let index = 0; index < count; index++) {
        set.add(element.decodeFrom(reader));
      }
      return set;
    },
  });
}
