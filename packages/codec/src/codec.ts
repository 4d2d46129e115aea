import { TrailingBytesError } from "./errors";
import { ByteReader } from "./io/reader";
import { ByteWriter } from "./io/writer";
import type { CodecLogger } from "./logger";
import { NOOP_LOGGER } from "./logger";
import type { CodecShape } from "./shape";

export interface DecodeOptions {
  /** Accept input that is longer than the decoded value (default: false). */
  allowTrailingBytes?: boolean;
  /** Receives a warning when trailing bytes are tolerated (default: NOOP_LOGGER). */
  logger?: CodecLogger;
}

export interface DecodePrefixResult<T> {
  value: T;
  bytesRead: number;
  remaining: Uint8Array;
}

/**
 * Encoder/decoder pair for one concrete type. Codecs are immutable and hold
 * no state between calls.
 */
export interface Codec<T> {
  readonly name: string;
  readonly shape: CodecShape;
  encodeTo(value: T, writer: ByteWriter): void;
  decodeFrom(reader: ByteReader): T;
  encode(value: T): Uint8Array;
  /** Decodes the whole buffer; leftover bytes fail with `TrailingBytesError` unless allowed. */
  decode(bytes: Uint8Array, options?: DecodeOptions): T;
  /** Decodes one value from the start of the buffer and returns what is left. */
  decodePrefix(bytes: Uint8Array): DecodePrefixResult<T>;
}

/** Value type carried by a codec, e.g. `CodecType<typeof Phase>`. */
export type CodecType<C> = C extends Codec<infer T> ? T : never;

export interface CodecDefinition<T> {
  name: string;
  shape: CodecShape;
  encodeTo(value: T, writer: ByteWriter): void;
  decodeFrom(reader: ByteReader): T;
}

export function defineCodec<T>(definition: CodecDefinition<T>): Codec<T> {
  const { name, shape, encodeTo, decodeFrom } = definition;

  return {
    name,
    shape,
    encodeTo,
    decodeFrom,
    encode(value: T): Uint8Array {
      const writer = new ByteWriter();
      encodeTo(value, writer);
      return writer.finish();
    },
    decode(bytes: Uint8Array, options: DecodeOptions = {}): T {
      const reader = new ByteReader(bytes);
      const value = decodeFrom(reader);
      if (reader.remaining > 0) {
        if (!options.allowTrailingBytes) {
          throw new TrailingBytesError(reader.remaining, name);
        }
        (options.logger ?? NOOP_LOGGER).warn("ignoring trailing bytes after decoded value", {
          codec: name,
          remaining: reader.remaining,
        });
      }
      return value;
    },
    decodePrefix(bytes: Uint8Array): DecodePrefixResult<T> {
      const reader = new ByteReader(bytes);
      const value = decodeFrom(reader);
      return { value, bytesRead: reader.offset, remaining: bytes.subarray(reader.offset) };
    },
  };
}
