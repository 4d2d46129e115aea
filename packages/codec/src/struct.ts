import type { Codec } from "./codec";
import { defineCodec } from "./codec";
import { ScaleDefinitionError, ScaleEncodeError } from "./errors";
import type { CodecShape, StructFieldShape } from "./shape";
import { UNIT_SHAPE } from "./shape";

/**
 * A field that never reaches the wire. Decoding fills it from `create`.
 * `shape` is kept on the struct shape for tooling only.
 */
export interface SkipField<T> {
  readonly kind: "skip";
  readonly create: () => T;
  readonly shape: CodecShape;
}

export type FieldSpec<T> = Codec<T> | SkipField<T>;

export type StructFields = Record<string, FieldSpec<unknown>>;

export type StructValue<F extends StructFields> = {
  [K in keyof F]: F[K] extends FieldSpec<infer T> ? T : never;
};

export function skip<T>(create: () => T, shape: CodecShape = UNIT_SHAPE): SkipField<T> {
  return { kind: "skip", create, shape };
}

/** `PhantomData<T>`: skipped, decodes to `undefined`. */
export function phantom(): SkipField<undefined> {
  return skip(() => undefined);
}

export function isSkipField(spec: FieldSpec<unknown>): spec is SkipField<unknown> {
  return "kind" in spec && spec.kind === "skip";
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

/** Reads `field` off a value handed to an encoder, failing on non-objects and missing keys. */
export function getField(value: unknown, field: string, context: string): unknown {
  if (typeof value !== "object" || value === null) {
    throw new ScaleEncodeError(`${context} expects an object`, { actualType: value === null ? "null" : typeof value });
  }
  if (!(field in value)) {
    throw new ScaleEncodeError(`${context} is missing field '${field}'`, { field });
  }
  return Reflect.get(value, field);
}

/**
 * Named-field composite. Fields are encoded in the order they appear in
 * `fields`; integer-like names are rejected because objects would reorder them.
 */
export function struct<F extends StructFields>(name: string, fields: F): Codec<StructValue<F>> {
  const entries = Object.entries(fields);
  for (const [fieldName] of entries) {
    if (INTEGER_KEY.test(fieldName)) {
      throw new ScaleDefinitionError(`Struct '${name}' uses integer-like field name '${fieldName}'`, {
        field: fieldName,
      });
    }
  }

  const shapeFields: StructFieldShape[] = entries.map(([fieldName, spec]) => ({
    name: fieldName,
    shape: spec.shape,
    skip: isSkipField(spec),
  }));

  return defineCodec<StructValue<F>>({
    name,
    shape: { kind: "struct", name, fields: shapeFields },
    encodeTo(value, writer) {
      for (const [fieldName, spec] of entries) {
        if (isSkipField(spec)) continue;
        spec.encodeTo(getField(value, fieldName, name), writer);
      }
    },
    decodeFrom(reader) {
      const decoded: Record<string, unknown> = {};
      for (const [fieldName, spec] of entries) {
        decoded[fieldName] = isSkipField(spec) ? spec.create() : spec.decodeFrom(reader);
      }
      return decoded as unknown as StructValue<F>;
    },
  });
}

/**
 * Single unnamed field wrapper such as `ActorId([u8; 32])`. The value is the
 * inner value itself and the bytes are exactly the inner encoding.
 */
export function newtype<T>(name: string, inner: Codec<T>): Codec<T> {
  return defineCodec<T>({
    name,
    shape: { kind: "struct", name, fields: [{ name: "0", shape: inner.shape, skip: false }] },
    encodeTo: (value, writer) => inner.encodeTo(value, writer),
    decodeFrom: (reader) => inner.decodeFrom(reader),
  });
}
