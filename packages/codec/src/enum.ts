import type { Codec } from "./codec";
import { defineCodec } from "./codec";
import { ScaleDefinitionError, ScaleEncodeError, UnknownVariantError } from "./errors";
import type { CodecLogger } from "./logger";
import { NOOP_LOGGER } from "./logger";
import type { EnumVariantShape } from "./shape";
import { getField } from "./struct";

export interface VariantSpec<P> {
  readonly kind: "variant";
  readonly index: number;
  readonly payload: Codec<P> | null;
}

/**
 * Placeholder for a variant that only exists to hold an unused type
 * parameter. It has no discriminant and is left out of the wire table.
 */
export interface IgnoredVariant {
  readonly kind: "ignore";
}

export type EnumVariants = Record<string, VariantSpec<unknown> | IgnoredVariant>;

type WireVariantName<V extends EnumVariants> = {
  [K in keyof V]: V[K] extends IgnoredVariant ? never : K;
}[keyof V] &
  string;

export type EnumValue<V extends EnumVariants> = {
  [K in WireVariantName<V>]: V[K] extends VariantSpec<infer P>
    ? [P] extends [undefined]
      ? { variant: K; value?: undefined }
      : { variant: K; value: P }
    : never;
}[WireVariantName<V>];

export function variant(index: number): VariantSpec<undefined>;
export function variant<P>(index: number, payload: Codec<P>): VariantSpec<P>;
export function variant<P>(index: number, payload?: Codec<P>): VariantSpec<P> | VariantSpec<undefined> {
  return { kind: "variant", index, payload: payload ?? null };
}

export function ignored(): IgnoredVariant {
  return { kind: "ignore" };
}

export interface EnumOptions {
  logger?: CodecLogger;
}

interface WireVariant {
  name: string;
  index: number;
  payload: Codec<unknown> | null;
}

function buildWireTable(name: string, variants: EnumVariants, logger: CodecLogger): WireVariant[] {
  const table: WireVariant[] = [];
  const seen = new Map<number, string>();

  for (const [variantName, spec] of Object.entries(variants)) {
    if (spec.kind === "ignore") {
      logger.debug("dropping ignored variant from wire table", { enum: name, variant: variantName });
      continue;
    }
    if (!Number.isInteger(spec.index) || spec.index < 0 || spec.index > 0xff) {
      throw new ScaleDefinitionError(`Variant '${name}::${variantName}' has discriminant ${spec.index} outside 0..=255`, {
        variant: variantName,
        index: spec.index,
      });
    }
    const previous = seen.get(spec.index);
    if (previous !== undefined) {
      throw new ScaleDefinitionError(
        `Variants '${previous}' and '${variantName}' of '${name}' share discriminant ${spec.index}`,
        { index: spec.index },
      );
    }
    seen.set(spec.index, variantName);
    table.push({ name: variantName, index: spec.index, payload: spec.payload });
  }

  return table;
}

/**
 * Tagged union with explicitly assigned discriminants. Declaration order is
 * irrelevant to the wire; only `variant(index)` decides the tag byte.
 */
export function enumeration<V extends EnumVariants>(
  name: string,
  variants: V,
  options: EnumOptions = {},
): Codec<EnumValue<V>> {
  const table = buildWireTable(name, variants, options.logger ?? NOOP_LOGGER);
  const byName = new Map(table.map((entry) => [entry.name, entry]));
  const byIndex = new Map(table.map((entry) => [entry.index, entry]));
  const indices = table.map((entry) => entry.index).sort((a, b) => a - b);
  const shapeVariants: EnumVariantShape[] = table.map((entry) => ({
    index: entry.index,
    name: entry.name,
    payload: entry.payload ? entry.payload.shape : null,
  }));

  return defineCodec<EnumValue<V>>({
    name,
    shape: { kind: "enum", name, variants: shapeVariants },
    encodeTo(value, writer) {
      const variantName = getField(value, "variant", name);
      const entry = typeof variantName === "string" ? byName.get(variantName) : undefined;
      if (!entry) {
        throw new ScaleEncodeError(`Enum '${name}' has no variant named '${String(variantName)}'`, {
          available: Array.from(byName.keys()),
        });
      }
      writer.writeByte(entry.index);
      entry.payload?.encodeTo(getField(value, "value", `${name}::${entry.name}`), writer);
    },
    decodeFrom(reader) {
      const discriminant = reader.readByte(name);
      const entry = byIndex.get(discriminant);
      if (!entry) {
        throw new UnknownVariantError(discriminant, name, indices);
      }
      const decoded = entry.payload
        ? { variant: entry.name, value: entry.payload.decodeFrom(reader) }
        : { variant: entry.name };
      return decoded as unknown as EnumValue<V>;
    },
  });
}
