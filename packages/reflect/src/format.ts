import { bytesToHex } from "@scale-kit/helpers";
import type { DecodedStructValue, DecodedValue } from "./decodedValue";
import type { FormattedReflection, FormattedValue } from "./types";

/**
 * Plain data view of a decoded tree: enums become `{ variant, value }`,
 * results `{ ok }` or `{ err }`, byte strings `0x`-prefixed hex and
 * single-field wrappers their inner value.
 */
export function formatDecoded(value: DecodedValue): FormattedValue {
  switch (value.kind) {
    case "primitive":
      return value.value;
    case "compact":
      return value.target === "u64" || value.target === "u128" ? value.value : Number(value.value);
    case "string":
      return value.value;
    case "bytes":
      return `0x${bytesToHex(value.value)}`;
    case "sequence":
    case "array":
      return value.elements.map(formatDecoded);
    case "tuple":
      return value.elements.length === 0 ? null : value.elements.map(formatDecoded);
    case "option":
      return value.value === null ? null : formatDecoded(value.value);
    case "result":
      return value.ok ? { ok: formatDecoded(value.value) } : { err: formatDecoded(value.value) };
    case "struct":
      return formatStruct(value);
    case "enum":
      return { variant: value.variantName, value: value.value === null ? null : formatDecoded(value.value) };
    default:
      value satisfies never;
      return null;
  }
}

function formatStruct(value: DecodedStructValue): FormattedValue {
  const [first] = value.fieldOrder;
  if (value.fieldOrder.length === 1 && value.skippedFields.length === 0 && first.name === "0") {
    return formatDecoded(first.value);
  }
  const formatted: { [key: string]: FormattedValue } = {};
  for (const field of value.fieldOrder) {
    formatted[field.name] = formatDecoded(field.value);
  }
  return formatted;
}

export function formatReflection(value: DecodedValue): FormattedReflection {
  return {
    typeName: value.typeName,
    kind: value.kind,
    value: formatDecoded(value),
    byteRange: { offset: value.byteOffset, size: value.byteLength },
  };
}
