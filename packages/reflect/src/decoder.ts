import {
  ByteReader,
  InvalidTagError,
  NOOP_LOGGER,
  PRIMITIVE_CODECS,
  ScaleDecodeError,
  ScaleDefinitionError,
  TrailingBytesError,
  UnknownVariantError,
  collectParams,
  decodeCompactAs,
  describeShape,
  ensureSequenceFits,
  isByteShape,
  isUnsignedPrimitive,
  minEncodedSize,
  readLength,
  str,
} from "@scale-kit/codec";
import type {
  CodecLogger,
  CodecShape,
  EnumShape,
  FixedArrayShape,
  OptionShape,
  ResultShape,
  SequenceShape,
  ShapeResolver,
  StructShape,
  TupleShape,
  UnsignedPrimitive,
} from "@scale-kit/codec";
import { bytesToHex, toUint8Array } from "@scale-kit/helpers";
import type { BytesLike } from "@scale-kit/helpers";
import type {
  DecodedEnumValue,
  DecodedField,
  DecodedOptionValue,
  DecodedResultValue,
  DecodedStructValue,
  DecodedTupleValue,
  DecodedValue,
} from "./decodedValue";
import { ReflectDecodeError } from "./errors";
import { parseTypeExpression } from "./typeExpression";
import type { TypeRegistry, TypeRegistryOptions } from "./typeRegistry";
import { loadTypeRegistry, validateShapeReferences } from "./typeRegistry";

export interface ReflectOptions {
  /** Accept input that is longer than the decoded value (default: false). */
  allowTrailingBytes?: boolean;
  /** Attach the hex of each value's bytes to its node (default: true). */
  includeRawHex?: boolean;
  logger?: CodecLogger;
}

interface DecodeState {
  reader: ByteReader;
  registry?: TypeRegistry;
  resolve: ShapeResolver;
  includeRawHex: boolean;
}

interface Span {
  typeName?: string;
  byteOffset: number;
  byteLength: number;
  rawHex?: string;
}

/**
 * Decodes `bytes` against a runtime description of their type, either a
 * shape or a type expression such as `Vec<EventRecord>` whose names are
 * looked up in `registry`.
 */
export function decodeAsType(
  bytes: BytesLike,
  descriptor: string | CodecShape,
  registry?: TypeRegistry,
  options: ReflectOptions = {},
): DecodedValue {
  const shape = typeof descriptor === "string" ? parseTypeExpression(descriptor) : descriptor;
  const rootName = typeof descriptor === "string" ? descriptor.trim() : describeShape(shape);

  const unbound = Array.from(collectParams(shape));
  if (unbound.length > 0) {
    throw new ScaleDefinitionError(`Cannot decode '${rootName}' with unbound type parameters`, { params: unbound });
  }
  validateShapeReferences(shape, registry, rootName);

  const state: DecodeState = {
    reader: new ByteReader(toUint8Array(bytes)),
    registry,
    resolve: (ref) => requireRegistry(state, ref.name).resolve(ref),
    includeRawHex: options.includeRawHex ?? true,
  };

  const value = decodeShape(shape, state, rootName);

  const { remaining } = state.reader;
  if (remaining > 0) {
    if (!options.allowTrailingBytes) {
      throw new ReflectDecodeError(rootName, new TrailingBytesError(remaining, rootName));
    }
    (options.logger ?? NOOP_LOGGER).warn("ignoring trailing bytes after decoded value", {
      type: rootName,
      remaining,
    });
  }
  return value;
}

/** Loads a registry from YAML and decodes one value of `typeName` from it. */
export function decodeData(
  yamlText: string,
  typeName: string,
  bytes: BytesLike,
  options: ReflectOptions & TypeRegistryOptions = {},
): DecodedValue {
  const trimmed = typeName.trim();
  if (!trimmed) {
    throw new ScaleDefinitionError("decodeData requires a non-empty typeName argument");
  }
  const registry = loadTypeRegistry(yamlText, { logger: options.logger, cache: options.cache });
  return decodeAsType(bytes, trimmed, registry, options);
}

function requireRegistry(state: DecodeState, typeName: string): TypeRegistry {
  if (!state.registry) {
    throw new ScaleDefinitionError(`Type '${typeName}' can only be decoded with a registry`, { typeName });
  }
  return state.registry;
}

/** Runs one read and attaches `path` to any decode failure it raises. */
function atPath<T>(path: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof ScaleDecodeError) {
      throw new ReflectDecodeError(path, error);
    }
    throw error;
  }
}

function span(state: DecodeState, start: number, typeName?: string): Span {
  const end = state.reader.offset;
  const result: Span = { byteOffset: start, byteLength: end - start };
  if (typeName !== undefined) {
    result.typeName = typeName;
  }
  if (state.includeRawHex) {
    result.rawHex = bytesToHex(state.reader.source.subarray(start, end));
  }
  return result;
}

function decodeShape(shape: CodecShape, state: DecodeState, path: string, typeName?: string): DecodedValue {
  const start = state.reader.offset;
  const { reader } = state;

  switch (shape.kind) {
    case "type-ref":
      return decodeShape(state.resolve(shape), state, path, describeShape(shape));
    case "primitive": {
      const codec = PRIMITIVE_CODECS[shape.primitive];
      const value = atPath(path, () => codec.decodeFrom(reader));
      return { kind: "primitive", ...span(state, start, typeName), primitiveType: shape.primitive, value };
    }
    case "compact": {
      const target = compactTarget(shape.inner, state, path);
      const value = atPath(path, () => decodeCompactAs(reader, target, path));
      return { kind: "compact", ...span(state, start, typeName), target, value };
    }
    case "str": {
      const value = atPath(path, () => str.decodeFrom(reader));
      return { kind: "string", ...span(state, start, typeName), value };
    }
    case "fixed-array":
      return decodeFixedArray(shape, state, path, typeName);
    case "sequence":
      return decodeSequence(shape, state, path, typeName);
    case "tuple":
      return decodeTuple(shape, state, path, typeName);
    case "option":
      return decodeOption(shape, state, path, typeName);
    case "result":
      return decodeResult(shape, state, path, typeName);
    case "struct":
      return decodeStruct(shape, state, path, typeName);
    case "enum":
      return decodeEnum(shape, state, path, typeName);
    case "param":
      throw new ScaleDefinitionError(`Type parameter '${shape.name}' is unbound at '${path}'`, { param: shape.name });
    default:
      shape satisfies never;
      throw new ScaleDefinitionError(`Unsupported shape at '${path}'`);
  }
}

/** Follows references and single-field wrappers down to the unsigned integer a compact encodes. */
function compactTarget(inner: CodecShape, state: DecodeState, path: string): UnsignedPrimitive {
  let current = inner;
  for (;;) {
    if (current.kind === "type-ref") {
      current = state.resolve(current);
    } else if (current.kind === "struct" && current.fields.length === 1 && current.fields[0].name === "0") {
      current = current.fields[0].shape;
    } else {
      break;
    }
  }
  if (current.kind === "primitive" && isUnsignedPrimitive(current.primitive)) {
    return current.primitive;
  }
  throw new ScaleDefinitionError(`Compact at '${path}' must wrap an unsigned integer, got '${describeShape(inner)}'`, {
    path,
  });
}

function decodeFixedArray(shape: FixedArrayShape, state: DecodeState, path: string, typeName?: string): DecodedValue {
  const start = state.reader.offset;
  if (isByteShape(shape.element)) {
    const value = atPath(path, () => state.reader.readBytes(shape.length, path));
    return { kind: "bytes", ...span(state, start, typeName), value };
  }
  const elements: DecodedValue[] = [];
  for (let index = 0; index < shape.length; index++) {
    elements.push(decodeShape(shape.element, state, `${path}[${index}]`));
  }
  return { kind: "array", ...span(state, start, typeName), length: shape.length, elements };
}

function decodeSequence(shape: SequenceShape, state: DecodeState, path: string, typeName?: string): DecodedValue {
  const { reader } = state;
  const start = reader.offset;
  const count = atPath(path, () => readLength(reader, path));
  const minElementSize = minEncodedSize(shape.element, state.resolve);
  atPath(path, () => ensureSequenceFits(count, minElementSize, reader, path));

  if (isByteShape(shape.element)) {
    const value = atPath(path, () => reader.readBytes(count, path));
    return { kind: "bytes", ...span(state, start, typeName), value };
  }

  const elements: DecodedValue[] = [];
  for (let index = 0; index < count; index++) {
    elements.push(decodeShape(shape.element, state, `${path}[${index}]`));
  }
  const base = { kind: "sequence" as const, ...span(state, start, typeName), length: count, elements };
  return shape.bound === undefined ? base : { ...base, bound: shape.bound };
}

function decodeTuple(shape: TupleShape, state: DecodeState, path: string, typeName?: string): DecodedTupleValue {
  const start = state.reader.offset;
  const elements = shape.elements.map((element, index) => decodeShape(element, state, `${path}.${index}`));
  return { kind: "tuple", ...span(state, start, typeName), elements };
}

function readTag(state: DecodeState, path: string): number {
  const tag = atPath(path, () => state.reader.readByte(path));
  if (tag > 1) {
    throw new ReflectDecodeError(path, new InvalidTagError(tag, path));
  }
  return tag;
}

function decodeOption(shape: OptionShape, state: DecodeState, path: string, typeName?: string): DecodedOptionValue {
  const start = state.reader.offset;
  const tag = readTag(state, path);
  const value = tag === 1 ? decodeShape(shape.inner, state, `${path}.Some`) : null;
  return { kind: "option", ...span(state, start, typeName), value };
}

function decodeResult(shape: ResultShape, state: DecodeState, path: string, typeName?: string): DecodedResultValue {
  const start = state.reader.offset;
  const ok = readTag(state, path) === 0;
  const value = ok ? decodeShape(shape.ok, state, `${path}.Ok`) : decodeShape(shape.err, state, `${path}.Err`);
  return { kind: "result", ...span(state, start, typeName), ok, value };
}

function decodeStruct(shape: StructShape, state: DecodeState, path: string, typeName?: string): DecodedStructValue {
  const start = state.reader.offset;
  const fields: Record<string, DecodedValue> = {};
  const fieldOrder: DecodedField[] = [];
  const skippedFields: string[] = [];

  for (const field of shape.fields) {
    if (field.skip) {
      skippedFields.push(field.name);
      continue;
    }
    const value = decodeShape(field.shape, state, `${path}.${field.name}`);
    fields[field.name] = value;
    fieldOrder.push({ name: field.name, value });
  }

  return {
    kind: "struct",
    ...span(state, start, typeName ?? shape.name),
    fields,
    fieldOrder,
    skippedFields,
  };
}

function decodeEnum(shape: EnumShape, state: DecodeState, path: string, typeName?: string): DecodedEnumValue {
  const start = state.reader.offset;
  const index = atPath(path, () => state.reader.readByte(path));
  const variant = shape.variants.find((candidate) => candidate.index === index);
  if (!variant) {
    const available = shape.variants.map((candidate) => candidate.index).sort((a, b) => a - b);
    throw new ReflectDecodeError(path, new UnknownVariantError(index, shape.name ?? path, available));
  }
  const value = variant.payload ? decodeShape(variant.payload, state, `${path}.${variant.name}`) : null;
  return {
    kind: "enum",
    ...span(state, start, typeName ?? shape.name),
    index,
    variantName: variant.name,
    value,
  };
}
