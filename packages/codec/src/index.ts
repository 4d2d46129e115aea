export { defineCodec } from "./codec";
export type { Codec, CodecDefinition, CodecType, DecodeOptions, DecodePrefixResult } from "./codec";
export {
  MAX_COMPACT_BYTES,
  compact,
  compactLength,
  decodeCompact,
  decodeCompactAs,
  decodeCompactFrom,
  encodeCompact,
  encodeCompactTo,
  readLength,
} from "./compact";
export {
  EncodedKeyMap,
  EncodedKeySet,
  MAX_ZERO_SIZED_ELEMENTS,
  array,
  boundedVec,
  btreeMap,
  btreeSet,
  defaultKeyOrder,
  ensureSequenceFits,
  keyedVec,
  nestedOption,
  option,
  readSequenceLength,
  result,
  tuple,
  vec,
  weakBoundedVec,
} from "./containers";
export type { KeyComparator, ResultValue } from "./containers";
export { enumeration, ignored, variant } from "./enum";
export type { EnumOptions, EnumValue, EnumVariants, IgnoredVariant, VariantSpec } from "./enum";
export {
  InvalidCompactLengthError,
  InvalidTagError,
  InvalidUtf8Error,
  ScaleDecodeError,
  ScaleDefinitionError,
  ScaleEncodeError,
  ScaleError,
  TrailingBytesError,
  UnexpectedEofError,
  UnknownVariantError,
} from "./errors";
export type { DecodeErrorCode, ScaleErrorCode } from "./errors";
export {
  InstantiationCache,
  collectParams,
  defaultShapeCache,
  generic,
  genericName,
  instantiateShape,
  substituteShape,
} from "./generics";
export type { GenericDefinition, InstantiationCacheOptions } from "./generics";
export { ByteReader } from "./io/reader";
export { ByteWriter } from "./io/writer";
export { LOG_LEVELS, NOOP_LOGGER, createConsoleLogger, shouldLog } from "./logger";
export type { CodecLogger, ConsoleLoggerOptions, LogLevel } from "./logger";
export {
  PRIMITIVE_CODECS,
  bool,
  bytes,
  fixedBytes,
  i128,
  i16,
  i32,
  i64,
  i8,
  str,
  u128,
  u16,
  u32,
  u64,
  u8,
  unit,
} from "./primitives";
export type { PrimitiveValue } from "./primitives";
export {
  PRIMITIVE_NAMES,
  PRIMITIVE_WIDTHS,
  UNIT_SHAPE,
  describeShape,
  isByteShape,
  isPrimitiveName,
  isUnsignedPrimitive,
  minEncodedSize,
  primitiveShape,
  shapeKey,
} from "./shape";
export type {
  CodecShape,
  CompactShape,
  EnumShape,
  EnumVariantShape,
  FixedArrayShape,
  OptionShape,
  ParamShape,
  PrimitiveName,
  PrimitiveShape,
  ResultShape,
  SequenceShape,
  ShapeResolver,
  SignedPrimitive,
  StrShape,
  StructFieldShape,
  StructShape,
  TupleShape,
  TypeRefShape,
  UnsignedPrimitive,
} from "./shape";
export { getField, isSkipField, newtype, phantom, skip, struct } from "./struct";
export type { FieldSpec, SkipField, StructFields, StructValue } from "./struct";
