export { decodeAsType, decodeData } from "./decoder";
export type { ReflectOptions } from "./decoder";
export type {
  DecodedArrayValue,
  DecodedBytesValue,
  DecodedCompactValue,
  DecodedEnumValue,
  DecodedField,
  DecodedOptionValue,
  DecodedPrimitiveValue,
  DecodedResultValue,
  DecodedSequenceValue,
  DecodedStringValue,
  DecodedStructValue,
  DecodedTupleValue,
  DecodedValue,
} from "./decodedValue";
export { ReflectDecodeError, ScaleParseError } from "./errors";
export { formatDecoded, formatReflection } from "./format";
export { buildTypeDocument, parseTypeDocument } from "./typeDocument";
export type { ParseDocumentOptions, TypeDefinition, TypeDocument } from "./typeDocument";
export { BUILTIN_TYPE_NAMES, parseTypeExpression } from "./typeExpression";
export { TypeRegistry, buildTypeRegistry, loadTypeRegistry, validateShapeReferences } from "./typeRegistry";
export type { TypeRegistryOptions } from "./typeRegistry";
export type { ByteRange, FormattedReflection, FormattedValue } from "./types";
