export type DecodeErrorCode =
  | "UNEXPECTED_EOF"
  | "UNKNOWN_VARIANT"
  | "INVALID_TAG"
  | "INVALID_COMPACT_LENGTH"
  | "TRAILING_BYTES"
  | "INVALID_UTF8";

export type ScaleErrorCode = DecodeErrorCode | "ENCODE_ERROR" | "DEFINITION_ERROR";

export class ScaleError<TCode extends string = ScaleErrorCode> extends Error {
  readonly code: TCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

/** Raised when a value does not fit the shape it is being encoded as. */
export class ScaleEncodeError extends ScaleError<"ENCODE_ERROR"> {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ENCODE_ERROR", message, details);
  }
}

/** Raised while building a codec or shape, before any bytes are touched. */
export class ScaleDefinitionError extends ScaleError<"DEFINITION_ERROR"> {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DEFINITION_ERROR", message, details);
  }
}

export class ScaleDecodeError extends ScaleError<DecodeErrorCode> {}

export class UnexpectedEofError extends ScaleDecodeError {
  readonly requested: number;
  readonly remaining: number;

  constructor(requested: number, remaining: number, context?: string) {
    super(
      "UNEXPECTED_EOF",
      `Unexpected end of input${context ? ` while decoding '${context}'` : ""}: needed ${requested} bytes, ${remaining} remain`,
      { requested, remaining, context },
    );
    this.requested = requested;
    this.remaining = remaining;
  }
}

export class UnknownVariantError extends ScaleDecodeError {
  readonly discriminant: number;

  constructor(discriminant: number, context: string, availableIndices: readonly number[]) {
    super("UNKNOWN_VARIANT", `Enum '${context}' has no variant with discriminant ${discriminant}`, {
      discriminant,
      availableIndices,
    });
    this.discriminant = discriminant;
  }
}

export class InvalidTagError extends ScaleDecodeError {
  readonly tag: number;

  constructor(tag: number, context: string) {
    super("INVALID_TAG", `Invalid tag byte 0x${tag.toString(16).padStart(2, "0")} while decoding '${context}'`, {
      tag,
      context,
    });
    this.tag = tag;
  }
}

export class InvalidCompactLengthError extends ScaleDecodeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_COMPACT_LENGTH", message, details);
  }
}

export class TrailingBytesError extends ScaleDecodeError {
  readonly remaining: number;

  constructor(remaining: number, context: string) {
    super("TRAILING_BYTES", `Decoding '${context}' left ${remaining} unconsumed bytes`, { remaining, context });
    this.remaining = remaining;
  }
}

export class InvalidUtf8Error extends ScaleDecodeError {
  constructor(context: string, cause: unknown) {
    super("INVALID_UTF8", `String payload of '${context}' is not valid UTF-8`, { context }, { cause });
  }
}
