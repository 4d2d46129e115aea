import { ScaleError } from "@scale-kit/codec";
import type { DecodeErrorCode, ScaleDecodeError } from "@scale-kit/codec";

export class ScaleParseError extends ScaleError<"PARSE_ERROR"> {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_ERROR", message, details);
  }
}

/**
 * A decode failure raised while walking a described type. Keeps the code of
 * the underlying error and records where in the value it happened.
 */
export class ReflectDecodeError extends ScaleError<DecodeErrorCode> {
  readonly path: string;

  constructor(path: string, cause: ScaleDecodeError) {
    super(cause.code, `${cause.message} (at ${path})`, { ...cause.details, path }, { cause });
    this.path = path;
  }
}
