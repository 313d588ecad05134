import { BaseError } from "./base-error"

/**
 * Thrown while building a composite codec whose layout is invalid.
 * Never raised by encode or decode.
 */
export class CodecDefinitionError extends BaseError<"invalid_definition"> {
  static of(type: string, reason: string): CodecDefinitionError {
    return new CodecDefinitionError(`invalid codec definition for ${type}: ${reason}`, {
      code: "invalid_definition",
      context: { type },
      isOperational: false,
    })
  }
}
