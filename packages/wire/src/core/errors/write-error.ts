import type { PathSegment } from "../../ports/error"
import { WireError } from "./wire-error"

export type WriteErrorCode =
  | "io_error"
  | "invalid_value"
  | "length_exceeded"
  | "depth_exceeded"
  | "custom"
  | "aborted"

export class WriteError extends WireError<WriteErrorCode> {
  within(segment: PathSegment): WriteError {
    return new WriteError(this.message, this.rebuild(segment))
  }

  static io(cause: unknown): WriteError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new WriteError(`transport failed while writing: ${detail}`, {
      code: "io_error",
      cause,
    })
  }

  static invalidValue(type: string, reason: string): WriteError {
    return new WriteError(`cannot encode ${type}: ${reason}`, {
      code: "invalid_value",
      context: { type },
    })
  }

  static lengthExceeded(type: string, length: number, maxLength: number): WriteError {
    return new WriteError(`${type} length ${length} exceeds the maximum of ${maxLength}`, {
      code: "length_exceeded",
      context: { type, length, maxLength },
    })
  }

  static depthExceeded(type: string, maxDepth: number): WriteError {
    return new WriteError(`${type} nests deeper than ${maxDepth} levels`, {
      code: "depth_exceeded",
      context: { type, maxDepth },
    })
  }

  static custom(type: string, message: string, cause?: unknown): WriteError {
    return new WriteError(message, {
      code: "custom",
      context: { type },
      cause,
    })
  }

  static aborted(reason?: unknown): WriteError {
    return new WriteError("encode aborted", {
      code: "aborted",
      cause: reason,
    })
  }
}

export function isWriteError(err: unknown): err is WriteError {
  return err instanceof WriteError
}
