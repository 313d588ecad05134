import type { PathSegment } from "../../ports/error"
import { WireError } from "./wire-error"

export type ReadErrorCode =
  | "io_error"
  | "end_of_stream"
  | "invalid_utf8"
  | "unknown_variant"
  | "invalid_bool"
  | "oversized_request"
  | "custom"
  | "length_exceeded"
  | "depth_exceeded"
  | "read_never"
  | "trailing_bytes"
  | "aborted"

export type OversizedRequest = {
  type: string
  requested: number
  remaining: number
  reason?: "budget" | "element_count" | "length_overflow" | "allocation_failed"
}

export class ReadError extends WireError<ReadErrorCode> {
  within(segment: PathSegment): ReadError {
    return new ReadError(this.message, this.rebuild(segment))
  }

  static io(cause: unknown): ReadError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new ReadError(`transport failed while reading: ${detail}`, {
      code: "io_error",
      cause,
    })
  }

  static endOfStream(expected: number, received: number): ReadError {
    return new ReadError(`stream ended after ${received} of ${expected} expected bytes`, {
      code: "end_of_stream",
      context: { expected, received },
    })
  }

  static invalidUtf8(byteLength: number, cause?: unknown): ReadError {
    return new ReadError("text payload is not valid UTF-8", {
      code: "invalid_utf8",
      context: { byteLength },
      cause,
    })
  }

  static unknownVariant(type: string, value: number): ReadError {
    return new ReadError(`unknown variant ${value} for ${type}`, {
      code: "unknown_variant",
      context: { type, value },
    })
  }

  static invalidBool(byte: number): ReadError {
    return new ReadError(`invalid boolean byte 0x${byte.toString(16).padStart(2, "0")}`, {
      code: "invalid_bool",
      context: { byte },
    })
  }

  static oversized(request: OversizedRequest): ReadError {
    const unit = request.reason === "element_count" ? "zero-size elements" : "bytes"

    return new ReadError(
      `${request.type} requested ${request.requested} ${unit} with ${request.remaining} left in the decode budget`,
      {
        code: "oversized_request",
        context: { ...request, reason: request.reason ?? "budget" },
      },
    )
  }

  static custom(type: string, message: string, cause?: unknown): ReadError {
    return new ReadError(message, {
      code: "custom",
      context: { type },
      cause,
    })
  }

  static lengthExceeded(type: string, length: number, maxLength: number): ReadError {
    return new ReadError(`${type} length ${length} exceeds the maximum of ${maxLength}`, {
      code: "length_exceeded",
      context: { type, length, maxLength },
    })
  }

  static depthExceeded(type: string, maxDepth: number): ReadError {
    return new ReadError(`${type} nests deeper than ${maxDepth} levels`, {
      code: "depth_exceeded",
      context: { type, maxDepth },
    })
  }

  static never(type: string): ReadError {
    return new ReadError(`${type} has no values and cannot be decoded`, {
      code: "read_never",
      context: { type },
    })
  }

  static trailingBytes(count: number): ReadError {
    return new ReadError(`${count} bytes left over after decoding`, {
      code: "trailing_bytes",
      context: { count },
    })
  }

  static aborted(reason?: unknown): ReadError {
    return new ReadError("decode aborted", {
      code: "aborted",
      cause: reason,
    })
  }
}

export function isReadError(err: unknown): err is ReadError {
  return err instanceof ReadError
}

export function isReadErrorCode<C extends ReadErrorCode>(
  err: unknown,
  code: C,
): err is ReadError & { code: C } {
  return err instanceof ReadError && err.code === code
}
