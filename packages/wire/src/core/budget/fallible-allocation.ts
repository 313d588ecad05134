import { ReadError } from "../errors"

/**
 * Length fields are read as u64. Anything the engine cannot index is
 * refused before it reaches an allocator.
 */
export function toSafeLength(length: bigint, forType: string, remaining: number): number {
  if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw ReadError.oversized({
      type: forType,
      requested: Number.MAX_SAFE_INTEGER,
      remaining,
      reason: "length_overflow",
    })
  }

  return Number(length)
}

function allocationFailed(err: unknown, forType: string, requested: number): unknown {
  if (!(err instanceof RangeError)) return err

  return new ReadError(`allocation of ${requested} for ${forType} was refused`, {
    code: "oversized_request",
    context: { type: forType, requested, reason: "allocation_failed" },
    cause: err,
  })
}

export function tryAllocateArray<T>(length: number, forType: string): T[] {
  try {
    return new Array<T>(length)
  } catch (err) {
    throw allocationFailed(err, forType, length)
  }
}

export function tryAllocateBytes(length: number, forType: string): Uint8Array {
  try {
    return new Uint8Array(length)
  } catch (err) {
    throw allocationFailed(err, forType, length)
  }
}
