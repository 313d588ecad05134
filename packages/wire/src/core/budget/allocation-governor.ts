import type { BudgetReservation, DecodeBudget } from "../../ports/decode-budget"
import { ReadError } from "../errors"

export const DEFAULT_MAX_DECODE_BYTES = 16 * 1024 * 1024

export type AllocationGovernorOptions = {
  /** Hard cap for one decode call tree. Default: 16 MiB */
  maxBytes?: number
  /** Bytes the source reports as still readable, when it knows. */
  available?: number | undefined
}

/**
 * Tracks how much a single decode may still allocate.
 *
 * The limit is the smaller of `maxBytes` and what the source can still
 * deliver. Containers reserve `count * unitSize` before they allocate and
 * hand each element's share back as that element starts, so nested
 * containers see only what the outer ones have not claimed.
 *
 * Elements that encode to zero bytes never draw on the source, so they are
 * counted against `maxBytes` alone. That count only grows: a decoded
 * zero-size element stays in memory until the decode returns.
 */
export class AllocationGovernor implements DecodeBudget {
  readonly limit: number
  readonly maxElements: number
  private consumedBytes = 0
  private reservedBytes = 0
  private elementCount = 0

  constructor(options: AllocationGovernorOptions = {}) {
    const maxBytes = options.maxBytes ?? DEFAULT_MAX_DECODE_BYTES

    this.maxElements = maxBytes
    this.limit =
      options.available === undefined ? maxBytes : Math.min(maxBytes, options.available)
  }

  /** Zero-size elements held or decoded so far. */
  get elements(): number {
    return this.elementCount
  }

  get consumed(): number {
    return this.consumedBytes
  }

  get reserved(): number {
    return this.reservedBytes
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.consumedBytes - this.reservedBytes)
  }

  consume(bytes: number): void {
    this.consumedBytes += bytes
  }

  reserve(count: number, unitSize: number, forType: string): BudgetReservation {
    if (unitSize <= 0) return this.reserveElements(count, forType)

    const requested = count * unitSize
    const remaining = this.remaining

    if (!Number.isSafeInteger(requested) || requested > remaining) {
      throw ReadError.oversized({ type: forType, requested, remaining })
    }

    this.reservedBytes += requested

    let held = requested

    return {
      shrink: () => {
        const share = Math.min(unitSize, held)
        held -= share
        this.reservedBytes -= share
      },
      release: () => {
        this.reservedBytes -= held
        held = 0
      },
    }
  }

  private reserveElements(count: number, forType: string): BudgetReservation {
    const remaining = Math.max(0, this.maxElements - this.elementCount)

    if (!Number.isSafeInteger(count) || count > remaining) {
      throw ReadError.oversized({ type: forType, requested: count, remaining, reason: "element_count" })
    }

    this.elementCount += count

    let pending = count

    return {
      shrink: () => {
        if (pending > 0) pending--
      },
      release: () => {
        this.elementCount -= pending
        pending = 0
      },
    }
  }
}
