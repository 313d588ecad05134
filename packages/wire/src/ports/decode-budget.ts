/**
 * A hold on part of the decode budget, taken before a container is filled.
 */
export interface BudgetReservation {
  /** Returns one element's share to the budget as that element starts decoding. */
  shrink(): void
  /** Returns whatever is still held. Safe to call more than once. */
  release(): void
}

/**
 * Allocation capacity for one top-level decode call tree.
 */
export interface DecodeBudget {
  readonly limit: number
  readonly consumed: number
  readonly reserved: number
  readonly remaining: number

  /** Records bytes actually read from the source. */
  consume(bytes: number): void

  /**
   * Holds `count * unitSize` bytes, or rejects with `oversized_request`
   * when that exceeds what is left. A `unitSize` of 0 holds `count`
   * elements against the element cap instead.
   */
  reserve(count: number, unitSize: number, forType: string): BudgetReservation
}
