/**
 * Runs tasks one at a time in submission order. A failed task rejects its
 * own caller and does not stop the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  get size(): number {
    return this.pending
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++

    const result = this.tail.then(task).finally(() => {
      this.pending--
    })

    // Outcome goes to the caller through `result`; the tail only orders.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )

    return result
  }
}
