/**
 * Settles with `operation`, or rejects with `onAbort()` as soon as `signal`
 * fires, whichever comes first. The listener is removed either way.
 */
export async function raceAbort<T>(
  operation: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: (reason: unknown) => Error,
): Promise<T> {
  if (!signal) return operation
  if (signal.aborted) throw onAbort(signal.reason)

  let rejectAborted: (reason: Error) => void = () => undefined
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject
  })
  const listener = () => rejectAborted(onAbort(signal.reason))

  signal.addEventListener("abort", listener, { once: true })

  try {
    return await Promise.race([operation, aborted])
  } finally {
    signal.removeEventListener("abort", listener)
  }
}
