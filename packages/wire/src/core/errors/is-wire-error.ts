import { ReadError } from "./read-error"
import { WriteError } from "./write-error"

export function isWireError(err: unknown): err is ReadError | WriteError {
  return err instanceof ReadError || err instanceof WriteError
}

/**
 * Moves a wire error one level further out. Anything else is returned
 * untouched so callers can rethrow it as is.
 */
export function locate(err: unknown, segment: string | number): unknown {
  return isWireError(err) ? err.within(segment) : err
}
