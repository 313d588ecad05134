/**
 * Raw key/value input to `loadWireConfig`. Coercion and validation happen
 * after every source has been merged.
 */
export interface ConfigSource {
  /** Recorded as the provenance of every key this source supplies. */
  readonly name: string

  /** Keys mapped to undefined count as absent. */
  load(): Promise<Record<string, unknown>>
}
