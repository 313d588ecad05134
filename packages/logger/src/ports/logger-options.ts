import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output instead of one JSON object per line. */
  prettify?: boolean

  /** Written as `name` on every entry, e.g. "wire". */
  name?: string
}
