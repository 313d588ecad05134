export type WireDirection = "send" | "receive"

export type LogContext = {
  /** Name of the channel the entry belongs to. */
  channel: string
  /** Remote address or label of the other end of the transport. */
  peer: string
  /** Name of the codec being encoded or decoded. */
  codec: string
  direction: WireDirection

  service: string
  module: string
  env: string
}

export type LogOutcome = {
  bytes: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
