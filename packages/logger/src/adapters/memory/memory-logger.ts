import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevel, type LogLevelName, levelValue } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type LogEntry = {
  level: LogLevelName
  message: string
  /** Inherited context merged with the call's meta, meta winning. */
  fields: Record<string, unknown>
}

/**
 * Keeps entries in an array instead of writing them anywhere. A logger and
 * every child it creates share one list.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly minimum: LogLevel

  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly context: LogContextPatch = {},
    private readonly sink: LogEntry[] = [],
  ) {
    this.minimum = levelValue(opts.level ?? "trace")
  }

  entries(): LogEntry[] {
    return [...this.sink]
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.opts, { ...this.context, ...context }, this.sink)
  }

  private record(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (levelValue(level) < this.minimum) return

    this.sink.push({
      level,
      message,
      fields: {
        ...(this.opts.name && { name: this.opts.name }),
        ...this.context,
        ...meta,
      },
    })
  }
}
