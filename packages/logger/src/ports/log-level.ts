export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric severities, higher is more severe. Same numbers pino writes in
 * its `level` field.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

const valueByName: Readonly<Record<LogLevelName, LogLevel>> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

export function levelValue(name: LogLevelName): LogLevel {
  return valueByName[name]
}

export function levelName(value: number): LogLevelName | undefined {
  return logLevelNames.find((name) => valueByName[name] === value)
}

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && (logLevelNames as readonly string[]).includes(value)
}
