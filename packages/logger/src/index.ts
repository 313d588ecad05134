export { type LogEntry, MemoryLogger } from "./adapters/memory/memory-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
  LogOutcome,
  WireDirection,
} from "./ports/log-context"
export {
  isLogLevelName,
  levelName,
  levelValue,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelNames,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
