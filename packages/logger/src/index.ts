export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { ErrInvalidLoggerConfig, LOGGER_NAMESPACE } from "./core/errors"
export {
  type LoadLoggerOptionsInput,
  loadLoggerOptions,
} from "./core/load-logger-options"
export { type ErrorSeverity, logError, severityOf } from "./core/log-error"
export { serializeErr } from "./core/serialize-err"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
