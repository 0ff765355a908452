import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and whether the
 * output is meant for people or for log processors. Read from the
 * environment with `loadLoggerOptions`.
 */
export type LoggerOptions = {
  /** Minimum level to emit. "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Pretty-print through pino-pretty. Local development only; structured
   * JSON is what production log pipelines ingest.
   */
  prettify?: boolean
}
