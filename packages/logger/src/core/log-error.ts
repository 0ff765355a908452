import { classify } from "@faultline/errors"
import type { LogContext, LogMeta } from "../ports/log-context"
import type { Logger } from "../ports/logger"

export type ErrorSeverity = "warn" | "error"

/**
 * Retryable and timed-out failures are expected to resolve themselves and are
 * reported as warnings. A group is a warning only when every member is one.
 */
export function severityOf(err: unknown): ErrorSeverity {
  const variant = classify(err)

  switch (variant.kind) {
    case "classified":
      return variant.error.isRetryable || variant.error.isTimeout ? "warn" : "error"
    case "aggregate":
      return variant.error.length > 0 &&
        variant.error.errors.every((e) => severityOf(e) === "warn")
        ? "warn"
        : "error"
    case "foreign":
      return "error"
  }
}

export function logError<TContext extends LogContext = LogContext>(
  logger: Logger<TContext>,
  message: string,
  err: unknown,
  meta?: LogMeta<TContext>,
): void {
  const variant = classify(err)

  logger[severityOf(err)](message, {
    ...meta,
    err,
    ...(variant.kind === "classified" && { errorKey: variant.error.key() }),
  })
}
