export type LogContext = {
  requestId: string
  traceId: string
  spanId: string

  /** Name of the operation that failed or is being reported on */
  operation: string
  /** Key (namespace/code) of the error being logged */
  errorKey: string

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
