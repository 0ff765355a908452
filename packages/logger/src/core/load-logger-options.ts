import { z } from "zod"
import { logLevelNames } from "../ports/log-level"
import type { LoggerOptions } from "../ports/logger-options"
import { ErrInvalidLoggerConfig } from "./errors"

const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
})

export type LoadLoggerOptionsInput = {
  env?: Record<string, string | undefined>
}

export function loadLoggerOptions({
  env = process.env,
}: LoadLoggerOptionsInput = {}): LoggerOptions {
  const result = loggerEnvSchema.safeParse(env)

  if (!result.success) {
    throw ErrInvalidLoggerConfig.wrap(new Error(z.prettifyError(result.error)))
  }

  return { level: result.data.LOG_LEVEL, prettify: result.data.LOG_PRETTY }
}
