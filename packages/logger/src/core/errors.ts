import { defineError } from "@faultline/errors"

export const LOGGER_NAMESPACE = "faultline/logger"

export const ErrInvalidLoggerConfig = defineError(
  LOGGER_NAMESPACE,
  "invalid-config",
  "logger configuration is invalid",
)
