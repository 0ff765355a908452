import { classify } from "@faultline/errors"
import { errWithCause } from "pino-std-serializers"

/**
 * pino `err` serializer that keeps the taxonomy fields of Canonical errors
 * and the members of groups. Other errors get the standard treatment.
 */
export function serializeErr(err: unknown): unknown {
  const variant = classify(err)

  switch (variant.kind) {
    case "classified": {
      const e = variant.error
      return {
        type: e.name,
        key: e.key(),
        ...e.toJSON(),
        text: e.format({ verbose: true }),
        stack: e.stack,
        ...(e.wrapped !== undefined && { cause: serializeErr(e.wrapped) }),
      }
    }
    case "aggregate":
      return {
        type: variant.error.name,
        message: variant.error.message,
        errors: variant.error.errors.map(serializeErr),
      }
    case "foreign":
      return variant.error instanceof Error ? errWithCause(variant.error) : variant.error
  }
}
