import type { Code, Namespace } from "../../ports/error"
import { Canonical, type CanonicalInit } from "../canonical"

/**
 * Factory function to declare an error kind with less boilerplate.
 *
 * @example
 * ```ts
 * export const ErrRateLimited = defineError("billing", "rate-limited", "too many requests", {
 *   flags: Flags.Retryable,
 * })
 * ```
 */
export function defineError(
  namespace: Namespace,
  code: Code,
  message: string,
  options?: Pick<CanonicalInit, "flags" | "extras">,
): Canonical {
  return new Canonical({ namespace, code, message, ...options })
}
