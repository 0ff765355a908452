import type { ErrorClass, Extractor, Matcher, Unwrapper } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isUnwrapper(v: unknown): v is Unwrapper {
  return isRecord(v) && typeof v.unwrap === "function"
}

function isMatcher(v: unknown): v is Matcher {
  return isRecord(v) && typeof v.is === "function"
}

function isExtractor(v: unknown): v is Extractor {
  return isRecord(v) && typeof v.as === "function"
}

/**
 * Next link of an error's cause chain.
 *
 * Prefers an `unwrap()` hook and falls back to the standard `cause` property.
 */
export function unwrap(err: unknown): unknown {
  if (isUnwrapper(err)) return err.unwrap()
  if (isRecord(err) && "cause" in err) return err.cause
  return undefined
}

function* walk(err: unknown): Generator<unknown> {
  const seen = new WeakSet<object>()
  let current: unknown = err

  while (current != null) {
    if (typeof current === "object") {
      if (seen.has(current)) return
      seen.add(current)
    }

    yield current
    current = unwrap(current)
  }
}

/**
 * Reports whether any link in the chain of `err` matches `target`, either by
 * reference or through the link's own `is()` hook.
 *
 * @example
 * ```ts
 * if (matches(err, ErrNotFound)) {
 *   return undefined
 * }
 * ```
 */
export function matches(err: unknown, target: unknown): boolean {
  for (const current of walk(err)) {
    if (current === target) return true
    if (isMatcher(current) && current.is(target)) return true
  }
  return false
}

/**
 * Finds the first link in the chain of `err` that is an instance of `ctor`,
 * asking each link's `as()` hook along the way.
 */
export function extract<T>(err: unknown, ctor: ErrorClass<T>): T | undefined {
  for (const current of walk(err)) {
    if (current instanceof ctor) return current
    if (isExtractor(current)) {
      const found = current.as(ctor)
      if (found !== undefined) return found
    }
  }
  return undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Safety:
 * - maxDepth guardrail (default 50)
 * - cycle detection via WeakSet
 *
 * @example
 * ```ts
 * catch (err) {
 *   for (const e of errorChain(err)) {
 *     console.log(String(e))
 *   }
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []

  for (const current of walk(err)) {
    if (chain.length >= maxDepth) break
    chain.push(current)
  }

  return chain
}
