import { format as formatMessage } from "node:util"
import type {
  Code,
  FormatOptions,
  Matcher,
  Namespace,
  SerializedCanonical,
  Unwrapper,
} from "../ports/error"
import { errorText } from "./classify"
import { Extras } from "./extras"
import { Flags } from "./flags"
import { Group } from "./group"
import { extract } from "./utils/inspect"

/** Namespace of the errors defined by this package. */
export const DEFAULT_NAMESPACE: Namespace = "faultline/errors"

/** Slug that identifies an error kind (namespace + code). */
export function errorKey(namespace: Namespace, code: Code): string {
  return `${namespace}/${code}`
}

export type CanonicalInit = Readonly<{
  code?: Code
  namespace?: Namespace
  /** Human-readable description */
  message?: string
  flags?: Flags
  extras?: Extras
  /**
   * Underlying cause. Hidden from the single-line rendering's consumers
   * beyond its text and never serialized.
   */
  wrapped?: unknown
}>

/**
 * A known, classified application error.
 *
 * Instances are immutable: `wrap` and the `with*` builders return new
 * values. Two instances are equal when their code, namespace, message,
 * flags and extras are, whatever they wrap.
 *
 * @example
 * ```ts
 * const ErrNotFound = new Canonical({
 *   namespace: "billing",
 *   code: "not-found",
 *   message: "invoice does not exist",
 * })
 *
 * throw ErrNotFound.wrap(cause).withTags("invoice")
 * ```
 */
export class Canonical extends Error implements Matcher, Unwrapper {
  readonly code: Code
  readonly namespace: Namespace
  readonly flags: Flags
  readonly extras: Extras
  readonly wrapped: unknown

  constructor(init: CanonicalInit = {}) {
    super(init.message ?? "", init.wrapped === undefined ? undefined : { cause: init.wrapped })

    this.name = this.constructor.name
    this.code = init.code ?? ""
    this.namespace = init.namespace ?? ""
    this.flags = init.flags ?? Flags.None
    this.extras = init.extras ?? Extras.Empty
    this.wrapped = init.wrapped

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get isRetryable(): boolean {
    return this.flags.has(Flags.Retryable)
  }

  get isTimeout(): boolean {
    return this.flags.has(Flags.Timeout)
  }

  /**
   * @remarks
   * Tests the `Unknown` bit; there is no dedicated transient flag.
   */
  get isTransient(): boolean {
    return this.flags.has(Flags.Unknown)
  }

  key(): string {
    return errorKey(this.namespace, this.code)
  }

  isZero(): boolean {
    return (
      this.code === "" &&
      this.namespace === "" &&
      this.message === "" &&
      this.flags.isZero() &&
      this.extras.isZero() &&
      this.wrapped === undefined
    )
  }

  equals(other: unknown): boolean {
    const ce = extract(other, Canonical)
    if (ce === undefined) return false

    return (
      this.code === ce.code &&
      this.message === ce.message &&
      this.namespace === ce.namespace &&
      this.flags.equals(ce.flags) &&
      this.extras.equals(ce.extras)
    )
  }

  is(target: unknown): boolean {
    return this.equals(target)
  }

  unwrap(): unknown {
    return this.wrapped
  }

  /** Full copy, including copies of every Canonical in the wrap chain. */
  copy(): Canonical {
    const wrapped = this.wrapped instanceof Canonical ? this.wrapped.copy() : this.wrapped
    return new Canonical({ ...this.fields(), wrapped })
  }

  /**
   * Returns a new error of this kind wrapping `err`.
   *
   * A zero receiver given a Canonical returns a copy of that Canonical, so
   * call sites can wrap without checking whether `err` is classified.
   */
  wrap(err: unknown): Canonical {
    if (err == null) return this
    if (this.isZero() && err instanceof Canonical) return err.copy()

    return new Canonical({ ...this.fields(), wrapped: err })
  }

  /** Wraps an Error built from printf-style `format` and `args`. */
  wrapf(format: string, ...args: unknown[]): Canonical {
    return this.wrap(new Error(formatMessage(format, ...args)))
  }

  withExtras(extras: Extras): Canonical {
    return new Canonical({ ...this.fields(), extras })
  }

  /** The given bits are added to the current ones. */
  withFlags(flags: Flags): Canonical {
    return new Canonical({ ...this.fields(), flags: this.flags.set(flags) })
  }

  withTags(...tags: string[]): Canonical {
    return new Canonical({ ...this.fields(), extras: this.extras.withTags(...tags) })
  }

  /** A group holding this error followed by every error it wraps. */
  asGroup(): Group {
    const group = new Group([this])

    let err: Canonical = this
    while (err.wrapped !== undefined) {
      group.append(err.wrapped)

      if (!(err.wrapped instanceof Canonical)) break
      err = err.wrapped
    }

    return group
  }

  format(options?: FormatOptions): string {
    return options?.verbose ? this.asGroup().toString() : this.toString()
  }

  toString(): string {
    const head = `[${this.namespace}:${this.code}] ${this.message}`
    return this.wrapped === undefined ? head : `${head}\n-> ${errorText(this.wrapped)}`
  }

  toJSON(): SerializedCanonical {
    return {
      code: this.code,
      namespace: this.namespace,
      message: this.message,
      ...(!this.flags.isZero() && { flags: this.flags.toJSON() }),
      ...(!this.extras.isZero() && { extras: this.extras.toJSON() }),
    }
  }

  private fields(): CanonicalInit {
    return {
      code: this.code,
      namespace: this.namespace,
      message: this.message,
      flags: this.flags,
      extras: this.extras,
      wrapped: this.wrapped,
    }
  }
}

/**
 * Wraps errors that are not well-known and not previously defined. This
 * commonly indicates they come from an external system/library.
 */
export const ErrUnknown = new Canonical({
  code: "unknown",
  namespace: DEFAULT_NAMESPACE,
  message: "wrapped error is unknown",
  flags: Flags.Unknown,
})
