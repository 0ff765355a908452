/** Machine-readable identifier of an error kind. Unique within a namespace. */
export type Code = string

/**
 * Identifier of a logical grouping of errors, commonly the
 * package/repository/service an error originated from.
 */
export type Namespace = string

/**
 * Any class an error may be an instance of.
 * Used as the target of {@link Extractor.as}.
 */
export type ErrorClass<T> = abstract new (...args: never[]) => T

/** Links that expose the next error in their cause chain. */
export interface Unwrapper {
  unwrap(): unknown
}

/** Links that decide for themselves whether they match a target error. */
export interface Matcher {
  is(target: unknown): boolean
}

/** Links that can hand out a value of a requested error class. */
export interface Extractor {
  as<T>(ctor: ErrorClass<T>): T | undefined
}

export type FormatOptions = Readonly<{
  /** Unroll the whole wrap chain as a bullet list. Default: false */
  verbose?: boolean
}>

/**
 * Wire shape of an Extras bundle. Zero-valued fields are omitted.
 *
 * `delay` is in milliseconds.
 */
export type SerializedExtras = Readonly<{
  delay?: number
  links?: string[]
  stack_trace?: string
  tags?: string[]
}>

/**
 * Wire shape of a Canonical error.
 *
 * The wrapped cause is never part of it; it is for operators only.
 */
export type SerializedCanonical = Readonly<{
  code: Code
  namespace: Namespace
  message: string
  /** Base-2 digits of the flag mask */
  flags?: string
  extras?: SerializedExtras
}>

export type SerializedGroup = Readonly<{
  errors: SerializedCanonical[]
}>
