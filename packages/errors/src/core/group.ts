import type { SerializedGroup, Unwrapper } from "../ports/error"
import { type Canonical, ErrUnknown } from "./canonical"
import { Chain } from "./chain"
import { classify } from "./classify"

/** Turns the members of a group into its string representation. */
export type GroupFormatter = (errors: readonly Canonical[]) => string

/**
 * Nothing for an empty group, the error itself for a single one, and a
 * bullet list otherwise.
 */
export function formatGroupDefault(errors: readonly Canonical[]): string {
  const [first] = errors
  if (first === undefined) return ""
  if (errors.length === 1) return first.toString()

  const points = errors.map((err) => `* ${err.toString()}`)
  return `\n${points.join("\n")}\n\n`
}

export type GroupOptions = Readonly<{
  formatter?: GroupFormatter
}>

/**
 * An ordered collection of Canonical errors reported as one failure.
 *
 * Appended groups are flattened into their members and anything that is not
 * a Canonical is wrapped with {@link ErrUnknown}, so `errors` only ever holds
 * Canonical values.
 *
 * @example
 * ```ts
 * const failures = new Group()
 * for (const job of jobs) {
 *   failures.append(await run(job).catch((err: unknown) => err))
 * }
 * return failures.errorOrUndefined()
 * ```
 */
export class Group extends Error implements Unwrapper, Iterable<Canonical> {
  readonly formatter: GroupFormatter
  private readonly members: Canonical[] = []

  constructor(errors: readonly unknown[] = [], options: GroupOptions = {}) {
    super()

    this.name = this.constructor.name
    this.formatter = options.formatter ?? formatGroupDefault
    // message is rendered from the members on every read
    Object.defineProperty(this, "message", {
      get: (): string => this.toString(),
      configurable: true,
      enumerable: false,
    })
    this.append(...errors)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get errors(): readonly Canonical[] {
    return this.members
  }

  get length(): number {
    return this.members.length
  }

  /** `null` and `undefined` are skipped. */
  append(...errs: unknown[]): void {
    for (const err of errs) {
      if (err == null) continue

      const variant = classify(err)
      switch (variant.kind) {
        case "aggregate":
          this.members.push(...variant.error.slice())
          break
        case "classified":
          this.members.push(variant.error)
          break
        case "foreign":
          this.members.push(ErrUnknown.wrap(variant.error))
          break
      }
    }
  }

  empty(): boolean {
    return this.members.length === 0
  }

  /**
   * The group itself when it holds errors, otherwise undefined. Meant for the
   * end of an accumulation, so the returned value tells whether anything
   * failed.
   */
  errorOrUndefined(): Group | undefined {
    return this.empty() ? undefined : this
  }

  slice(): Canonical[] {
    return [...this.members]
  }

  /**
   * A single member is returned as is; two or more come back as a
   * {@link Chain} over a snapshot, unaffected by later appends.
   */
  unwrap(): Canonical | Chain | undefined {
    const [first] = this.members
    if (first === undefined) return undefined
    if (this.members.length === 1) return first

    return new Chain([...this.members])
  }

  /**
   * Orders the members in place by the UTF-8 bytes of their single-line
   * rendering.
   */
  sort(): this {
    const keyed = this.members.map((err) => ({ err, key: Buffer.from(err.toString()) }))
    keyed.sort((a, b) => Buffer.compare(a.key, b.key))
    keyed.forEach(({ err }, i) => {
      this.members[i] = err
    })

    return this
  }

  toString(): string {
    return this.formatter(this.members)
  }

  toJSON(): SerializedGroup {
    return { errors: this.members.map((err) => err.toJSON()) }
  }

  [Symbol.iterator](): Iterator<Canonical> {
    return this.members[Symbol.iterator]()
  }
}

/** True for an absent group as well as an empty one. */
export function isEmpty(group: Group | undefined): boolean {
  return group === undefined || group.empty()
}

/** {@link Group.errorOrUndefined} for a group that may not exist yet. */
export function errorOrUndefined(group: Group | undefined): Group | undefined {
  return group?.errorOrUndefined()
}
