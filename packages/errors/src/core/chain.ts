import type { ErrorClass, Extractor, Matcher, Unwrapper } from "../ports/error"
import type { Canonical } from "./canonical"
import { extract, matches } from "./utils/inspect"

/**
 * Lets a flat list of errors present itself as a sequence of single-cause
 * unwrap steps, so {@link matches} and {@link extract} visit every member in
 * order. `is`/`as`/`toString` act on the member at the cursor; `unwrap`
 * returns a chain advanced by one.
 */
export class Chain implements Matcher, Extractor, Unwrapper, Iterable<Canonical> {
  constructor(
    private readonly members: readonly Canonical[],
    private readonly index: number = 0,
  ) {}

  /** Number of members not yet visited, the current one included. */
  get length(): number {
    return Math.max(this.members.length - this.index, 0)
  }

  unwrap(): Chain | undefined {
    if (this.length <= 1) return undefined
    return new Chain(this.members, this.index + 1)
  }

  is(target: unknown): boolean {
    const current = this.members[this.index]
    return current !== undefined && matches(current, target)
  }

  as<T>(ctor: ErrorClass<T>): T | undefined {
    const current = this.members[this.index]
    return current === undefined ? undefined : extract(current, ctor)
  }

  toString(): string {
    return this.members[this.index]?.toString() ?? ""
  }

  *[Symbol.iterator](): Iterator<Canonical> {
    yield* this.members.slice(this.index)
  }
}
