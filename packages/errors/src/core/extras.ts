import type { SerializedExtras } from "../ports/error"

export type ExtrasInit = Readonly<{
  /** Milliseconds to wait before retrying the failed operation. */
  delay?: number
  /** Links to documentation about the error. */
  links?: readonly string[]
  stackTrace?: string
  /** Labels used to categorize errors. */
  tags?: readonly string[]
}>

function sameItems(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i])
}

/**
 * Additional context attached to an error instance.
 *
 * Immutable; every `with*` builder returns a new bundle and links/tags
 * can only be appended to.
 */
export class Extras {
  static readonly Empty = new Extras()

  readonly delay: number
  readonly links: readonly string[]
  readonly stackTrace: string
  readonly tags: readonly string[]

  constructor(init: ExtrasInit = {}) {
    this.delay = init.delay ?? 0
    this.links = Object.freeze([...(init.links ?? [])])
    this.stackTrace = init.stackTrace ?? ""
    this.tags = Object.freeze([...(init.tags ?? [])])
  }

  withDelay(delay: number): Extras {
    return new Extras({ ...this, delay })
  }

  withLinks(...links: string[]): Extras {
    return new Extras({ ...this, links: [...this.links, ...links] })
  }

  withStackTrace(stackTrace: string): Extras {
    return new Extras({ ...this, stackTrace })
  }

  withTags(...tags: string[]): Extras {
    return new Extras({ ...this, tags: [...this.tags, ...tags] })
  }

  isZero(): boolean {
    return (
      this.delay === 0 &&
      this.links.length === 0 &&
      this.stackTrace === "" &&
      this.tags.length === 0
    )
  }

  equals(other: Extras): boolean {
    return (
      this.delay === other.delay &&
      this.stackTrace === other.stackTrace &&
      sameItems(this.links, other.links) &&
      sameItems(this.tags, other.tags)
    )
  }

  toJSON(): SerializedExtras {
    return {
      ...(this.delay !== 0 && { delay: this.delay }),
      ...(this.links.length > 0 && { links: [...this.links] }),
      ...(this.stackTrace !== "" && { stack_trace: this.stackTrace }),
      ...(this.tags.length > 0 && { tags: [...this.tags] }),
    }
  }
}
