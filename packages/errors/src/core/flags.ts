const MASK = 0xff
const BINARY = /^[01]{1,8}$/

/**
 * An 8-bit mask carrying classification that cuts across error kinds,
 * e.g. whether a failed operation can be retried.
 *
 * Every operation returns a new value.
 */
export class Flags {
  static readonly None = new Flags(0)
  /** Set on errors that were not produced by a known taxonomy. */
  static readonly Unknown = new Flags(1 << 0)
  /** Set on errors whose operation can be retried. */
  static readonly Retryable = new Flags(1 << 1)
  /** Set on errors indicating a timeout occurred. */
  static readonly Timeout = new Flags(1 << 2)

  readonly value: number

  constructor(value: number = 0) {
    this.value = value & MASK
  }

  static of(...bits: Flags[]): Flags {
    return bits.reduce((acc, b) => acc.set(b), Flags.None)
  }

  /**
   * Parse the base-2 form produced by {@link Flags.toString}.
   * Returns undefined unless the text is one to eight binary digits.
   */
  static parse(text: string): Flags | undefined {
    if (!BINARY.test(text)) return undefined
    return new Flags(Number.parseInt(text, 2))
  }

  /** Checks if any of the bits are set. */
  has(bits: Flags): boolean {
    return (this.value & bits.value) !== 0
  }

  set(bits: Flags): Flags {
    return new Flags(this.value | bits.value)
  }

  clear(bits: Flags): Flags {
    return new Flags(this.value & ~bits.value)
  }

  toggle(bits: Flags): Flags {
    return new Flags(this.value ^ bits.value)
  }

  equals(other: Flags): boolean {
    return this.value === other.value
  }

  isZero(): boolean {
    return this.value === 0
  }

  /** Binary form, e.g. "101". */
  toString(): string {
    return this.value.toString(2)
  }

  toJSON(): string {
    return this.toString()
  }
}
