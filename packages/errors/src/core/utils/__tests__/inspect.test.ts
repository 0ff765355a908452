import { Canonical } from "../../canonical"
import { Chain } from "../../chain"
import { Group } from "../../group"
import { errorChain, extract, matches, unwrap } from "../inspect"

const ErrNotFound = new Canonical({ code: "not-found", namespace: "svc", message: "missing" })
const ErrConflict = new Canonical({ code: "conflict", namespace: "svc", message: "already exists" })
const ErrDeadline = new Canonical({ code: "deadline", namespace: "svc", message: "took too long" })

describe("unwrap", () => {
  it("uses the unwrap() hook of Canonical", () => {
    const root = new Error("root")

    expect(unwrap(ErrNotFound.wrap(root))).toBe(root)
    expect(unwrap(ErrNotFound)).toBeUndefined()
  })

  it("falls back to the standard cause", () => {
    const root = new Error("root")

    expect(unwrap(new Error("outer", { cause: root }))).toBe(root)
  })

  it("returns the only member of a single-member group", () => {
    expect(unwrap(new Group([ErrNotFound]))).toBe(ErrNotFound)
  })

  it("returns undefined for values without a cause", () => {
    expect(unwrap(new Error("solo"))).toBeUndefined()
    expect(unwrap({ message: "plain" })).toBeUndefined()
    expect(unwrap(null)).toBeUndefined()
    expect(unwrap("text")).toBeUndefined()
  })
})

describe("errorChain", () => {
  describe("basic chains", () => {
    it("returns single element for error without cause", () => {
      const err = new Error("solo")
      const chain = errorChain(err)

      expect(chain).toHaveLength(1)
      expect(chain[0]).toBe(err)
    })

    it("returns chain for nested causes", () => {
      const root = new Error("root")
      const middle = new Error("middle", { cause: root })
      const outer = new Error("outer", { cause: middle })

      expect(errorChain(outer)).toEqual([outer, middle, root])
    })

    it("follows wrapped Canonicals", () => {
      const root = new Error("standard")
      const middle = ErrNotFound.wrap(root)
      const outer = ErrConflict.wrap(middle)

      const chain = errorChain(outer)

      expect(chain).toHaveLength(3)
      expect(chain[0]).toBe(outer)
      expect(chain[1]).toBe(middle)
      expect(chain[2]).toBe(root)
    })

    it("steps through group members via chains", () => {
      const group = new Group([ErrNotFound, ErrConflict])

      const chain = errorChain(group)

      expect(chain).toHaveLength(3)
      expect(chain[0]).toBe(group)
      expect(chain[1]).toBeInstanceOf(Chain)
      expect(String(chain[2])).toBe("[svc:conflict] already exists")
    })

    it("handles non-Error causes", () => {
      const err = new Error("wrapper", { cause: "string cause" })

      expect(errorChain(err)).toEqual([err, "string cause"])
    })
  })

  describe("safety", () => {
    it("detects cycles", () => {
      const a = { cause: null as unknown, message: "a" }
      const b = { cause: a, message: "b" }
      a.cause = b

      const chain = errorChain(a)

      expect(chain).toHaveLength(2)
      expect(chain[0]).toBe(a)
      expect(chain[1]).toBe(b)
    })

    it("respects maxDepth", () => {
      let current: Error = new Error("root")
      for (let i = 0; i < 9; i++) {
        current = new Error(`level-${i}`, { cause: current })
      }

      expect(errorChain(current, 5)).toHaveLength(5)
    })

    it("uses default maxDepth of 50", () => {
      let current: Error = new Error("root")
      for (let i = 0; i < 99; i++) {
        current = new Error(`level-${i}`, { cause: current })
      }

      expect(errorChain(current)).toHaveLength(50)
    })
  })

  describe("edge cases", () => {
    it("handles null and undefined input", () => {
      expect(errorChain(null)).toHaveLength(0)
      expect(errorChain(undefined)).toHaveLength(0)
    })

    it("handles string input", () => {
      expect(errorChain("just a string")).toEqual(["just a string"])
    })
  })
})

describe("matches", () => {
  it("finds a foreign error by reference", () => {
    const root = new Error("disk full")

    expect(matches(ErrNotFound.wrap(root), root)).toBe(true)
    expect(matches(ErrNotFound.wrap(root), new Error("disk full"))).toBe(false)
  })

  it("finds a Canonical by classification anywhere in the chain", () => {
    const err = ErrConflict.wrap(ErrNotFound.wrap(new Error("disk full")))

    expect(matches(err, ErrConflict)).toBe(true)
    expect(matches(err, ErrNotFound)).toBe(true)
    expect(matches(err, ErrDeadline)).toBe(false)
  })

  it("visits every member of a group", () => {
    const root = new Error("disk full")
    const group = new Group([ErrNotFound, ErrConflict.wrap(root)])

    expect(matches(group, ErrNotFound)).toBe(true)
    expect(matches(group, ErrConflict)).toBe(true)
    expect(matches(group, root)).toBe(true)
    expect(matches(group, ErrDeadline)).toBe(false)
  })

  it("treats a single-member group as its member", () => {
    expect(matches(new Group([ErrNotFound]), ErrNotFound)).toBe(true)
  })

  it("looks through foreign wrappers", () => {
    const outer = new Error("request failed", { cause: ErrNotFound.wrap(new Error("x")) })

    expect(matches(outer, ErrNotFound)).toBe(true)
  })

  it("is false for absent errors", () => {
    expect(matches(undefined, ErrNotFound)).toBe(false)
  })
})

describe("extract", () => {
  class QuotaError extends Error {}

  it("returns the first Canonical", () => {
    const inner = ErrNotFound.wrap(new Error("x"))
    const outer = new Error("request failed", { cause: inner })

    expect(extract(outer, Canonical)).toBe(inner)
  })

  it("returns the first member of a group", () => {
    expect(extract(new Group([ErrNotFound, ErrConflict]), Canonical)).toBe(ErrNotFound)
  })

  it("finds foreign classes behind any group member", () => {
    const quota = new QuotaError("over quota")
    const group = new Group([ErrNotFound, ErrConflict.wrap(quota)])

    expect(extract(group, QuotaError)).toBe(quota)
  })

  it("returns undefined when nothing matches", () => {
    expect(extract(ErrNotFound, QuotaError)).toBeUndefined()
    expect(extract("text", Canonical)).toBeUndefined()
  })
})
