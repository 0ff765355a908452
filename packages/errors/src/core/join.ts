import { classify } from "./classify"
import { Group } from "./group"

/**
 * Join one or more errors into a group.
 *
 * When `err` is already a Group the others are appended to it and it is
 * returned; otherwise a new Group holds `err` followed by `errs`. Groups among
 * `errs` are flattened and `null`/`undefined` values ignored, so joining onto
 * an absent error yields a group of just `errs`.
 */
export function join(err: unknown, ...errs: unknown[]): Group {
  const variant = classify(err)
  const group = variant.kind === "aggregate" ? variant.error : new Group([err])

  group.append(...errs)
  return group
}
