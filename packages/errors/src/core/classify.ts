import { Canonical } from "./canonical"
import { Group } from "./group"

export type ErrorVariant =
  | Readonly<{ kind: "classified"; error: Canonical }>
  | Readonly<{ kind: "aggregate"; error: Group }>
  | Readonly<{ kind: "foreign"; error: unknown }>

/**
 * Sorts a value into the three shapes the taxonomy deals with: a classified
 * error, an aggregate of them, or anything else.
 */
export function classify(err: unknown): ErrorVariant {
  if (err instanceof Canonical) return { kind: "classified", error: err }
  if (err instanceof Group) return { kind: "aggregate", error: err }
  return { kind: "foreign", error: err }
}

/** Single-line text of any error-shaped value. */
export function errorText(err: unknown): string {
  const variant = classify(err)

  switch (variant.kind) {
    case "classified":
    case "aggregate":
      return variant.error.toString()
    case "foreign":
      return variant.error instanceof Error ? variant.error.message : String(variant.error)
  }
}
