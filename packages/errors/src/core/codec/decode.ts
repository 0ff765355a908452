import { z } from "zod"
import { Canonical, DEFAULT_NAMESPACE } from "../canonical"
import { Extras } from "../extras"
import { Flags } from "../flags"
import { Group } from "../group"

/** The payload does not have the wire shape of a serialized error. */
export const ErrInvalidPayload = new Canonical({
  code: "invalid-payload",
  namespace: DEFAULT_NAMESPACE,
  message: "payload is not a serialized error",
})

const extrasSchema = z.object({
  delay: z.number().optional(),
  links: z.array(z.string()).optional(),
  stack_trace: z.string().optional(),
  tags: z.array(z.string()).optional(),
})

const canonicalSchema = z.object({
  code: z.string(),
  namespace: z.string(),
  message: z.string(),
  flags: z
    .string()
    .regex(/^[01]{1,8}$/, "flags must be 1 to 8 binary digits")
    .optional(),
  extras: extrasSchema.optional(),
})

const groupSchema = z.object({
  errors: z.array(canonicalSchema),
})

type CanonicalPayload = z.infer<typeof canonicalSchema>

function toCanonical(data: CanonicalPayload): Canonical {
  return new Canonical({
    code: data.code,
    namespace: data.namespace,
    message: data.message,
    flags: data.flags === undefined ? Flags.None : (Flags.parse(data.flags) ?? Flags.None),
    extras: data.extras
      ? new Extras({
          delay: data.extras.delay,
          links: data.extras.links,
          stackTrace: data.extras.stack_trace,
          tags: data.extras.tags,
        })
      : Extras.Empty,
  })
}

function parseOrThrow<T>(schema: z.ZodType<T>, payload: unknown): T {
  const result = schema.safeParse(payload)

  if (!result.success) {
    throw ErrInvalidPayload.wrap(new Error(z.prettifyError(result.error)))
  }

  return result.data
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json)
  } catch (err) {
    throw ErrInvalidPayload.wrap(err)
  }
}

/**
 * Rebuilds a Canonical from its wire shape.
 *
 * @throws {@link ErrInvalidPayload} wrapping the validation report.
 */
export function decodeCanonical(payload: unknown): Canonical {
  return toCanonical(parseOrThrow(canonicalSchema, payload))
}

export function decodeGroup(payload: unknown): Group {
  const data = parseOrThrow(groupSchema, payload)
  return new Group(data.errors.map(toCanonical))
}

export function parseCanonical(json: string): Canonical {
  return decodeCanonical(parseJson(json))
}

export function parseGroup(json: string): Group {
  return decodeGroup(parseJson(json))
}
