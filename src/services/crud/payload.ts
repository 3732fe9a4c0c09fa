import { Effect } from 'effect'
import { z } from 'zod'
import { ValidationError } from './errors'

/** Schema capability required of create, update and filter payloads */
export type PayloadSchema = z.AnyZodObject

export type PayloadKind = 'create' | 'update' | 'filter'

export function isPayloadSchema(value: unknown): value is PayloadSchema {
  return value instanceof z.ZodObject
}

/** Parse caller input with its payload schema; failures become a ValidationError with the zod issues. */
export function parsePayload(
  schema: PayloadSchema,
  input: unknown,
  kind: PayloadKind,
): Effect.Effect<Record<string, unknown>, ValidationError> {
  return Effect.suspend(() => {
    const parsed = schema.safeParse(input)
    if (parsed.success) {
      return Effect.succeed(dumpPayload(parsed.data))
    }
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    return Effect.fail(
      new ValidationError({
        message: `${kind}: invalid payload (${issues
          .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ')})`,
        issues,
      }),
    )
  })
}

/** Field -> value mapping of a parsed payload (own enumerable keys only) */
export function dumpPayload(payload: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(payload))
}

/**
 * Fields the caller set. zod leaves keys the input omitted out of its output,
 * so presence marks "set"; an explicit `null` counts as set, `undefined` does not.
 */
export function explicitlySetFields(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== undefined))
}

export function pickFields(
  payload: Record<string, unknown>,
  allowed: ReadonlySet<string>,
): { picked: Record<string, unknown>; rejected: string[] } {
  const picked: Record<string, unknown> = {}
  const rejected: string[] = []
  for (const [field, value] of Object.entries(payload)) {
    if (allowed.has(field)) {
      picked[field] = value
    } else {
      rejected.push(field)
    }
  }
  return { picked, rejected }
}
