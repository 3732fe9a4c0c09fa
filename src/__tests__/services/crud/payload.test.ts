import { Effect, Either } from 'effect'
import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  explicitlySetFields,
  isPayloadSchema,
  parsePayload,
  pickFields,
  ValidationError,
} from '@/services/crud'
import { UserUpdateInputSchema } from '@/types/user'

describe('isPayloadSchema', () => {
  it('accepts zod object schemas only', () => {
    expect(isPayloadSchema(z.object({}))).toBe(true)
    expect(isPayloadSchema(UserUpdateInputSchema.partial())).toBe(true)
    expect(isPayloadSchema(z.string())).toBe(false)
    expect(isPayloadSchema(z.object({}).nullable())).toBe(false)
    expect(isPayloadSchema({ shape: {} })).toBe(false)
  })
})

describe('parsePayload', () => {
  const schema = z.object({ name: z.string(), age: z.number().int().optional() })

  it('succeeds with the parsed fields', () => {
    const result = Effect.runSync(parsePayload(schema, { name: 'n', age: 3 }, 'create'))
    expect(result).toEqual({ name: 'n', age: 3 })
  })

  it('fails with a ValidationError that lists every issue', () => {
    const result = Effect.runSync(Effect.either(parsePayload(schema, { age: 1.5 }, 'update')))

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ValidationError)
      expect(result.left.message).toBe(
        'update: invalid payload (name: Required; age: Expected integer, received float)',
      )
      expect(result.left.issues).toEqual([
        { path: ['name'], message: 'Required' },
        { path: ['age'], message: 'Expected integer, received float' },
      ])
    }
  })

  it('labels root-level issues', () => {
    const result = Effect.runSync(Effect.either(parsePayload(schema, 'text', 'filter')))
    expect(Either.isLeft(result) && result.left.message).toBe(
      'filter: invalid payload (<root>: Expected object, received string)',
    )
  })
})

describe('explicitlySetFields', () => {
  it('keeps omitted keys out and explicit nulls in', () => {
    const parsed = UserUpdateInputSchema.parse({ bio: null, fullName: undefined, isActive: false })
    expect(explicitlySetFields(parsed)).toEqual({ bio: null, isActive: false })
    expect(Object.keys(explicitlySetFields(parsed))).toEqual(['bio', 'isActive'])
  })
})

describe('pickFields', () => {
  it('splits fields into allowed and rejected', () => {
    expect(pickFields({ a: 1, b: 2, c: 3 }, new Set(['a', 'c']))).toEqual({
      picked: { a: 1, c: 3 },
      rejected: ['b'],
    })
  })
})
