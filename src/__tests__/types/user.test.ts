import { describe, expect, it } from 'vitest'
import {
  toUserOutput,
  UserFilterSchema,
  UserInputSchema,
  UserUpdateInputSchema,
} from '@/types/user'

describe('user payload schemas', () => {
  it('defaults isActive on create and leaves optional fields out', () => {
    expect(UserInputSchema.parse({ username: 'a', email: 'a@x.com' })).toEqual({
      username: 'a',
      email: 'a@x.com',
      isActive: true,
    })
  })

  it('enforces the column limits', () => {
    expect(UserInputSchema.safeParse({ username: 'x'.repeat(51), email: 'a@x.com' }).success).toBe(
      false,
    )
    expect(UserInputSchema.safeParse({ username: '', email: 'a@x.com' }).success).toBe(false)
  })

  it('allows clearing nullable columns on update but not required ones', () => {
    expect(UserUpdateInputSchema.safeParse({ bio: null, fullName: null }).success).toBe(true)
    expect(UserUpdateInputSchema.safeParse({ username: null }).success).toBe(false)
  })

  it('accepts single values and lists in filters', () => {
    expect(UserFilterSchema.parse({ username: ['a', 'b'], email: 'a@x.com' })).toEqual({
      username: ['a', 'b'],
      email: 'a@x.com',
    })
    expect(UserFilterSchema.safeParse({ email: ['bad'] }).success).toBe(false)
  })
})

describe('toUserOutput', () => {
  it('maps a stored user to the read model', () => {
    const output = toUserOutput({
      id: 3,
      username: 'alice',
      email: 'alice@example.com',
      fullName: null,
      bio: 'hello',
      isActive: true,
      createdAt: '2026-01-02 03:04:05',
      updatedAt: null,
    })

    expect(output).toEqual({
      id: 3,
      username: 'alice',
      email: 'alice@example.com',
      fullName: null,
      bio: 'hello',
      isActive: true,
      createdAt: '2026-01-02 03:04:05',
      updatedAt: null,
    })
  })
})
