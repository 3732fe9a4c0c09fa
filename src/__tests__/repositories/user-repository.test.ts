import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { users } from '@/db/schema'
import { AsyncUserRepository, UserRepository } from '@/repositories'
import { AsyncCrudAccessor, CrudAccessor, specializeCrud } from '@/services/crud'
import { UserFilterSchema, UserInputSchema, UserUpdateInputSchema } from '@/types/user'
import { createTestDatabase, type TestDatabase } from '../__helpers/test-database'

describe('UserRepository', () => {
  let testDb: TestDatabase

  beforeEach(() => {
    testDb = createTestDatabase()
  })

  afterEach(() => {
    testDb.cleanup()
  })

  it('is the users specialization bound to id', () => {
    const repo = new UserRepository(testDb.db)

    expect(repo).toBeInstanceOf(
      specializeCrud(users, UserInputSchema, UserUpdateInputSchema, UserFilterSchema),
    )
    expect(repo).toBeInstanceOf(CrudAccessor)
    expect(repo.idFieldName).toBe('id')
  })

  it('finds a user by username', () => {
    const repo = new UserRepository(testDb.db)
    repo.create({ username: 'alice', email: 'alice@example.com' })
    const bob = repo.create({ username: 'bob', email: 'bob@example.com' })

    expect(repo.findByUsername('bob')).toEqual(bob)
    expect(repo.findByUsername('nobody')).toBeNull()
  })
})

describe('AsyncUserRepository', () => {
  let testDb: TestDatabase

  beforeEach(() => {
    testDb = createTestDatabase()
  })

  afterEach(() => {
    testDb.cleanup()
  })

  it('finds a user by username', async () => {
    const repo = new AsyncUserRepository(testDb.asyncDb)
    const alice = await repo.create({ username: 'alice', email: 'alice@example.com' })

    expect(repo).toBeInstanceOf(AsyncCrudAccessor)
    expect(await repo.findByUsername('alice')).toEqual(alice)
    expect(await repo.findByUsername('bob')).toBeNull()
  })
})
