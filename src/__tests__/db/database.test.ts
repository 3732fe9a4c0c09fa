import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import Database from 'better-sqlite3'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { AppConfig } from '@/config'
import { openDatabase, users, withDatabase, withSuspendingDatabase } from '@/db'
import { AsyncUserRepository, UserRepository } from '@/repositories'

type DatabaseConfig = AppConfig['database']

describe('openDatabase', () => {
  it('applies pragmas and the schema to an in-memory database', () => {
    const handle = openDatabase({ path: ':memory:', busyTimeoutMs: 1234, echo: false })

    expect(handle.sqlite.pragma('busy_timeout', { simple: true })).toBe(1234)
    expect(handle.sqlite.pragma('foreign_keys', { simple: true })).toBe(1)
    expect(handle.db.select().from(users).all()).toEqual([])

    handle.close()
    expect(handle.sqlite.open).toBe(false)
    expect(() => handle.close()).not.toThrow()
  })
})

describe('withDatabase / withSuspendingDatabase', () => {
  let dir: string
  let config: DatabaseConfig

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crud-db-'))
    config = { path: path.join(dir, 'nested', 'crud.db'), busyTimeoutMs: 1000, echo: false }
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('creates the database file and persists between sessions', async () => {
    const created = withDatabase(
      (db) => new UserRepository(db).create({ username: 'alice', email: 'alice@example.com' }),
      config,
    )
    expect(fs.existsSync(config.path)).toBe(true)

    const found = await withSuspendingDatabase(
      (db) => new AsyncUserRepository(db).findByUsername('alice'),
      config,
    )
    expect(found).toEqual(created)
  })

  it('closes the database even when the callback throws', () => {
    const close = vi.spyOn(Database.prototype, 'close')

    expect(() =>
      withDatabase(() => {
        throw new Error('boom')
      }, config),
    ).toThrow('boom')
    expect(close).toHaveBeenCalledTimes(1)
  })
})
