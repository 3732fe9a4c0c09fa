import type Database from 'better-sqlite3'
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3'
import type { Logger as DrizzleLogger } from 'drizzle-orm/logger'
import { drizzle as drizzleProxy, type SqliteRemoteDatabase } from 'drizzle-orm/sqlite-proxy'
import { getLogger } from '@/infrastructure/logging/logger'

export type BlockingDatabase = BetterSQLite3Database
export type SuspendingDatabase = SqliteRemoteDatabase

export interface ConnectionOptions {
  /** Forward every statement to the logger at debug level */
  echo?: boolean
}

/** drizzle query logger that writes through the application logger */
export class QueryEchoLogger implements DrizzleLogger {
  logQuery(query: string, params: unknown[]): void {
    getLogger().debug('sql_query', { query, params })
  }
}

function drizzleLogger(options: ConnectionOptions): DrizzleLogger | undefined {
  return options.echo ? new QueryEchoLogger() : undefined
}

/**
 * Blocking drizzle session over a better-sqlite3 handle.
 */
export function createDatabaseConnection(
  sqlite: Database.Database,
  options: ConnectionOptions = {},
): BlockingDatabase {
  return drizzle(sqlite, { logger: drizzleLogger(options) })
}

// drizzle reads an undefined row as "no match"; its callback type only admits arrays
const NO_ROW = { rows: undefined } as unknown as { rows: unknown[] }

/**
 * Suspending drizzle session over the same better-sqlite3 handle.
 * Every statement, including BEGIN/COMMIT/ROLLBACK of a transaction, goes
 * through the async proxy callback.
 */
export function createSuspendingSession(
  sqlite: Database.Database,
  options: ConnectionOptions = {},
): SuspendingDatabase {
  return drizzleProxy(
    async (query, params, method) => {
      const statement = sqlite.prepare(query)
      if (method === 'run') {
        statement.run(...params)
        return { rows: [] }
      }
      if (method === 'get') {
        const row: unknown = statement.raw(true).get(...params)
        return Array.isArray(row) ? { rows: row } : NO_ROW
      }
      return { rows: statement.raw(true).all(...params) }
    },
    { logger: drizzleLogger(options) },
  )
}
