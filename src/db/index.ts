import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'
import { type AppConfig, getDatabaseConfig } from '@/config'
import {
  type BlockingDatabase,
  createDatabaseConnection,
  createSuspendingSession,
  type SuspendingDatabase,
} from '@/infrastructure/database/connection'
import { getLogger } from '@/infrastructure/logging/logger'

export * from './schema'

type DatabaseConfig = AppConfig['database']

const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url))

export interface DatabaseHandle {
  readonly sqlite: Database.Database
  readonly db: BlockingDatabase
  close(): void
}

/** Apply src/db/schema.sql. Every statement is IF NOT EXISTS, so repeated calls are no-ops. */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(fs.readFileSync(SCHEMA_SQL_PATH, 'utf8'))
}

function isMemoryPath(dbPath: string): boolean {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:')
}

export function openDatabase(config: DatabaseConfig = getDatabaseConfig()): DatabaseHandle {
  const logger = getLogger().withContext({ scope: 'database' })
  const memory = isMemoryPath(config.path)

  if (!memory) {
    const dir = path.dirname(config.path)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
  }

  const sqlite = new Database(config.path)
  sqlite.pragma(`busy_timeout = ${config.busyTimeoutMs}`)
  sqlite.pragma('foreign_keys = ON')
  if (!memory) {
    // ファイルDBのみWALを有効化
    sqlite.pragma('journal_mode = WAL')
  }
  ensureSchema(sqlite)

  const db = createDatabaseConnection(sqlite, { echo: config.echo })
  logger.debug('database_opened', { path: config.path, echo: config.echo })

  return {
    sqlite,
    db,
    close: () => {
      if (sqlite.open) {
        sqlite.close()
        logger.debug('database_closed', { path: config.path })
      }
    },
  }
}

/** Open a blocking session, run `fn` with it, and close the database afterwards. */
export function withDatabase<T>(
  fn: (db: BlockingDatabase) => T,
  config: DatabaseConfig = getDatabaseConfig(),
): T {
  const handle = openDatabase(config)
  try {
    return fn(handle.db)
  } finally {
    handle.close()
  }
}

/** Suspending counterpart of withDatabase; the database is closed once `fn` settles. */
export async function withSuspendingDatabase<T>(
  fn: (db: SuspendingDatabase) => Promise<T>,
  config: DatabaseConfig = getDatabaseConfig(),
): Promise<T> {
  const handle = openDatabase(config)
  try {
    return await fn(createSuspendingSession(handle.sqlite, { echo: config.echo }))
  } finally {
    handle.close()
  }
}
