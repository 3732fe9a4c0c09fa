import { getTableColumns, getTableName, type SQL } from 'drizzle-orm'
import type {
  BaseSQLiteDatabase,
  SQLiteInsertValue,
  SQLiteTable,
  SQLiteUpdateSetSource,
} from 'drizzle-orm/sqlite-core'
import { Effect } from 'effect'
import { type CrudOperation, StorageError } from './errors'

/** Transactional session whose statements complete on the calling thread (better-sqlite3). */
export type BlockingSession = BaseSQLiteDatabase<'sync', unknown>

/** Transactional session whose statements resolve through Promises (sqlite-proxy, libsql, D1). */
export type SuspendingSession = BaseSQLiteDatabase<'async', unknown>

export interface SelectOptions {
  where?: SQL
  limit?: number
  offset?: number
}

/**
 * Storage primitives an operation program is written against. Each call is a
 * suspension point; the blocking and suspending implementations differ only
 * in how a statement is executed.
 */
export interface UnitOfWork<TEntity> {
  insert(values: Record<string, unknown>): Effect.Effect<TEntity, StorageError>
  select(options: SelectOptions): Effect.Effect<TEntity[], StorageError>
  update(where: SQL, values: Record<string, unknown>): Effect.Effect<TEntity[], StorageError>
  remove(where: SQL): Effect.Effect<TEntity[], StorageError>
}

function hasOnlyColumns(table: SQLiteTable, values: object): boolean {
  const columns = getTableColumns(table)
  return Object.keys(values).every((key) => Object.hasOwn(columns, key))
}

function isInsertValue(table: SQLiteTable, values: object): values is SQLiteInsertValue<SQLiteTable> {
  return hasOnlyColumns(table, values)
}

function isUpdateSet(table: SQLiteTable, values: object): values is SQLiteUpdateSetSource<SQLiteTable> {
  return Object.keys(values).length > 0 && hasOnlyColumns(table, values)
}

function storageError(operation: CrudOperation, cause: unknown): StorageError {
  return new StorageError({
    message: `${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    operation,
    cause,
  })
}

// SQLite rejects OFFSET without LIMIT
const UNBOUNDED_LIMIT = Number.MAX_SAFE_INTEGER

function effectiveLimit(options: SelectOptions): number | undefined {
  if (options.limit !== undefined) return options.limit
  return options.offset !== undefined ? UNBOUNDED_LIMIT : undefined
}

function buildInsert<TKind extends 'sync' | 'async'>(
  session: BaseSQLiteDatabase<TKind, unknown>,
  table: SQLiteTable,
  values: Record<string, unknown>,
) {
  if (!isInsertValue(table, values)) {
    throw new Error(`insert values must only name columns of ${getTableName(table)}`)
  }
  // columns missing from values fall back to their storage default
  return session.insert(table).values(values).returning()
}

function buildSelect<TKind extends 'sync' | 'async'>(
  session: BaseSQLiteDatabase<TKind, unknown>,
  table: SQLiteTable,
  options: SelectOptions,
) {
  let query = session.select().from(table).where(options.where).$dynamic()
  const limit = effectiveLimit(options)
  if (limit !== undefined) query = query.limit(limit)
  if (options.offset !== undefined) query = query.offset(options.offset)
  return query
}

function buildUpdate<TKind extends 'sync' | 'async'>(
  session: BaseSQLiteDatabase<TKind, unknown>,
  table: SQLiteTable,
  where: SQL,
  values: Record<string, unknown>,
) {
  if (!isUpdateSet(table, values)) {
    throw new Error(`update values must name at least one column of ${getTableName(table)}`)
  }
  return session.update(table).set(values).where(where).returning()
}

function buildDelete<TKind extends 'sync' | 'async'>(
  session: BaseSQLiteDatabase<TKind, unknown>,
  table: SQLiteTable,
  where: SQL,
) {
  return session.delete(table).where(where).returning()
}

/**
 * Unit of work over a blocking session. Rows come back from drizzle typed
 * against the base SQLiteTable, so they are re-typed to the bound entity here.
 */
export function blockingUnitOfWork<TEntity>(
  session: BlockingSession,
  table: SQLiteTable,
): UnitOfWork<TEntity> {
  const attempt = <T>(operation: CrudOperation, run: () => T) =>
    Effect.try({ try: run, catch: (cause) => storageError(operation, cause) })

  return {
    insert: (values) =>
      attempt('create', () => buildInsert(session, table, values).get() as TEntity),
    select: (options) =>
      attempt('read', () => buildSelect(session, table, options).all() as TEntity[]),
    update: (where, values) =>
      attempt('update', () => buildUpdate(session, table, where, values).all() as TEntity[]),
    remove: (where) => attempt('delete', () => buildDelete(session, table, where).all() as TEntity[]),
  }
}

export function suspendingUnitOfWork<TEntity>(
  session: SuspendingSession,
  table: SQLiteTable,
): UnitOfWork<TEntity> {
  const attempt = <T>(operation: CrudOperation, run: () => Promise<T>) =>
    Effect.tryPromise({ try: run, catch: (cause) => storageError(operation, cause) })

  return {
    insert: (values) =>
      attempt('create', async () => {
        const [row] = await buildInsert(session, table, values).all()
        return row as TEntity
      }),
    select: (options) =>
      attempt('read', async () => (await buildSelect(session, table, options).all()) as TEntity[]),
    update: (where, values) =>
      attempt(
        'update',
        async () => (await buildUpdate(session, table, where, values).all()) as TEntity[],
      ),
    remove: (where) =>
      attempt('delete', async () => (await buildDelete(session, table, where).all()) as TEntity[]),
  }
}
