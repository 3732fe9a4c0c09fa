import { type Column, eq } from 'drizzle-orm'
import { Effect, pipe } from 'effect'
import {
  type LoggerEffectService,
  logDebug,
  logError,
  logInfo,
  logWarn,
  withEffectLogContext,
} from '@/infrastructure/logging/effect-logger'
import { type CrudOperation, NotFoundError, type StorageError, ValidationError } from './errors'
import { buildFilterConditions, combineConditions } from './filters'
import { explicitlySetFields, type PayloadSchema, parsePayload, pickFields } from './payload'
import type { UnitOfWork } from './session'

/**
 * CRUD operations, written once as Effect programs over a UnitOfWork.
 * The blocking and suspending accessors differ only in the UnitOfWork they
 * pass in and the runner they execute the program with.
 */

export interface OperationContext {
  readonly entityName: string
  readonly idFieldName: string
  readonly idColumn: Column
  readonly columns: Readonly<Record<string, Column>>
  readonly columnNames: ReadonlySet<string>
  readonly createSchema: PayloadSchema
  readonly updateSchema: PayloadSchema
  readonly filterSchema: PayloadSchema
}

export interface ReadOptions<TFilterInput = unknown> {
  limit?: number
  offset?: number
  filter?: TFilterInput
}

export type Program<A, E = never> = Effect.Effect<A, E | StorageError, LoggerEffectService>

function readField(entity: unknown, field: string): unknown {
  return typeof entity === 'object' && entity !== null ? Reflect.get(entity, field) : undefined
}

function describeError(error: { readonly _tag: string; readonly message: string }) {
  return { errorTag: error._tag, error: error.message }
}

// Attaches entity/operation metadata and records every failure before it propagates
function traced<A, E extends { readonly _tag: string; readonly message: string }>(
  ctx: OperationContext,
  operation: CrudOperation,
  program: Effect.Effect<A, E, LoggerEffectService>,
): Effect.Effect<A, E, LoggerEffectService> {
  return pipe(
    program,
    Effect.tapError((error) => logError(`crud_${operation}_failed`, describeError(error))),
    withEffectLogContext({ entity: ctx.entityName, operation }),
  )
}

function validatePagination(
  limit: number | undefined,
  offset: number | undefined,
): Effect.Effect<void, ValidationError> {
  for (const [name, value] of [
    ['limit', limit],
    ['offset', offset],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      return Effect.fail(
        new ValidationError({ message: `read: ${name} must be a non-negative integer, got ${value}` }),
      )
    }
  }
  return Effect.void
}

export function createEntity<TEntity>(
  ctx: OperationContext,
  uow: UnitOfWork<TEntity>,
  input: unknown,
): Program<TEntity, ValidationError> {
  return traced(
    ctx,
    'create',
    Effect.gen(function* () {
      const payload = yield* parsePayload(ctx.createSchema, input, 'create')
      const { picked, rejected } = pickFields(explicitlySetFields(payload), ctx.columnNames)
      if (rejected.length > 0) {
        return yield* Effect.fail(
          new ValidationError({
            message: `create: unknown fields for ${ctx.entityName}: ${rejected.join(', ')}`,
          }),
        )
      }
      yield* logDebug('crud_create_attempt', { data: picked })
      const entity = yield* uow.insert(picked)
      yield* logInfo('crud_create_succeeded', { id: readField(entity, ctx.idFieldName) })
      return entity
    }),
  )
}

export function readEntities<TEntity>(
  ctx: OperationContext,
  uow: UnitOfWork<TEntity>,
  options: ReadOptions,
): Program<TEntity[], ValidationError> {
  return traced(
    ctx,
    'read',
    Effect.gen(function* () {
      const { limit, offset } = options
      yield* logDebug('crud_read_attempt', { limit, offset })
      yield* validatePagination(limit, offset)
      const filter =
        options.filter === undefined
          ? undefined
          : yield* parsePayload(ctx.filterSchema, options.filter, 'filter')
      const where = combineConditions(buildFilterConditions(ctx.columns, filter))
      const rows = yield* uow.select({ where, limit, offset })
      yield* logInfo('crud_read_succeeded', { count: rows.length })
      return rows
    }),
  )
}

export function readEntityById<TEntity>(
  ctx: OperationContext,
  uow: UnitOfWork<TEntity>,
  id: unknown,
): Program<TEntity | null> {
  return traced(
    ctx,
    'readById',
    Effect.gen(function* () {
      yield* logDebug('crud_read_by_id_attempt', { id })
      const rows = yield* uow.select({ where: eq(ctx.idColumn, id), limit: 1 })
      const entity = rows.at(0)
      if (entity === undefined) {
        yield* logWarn('crud_read_by_id_not_found', { id })
        return null
      }
      yield* logInfo('crud_read_by_id_found', { id })
      return entity
    }),
  )
}

export function updateEntity<TEntity>(
  ctx: OperationContext,
  uow: UnitOfWork<TEntity>,
  id: unknown,
  input: unknown,
): Program<TEntity, ValidationError | NotFoundError> {
  const notFound = () =>
    new NotFoundError({
      message: `update: no ${ctx.entityName} found with ${ctx.idFieldName}=${String(id)}`,
      entity: ctx.entityName,
      id,
    })

  return traced(
    ctx,
    'update',
    Effect.gen(function* () {
      const payload = yield* parsePayload(ctx.updateSchema, input, 'update')
      const { picked: changes } = pickFields(explicitlySetFields(payload), ctx.columnNames)
      // checked before the lookup: an empty update is invalid whether or not the id exists
      if (Object.keys(changes).length === 0) {
        return yield* Effect.fail(
          new ValidationError({ message: `update: no valid fields to update for id=${String(id)}` }),
        )
      }

      const existing = yield* readEntityById(ctx, uow, id)
      if (existing === null) {
        return yield* Effect.fail(notFound())
      }

      yield* logDebug('crud_update_attempt', { id, data: changes })
      const rows = yield* uow.update(eq(ctx.idColumn, id), changes)
      const updated = rows.at(0)
      if (updated === undefined) {
        return yield* Effect.fail(notFound())
      }
      yield* logInfo('crud_update_succeeded', { id })
      return updated
    }),
  )
}

export function deleteEntity<TEntity>(
  ctx: OperationContext,
  uow: UnitOfWork<TEntity>,
  id: unknown,
): Program<TEntity | null> {
  return traced(
    ctx,
    'delete',
    Effect.gen(function* () {
      const existing = yield* readEntityById(ctx, uow, id)
      if (existing === null) {
        yield* logWarn('crud_delete_not_found', { id })
        return null
      }
      yield* logDebug('crud_delete_attempt', { id })
      const rows = yield* uow.remove(eq(ctx.idColumn, id))
      yield* logInfo('crud_delete_succeeded', { id })
      // RETURNING carries the row as it was before removal
      return rows.at(0) ?? existing
    }),
  )
}
