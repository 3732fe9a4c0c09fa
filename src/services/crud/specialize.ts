import { getTableName, is } from 'drizzle-orm'
import { SQLiteTable } from 'drizzle-orm/sqlite-core'
import { getLogger } from '@/infrastructure/logging/logger'
import type { AccessorBinding } from './accessor-core'
import { AsyncCrudAccessor } from './async-crud-accessor'
import { CrudAccessor } from './crud-accessor'
import { type SpecializationArgument, ValidationError } from './errors'
import { isPayloadSchema, type PayloadSchema } from './payload'
import type { BlockingSession, SuspendingSession } from './session'

export interface CrudAccessorClass<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
> {
  new (session: BlockingSession, idFieldName: string): CrudAccessor<TTable, TCreate, TUpdate, TFilter>
  readonly binding: AccessorBinding<TTable, TCreate, TUpdate, TFilter>
}

export interface AsyncCrudAccessorClass<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
> {
  new (
    session: SuspendingSession,
    idFieldName: string,
  ): AsyncCrudAccessor<TTable, TCreate, TUpdate, TFilter>
  readonly binding: AccessorBinding<TTable, TCreate, TUpdate, TFilter>
}

type BindingKey = AccessorBinding<SQLiteTable, PayloadSchema, PayloadSchema, PayloadSchema>

/**
 * Specializations keyed by the identity of their four descriptors.
 * Every level is a WeakMap, so an entry goes away with its table or schemas.
 */
class SpecializationCache<TClass extends object> {
  private readonly byTable = new WeakMap<
    SQLiteTable,
    WeakMap<PayloadSchema, WeakMap<PayloadSchema, WeakMap<PayloadSchema, TClass>>>
  >()

  get(key: BindingKey): TClass | undefined {
    return this.byTable
      .get(key.table)
      ?.get(key.createSchema)
      ?.get(key.updateSchema)
      ?.get(key.filterSchema)
  }

  set(key: BindingKey, value: TClass): void {
    const byCreate = getOrInsert(this.byTable, key.table, () => new WeakMap())
    const byUpdate = getOrInsert(byCreate, key.createSchema, () => new WeakMap())
    const byFilter = getOrInsert(byUpdate, key.updateSchema, () => new WeakMap())
    byFilter.set(key.filterSchema, value)
  }
}

function getOrInsert<K extends object, V>(map: WeakMap<K, V>, key: K, create: () => V): V {
  const existing = map.get(key)
  if (existing !== undefined) return existing
  const created = create()
  map.set(key, created)
  return created
}

const blockingCache = new SpecializationCache<object>()
const suspendingCache = new SpecializationCache<object>()

function invalid(argument: SpecializationArgument, message: string): ValidationError {
  return new ValidationError({ message, argument })
}

function validateBinding(
  table: unknown,
  createSchema: unknown,
  updateSchema: unknown,
  filterSchema: unknown,
): void {
  if (!is(table, SQLiteTable)) {
    throw invalid('entity', 'entity must be a drizzle SQLite table (created with sqliteTable)')
  }
  if (!isPayloadSchema(createSchema)) {
    throw invalid('create', 'create payload must be a zod object schema')
  }
  if (!isPayloadSchema(updateSchema)) {
    throw invalid('update', 'update payload must be a zod object schema')
  }
  if (!isPayloadSchema(filterSchema)) {
    throw invalid('filter', 'filter payload must be a zod object schema')
  }
}

function nameClass(target: object, base: string, table: SQLiteTable): void {
  Object.defineProperty(target, 'name', { value: `${base}<${getTableName(table)}>` })
}

/**
 * Bind CrudAccessor to a table and its create/update/filter schemas.
 * Repeated calls with the same four descriptors return the same class.
 *
 * @throws ValidationError when an argument is not a table or a zod object schema
 */
export function specializeCrud<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
>(
  table: TTable,
  createSchema: TCreate,
  updateSchema: TUpdate,
  filterSchema: TFilter,
): CrudAccessorClass<TTable, TCreate, TUpdate, TFilter> {
  validateBinding(table, createSchema, updateSchema, filterSchema)
  const binding: AccessorBinding<TTable, TCreate, TUpdate, TFilter> = {
    table,
    createSchema,
    updateSchema,
    filterSchema,
  }

  const cached = blockingCache.get(binding)
  if (cached !== undefined) {
    return cached as CrudAccessorClass<TTable, TCreate, TUpdate, TFilter>
  }

  class SpecializedCrudAccessor extends CrudAccessor<TTable, TCreate, TUpdate, TFilter> {
    static readonly binding = binding

    protected override resolveBinding() {
      return binding
    }
  }
  nameClass(SpecializedCrudAccessor, 'CrudAccessor', table)

  blockingCache.set(binding, SpecializedCrudAccessor)
  getLogger().debug('crud_specialized', {
    entity: getTableName(table),
    variant: 'blocking',
  })
  return SpecializedCrudAccessor
}

/** Suspending variant of `specializeCrud`, cached separately. */
export function specializeAsyncCrud<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
>(
  table: TTable,
  createSchema: TCreate,
  updateSchema: TUpdate,
  filterSchema: TFilter,
): AsyncCrudAccessorClass<TTable, TCreate, TUpdate, TFilter> {
  validateBinding(table, createSchema, updateSchema, filterSchema)
  const binding: AccessorBinding<TTable, TCreate, TUpdate, TFilter> = {
    table,
    createSchema,
    updateSchema,
    filterSchema,
  }

  const cached = suspendingCache.get(binding)
  if (cached !== undefined) {
    return cached as AsyncCrudAccessorClass<TTable, TCreate, TUpdate, TFilter>
  }

  class SpecializedAsyncCrudAccessor extends AsyncCrudAccessor<TTable, TCreate, TUpdate, TFilter> {
    static readonly binding = binding

    protected override resolveBinding() {
      return binding
    }
  }
  nameClass(SpecializedAsyncCrudAccessor, 'AsyncCrudAccessor', table)

  suspendingCache.set(binding, SpecializedAsyncCrudAccessor)
  getLogger().debug('crud_specialized', {
    entity: getTableName(table),
    variant: 'suspending',
  })
  return SpecializedAsyncCrudAccessor
}
