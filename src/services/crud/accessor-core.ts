import { type Column, getTableColumns, getTableName, type InferSelectModel } from 'drizzle-orm'
import type { SQLiteTable } from 'drizzle-orm/sqlite-core'
import type { z } from 'zod'
import { ConfigurationError } from './errors'
import type { OperationContext, ReadOptions } from './operations'
import type { PayloadSchema } from './payload'

/** The four descriptors a specialization is bound to */
export interface AccessorBinding<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
> {
  readonly table: TTable
  readonly createSchema: TCreate
  readonly updateSchema: TUpdate
  readonly filterSchema: TFilter
}

export type EntityOf<TTable extends SQLiteTable> = InferSelectModel<TTable>

export type EntityId = string | number | bigint

export type AccessorReadOptions<TFilter extends PayloadSchema> = ReadOptions<z.input<TFilter>>

export function columnsOf(table: SQLiteTable): Record<string, Column> {
  return getTableColumns(table)
}

/**
 * State and construction checks shared by the blocking and suspending
 * accessors. Only classes produced by specialization supply a binding; the
 * base implementation of `resolveBinding` rejects everything else.
 */
export abstract class AccessorCore<
  TTable extends SQLiteTable,
  TCreate extends PayloadSchema,
  TUpdate extends PayloadSchema,
  TFilter extends PayloadSchema,
> {
  readonly table: TTable
  readonly idFieldName: string
  protected readonly context: OperationContext

  protected constructor(idFieldName: string) {
    const binding = this.resolveBinding()
    const columns = columnsOf(binding.table)
    const entityName = getTableName(binding.table)

    if (!Object.hasOwn(columns, idFieldName)) {
      throw new ConfigurationError({
        message: `Table ${entityName} has no field '${idFieldName}'`,
      })
    }

    this.table = binding.table
    this.idFieldName = idFieldName
    this.context = {
      entityName,
      idFieldName,
      idColumn: columns[idFieldName],
      columns,
      columnNames: new Set(Object.keys(columns)),
      createSchema: binding.createSchema,
      updateSchema: binding.updateSchema,
      filterSchema: binding.filterSchema,
    }
  }

  protected resolveBinding(): AccessorBinding<TTable, TCreate, TUpdate, TFilter> {
    throw new ConfigurationError({
      message: `${this.constructor.name} must be specialized with concrete table and payload schemas before it is instantiated`,
    })
  }
}
