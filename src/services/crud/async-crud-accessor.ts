import type { SQLiteTable } from 'drizzle-orm/sqlite-core'
import type { z } from 'zod'
import {
  type AccessorReadOptions,
  AccessorCore,
  type EntityId,
  type EntityOf,
} from './accessor-core'
import { createEntity, deleteEntity, readEntities, readEntityById, updateEntity } from './operations'
import type { PayloadSchema } from './payload'
import { runSuspending } from './runtime'
import { type SuspendingSession, suspendingUnitOfWork } from './session'

/**
 * Suspending counterpart of CrudAccessor: same contract, every operation
 * returns a Promise. Obtain a concrete class with `specializeAsyncCrud`.
 */
export class AsyncCrudAccessor<
  TTable extends SQLiteTable = SQLiteTable,
  TCreate extends PayloadSchema = PayloadSchema,
  TUpdate extends PayloadSchema = PayloadSchema,
  TFilter extends PayloadSchema = PayloadSchema,
> extends AccessorCore<TTable, TCreate, TUpdate, TFilter> {
  constructor(
    protected readonly session: SuspendingSession,
    idFieldName: string,
  ) {
    super(idFieldName)
  }

  async create(payload: z.input<TCreate>): Promise<EntityOf<TTable>> {
    return await this.session.transaction(async (tx) =>
      runSuspending(createEntity(this.context, this.unitOfWork(tx), payload)),
    )
  }

  async read(options: AccessorReadOptions<TFilter> = {}): Promise<EntityOf<TTable>[]> {
    return await runSuspending(readEntities(this.context, this.unitOfWork(this.session), options))
  }

  async readById(id: EntityId): Promise<EntityOf<TTable> | null> {
    return await runSuspending(readEntityById(this.context, this.unitOfWork(this.session), id))
  }

  async update(id: EntityId, payload: z.input<TUpdate>): Promise<EntityOf<TTable>> {
    return await this.session.transaction(async (tx) =>
      runSuspending(updateEntity(this.context, this.unitOfWork(tx), id, payload)),
    )
  }

  async delete(id: EntityId): Promise<EntityOf<TTable> | null> {
    return await this.session.transaction(async (tx) =>
      runSuspending(deleteEntity(this.context, this.unitOfWork(tx), id)),
    )
  }

  private unitOfWork(session: SuspendingSession) {
    return suspendingUnitOfWork<EntityOf<TTable>>(session, this.table)
  }
}
