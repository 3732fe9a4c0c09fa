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
import { runBlocking } from './runtime'
import { type BlockingSession, blockingUnitOfWork } from './session'

/**
 * Blocking CRUD accessor. Every operation completes on the calling thread
 * and returns its value directly.
 *
 * Obtain a concrete class with `specializeCrud`; the class itself cannot be
 * instantiated.
 */
export class CrudAccessor<
  TTable extends SQLiteTable = SQLiteTable,
  TCreate extends PayloadSchema = PayloadSchema,
  TUpdate extends PayloadSchema = PayloadSchema,
  TFilter extends PayloadSchema = PayloadSchema,
> extends AccessorCore<TTable, TCreate, TUpdate, TFilter> {
  constructor(
    protected readonly session: BlockingSession,
    idFieldName: string,
  ) {
    super(idFieldName)
  }

  /** Insert one entity and return it as stored (generated id and defaults included). */
  create(payload: z.input<TCreate>): EntityOf<TTable> {
    return this.session.transaction((tx) =>
      runBlocking(createEntity(this.context, this.unitOfWork(tx), payload)),
    )
  }

  read(options: AccessorReadOptions<TFilter> = {}): EntityOf<TTable>[] {
    return runBlocking(readEntities(this.context, this.unitOfWork(this.session), options))
  }

  readById(id: EntityId): EntityOf<TTable> | null {
    return runBlocking(readEntityById(this.context, this.unitOfWork(this.session), id))
  }

  /**
   * Apply the fields the caller set. Throws ValidationError when nothing is
   * set and NotFoundError when no entity has the id.
   */
  update(id: EntityId, payload: z.input<TUpdate>): EntityOf<TTable> {
    return this.session.transaction((tx) =>
      runBlocking(updateEntity(this.context, this.unitOfWork(tx), id, payload)),
    )
  }

  /** Remove the entity; returns its last state, or null when it did not exist. */
  delete(id: EntityId): EntityOf<TTable> | null {
    return this.session.transaction((tx) =>
      runBlocking(deleteEntity(this.context, this.unitOfWork(tx), id)),
    )
  }

  private unitOfWork(session: BlockingSession) {
    return blockingUnitOfWork<EntityOf<TTable>>(session, this.table)
  }
}
