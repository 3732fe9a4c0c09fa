import { Data } from 'effect'

/**
 * CRUD accessor error taxonomy.
 *
 * Soft absence (readById / delete of a missing id) is not represented here:
 * those operations return `null`.
 */
export type CrudError = ConfigurationError | ValidationError | NotFoundError | StorageError

export type SpecializationArgument = 'entity' | 'create' | 'update' | 'filter'

export type CrudOperation = 'create' | 'read' | 'readById' | 'update' | 'delete'

/** Accessor built without specialization, or bound to a field the table lacks. Not retryable. */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string
}> {}

/**
 * Caller input rejected: a bad specialization argument, a payload that fails
 * its schema, or an update that sets nothing.
 */
export class ValidationError extends Data.TaggedError('ValidationError')<{
  readonly message: string
  readonly argument?: SpecializationArgument
  readonly issues?: ReadonlyArray<{ readonly path: ReadonlyArray<string | number>; readonly message: string }>
}> {}

/** Update target missing */
export class NotFoundError extends Data.TaggedError('NotFoundError')<{
  readonly message: string
  readonly entity: string
  readonly id: unknown
}> {}

/**
 * Driver failure while staging or committing. Only lives inside the
 * operation programs so it can be logged; callers receive `cause` as thrown
 * by the driver.
 */
export class StorageError extends Data.TaggedError('StorageError')<{
  readonly message: string
  readonly operation: CrudOperation
  readonly cause: unknown
}> {}

export function isCrudError(error: unknown): error is CrudError {
  return (
    error instanceof ConfigurationError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof StorageError
  )
}
