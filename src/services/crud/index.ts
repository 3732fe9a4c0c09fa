export {
  type AccessorBinding,
  type AccessorReadOptions,
  AccessorCore,
  type EntityId,
  type EntityOf,
} from './accessor-core'
export { AsyncCrudAccessor } from './async-crud-accessor'
export { CrudAccessor } from './crud-accessor'
export {
  ConfigurationError,
  type CrudError,
  type CrudOperation,
  isCrudError,
  NotFoundError,
  type SpecializationArgument,
  StorageError,
  ValidationError,
} from './errors'
export { buildFilterConditions, combineConditions } from './filters'
export type { ReadOptions } from './operations'
export {
  dumpPayload,
  explicitlySetFields,
  isPayloadSchema,
  type PayloadKind,
  type PayloadSchema,
  parsePayload,
  pickFields,
} from './payload'
export type { BlockingSession, SuspendingSession } from './session'
export {
  type AsyncCrudAccessorClass,
  type CrudAccessorClass,
  specializeAsyncCrud,
  specializeCrud,
} from './specialize'
