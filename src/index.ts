export * from './services/crud'
export {
  type BlockingDatabase,
  createDatabaseConnection,
  createSuspendingSession,
  QueryEchoLogger,
  type SuspendingDatabase,
} from './infrastructure/database/connection'
export {
  getLogger,
  type LoggerPort,
  type LogLevel,
  runWithLogContext,
  setLogger,
} from './infrastructure/logging/logger'
