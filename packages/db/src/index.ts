export { connectWithIdToken, type DbConnection } from './client.js';
export {
  JWT_AUTH_STARTUP_OPTION,
  buildConnectionOptions,
  describeTarget,
  loadDbConfig,
  type ConnectionOptions,
  type DbConfig
} from './connection-config.js';
export {
  SERIALIZATION_FAILURE_CODE,
  StoreError,
  classifyStoreError,
  isConflictError,
  toStoreError,
  type StoreErrorKind
} from './errors.js';
export {
  createSession,
  type QueryParam,
  type QueryResult,
  type QueryRow,
  type QuerySession,
  type Session,
  type StatementRunner,
  type TransactionalSession
} from './session.js';
export {
  runTransaction,
  type RunTransactionOptions,
  type RunTransactionResult,
  type TransactionOperation
} from './transaction.js';
