// Core exports
export { createDriver, PostgresDriver, readMigration } from './driver/index.js';
export { resolveDriverConfig } from './config.js';
export { DebugLogger, createDebugLogger } from './debug.js';

// Locking
export { LockCoordinator } from './lock/index.js';
export { getLockingKey, crc32, ADVISORY_LOCK_ID_SALT } from './lock/index.js';

// Version state
export { VersionStore } from './state/index.js';

// Identifiers
export { TableName, validateIdentifier, isIdentifier } from './identifier.js';

// Errors
export {
  ConfigurationError,
  DatabaseLockedError,
  DriverError,
  TransactionError,
  ErrNoDatabaseName,
  ErrNoDatabaseClient,
} from './errors.js';

// Constants
export { DEFAULT_CONFIG, NO_MIGRATION_VERSION, MAX_MIGRATION_VERSION } from './types.js';

// Types
export type {
  DatabaseClient,
  DatabaseSession,
  MigrationState,
  MigrationContent,
  MigrationDriver,
  DriverOptions,
  DriverLogger,
  DebugContext,
} from './types.js';

export type { DriverConfig } from './config.js';
export type { DebugConfig } from './debug.js';
export type { Identifier } from './identifier.js';
export type { LockCoordinatorConfig } from './lock/index.js';
