import { ErrNoDatabaseClient, ErrNoDatabaseName } from './errors.js';
import { TableName } from './identifier.js';
import { DEFAULT_CONFIG } from './types.js';
import type { DatabaseClient, DriverLogger, DriverOptions } from './types.js';

/**
 * Fully resolved driver configuration
 */
export interface DriverConfig {
  /** Pool the driver checks its session out of */
  client: DatabaseClient;
  /** Database the lock key is derived from */
  databaseName: string;
  /** Validated migrations table */
  migrationsTable: TableName;
  /** Whether lock/unlock contact the server */
  locking: boolean;
  /** Whether diagnostic output is emitted */
  verbose: boolean;
  /** Logging sink */
  logger?: DriverLogger | undefined;
}

/**
 * Validate driver arguments and apply defaults
 *
 * @throws ConfigurationError when the database name or client is missing,
 * or when the table or schema name is not a valid identifier
 *
 * @example
 * ```typescript
 * const config = resolveDriverConfig(pool, 'app_db', {
 *   migrationsTable: 'schema_migrations',
 *   locking: true,
 * });
 * ```
 */
export function resolveDriverConfig(
  client: DatabaseClient | null | undefined,
  databaseName: string,
  options: DriverOptions = {}
): DriverConfig {
  if (!databaseName) {
    throw ErrNoDatabaseName();
  }

  if (!client) {
    throw ErrNoDatabaseClient();
  }

  return {
    client,
    databaseName,
    migrationsTable: TableName.parse(
      options.migrationsTable ?? DEFAULT_CONFIG.migrationsTable,
      options.migrationsSchema
    ),
    locking: options.locking ?? DEFAULT_CONFIG.locking,
    verbose: options.verbose ?? DEFAULT_CONFIG.verbose,
    logger: options.logger,
  };
}
