import type { QueryResult } from 'pg';

/**
 * A single connection checked out of a pool.
 *
 * `pg.PoolClient` satisfies this interface. Advisory locks in PostgreSQL belong
 * to a session, so every driver operation runs on the same session.
 */
export interface DatabaseSession {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  release(err?: Error | boolean): void;
}

/**
 * Source of database sessions (`pg.Pool` satisfies this interface)
 */
export interface DatabaseClient {
  connect(): Promise<DatabaseSession>;
}

/**
 * Migration state stored in the migrations table
 */
export interface MigrationState {
  /** Applied version, or `null` when no migration has ever run */
  version: bigint | null;
  /** A migration started but never confirmed completion */
  dirty: boolean;
}

/**
 * Version returned when the migrations table holds no row
 */
export const NO_MIGRATION_VERSION = null;

/**
 * Largest version that fits the `bigint` version column
 */
export const MAX_MIGRATION_VERSION = 9_223_372_036_854_775_807n;

/**
 * Migration script content accepted by `runMigration`
 */
export type MigrationContent = string | Uint8Array | AsyncIterable<string | Uint8Array>;

/**
 * Context passed to the debug logger
 */
export interface DebugContext {
  /** Event type */
  type:
    | 'query'
    | 'lock_acquired'
    | 'lock_released'
    | 'lock_skipped'
    | 'lock_not_held'
    | 'version_read'
    | 'version_set'
    | 'table_prepared'
    | 'table_reset'
    | 'migration_run';
  /** Lock key (for lock events) */
  lockKey?: string;
  /** SQL query (for query events) */
  query?: string;
  /** Query duration in ms */
  durationMs?: number;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Logging sink used by the driver
 */
export type DriverLogger = (message: string, context?: DebugContext) => void;

/**
 * Options accepted by `createDriver`
 */
export interface DriverOptions {
  /** Name of the table holding the migration state (default: schema_migrations) */
  migrationsTable?: string;
  /** Schema holding the migrations table (default: the session search_path) */
  migrationsSchema?: string;
  /** Guard schema changes with an advisory lock (default: true) */
  locking?: boolean;
  /** Custom logger function (default: console.log) */
  logger?: DriverLogger;
  /** Emit diagnostic log lines (default: false) */
  verbose?: boolean;
}

/**
 * Operations exposed to a migration orchestrator
 */
export interface MigrationDriver {
  /** Acquire the database-wide migration lock */
  lock(): Promise<void>;
  /** Release the database-wide migration lock */
  unlock(): Promise<void>;
  /** Read the current migration state */
  getVersion(): Promise<MigrationState>;
  /** Replace the migration state atomically */
  setVersion(version: bigint, dirty: boolean): Promise<void>;
  /** Execute one migration script as a single batch */
  runMigration(content: MigrationContent): Promise<void>;
  /** Drop the migrations table */
  reset(): Promise<void>;
  /** Release the pinned session */
  close(): Promise<void>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  migrationsTable: 'schema_migrations',
  locking: true,
  verbose: false,
  lockTimeoutMs: 5_000,
} as const;
