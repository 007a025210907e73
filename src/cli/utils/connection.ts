import pg from 'pg';
import type { Command } from 'commander';
import { createDriver } from '../../driver/driver.js';
import type { PostgresDriver } from '../../driver/driver.js';
import { foldUnwindError } from '../../errors.js';
import { CLIErrors } from './errors.js';
import { debug, shouldShowVerbose } from './output.js';
import type { DatabaseClient } from '../../types.js';
import type { ConnectionOptions } from '../types.js';

/**
 * Connection settings resolved from CLI options and the environment
 */
export interface ResolvedConnection {
  url: string;
  databaseName: string;
  migrationsTable?: string | undefined;
  migrationsSchema?: string | undefined;
  locking: boolean;
}

/**
 * Register the options shared by every command that talks to the database
 */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('--url <url>', 'PostgreSQL connection URL (default: $DATABASE_URL)')
    .option('--database <name>', 'Database name used for the lock key (default: from the URL)')
    .option('--table <name>', 'Migrations table name', 'schema_migrations')
    .option('--schema <name>', 'Schema holding the migrations table')
    .option('--no-lock', 'Skip the advisory lock');
}

/**
 * Extract the database name from a connection URL path
 *
 * Returns null when the URL cannot be parsed or names no database.
 */
export function parseDatabaseName(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  const name = decodeURIComponent(parsed.pathname.replace(/^\/+/, ''));
  return name.length > 0 ? name : null;
}

/**
 * Resolve connection settings, falling back to DATABASE_URL
 */
export function resolveConnection(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConnection {
  const url = options.url ?? env['DATABASE_URL'];
  if (!url) {
    throw CLIErrors.noConnectionUrl();
  }

  const databaseName = options.database ?? parseDatabaseName(url);
  if (!databaseName) {
    throw CLIErrors.noDatabaseName(redactUrl(url));
  }

  return {
    url,
    databaseName,
    migrationsTable: options.table,
    migrationsSchema: options.schema,
    locking: options.lock !== false,
  };
}

/**
 * Replace the password in a connection URL for display
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Open a pool, create a driver and run `fn` with it
 *
 * The pool is ended once the driver is closed.
 */
export async function withDriver<T>(
  connection: ResolvedConnection,
  fn: (driver: PostgresDriver) => Promise<T>
): Promise<T> {
  debug(`Connecting to ${redactUrl(connection.url)}`);

  const pool = new pg.Pool({ connectionString: connection.url, max: 1 });

  try {
    return await withClientDriver(pool, connection, fn);
  } finally {
    await pool.end();
  }
}

/**
 * Create a driver on `client` and run `fn` with it
 *
 * The driver is closed whatever `fn` does. A close failure after `fn` failed
 * is folded into the reported error.
 */
export async function withClientDriver<T>(
  client: DatabaseClient,
  connection: ResolvedConnection,
  fn: (driver: PostgresDriver) => Promise<T>
): Promise<T> {
  const driver = await createDriver(client, connection.databaseName, {
    migrationsTable: connection.migrationsTable,
    migrationsSchema: connection.migrationsSchema,
    locking: connection.locking,
    verbose: shouldShowVerbose(),
  });

  return unwinding(() => fn(driver), () => driver.close());
}

/**
 * Run `fn` while holding the migration lock
 */
export async function withLock<T>(driver: PostgresDriver, fn: () => Promise<T>): Promise<T> {
  await driver.lock();
  debug(`Holding lock ${driver.getLockKey()}`);
  return unwinding(fn, () => driver.unlock());
}

async function unwinding<T>(fn: () => Promise<T>, unwind: () => Promise<void>): Promise<T> {
  let result: T;
  try {
    result = await fn();
  } catch (error) {
    try {
      await unwind();
    } catch (unwindError) {
      throw foldUnwindError(error, unwindError);
    }
    throw error;
  }

  await unwind();
  return result;
}
