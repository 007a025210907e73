import { resolveDriverConfig } from '../config.js';
import type { DriverConfig } from '../config.js';
import { createDebugLogger } from '../debug.js';
import type { DebugLogger } from '../debug.js';
import { DriverError, foldUnwindError } from '../errors.js';
import { LockCoordinator } from '../lock/lock-coordinator.js';
import { VersionStore } from '../state/version-store.js';
import type {
  DatabaseClient,
  DatabaseSession,
  DriverOptions,
  MigrationContent,
  MigrationDriver,
  MigrationState,
} from '../types.js';

/**
 * PostgreSQL migration-state driver.
 *
 * Composes the advisory {@link LockCoordinator} and the single-row
 * {@link VersionStore} on one pinned session. Each call performs one read or
 * one state transition; sequencing versions is left to the caller.
 *
 * Create instances with {@link createDriver}.
 */
export class PostgresDriver implements MigrationDriver {
  private closed = false;

  private constructor(
    private readonly session: DatabaseSession,
    private readonly config: DriverConfig,
    private readonly locker: LockCoordinator,
    private readonly store: VersionStore,
    private readonly logger: DebugLogger
  ) {}

  /**
   * Build a driver on a checked-out session and bootstrap its migrations table
   *
   * On failure the session is released with the error and the error rethrown.
   */
  static async open(
    session: DatabaseSession,
    config: DriverConfig,
    logger: DebugLogger
  ): Promise<PostgresDriver> {
    const driver = new PostgresDriver(
      session,
      config,
      new LockCoordinator(session, { databaseName: config.databaseName, locking: config.locking }, logger),
      new VersionStore(session, config.migrationsTable, logger),
      logger
    );

    try {
      await driver.prepareMigrationTable();
    } catch (error) {
      session.release(error instanceof Error ? error : true);
      throw error;
    }

    return driver;
  }

  /**
   * Key of the advisory lock guarding this database
   */
  getLockKey(): string {
    return this.locker.getLockKey();
  }

  getConfig(): DriverConfig {
    return this.config;
  }

  async lock(): Promise<void> {
    this.assertOpen();
    await this.locker.lock();
  }

  async unlock(): Promise<void> {
    this.assertOpen();
    await this.locker.unlock();
  }

  async getVersion(): Promise<MigrationState> {
    this.assertOpen();
    return this.store.getVersion();
  }

  async setVersion(version: bigint, dirty: boolean): Promise<void> {
    this.assertOpen();
    await this.store.setVersion(version, dirty);
  }

  /**
   * Execute one migration script as a single batch
   *
   * The script is sent without parameters, so PostgreSQL accepts several
   * statements and runs them in one implicit transaction unless the script
   * issues its own BEGIN/COMMIT.
   *
   * @throws DriverError carrying the script text when execution fails
   */
  async runMigration(content: MigrationContent): Promise<void> {
    this.assertOpen();

    const script = await readMigration(content);
    const start = Date.now();

    try {
      await this.session.query(script);
    } catch (error) {
      throw new DriverError('migration failed', { cause: error, query: script });
    }

    const durationMs = Date.now() - start;
    this.logger.logQuery(script, durationMs);
    this.logger.log(`MIGRATION_RUN bytes=${Buffer.byteLength(script)} duration=${durationMs}ms`, {
      type: 'migration_run',
      durationMs,
    });
  }

  async reset(): Promise<void> {
    this.assertOpen();
    await this.store.reset();
  }

  /**
   * Release the pinned session
   *
   * A lock still held is released first. If that fails, the session is
   * destroyed instead of returned to the pool, which ends the server-side lock
   * with it, and the release error is rethrown.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.locker.isHeld()) {
      try {
        await this.locker.unlock();
      } catch (error) {
        this.session.release(error instanceof Error ? error : true);
        throw error;
      }
    }

    this.session.release();
  }

  /**
   * Create the migrations table under the migration lock
   *
   * The lock is released whatever the outcome; a release failure is folded
   * into the reported error.
   */
  private async prepareMigrationTable(): Promise<void> {
    await this.locker.lock();

    let failure: unknown;
    let failed = false;
    try {
      await this.store.createTable();
    } catch (error) {
      failure = error;
      failed = true;
    }

    try {
      await this.locker.unlock();
    } catch (unlockError) {
      throw failed ? foldUnwindError(failure, unlockError) : unlockError;
    }

    if (failed) {
      throw failure;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new DriverError('driver is closed');
    }
  }
}

/**
 * Create a migration driver and bootstrap its migrations table
 *
 * Checks one session out of the pool and keeps it until `close()`:
 * PostgreSQL advisory locks belong to the session that took them.
 *
 * @throws ConfigurationError when `databaseName` is empty or `client` is missing;
 * no database call is made in that case
 * @throws DriverError when connecting or creating the table fails
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { createDriver } from 'pg-migration-state';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const driver = await createDriver(pool, 'app_db', { verbose: true });
 *
 * await driver.lock();
 * try {
 *   const { version, dirty } = await driver.getVersion();
 *   if (dirty) throw new Error(`database is dirty at version ${version}`);
 *
 *   await driver.setVersion(2n, true);
 *   await driver.runMigration('CREATE TABLE users (id serial primary key);');
 *   await driver.setVersion(2n, false);
 * } finally {
 *   await driver.unlock();
 *   await driver.close();
 * }
 * ```
 */
export async function createDriver(
  client: DatabaseClient | null | undefined,
  databaseName: string,
  options: DriverOptions = {}
): Promise<PostgresDriver> {
  const config = resolveDriverConfig(client, databaseName, options);
  const logger = createDebugLogger({ enabled: config.verbose, logger: config.logger });

  let session: DatabaseSession;
  try {
    session = await config.client.connect();
  } catch (error) {
    throw new DriverError('failed to connect', { cause: error });
  }

  return PostgresDriver.open(session, config, logger);
}

/**
 * Read a migration script fully and decode it as UTF-8
 */
export async function readMigration(content: MigrationContent): Promise<string> {
  if (typeof content === 'string') {
    return content;
  }

  if (content instanceof Uint8Array) {
    return Buffer.from(content).toString('utf8');
  }

  const chunks: Buffer[] = [];
  for await (const chunk of content) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}
