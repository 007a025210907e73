import type { QueryResult } from 'pg';
import { DriverError, TransactionError } from '../errors.js';
import type { DebugLogger } from '../debug.js';
import type { TableName } from '../identifier.js';
import type { DatabaseSession, MigrationState } from '../types.js';
import { MAX_MIGRATION_VERSION, NO_MIGRATION_VERSION } from '../types.js';

/**
 * Reads and replaces the single-row migration state table.
 *
 * The row is never updated in place: `setVersion` deletes it and inserts the
 * new pair inside one serializable transaction, so readers only ever see a
 * complete snapshot. Callers are expected to hold the migration lock around
 * writes.
 */
export class VersionStore {
  constructor(
    private readonly session: DatabaseSession,
    private readonly table: TableName,
    private readonly logger: DebugLogger
  ) {}

  /**
   * Create the migrations table if it does not exist
   */
  async createTable(): Promise<void> {
    const query = `CREATE TABLE IF NOT EXISTS ${this.table.toSql()} (version bigint not null primary key, dirty boolean not null)`;

    try {
      await this.execute(query);
    } catch (error) {
      throw new DriverError('failed create migration table', { cause: error, query });
    }

    this.logger.log(`TABLE_PREPARED table=${this.table.toString()}`, { type: 'table_prepared' });
  }

  /**
   * Read the current migration state
   *
   * Returns `{ version: null, dirty: false }` when no migration has run yet.
   */
  async getVersion(): Promise<MigrationState> {
    const query = `SELECT version, dirty FROM ${this.table.toSql()} LIMIT 1`;

    let result: QueryResult;
    try {
      result = await this.execute(query);
    } catch (error) {
      throw new DriverError('failed to select version', { cause: error, query });
    }

    const row: unknown = result.rows[0];
    if (row === undefined) {
      this.logger.logVersion('version_read', NO_MIGRATION_VERSION, false);
      return { version: NO_MIGRATION_VERSION, dirty: false };
    }

    const state = parseStateRow(row);
    if (!state) {
      throw new DriverError('failed to select version: unexpected row shape', { query });
    }

    this.logger.logVersion('version_read', state.version, state.dirty);
    return state;
  }

  /**
   * Replace the migration state with `(version, dirty)`
   *
   * Runs `DELETE` and `INSERT` in one `SERIALIZABLE` transaction. On failure
   * the transaction is rolled back and the prior row stays in place.
   *
   * @throws DriverError when the version is out of range or the transaction cannot start
   * @throws TransactionError when a statement or the commit fails
   */
  async setVersion(version: bigint, dirty: boolean): Promise<void> {
    if (version < 0n || version > MAX_MIGRATION_VERSION) {
      throw new DriverError(`version ${version} is out of range (0..${MAX_MIGRATION_VERSION})`);
    }

    const begin = 'BEGIN ISOLATION LEVEL SERIALIZABLE';
    try {
      await this.execute(begin);
    } catch (error) {
      throw new DriverError('transaction start failed', { cause: error, query: begin });
    }

    // Delete all entries in the migrations table.
    const deleteQuery = `DELETE FROM ${this.table.toSql()}`;
    try {
      await this.execute(deleteQuery);
    } catch (error) {
      throw await this.rollback('failed to clean migration table', error, deleteQuery);
    }

    const insertQuery = `INSERT INTO ${this.table.toSql()} (version, dirty) VALUES ($1, $2)`;
    try {
      await this.execute(insertQuery, [version.toString(), dirty]);
    } catch (error) {
      throw await this.rollback('failed to update migration table', error, insertQuery);
    }

    try {
      await this.execute('COMMIT');
    } catch (error) {
      throw await this.rollback('transaction commit failed', error, 'COMMIT');
    }

    this.logger.logVersion('version_set', version, dirty);
  }

  /**
   * Drop the migrations table. Irreversible.
   */
  async reset(): Promise<void> {
    const query = `DROP TABLE IF EXISTS ${this.table.toSql()}`;

    try {
      await this.execute(query);
    } catch (error) {
      throw new DriverError('failed drop migration table', { cause: error, query });
    }

    this.logger.log(`TABLE_RESET table=${this.table.toString()}`, { type: 'table_reset' });
  }

  /**
   * Roll back the open transaction and build the error describing the failure
   */
  private async rollback(message: string, cause: unknown, query: string): Promise<TransactionError> {
    try {
      await this.execute('ROLLBACK');
    } catch (rollbackError) {
      return new TransactionError(`failed rollback for previous error: ${message}`, {
        cause,
        query,
        rollbackError,
      });
    }
    return new TransactionError(message, { cause, query });
  }

  private async execute(query: string, values?: unknown[]): Promise<QueryResult> {
    const start = Date.now();
    const result = await this.session.query(query, values);
    this.logger.logQuery(query, Date.now() - start);
    return result;
  }
}

function parseStateRow(row: unknown): MigrationState | null {
  if (typeof row !== 'object' || row === null || !('version' in row) || !('dirty' in row)) {
    return null;
  }

  const version = parseVersion(row.version);
  if (version === null || typeof row.dirty !== 'boolean') {
    return null;
  }

  return { version, dirty: row.dirty };
}

/**
 * `pg` returns int8 columns as strings
 */
function parseVersion(value: unknown): bigint | null {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  return null;
}
