import { DatabaseLockedError, DriverError, describeCause } from '../errors.js';
import type { DebugLogger } from '../debug.js';
import type { DatabaseSession } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import { getLockingKey } from './lock-key.js';

/** SQLSTATE raised when lock_timeout expires */
const LOCK_NOT_AVAILABLE = '55P03';

export interface LockCoordinatorConfig {
  /** Database the lock key is derived from */
  databaseName: string;
  /** When false, lock and unlock succeed without contacting the server */
  locking: boolean;
  /** Maximum time to wait for the advisory lock */
  lockTimeoutMs?: number;
}

/**
 * Guards schema changes with a PostgreSQL session advisory lock.
 *
 * A process-local `held` flag makes `lock` and `unlock` reentrant: only the
 * call that flips the flag talks to the server. The flag is flipped before the
 * first `await`, so concurrent callers in this process observe it at once.
 * Cross-process exclusion comes from the advisory lock alone.
 *
 * `pg_advisory_unlock` returns false when the session did not hold the lock.
 * That result is logged and the flag stays cleared; the local flag and the
 * server state are not reconciled beyond that.
 *
 * @example
 * ```typescript
 * const coordinator = new LockCoordinator(session, { databaseName: 'app_db', locking: true }, logger);
 *
 * await coordinator.lock();
 * try {
 *   // read and write migration state
 * } finally {
 *   await coordinator.unlock();
 * }
 * ```
 */
export class LockCoordinator {
  private held = false;
  private readonly lockKey: string;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly session: DatabaseSession,
    private readonly config: LockCoordinatorConfig,
    private readonly logger: DebugLogger
  ) {
    this.lockKey = getLockingKey(config.databaseName);
    this.lockTimeoutMs = config.lockTimeoutMs ?? DEFAULT_CONFIG.lockTimeoutMs;
  }

  /**
   * Key of the advisory lock guarding this database
   */
  getLockKey(): string {
    return this.lockKey;
  }

  /**
   * Whether this process believes it holds the advisory lock
   */
  isHeld(): boolean {
    return this.held;
  }

  /**
   * Acquire the advisory lock, waiting at most the lock timeout
   *
   * @throws DatabaseLockedError when another session holds the lock past the timeout,
   * carrying `resetError` if `lock_timeout` could not be restored afterwards
   * @throws DriverError when the server cannot be asked for the lock
   */
  async lock(): Promise<void> {
    if (!this.config.locking) {
      return;
    }

    // check if already locked, if not, lock
    if (this.held) {
      this.logger.logLock('lock_skipped', this.lockKey, 'already held');
      return;
    }
    this.held = true;

    const query = 'SELECT pg_advisory_lock($1::bigint)';

    let acquired = false;
    let acquireError: unknown;
    try {
      await this.session.query("SELECT set_config('lock_timeout', $1, false)", [
        `${this.lockTimeoutMs}ms`,
      ]);
      await this.session.query(query, [this.lockKey]);
      acquired = true;
    } catch (error) {
      acquireError = error;
    }

    // lock_timeout must not leak into the migrations run on this session
    let resetFailed = false;
    let resetError: unknown;
    try {
      await this.session.query('RESET lock_timeout');
    } catch (error) {
      resetFailed = true;
      resetError = error;
    }

    if (!acquired) {
      this.held = false;

      // contention is reported as such even when the reset failed as well
      if (isLockNotAvailable(acquireError)) {
        throw new DatabaseLockedError(this.lockKey, this.lockTimeoutMs, {
          cause: acquireError,
          resetError: resetFailed ? resetError : undefined,
        });
      }
      if (resetFailed) {
        throw new DriverError(
          `try lock failed (reset lock_timeout also failed: ${describeCause(resetError)})`,
          { cause: new AggregateError([acquireError, resetError]), query }
        );
      }
      throw new DriverError('try lock failed', { cause: acquireError, query });
    }

    if (resetFailed) {
      throw new DriverError('failed to reset lock_timeout', {
        cause: resetError,
        query: 'RESET lock_timeout',
      });
    }

    this.logger.logLock('lock_acquired', this.lockKey);
  }

  /**
   * Release the advisory lock
   *
   * @throws DriverError when the release query fails; the lock is then still
   * considered held
   */
  async unlock(): Promise<void> {
    if (!this.config.locking) {
      return;
    }

    // check if already unlocked, if not, unlock
    if (!this.held) {
      this.logger.logLock('lock_skipped', this.lockKey, 'not held');
      return;
    }
    this.held = false;

    const query = 'SELECT pg_advisory_unlock($1::bigint) AS released';

    let released: unknown;
    try {
      const result = await this.session.query(query, [this.lockKey]);
      released = readReleased(result.rows[0]);
    } catch (error) {
      this.held = true;
      throw new DriverError('release lock failed', { cause: error, query });
    }

    if (released === false) {
      this.logger.logLock('lock_not_held', this.lockKey, 'server reported the lock was not held');
      return;
    }

    this.logger.logLock('lock_released', this.lockKey);
  }
}

function isLockNotAvailable(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === LOCK_NOT_AVAILABLE
  );
}

function readReleased(row: unknown): unknown {
  if (typeof row === 'object' && row !== null && 'released' in row) {
    return row.released;
  }
  return undefined;
}
