import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LockCoordinator } from './lock-coordinator.js';
import { DebugLogger } from '../debug.js';
import { DatabaseLockedError, DriverError } from '../errors.js';
import { createMockSession, pgError } from '../testing/mock-session.js';
import type { QueryHandler } from '../testing/mock-session.js';

const LOCK_KEY = '2584668960';

describe('LockCoordinator', () => {
  let logger: DebugLogger;
  let logSink: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logSink = vi.fn();
    logger = new DebugLogger({ enabled: true, logger: logSink });
  });

  function setup(handler?: QueryHandler, locking = true) {
    const mock = createMockSession(handler);
    const coordinator = new LockCoordinator(
      mock.session,
      { databaseName: 'testdb', locking },
      logger
    );
    return { ...mock, coordinator };
  }

  describe('lock', () => {
    it('should request the advisory lock with a bounded wait', async () => {
      const { coordinator, query, queries } = setup();

      await coordinator.lock();

      expect(queries()).toEqual([
        "SELECT set_config('lock_timeout', $1, false)",
        'SELECT pg_advisory_lock($1::bigint)',
        'RESET lock_timeout',
      ]);
      expect(query).toHaveBeenNthCalledWith(1, "SELECT set_config('lock_timeout', $1, false)", ['5000ms']);
      expect(query).toHaveBeenNthCalledWith(2, 'SELECT pg_advisory_lock($1::bigint)', [LOCK_KEY]);
      expect(coordinator.isHeld()).toBe(true);
    });

    it('should honor a custom lock timeout', async () => {
      const mock = createMockSession();
      const coordinator = new LockCoordinator(
        mock.session,
        { databaseName: 'testdb', locking: true, lockTimeoutMs: 250 },
        logger
      );

      await coordinator.lock();

      expect(mock.query).toHaveBeenNthCalledWith(1, "SELECT set_config('lock_timeout', $1, false)", ['250ms']);
    });

    it('should not contact the server when already held', async () => {
      const { coordinator, query } = setup();

      await coordinator.lock();
      await coordinator.lock();

      expect(query).toHaveBeenCalledTimes(3);
      expect(coordinator.isHeld()).toBe(true);
    });

    it('should issue a single server call for concurrent lock calls', async () => {
      const { coordinator, queries } = setup();

      await Promise.all([coordinator.lock(), coordinator.lock(), coordinator.lock()]);

      expect(queries().filter((q) => q.startsWith('SELECT pg_advisory_lock'))).toHaveLength(1);
    });

    it('should be a no-op when locking is disabled', async () => {
      const { coordinator, query } = setup(undefined, false);

      await coordinator.lock();

      expect(query).not.toHaveBeenCalled();
      expect(coordinator.isHeld()).toBe(false);
    });

    it('should raise DatabaseLockedError when the lock times out', async () => {
      const { coordinator, queries } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_lock')) {
          throw pgError('canceling statement due to lock timeout', '55P03');
        }
        return [];
      });

      const error = await coordinator.lock().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseLockedError);
      expect(error).not.toBeInstanceOf(DriverError);
      expect(error).toMatchObject({ lockKey: LOCK_KEY });
      expect(error).toMatchObject({ timeoutMs: 5000 });
      expect(coordinator.isHeld()).toBe(false);
      expect(queries()).toContain('RESET lock_timeout');
    });

    it('should raise DriverError on transport failure', async () => {
      const { coordinator } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_lock')) {
          throw new Error('Connection terminated unexpectedly');
        }
        return [];
      });

      const error = await coordinator.lock().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DriverError);
      expect(error).not.toBeInstanceOf(DatabaseLockedError);
      expect(error).toMatchObject({ message: 'try lock failed: Connection terminated unexpectedly' });
      expect(error).toMatchObject({ query: 'SELECT pg_advisory_lock($1::bigint)' });
      expect(coordinator.isHeld()).toBe(false);
    });

    it('should allow a retry after a failed attempt', async () => {
      let attempts = 0;
      const { coordinator } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_lock') && attempts++ === 0) {
          throw pgError('canceling statement due to lock timeout', '55P03');
        }
        return [];
      });

      await expect(coordinator.lock()).rejects.toBeInstanceOf(DatabaseLockedError);
      await coordinator.lock();

      expect(coordinator.isHeld()).toBe(true);
    });

    it('should report both errors when the timeout reset also fails', async () => {
      const { coordinator } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_lock')) throw new Error('lock boom');
        if (text === 'RESET lock_timeout') throw new Error('reset boom');
        return [];
      });

      const error = await coordinator.lock().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DriverError);
      expect(error).toMatchObject({
        message: 'try lock failed (reset lock_timeout also failed: reset boom)',
      });
      expect(error).toMatchObject({ cause: expect.any(AggregateError) });
      expect(coordinator.isHeld()).toBe(false);
    });

    it('should still report contention when the timeout reset also fails', async () => {
      const resetError = new Error('reset boom');
      const { coordinator } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_lock')) {
          throw pgError('canceling statement due to lock timeout', '55P03');
        }
        if (text === 'RESET lock_timeout') throw resetError;
        return [];
      });

      const error = await coordinator.lock().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseLockedError);
      expect(error).toMatchObject({
        message: `database is locked (key ${LOCK_KEY}, waited 5000ms) (reset lock_timeout also failed: reset boom)`,
        resetError,
      });
      expect(coordinator.isHeld()).toBe(false);
    });

    it('should keep the lock held when only the timeout reset fails', async () => {
      const { coordinator } = setup((text) => {
        if (text === 'RESET lock_timeout') throw new Error('reset boom');
        return [];
      });

      await expect(coordinator.lock()).rejects.toThrow('failed to reset lock_timeout: reset boom');
      expect(coordinator.isHeld()).toBe(true);
    });
  });

  describe('unlock', () => {
    it('should release the advisory lock', async () => {
      const { coordinator, query } = setup((text) =>
        text.startsWith('SELECT pg_advisory_unlock') ? [{ released: true }] : []
      );

      await coordinator.lock();
      await coordinator.unlock();

      expect(query).toHaveBeenLastCalledWith(
        'SELECT pg_advisory_unlock($1::bigint) AS released',
        [LOCK_KEY]
      );
      expect(coordinator.isHeld()).toBe(false);
      expect(logSink).toHaveBeenLastCalledWith(
        `[pg-migration-state] LOCK_RELEASED key=${LOCK_KEY}`,
        { type: 'lock_released', lockKey: LOCK_KEY, metadata: undefined }
      );
    });

    it('should be idempotent', async () => {
      const { coordinator, queries } = setup((text) =>
        text.startsWith('SELECT pg_advisory_unlock') ? [{ released: true }] : []
      );

      await coordinator.lock();
      await coordinator.unlock();
      await coordinator.unlock();

      expect(queries().filter((q) => q.startsWith('SELECT pg_advisory_unlock'))).toHaveLength(1);
    });

    it('should not contact the server when never locked', async () => {
      const { coordinator, query } = setup();

      await coordinator.unlock();

      expect(query).not.toHaveBeenCalled();
    });

    it('should be a no-op when locking is disabled', async () => {
      const { coordinator, query } = setup(undefined, false);

      await coordinator.lock();
      await coordinator.unlock();

      expect(query).not.toHaveBeenCalled();
    });

    it('should restore the held flag when release fails', async () => {
      const { coordinator } = setup((text) => {
        if (text.startsWith('SELECT pg_advisory_unlock')) throw new Error('socket hang up');
        return [];
      });

      await coordinator.lock();
      const error = await coordinator.unlock().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DriverError);
      expect(error).toMatchObject({ message: 'release lock failed: socket hang up' });
      expect(error).toMatchObject({ query: 'SELECT pg_advisory_unlock($1::bigint) AS released' });
      expect(coordinator.isHeld()).toBe(true);
    });

    it('should log but accept a release the server did not recognize', async () => {
      const { coordinator } = setup((text) =>
        text.startsWith('SELECT pg_advisory_unlock') ? [{ released: false }] : []
      );

      await coordinator.lock();
      await coordinator.unlock();

      expect(coordinator.isHeld()).toBe(false);
      expect(logSink).toHaveBeenLastCalledWith(
        `[pg-migration-state] LOCK_NOT_HELD key=${LOCK_KEY} reason=server reported the lock was not held`,
        {
          type: 'lock_not_held',
          lockKey: LOCK_KEY,
          metadata: { reason: 'server reported the lock was not held' },
        }
      );
    });
  });

  describe('getLockKey', () => {
    it('should derive the key from the database name', () => {
      const { coordinator } = setup();
      expect(coordinator.getLockKey()).toBe(LOCK_KEY);
    });
  });
});
