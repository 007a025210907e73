const PREFIX = '[pg-migration-state]';

/**
 * Invalid driver configuration, raised before any database call
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = 'ConfigurationError';
  }
}

export const ErrNoDatabaseName = (): ConfigurationError =>
  new ConfigurationError('database name is required');

export const ErrNoDatabaseClient = (): ConfigurationError =>
  new ConfigurationError('database client is required');

/**
 * The advisory lock could not be obtained within the lock timeout.
 * Another process is most likely running migrations; the caller may retry.
 *
 * `resetError` is set when restoring `lock_timeout` afterwards failed too.
 */
export class DatabaseLockedError extends Error {
  public readonly resetError: unknown;

  constructor(
    public readonly lockKey: string,
    public readonly timeoutMs: number,
    options: { cause?: unknown; resetError?: unknown } = {}
  ) {
    const base = `database is locked (key ${lockKey}, waited ${timeoutMs}ms)`;
    super(
      options.resetError === undefined
        ? base
        : `${base} (reset lock_timeout also failed: ${describeCause(options.resetError)})`,
      { cause: options.cause }
    );
    this.name = 'DatabaseLockedError';
    this.resetError = options.resetError;
  }
}

/**
 * A query against the database failed
 */
export class DriverError extends Error {
  /** SQL text (or migration script) that failed */
  public readonly query: string | undefined;

  constructor(message: string, options: { cause?: unknown; query?: string | undefined } = {}) {
    const reason = describeCause(options.cause);
    super(reason ? `${message}: ${reason}` : message, {
      cause: options.cause,
    });
    this.name = 'DriverError';
    this.query = options.query;
  }
}

/**
 * Replacing the version row failed and the transaction was rolled back.
 * When the rollback failed as well, `rollbackError` holds its error.
 */
export class TransactionError extends DriverError {
  public readonly rollbackError: unknown;

  constructor(
    message: string,
    options: { cause: unknown; query?: string | undefined; rollbackError?: unknown }
  ) {
    super(message, { cause: options.cause, query: options.query });
    this.name = 'TransactionError';
    if (options.rollbackError !== undefined) {
      this.message = `${this.message} (rollback failed: ${describeCause(options.rollbackError)})`;
    }
    this.rollbackError = options.rollbackError;
  }
}

/**
 * Merge an error raised while unwinding with the error that started the unwind
 */
export function foldUnwindError(primary: unknown, unwind: unknown): DriverError {
  return new DriverError(
    `failed to unlock (${describeCause(unwind)}) after: ${describeCause(primary)}`,
    { cause: new AggregateError([primary, unwind]) }
  );
}

export function describeCause(cause: unknown): string {
  if (cause === undefined || cause === null) return '';
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
