import type { DebugContext, DriverLogger } from './types.js';

const PREFIX = '[pg-migration-state]';

export interface DebugConfig {
  /** Enable diagnostic output */
  enabled: boolean;
  /** Custom logger function (default: console.log) */
  logger?: DriverLogger | undefined;
}

/**
 * Debug logger for the migration driver
 * Emits structured lines for lock transitions, state changes and queries
 */
export class DebugLogger {
  private readonly enabled: boolean;
  private readonly logger: DriverLogger;

  constructor(config?: DebugConfig) {
    this.enabled = config?.enabled ?? false;
    this.logger = config?.logger ?? this.defaultLogger;
  }

  /**
   * Check if debug mode is enabled
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log a query execution
   */
  logQuery(query: string, durationMs: number): void {
    if (!this.enabled) return;

    this.logger(`${PREFIX} query="${this.truncateQuery(query)}" duration=${durationMs}ms`, {
      type: 'query',
      query: this.truncateQuery(query),
      durationMs,
    });
  }

  /**
   * Log a lock transition
   */
  logLock(
    type: 'lock_acquired' | 'lock_released' | 'lock_skipped' | 'lock_not_held',
    lockKey: string,
    reason?: string
  ): void {
    if (!this.enabled) return;

    const reasonStr = reason ? ` reason=${reason}` : '';
    this.logger(`${PREFIX} ${type.toUpperCase()} key=${lockKey}${reasonStr}`, {
      type,
      lockKey,
      metadata: reason ? { reason } : undefined,
    });
  }

  /**
   * Log a read or write of the migration state
   */
  logVersion(type: 'version_read' | 'version_set', version: bigint | null, dirty: boolean): void {
    if (!this.enabled) return;

    const versionStr = version === null ? 'none' : version.toString();
    this.logger(`${PREFIX} ${type.toUpperCase()} version=${versionStr} dirty=${dirty}`, {
      type,
      metadata: { version: versionStr, dirty },
    });
  }

  /**
   * Log a custom debug message
   */
  log(message: string, context: DebugContext): void {
    if (!this.enabled) return;

    this.logger(`${PREFIX} ${message}`, context);
  }

  /**
   * Default logger implementation using console
   */
  private defaultLogger(message: string, _context?: DebugContext): void {
    console.log(message);
  }

  /**
   * Truncate long queries for readability
   */
  private truncateQuery(query: string, maxLength = 100): string {
    const normalized = query.replace(/\s+/g, ' ').trim();
    if (normalized.length <= maxLength) {
      return normalized;
    }
    return normalized.substring(0, maxLength - 3) + '...';
  }
}

/**
 * Create a debug logger instance
 */
export function createDebugLogger(config?: DebugConfig): DebugLogger {
  return new DebugLogger(config);
}
