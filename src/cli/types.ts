/**
 * Global options registered on the root program
 */
export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
};

/**
 * Options shared by commands that connect to the database
 */
export interface ConnectionOptions {
  url?: string;
  database?: string;
  table?: string;
  schema?: string;
  /** Set to false by --no-lock */
  lock?: boolean;
}

export interface DropOptions extends ConnectionOptions {
  force?: boolean;
}

export interface LockKeyOptions {
  url?: string;
  database?: string;
}

/**
 * JSON output for the version command
 */
export interface VersionJsonOutput {
  database: string;
  table: string;
  /** Decimal string, or null when no migration has run */
  version: string | null;
  dirty: boolean;
}

/**
 * JSON output for the force command
 */
export interface ForceJsonOutput {
  database: string;
  version: string;
  dirty: false;
  previous: {
    version: string | null;
    dirty: boolean;
  };
}

/**
 * JSON output for the run command
 */
export interface RunJsonOutput {
  database: string;
  file: string;
  version: string;
  previousVersion: string | null;
  durationMs: number;
}

/**
 * JSON output for the drop command
 */
export interface DropJsonOutput {
  database: string;
  table: string;
  dropped: boolean;
}

/**
 * JSON output for the lock-key command
 */
export interface LockKeyJsonOutput {
  database: string;
  lockKey: string;
}
