import { Command } from 'commander';
import { getLockingKey } from '../../lock/lock-key.js';
import {
  CLIErrors,
  parseDatabaseName,
  redactUrl,
  handleError,
  report,
  bold,
} from '../utils/index.js';
import type { LockKeyJsonOutput, LockKeyOptions } from '../types.js';

export const lockKeyCommand = new Command('lock-key')
  .description('Print the advisory lock key for a database (no connection is made)')
  .option('--url <url>', 'PostgreSQL connection URL (default: $DATABASE_URL)')
  .option('--database <name>', 'Database name (default: from the URL)')
  .addHelpText('after', `
Examples:
  $ pg-migration-state lock-key --database app_db
  $ psql -c "SELECT pg_advisory_unlock($(pg-migration-state lock-key -q --database app_db))"
`)
  .action((options: LockKeyOptions) => {
    try {
      const databaseName = resolveDatabaseName(options);
      const lockKey = getLockingKey(databaseName);

      report<LockKeyJsonOutput>({
        json: { database: databaseName, lockKey },
        lines: [`${bold('Database:')} ${databaseName}`, `${bold('Lock key:')} ${lockKey}`],
        value: lockKey,
      });
    } catch (err) {
      handleError(err);
    }
  });

function resolveDatabaseName(options: LockKeyOptions): string {
  if (options.database) {
    return options.database;
  }

  const url = options.url ?? process.env['DATABASE_URL'];
  if (!url) {
    throw CLIErrors.noConnectionUrl();
  }

  const name = parseDatabaseName(url);
  if (!name) {
    throw CLIErrors.noDatabaseName(redactUrl(url));
  }
  return name;
}
