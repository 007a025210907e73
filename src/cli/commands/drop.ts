import { Command } from 'commander';
import { createInterface } from 'node:readline';
import { TableName } from '../../identifier.js';
import { DEFAULT_CONFIG } from '../../types.js';
import {
  addConnectionOptions,
  resolveConnection,
  withDriver,
  withLock,
  createContextSpinner,
  CLIErrors,
  handleError,
  getOutputContext,
  log,
  report,
  success,
  warning,
  dim,
  red,
  bold,
} from '../utils/index.js';
import type { DropJsonOutput, DropOptions } from '../types.js';

export const dropCommand = addConnectionOptions(
  new Command('drop').description('Drop the migrations table (DESTRUCTIVE)')
)
  .option('-f, --force', 'Skip confirmation prompt')
  .addHelpText('after', `
Examples:
  $ pg-migration-state drop
  $ pg-migration-state drop --force --json
`)
  .action(async (options: DropOptions) => {
    const ctx = getOutputContext();
    const spinner = createContextSpinner('Dropping migrations table...');

    try {
      const connection = resolveConnection(options);
      const table = TableName.parse(
        connection.migrationsTable ?? DEFAULT_CONFIG.migrationsTable,
        connection.migrationsSchema
      ).toString();

      if (!options.force) {
        if (ctx.jsonMode || !process.stdin.isTTY) {
          throw CLIErrors.create(
            'Refusing to drop without confirmation',
            'Pass --force when not running in a terminal',
            'pg-migration-state drop --force'
          );
        }

        console.log(red(bold('\n⚠️  WARNING: This action is DESTRUCTIVE and IRREVERSIBLE!')));
        console.log(dim(`\nYou are about to drop table: ${table}`));
        console.log(dim('The recorded migration version will be lost.\n'));

        const confirmed = await askConfirmation(
          `Type "${connection.databaseName}" to confirm: `,
          connection.databaseName
        );

        if (!confirmed) {
          log('\n' + warning('Operation cancelled.'));
          return;
        }
      }

      spinner.start();

      await withDriver(connection, (driver) => withLock(driver, () => driver.reset()));

      spinner.stop();

      report<DropJsonOutput>({
        json: {
          database: connection.databaseName,
          table,
          dropped: true,
        },
        lines: [success('Migrations table dropped: ') + dim(table)],
      });
    } catch (err) {
      spinner.stop();
      handleError(err);
    }
  });

/**
 * Ask for confirmation
 */
async function askConfirmation(question: string, expected: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim() === expected);
    });
  });
}
