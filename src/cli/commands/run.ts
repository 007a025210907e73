import { Command } from 'commander';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  addConnectionOptions,
  resolveConnection,
  withDriver,
  withLock,
  parseVersionArgument,
  formatVersion,
  createContextSpinner,
  CLIErrors,
  handleError,
  debug,
  report,
  versionToJson,
  success,
  dim,
} from '../utils/index.js';
import type { ConnectionOptions, RunJsonOutput } from '../types.js';

export const runCommand = addConnectionOptions(
  new Command('run')
    .description('Apply one migration file and record its version')
    .argument('<version>', 'Version the file migrates to')
    .argument('<file>', 'Path to the SQL file')
)
  .addHelpText('after', `
The database is marked dirty before the file runs and clean once it succeeds.
A dirty database is refused until cleared with the force command.

Examples:
  $ pg-migration-state run 2 ./migrations/0002_add_users.sql
  $ pg-migration-state run 20240101120000 up.sql --json
`)
  .action(async (rawVersion: string, file: string, options: ConnectionOptions) => {
    const spinner = createContextSpinner('Acquiring migration lock...');

    try {
      const version = parseVersionArgument(rawVersion);
      const path = resolve(process.cwd(), file);
      await assertFile(path);

      const connection = resolveConnection(options);
      spinner.start();

      const { previousVersion, durationMs } = await withDriver(connection, (driver) =>
        withLock(driver, async () => {
          const state = await driver.getVersion();
          if (state.dirty) {
            throw CLIErrors.dirtyDatabase(state.version);
          }
          debug(`Current version: ${formatVersion(state.version)}`);

          await driver.setVersion(version, true);

          spinner.text = `Running ${file}...`;
          const start = Date.now();
          await driver.runMigration(createReadStream(path));
          const elapsed = Date.now() - start;

          await driver.setVersion(version, false);
          return { previousVersion: state.version, durationMs: elapsed };
        })
      );

      spinner.stop();

      report<RunJsonOutput>({
        json: {
          database: connection.databaseName,
          file: path,
          version: version.toString(),
          previousVersion: versionToJson(previousVersion),
          durationMs,
        },
        lines: [
          success(`Migrated ${formatVersion(previousVersion)} -> ${version}`) + dim(` (${durationMs}ms)`),
        ],
      });
    } catch (err) {
      spinner.stop();
      handleError(err);
    }
  });

async function assertFile(path: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) {
      return;
    }
  } catch {
    throw CLIErrors.migrationFileNotFound(path);
  }
  throw CLIErrors.migrationFileNotFound(path);
}
