import { Command } from 'commander';
import {
  addConnectionOptions,
  resolveConnection,
  withDriver,
  createContextSpinner,
  formatVersion,
  handleError,
  report,
  versionToJson,
  bold,
  dim,
  warning,
} from '../utils/index.js';
import type { ConnectionOptions, VersionJsonOutput } from '../types.js';

export const versionCommand = addConnectionOptions(
  new Command('version').description('Show the current migration version and dirty flag')
)
  .addHelpText('after', `
Examples:
  $ pg-migration-state version
  $ pg-migration-state version --url postgresql://localhost:5432/app_db
  $ pg-migration-state version --json | jq '.dirty'
`)
  .action(async (options: ConnectionOptions) => {
    const spinner = createContextSpinner('Reading migration state...');

    try {
      const connection = resolveConnection(options);
      spinner.start();

      const { state, table } = await withDriver(connection, async (driver) => ({
        state: await driver.getVersion(),
        table: driver.getConfig().migrationsTable.toString(),
      }));

      spinner.stop();

      report<VersionJsonOutput>({
        json: {
          database: connection.databaseName,
          table,
          version: versionToJson(state.version),
          dirty: state.dirty,
        },
        lines: [
          `${bold('Database:')} ${connection.databaseName} ${dim(`(${table})`)}`,
          `${bold('Version:')}  ${formatVersion(state.version)}`,
          state.dirty
            ? warning('Dirty: a migration started but did not complete')
            : `${bold('Dirty:')}    false`,
        ],
        value: `${formatVersion(state.version)}${state.dirty ? ' dirty' : ''}`,
      });
    } catch (err) {
      spinner.stop();
      handleError(err);
    }
  });
