import { Command } from 'commander';
import {
  addConnectionOptions,
  resolveConnection,
  withDriver,
  withLock,
  parseVersionArgument,
  formatVersion,
  createContextSpinner,
  handleError,
  debug,
  report,
  versionToJson,
  success,
  dim,
} from '../utils/index.js';
import type { ConnectionOptions, ForceJsonOutput } from '../types.js';

export const forceCommand = addConnectionOptions(
  new Command('force')
    .description('Set the migration version and clear the dirty flag')
    .argument('<version>', 'Version to record')
)
  .addHelpText('after', `
Use after fixing a failed migration by hand.

Examples:
  $ pg-migration-state force 20240101120000
  $ pg-migration-state force 3 --schema ops --table versions
`)
  .action(async (rawVersion: string, options: ConnectionOptions) => {
    const spinner = createContextSpinner('Acquiring migration lock...');

    try {
      const version = parseVersionArgument(rawVersion);
      const connection = resolveConnection(options);
      spinner.start();

      const previous = await withDriver(connection, (driver) =>
        withLock(driver, async () => {
          const state = await driver.getVersion();
          debug(`Previous state: version=${formatVersion(state.version)} dirty=${state.dirty}`);

          spinner.text = `Setting version ${version}...`;
          await driver.setVersion(version, false);
          return state;
        })
      );

      spinner.stop();

      report<ForceJsonOutput>({
        json: {
          database: connection.databaseName,
          version: version.toString(),
          dirty: false,
          previous: {
            version: versionToJson(previous.version),
            dirty: previous.dirty,
          },
        },
        lines: [
          success(`Version set to ${version}`),
          dim(`  previously ${formatVersion(previous.version)}${previous.dirty ? ' (dirty)' : ''}`),
        ],
      });
    } catch (err) {
      spinner.stop();
      handleError(err);
    }
  });
