#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import {
  versionCommand,
  forceCommand,
  runCommand,
  dropCommand,
  lockKeyCommand,
} from './commands/index.js';
import { initOutputContext } from './utils/output.js';
import type { GlobalOptions } from './types.js';

// Handle graceful exit on SIGINT (Ctrl+C)
process.on('SIGINT', () => {
  console.log(chalk.cyan('\n\n  Interrupted\n'));
  process.exit(130);
});

const program = new Command();

program
  .name('pg-migration-state')
  .description('Migration lock and version state for PostgreSQL')
  .version('0.1.0')
  .option('--json', 'Output as JSON (machine-readable)')
  .option('-v, --verbose', 'Show verbose output')
  .option('-q, --quiet', 'Only show errors')
  .option('--no-color', 'Disable colored output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    initOutputContext({
      json: opts.json,
      verbose: opts.verbose,
      quiet: opts.quiet,
      noColor: opts.color === false,
    });
  });

program.addHelpText('after', `
Examples:
  $ pg-migration-state version
  $ pg-migration-state run 2 ./migrations/0002_add_users.sql
  $ pg-migration-state force 1
  $ pg-migration-state lock-key --database app_db
  $ pg-migration-state version --json | jq '.version'
`);

program.addCommand(versionCommand);
program.addCommand(forceCommand);
program.addCommand(runCommand);
program.addCommand(dropCommand);
program.addCommand(lockKeyCommand);

await program.parseAsync();
