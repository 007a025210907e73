import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * How command results are written
 */
export interface OutputContext {
  /** stdout is a terminal, so spinners and prompts make sense */
  isInteractive: boolean;
  jsonMode: boolean;
  verbose: boolean;
  /** Print only errors and bare values */
  quiet: boolean;
}

let current: OutputContext = {
  isInteractive: process.stdout.isTTY ?? false,
  jsonMode: false,
  verbose: false,
  quiet: false,
};

/**
 * Set the output context from the global CLI flags
 */
export function initOutputContext(flags: {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}): OutputContext {
  current = {
    isInteractive: process.stdout.isTTY ?? false,
    jsonMode: flags.json ?? false,
    verbose: flags.verbose ?? false,
    quiet: flags.quiet ?? false,
  };

  if (flags.noColor ?? !current.isInteractive) {
    chalk.level = 0;
  }

  return current;
}

export function getOutputContext(): OutputContext {
  return current;
}

/**
 * Driver diagnostics and `debug` lines are shown with --verbose, never in JSON mode
 */
export function shouldShowVerbose(): boolean {
  return current.verbose && !current.jsonMode;
}

/**
 * Spinner that stays silent unless a person is watching the terminal
 */
export function createContextSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    isSilent: !current.isInteractive || current.jsonMode || current.quiet,
  });
}

/**
 * Print a human-readable line unless --json or --quiet is set
 */
export function log(message: string): void {
  if (!current.jsonMode && !current.quiet) {
    console.log(message);
  }
}

export function debug(message: string): void {
  if (shouldShowVerbose()) {
    console.log(chalk.dim(`[debug] ${message}`));
  }
}

/**
 * Result of a command, in every shape it can be printed
 */
export interface CommandReport<T> {
  /** Printed as-is with --json */
  json: T;
  /** Printed one per line in the default mode */
  lines: string[];
  /** Bare value printed with --quiet, for use in shell substitutions */
  value?: string;
}

/**
 * Write a command result for the active output mode
 *
 * --json prints `json`. --quiet prints `value` when there is one and nothing
 * otherwise. The default mode prints `lines`.
 */
export function report<T>({ json, lines, value }: CommandReport<T>): void {
  if (current.jsonMode) {
    console.log(JSON.stringify(json, null, 2));
    return;
  }

  if (current.quiet) {
    if (value !== undefined) {
      console.log(value);
    }
    return;
  }

  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Render a stored version; `null` means no migration has run
 */
export function formatVersion(version: bigint | null): string {
  return version === null ? 'none' : version.toString();
}

/**
 * Version as it appears in JSON output: a decimal string, since JSON numbers
 * cannot hold every bigint
 */
export function versionToJson(version: bigint | null): string | null {
  return version === null ? null : version.toString();
}

export const success = (message: string): string => chalk.green('✓ ') + message;
export const error = (message: string): string => chalk.red('✗ ') + message;
export const warning = (message: string): string => chalk.yellow('⚠ ') + message;

export const dim = (text: string): string => chalk.dim(text);
export const bold = (text: string): string => chalk.bold(text);
export const cyan = (text: string): string => chalk.cyan(text);
export const red = (text: string): string => chalk.red(text);
