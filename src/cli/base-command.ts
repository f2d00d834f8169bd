/**
 * Base Command
 *
 * Shared output and exit handling for the addrclean subcommands. Every
 * handler builds one from the program's global flags (--verbose, --quiet,
 * --no-color, --data-dir) and routes all terminal output through it.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { Logger } from '../pipeline/types.js';
import { getDataDir, resolveDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Flags declared on the root program, visible to every subcommand.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** false when --no-color is given */
  color?: boolean;
  /** Replaces ADDRCLEAN_DATA_DIR and the ~/.addrclean default */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Unexpected failure */
  ERROR: 1,
  /** Conflicting or malformed flags */
  USAGE_ERROR: 2,
  /** Environment settings missing or invalid */
  CONFIG_ERROR: 3,
  /** Input file or saved batch does not exist */
  NOT_FOUND: 4,
  /** Interrupted with Ctrl-C */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Output helper bound to one command invocation.
 *
 * Quiet mode drops informational output but never warnings or errors, so a
 * `--json` run can force quiet and still leave stdout holding only the JSON
 * document.
 *
 * @example
 * ```typescript
 * async function statsHandler(options: { json?: boolean }, cmd: Command) {
 *   const base = getBaseCommand(cmd, options.json ? { quiet: true } : {});
 *   base.section('Lookup Cache');
 *   base.keyValue('Entries', 42);
 * }
 * ```
 */
export class BaseCommand {
  readonly options: GlobalOptions;

  /** Directory holding saved batches and the lookup cache */
  readonly dataDir: string;

  private readonly symbols: { ok: string; fail: string };

  constructor(options: GlobalOptions) {
    this.options = options;
    this.dataDir = options.dataDir ? resolveDir(options.dataDir) : getDataDir();

    const color = options.color !== false && process.stdout.isTTY === true;
    if (!color) {
      chalk.level = 0;
    }
    this.symbols = color ? { ok: '✔', fail: '✘' } : { ok: '[OK]', fail: '[FAIL]' };
  }

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  /** Verbose-only diagnostics. */
  debug(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.isQuiet()) {
      console.log(message, ...args);
    }
  }

  /** Printed to stderr even in quiet mode. */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  success(message: string): void {
    if (!this.isQuiet()) {
      console.log(chalk.green(`${this.symbols.ok} ${message}`));
    }
  }

  fail(message: string): void {
    console.log(chalk.red(`${this.symbols.fail} ${message}`));
  }

  blank(): void {
    if (!this.isQuiet()) {
      console.log();
    }
  }

  /**
   * Bold title underlined with `=` to its own width.
   */
  section(title: string): void {
    if (this.isQuiet()) {
      return;
    }
    console.log();
    console.log(chalk.bold(title));
    console.log(chalk.dim('='.repeat(title.length)));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.isQuiet()) {
      console.log(`${chalk.dim(`${key}:`)} ${value}`);
    }
  }

  /** Pretty-printed JSON on stdout, regardless of quiet mode. */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Errors
  // ==========================================================================

  /**
   * Print the error and terminate. A numeric second argument picks the exit
   * code; an Error adds its stack in verbose mode and exits with ERROR.
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    this.report(message);
    if (errorOrCode instanceof Error && this.isVerbose()) {
      console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
    }
    process.exit(typeof errorOrCode === 'number' ? errorOrCode : EXIT_CODES.ERROR);
  }

  /**
   * Logger handed to the batch engine. Its error level reports without
   * exiting; the handler decides the exit code once the batch settles.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.report(message, ...args),
    };
  }

  private report(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Build the base command inside an action handler. Flags set on the root
 * program are merged in; `overrides` wins, e.g. `{ quiet: true }` for --json.
 */
export function getBaseCommand(cmd: Command, overrides: GlobalOptions = {}): BaseCommand {
  return new BaseCommand({ ...cmd.optsWithGlobals<GlobalOptions>(), ...overrides });
}
