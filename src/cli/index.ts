#!/usr/bin/env node
/**
 * addrclean entry point.
 *
 *   addrclean clean prospects.csv --output cleaned.csv
 *   addrclean normalize "123 Main St Apt 4B, Springfield, IL 62704"
 *   addrclean batches list
 *   addrclean cache stats
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

/**
 * Build the root program with its global flags and every subcommand.
 */
export function createProgram(): Command {
  const program = new Command('addrclean')
    .description('Prospect Address Cleaner - normalize and deduplicate property addresses')
    .version(VERSION, '-V, --version', 'Display version number')
    .addHelpText('beforeAll', `${getVersionInfo()}\n`)
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.addrclean)');

  // Runs before any subcommand action
  program.hook('preAction', (root) => {
    const globals = root.opts<GlobalOptions>();
    if (globals.verbose && globals.quiet) {
      new BaseCommand(globals).error('--verbose and --quiet cannot be combined', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);
  return program;
}

/**
 * Parse `argv` and run the matching command. Errors that escape a handler
 * set the exit code instead of throwing.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERROR;
  }
}

if (require.main === module) {
  void main();
}
