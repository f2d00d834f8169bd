/**
 * CLI Commands Registry
 *
 * Available commands:
 * - clean: Clean and deduplicate a prospect list
 * - normalize: Canonicalize a single address
 * - batches: List or reprint saved batch results
 * - cache: Inspect or clear the lookup cache
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCleanCommand } from './clean.js';
import { registerNormalizeCommand } from './normalize.js';
import { registerBatchesCommands } from './batches.js';
import { registerCacheCommands } from './cache.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerCleanCommand(program);
  registerNormalizeCommand(program);
  registerBatchesCommands(program);
  registerCacheCommands(program);
}
