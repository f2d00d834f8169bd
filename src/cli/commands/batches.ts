/**
 * Batches Commands
 *
 * List saved batch results, or reprint and re-export one of them.
 *
 * @module cli/commands/batches
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { formatBatchSummary, formatFailedRows } from '../formatters/index.js';
import { listBatches, loadBatchResult } from '../../storage/batches.js';
import { exportRepresentativesCsv } from '../../storage/export.js';
import type { BatchResult } from '../../schemas/batch.js';

// ============================================================================
// Types
// ============================================================================

export interface ListBatchesOptions {
  /** Maximum number of batches to show */
  limit: string;
  json?: boolean;
}

export interface ShowBatchOptions {
  /** Write the batch's representatives to this CSV */
  export?: string;
  json?: boolean;
}

// ============================================================================
// Table Helpers
// ============================================================================

const COLUMNS = [
  { title: 'BATCH ID', width: 40 },
  { title: 'STATUS', width: 11 },
  { title: 'ROWS', width: 8 },
  { title: 'UNIQUE', width: 8 },
  { title: 'FAILED', width: 8 },
] as const;

function padRight(text: string, width: number): string {
  // ANSI codes take no columns
  const visible = text.replace(/\x1b\[[0-9;]*m/g, '').length;
  return text + ' '.repeat(Math.max(0, width - visible));
}

function formatTableRow(cells: readonly string[]): string {
  return cells.map((cell, i) => padRight(cell, COLUMNS[i]?.width ?? 0)).join('');
}

/**
 * One table line for a saved batch.
 */
export function formatBatchRow(batchId: string, result: BatchResult): string {
  const status = result.status === 'completed' ? chalk.green('completed') : chalk.yellow('cancelled');
  return formatTableRow([
    batchId,
    status,
    String(result.counts.total),
    String(result.counts.uniqueAfterDedup),
    String(result.failedRows.length),
  ]);
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`--limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failWith(base: BaseCommand, error: unknown): never {
  if (error instanceof RangeError) {
    base.error(error.message, EXIT_CODES.USAGE_ERROR);
  }
  if (error instanceof Error && error.message.startsWith('Batch not found')) {
    base.error(error.message, EXIT_CODES.NOT_FOUND);
  }
  base.error(errorMessage(error), error instanceof Error ? error : undefined);
}

// ============================================================================
// Handlers
// ============================================================================

export async function listBatchesHandler(options: ListBatchesOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd, options.json ? { quiet: true } : {});

  try {
    const limit = parseLimit(options.limit);
    const batchIds = (await listBatches(base.dataDir)).slice(0, limit);
    const rows: Array<{ batchId: string; result: BatchResult }> = [];
    for (const batchId of batchIds) {
      try {
        rows.push({ batchId, result: await loadBatchResult(batchId, base.dataDir) });
      } catch (error) {
        base.warn(`Skipping ${batchId}: ${errorMessage(error)}`);
      }
    }

    if (options.json) {
      base.json(
        rows.map(({ batchId, result }) => ({
          batchId,
          status: result.status,
          completedAt: result.timing.completedAt,
          counts: result.counts,
        }))
      );
      return;
    }

    if (rows.length === 0) {
      base.info('No saved batches.');
      return;
    }

    base.info(chalk.bold(formatTableRow(COLUMNS.map((column) => column.title))));
    base.info(chalk.dim('-'.repeat(COLUMNS.reduce((sum, column) => sum + column.width, 0))));
    for (const { batchId, result } of rows) {
      base.info(formatBatchRow(batchId, result));
    }
  } catch (error) {
    failWith(base, error);
  }
}

export async function showBatchHandler(batchId: string, options: ShowBatchOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd, options.json ? { quiet: true } : {});

  try {
    const result = await loadBatchResult(batchId, base.dataDir);

    if (options.export) {
      if (result.status !== 'completed') {
        base.error(`Batch ${batchId} was cancelled; there is no cleaned list to export`, EXIT_CODES.USAGE_ERROR);
      }
      const written = await exportRepresentativesCsv(result, options.export);
      base.debug(`Wrote ${written} rows to ${options.export}`);
    }

    if (options.json) {
      base.json({ batchId, ...result });
      return;
    }

    base.info(formatBatchSummary(result, { batchId, outputPath: options.export }));
    const failed = formatFailedRows(result.failedRows);
    if (failed) {
      base.blank();
      base.info(failed);
    }
  } catch (error) {
    failWith(base, error);
  }
}

// ============================================================================
// Registration
// ============================================================================

export function registerBatchesCommands(program: Command): void {
  const batches = program.command('batches').description('Inspect saved batch results');

  batches
    .command('list')
    .description('List saved batches, newest first')
    .option('-n, --limit <count>', 'Maximum number of batches to show', '20')
    .option('--json', 'Print as JSON')
    .action(listBatchesHandler);

  batches
    .command('show <batchId>')
    .description('Print the summary of a saved batch')
    .option('-o, --export <csv>', 'Write the cleaned list to a CSV file')
    .option('--json', 'Print the batch result as JSON')
    .action(showBatchHandler);
}
