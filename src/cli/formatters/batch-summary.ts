/**
 * Batch Summary Formatters
 *
 * CLI output for a finished batch: counts, confidence breakdown, property
 * class filter results and the failed-row listing.
 *
 * @module cli/formatters/batch-summary
 */

import chalk from 'chalk';
import type { BatchResult, FailedRow } from '../../schemas/batch.js';
import type { PropertyClassStats } from '../../ingest/property-class.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Context shown alongside the batch counts.
 */
export interface BatchSummaryMeta {
  /** Input file name */
  source?: string;
  /** Saved batch ID */
  batchId?: string;
  /** CSV written */
  outputPath?: string;
  /** Property class filter results, when the filter ran */
  filter?: PropertyClassStats;
}

/** Default number of failed rows listed */
const DEFAULT_FAILED_LIMIT = 10;

// ============================================================================
// Helpers
// ============================================================================

function percent(part: number, whole: number): string {
  if (whole === 0) return '0.0%';
  return `${((part / whole) * 100).toFixed(1)}%`;
}

function row(label: string, value: string | number): string {
  return `  ${(label + ':').padEnd(22)}${value}`;
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format the summary of a finished batch.
 *
 * @example
 * ```
 * === Batch Complete ===
 * Source:  prospects.csv
 * Batch:   20260102-143512-prospects
 *
 * Status:   COMPLETED
 * Duration: 2.5s
 *
 * Rows:
 *   Total:                120
 *   Parsed:               114
 *   Failed:               6
 *   Unique addresses:     97
 *   Duplicates absorbed:  17
 * ```
 */
export function formatBatchSummary(result: BatchResult, meta: BatchSummaryMeta = {}): string {
  const lines: string[] = [];
  const { counts } = result;
  const cancelled = result.status === 'cancelled';

  lines.push(chalk.bold(cancelled ? '=== Batch Cancelled ===' : '=== Batch Complete ==='));
  if (meta.source) lines.push(`Source:  ${chalk.cyan(meta.source)}`);
  if (meta.batchId) lines.push(`Batch:   ${chalk.cyan(meta.batchId)}`);
  lines.push('');

  lines.push(`Status:   ${cancelled ? chalk.yellow('CANCELLED') : chalk.green('COMPLETED')}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);
  lines.push('');

  if (meta.filter) {
    const { filter } = meta;
    lines.push('Property classes:');
    lines.push(row('Rows read', filter.total));
    lines.push(row('Kept', `${filter.kept} (${percent(filter.kept, filter.total)})`));
    lines.push(row('Filtered out', filter.filteredOut));
    for (const entry of filter.validClasses) {
      lines.push(`    ${entry.code} ${entry.description}: ${entry.count}`);
    }
    lines.push('');
  }

  lines.push('Rows:');
  lines.push(row('Total', counts.total));
  lines.push(row('Parsed', counts.parsed));
  lines.push(row('Failed', result.failedRows.length));
  lines.push(row('Unique addresses', counts.uniqueAfterDedup));
  lines.push(row('Duplicates absorbed', counts.duplicatesAbsorbed));

  if (!cancelled && counts.parsed > 0) {
    lines.push('');
    lines.push('Confidence:');
    lines.push(row('Exact', `${counts.exact} (${percent(counts.exact, counts.parsed)})`));
    lines.push(row('Resolved', `${counts.resolved} (${percent(counts.resolved, counts.parsed)})`));
    lines.push(row('Partial', `${counts.partial} (${percent(counts.partial, counts.parsed)})`));
  }

  if (meta.outputPath) {
    lines.push('');
    lines.push(`Output: ${meta.outputPath}`);
  }

  return lines.join('\n');
}

/**
 * Format failed rows, one per line, up to `limit`.
 *
 * @example
 * ```
 * Failed rows (2):
 *   row 3: unrecognized format "not an address"
 *   row 7: missing address field
 * ```
 */
export function formatFailedRows(
  failed: readonly FailedRow[],
  limit: number = DEFAULT_FAILED_LIMIT
): string {
  if (failed.length === 0) {
    return '';
  }

  const lines = [chalk.yellow(`Failed rows (${failed.length}):`)];
  for (const entry of failed.slice(0, limit)) {
    const raw = entry.raw ? ` "${entry.raw}"` : '';
    lines.push(`  row ${entry.rowIndex}: ${entry.reason}${raw}`);
  }
  if (failed.length > limit) {
    lines.push(chalk.dim(`  ... and ${failed.length - limit} more`));
  }
  return lines.join('\n');
}
