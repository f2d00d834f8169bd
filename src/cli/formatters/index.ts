/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  formatProgress,
  type SpinnerOptions,
} from './progress.js';

// Batch summary formatters
export { formatBatchSummary, formatFailedRows, type BatchSummaryMeta } from './batch-summary.js';
