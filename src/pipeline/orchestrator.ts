/**
 * Batch Orchestrator
 *
 * Runs every row through parse, canonicalize and fingerprint under a bounded
 * row limiter, waits for all rows to settle, then deduplicates once.
 *
 * Key properties:
 * - A failing row is recorded in `failedRows` and never stops the batch
 * - Every row ends up in exactly one group or in `failedRows`
 * - Deduplication starts only after the last row settles
 * - An aborted batch reports `status: 'cancelled'` and emits no groups
 *
 * Only configuration errors are thrown, and only before any row starts.
 *
 * @module pipeline/orchestrator
 */

import { parseAddress } from '../address/parser.js';
import { canonicalize, formatAddressLine } from '../address/canonicalizer.js';
import { fingerprint } from '../address/fingerprint.js';
import { ConfigurationError } from '../config/errors.js';
import { deduplicate, summarizeGroups } from '../dedupe/groups.js';
import { ConcurrencyLimiter } from '../geocoding/concurrency.js';
import { composeAddress } from '../ingest/rows.js';
import { isParseFailure } from '../schemas/address.js';
import type { Confidence } from '../schemas/address.js';
import type {
  BatchCounts,
  BatchResult,
  DedupGroup,
  DedupItem,
  FailedRow,
  RepresentativeRecord,
} from '../schemas/batch.js';
import type { RawRecord } from '../schemas/record.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import type { BatchOptions } from './types.js';

// ============================================================================
// Types
// ============================================================================

type RowOutcome =
  | { kind: 'item'; item: DedupItem }
  | { kind: 'failed'; failure: FailedRow }
  | { kind: 'skipped'; record: RawRecord };

/** Default number of rows in flight */
export const DEFAULT_ROW_CONCURRENCY = 8;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Validate options before any row starts.
 *
 * @throws ConfigurationError for an empty address field or bad concurrency
 */
export function validateBatchOptions(options: BatchOptions): void {
  const fields = typeof options.addressField === 'string' ? [options.addressField] : options.addressField;
  if (fields.length === 0 || fields.some((field) => field.trim() === '')) {
    throw new ConfigurationError('addressField must name at least one non-empty column', [
      'addressField',
    ]);
  }

  const concurrency = options.concurrency;
  if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${String(concurrency)}`,
      ['concurrency']
    );
  }
}

/**
 * Recursively freeze a value in place.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

function toRepresentative(group: DedupGroup): RepresentativeRecord {
  const { record, address } = group.representative;
  return {
    rowIndex: record.rowIndex,
    values: record.values,
    address,
    fullAddress: formatAddressLine(address),
    fingerprint: group.fingerprint,
    groupSize: group.size,
    absorbedRowIndices: group.absorbedRowIndices,
  };
}

function countConfidence(items: readonly DedupItem[]): Record<Confidence, number> {
  const counts: Record<Confidence, number> = { exact: 0, resolved: 0, partial: 0 };
  for (const item of items) {
    counts[item.address.confidence]++;
  }
  return counts;
}

function hasAddressColumn(record: RawRecord, fields: string | readonly string[]): boolean {
  const keys = typeof fields === 'string' ? [fields] : fields;
  return keys.some((key) => key in record.values);
}

function byRowIndex(a: FailedRow, b: FailedRow): number {
  return a.rowIndex - b.rowIndex;
}

// ============================================================================
// Row Processing
// ============================================================================

async function processRow(record: RawRecord, options: BatchOptions): Promise<RowOutcome> {
  const { logger } = options;
  if (!hasAddressColumn(record, options.addressField)) {
    logger?.debug(`[batch] Row ${record.rowIndex}: missing address field`);
    return {
      kind: 'failed',
      failure: { rowIndex: record.rowIndex, reason: 'missing address field', raw: '' },
    };
  }

  // Blank cells reach the parser as '' and fail there
  const raw = composeAddress(record, options.addressField) ?? '';
  const parsed = parseAddress(raw);
  if (isParseFailure(parsed)) {
    logger?.debug(`[batch] Row ${record.rowIndex}: unrecognized format "${raw}"`);
    return {
      kind: 'failed',
      failure: { rowIndex: record.rowIndex, reason: parsed.reason, raw },
    };
  }

  const address = await canonicalize(parsed, {
    geocoder: options.geocoder,
    signal: options.signal,
    logger,
  });

  return {
    kind: 'item',
    item: {
      // Copied so freezing the result leaves the caller's rows alone
      record: { rowIndex: record.rowIndex, values: { ...record.values } },
      address,
      fingerprint: fingerprint(address),
    },
  };
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Clean and deduplicate a batch of rows.
 *
 * @param rows - Input rows; `rowIndex` identifies each row in the report
 * @param options - Address columns, geocoder, concurrency, cancellation
 * @returns Deeply frozen batch result
 * @throws ConfigurationError before any row is processed
 *
 * @example
 * ```typescript
 * const result = await runBatch(toRawRecords(rows), {
 *   addressField: ['Address', 'City', 'State', 'Zipcode'],
 *   geocoder,
 * });
 * console.log(result.counts.uniqueAfterDedup);
 * ```
 */
export async function runBatch(
  rows: readonly RawRecord[],
  options: BatchOptions
): Promise<BatchResult> {
  validateBatchOptions(options);

  const { signal, logger, onProgress } = options;
  const concurrency = options.concurrency ?? DEFAULT_ROW_CONCURRENCY;
  const limiter = new ConcurrencyLimiter(concurrency, { logger });
  const startedAt = new Date();
  let completed = 0;

  logger?.info(
    `[batch] Processing ${rows.length} rows (concurrency ${concurrency}, ` +
      `${options.geocoder ? 'lookups enabled' : 'offline'})`
  );

  const tasks = rows.map((record) =>
    limiter
      .run(async (): Promise<RowOutcome> => {
        if (signal?.aborted) {
          return { kind: 'skipped', record };
        }
        return processRow(record, options);
      })
      .then((outcome) => {
        completed++;
        if (onProgress) {
          try {
            onProgress({ completed, total: rows.length });
          } catch (error) {
            logger?.warn(`[batch] Progress callback failed: ${String(error)}`);
          }
        }
        return outcome;
      })
  );

  // Join barrier: deduplication sees every row
  const outcomes = await Promise.all(tasks);

  const failedRows: FailedRow[] = [];
  const items: DedupItem[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'failed') {
      failedRows.push(outcome.failure);
    } else if (outcome.kind === 'item') {
      items.push(outcome.item);
    }
  }
  const parseFailed = failedRows.length;

  const cancelled = signal?.aborted === true;
  let groups: DedupGroup[] = [];
  let confidence: Record<Confidence, number> = { exact: 0, resolved: 0, partial: 0 };

  if (cancelled) {
    for (const outcome of outcomes) {
      if (outcome.kind === 'failed') continue;
      const record = outcome.kind === 'item' ? outcome.item.record : outcome.record;
      failedRows.push({
        rowIndex: record.rowIndex,
        reason: 'cancelled',
        raw: composeAddress(record, options.addressField) ?? '',
      });
    }
    logger?.warn(`[batch] Cancelled after ${completed} of ${rows.length} rows`);
  } else {
    groups = deduplicate(items);
    confidence = countConfidence(items);
  }

  failedRows.sort(byRowIndex);
  const summary = summarizeGroups(groups);
  const counts: BatchCounts = {
    total: rows.length,
    parsed: summary.inputCount,
    parseFailed,
    uniqueAfterDedup: summary.groupCount,
    duplicatesAbsorbed: summary.duplicatesAbsorbed,
    ...confidence,
  };

  const completedAt = new Date();
  const result: BatchResult = {
    schemaVersion: SCHEMA_VERSIONS.batch,
    status: cancelled ? 'cancelled' : 'completed',
    representatives: groups.map(toRepresentative),
    groups,
    failedRows,
    counts,
    timing: {
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    },
  };

  if (!cancelled) {
    logger?.info(
      `[batch] ${counts.parsed} parsed, ${counts.parseFailed} failed, ` +
        `${counts.uniqueAfterDedup} unique, ${counts.duplicatesAbsorbed} duplicates absorbed`
    );
  }

  return deepFreeze(result);
}
