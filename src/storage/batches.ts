/**
 * Batch Storage Operations
 *
 * Saves batch results under `<dataDir>/batches/<batchId>.json` and reads
 * them back with schema validation.
 *
 * Batch ID Format: YYYYMMDD-HHMMSS-<slug>
 *
 * @module storage/batches
 */

import * as fs from 'node:fs/promises';
import { BatchResultSchema, type BatchResult } from '../schemas/batch.js';
import { atomicWriteJson, fileExists, readValidatedJson } from './atomic.js';
import { getBatchesDir, getBatchFilePath, getDataDir } from './paths.js';

/**
 * Maximum slug length in characters
 */
const MAX_SLUG_LENGTH = 40;

export interface SaveBatchOptions {
  dataDir?: string;
  /** Explicit ID; generated from `source` when omitted */
  batchId?: string;
  /** Input name the slug is derived from, e.g. "prospects.csv" */
  source?: string;
}

/**
 * Generate a file-name friendly slug.
 *
 * @example
 * ```typescript
 * generateSlug('Q3 Prospects (Final).csv'); // 'q3-prospects-final-csv'
 * ```
 */
export function generateSlug(text: string): string {
  let slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.substring(0, MAX_SLUG_LENGTH);
    const lastHyphen = slug.lastIndexOf('-');
    if (lastHyphen > 0) {
      slug = slug.substring(0, lastHyphen);
    }
  }

  return slug || 'batch';
}

/**
 * Format a date as YYYYMMDD-HHMMSS string (local time).
 */
function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Generate a batch ID.
 *
 * @example
 * ```typescript
 * generateBatchId('prospects.csv', new Date(2026, 0, 2, 14, 35, 12));
 * // Returns: '20260102-143512-prospects'
 * ```
 */
export function generateBatchId(source: string = 'batch', date: Date = new Date()): string {
  const base = source.replace(/\.(csv|json)$/i, '');
  return `${formatTimestamp(date)}-${generateSlug(base)}`;
}

/**
 * Save a batch result.
 *
 * An existing batch with the same ID gets a numeric suffix instead of being
 * overwritten.
 *
 * @returns The batch ID and the file written
 */
export async function saveBatchResult(
  result: BatchResult,
  options: SaveBatchOptions = {}
): Promise<{ batchId: string; filePath: string }> {
  const dataDir = options.dataDir ?? getDataDir();
  const baseId = options.batchId ?? generateBatchId(options.source);
  const validated = BatchResultSchema.parse(result);

  let batchId = baseId;
  let suffix = 2;
  while (await fileExists(getBatchFilePath(batchId, dataDir))) {
    batchId = `${baseId}-${suffix}`;
    suffix++;
  }

  const filePath = getBatchFilePath(batchId, dataDir);
  await atomicWriteJson(filePath, validated);
  return { batchId, filePath };
}

/**
 * Load a saved batch result.
 *
 * @throws Error if the batch doesn't exist or fails validation
 */
export async function loadBatchResult(
  batchId: string,
  dataDir: string = getDataDir()
): Promise<BatchResult> {
  const filePath = getBatchFilePath(batchId, dataDir);
  if (!(await fileExists(filePath))) {
    throw new Error(`Batch not found: ${batchId} (path: ${filePath})`);
  }
  return readValidatedJson(filePath, BatchResultSchema);
}

/**
 * List saved batch IDs, newest first.
 */
export async function listBatches(dataDir: string = getDataDir()): Promise<string[]> {
  try {
    const entries = await fs.readdir(getBatchesDir(dataDir), { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name.slice(0, -'.json'.length))
      .sort((a, b) => b.localeCompare(a));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
