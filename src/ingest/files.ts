/**
 * Input Files
 *
 * Reads prospect lists from CSV (header row as column names) or JSON
 * (array of objects) and converts them to RawRecords.
 *
 * @module ingest/files
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawRecord } from '../schemas/record.js';
import { toRawRecords } from './rows.js';

const CsvRowsSchema = z.array(z.record(z.string(), z.string()));

const JsonRowsSchema = z.array(z.record(z.string(), z.unknown()));

export type InputFormat = 'csv' | 'json';

/**
 * Input format from the file extension.
 *
 * @throws Error for any other extension
 */
export function detectInputFormat(filePath: string): InputFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.json') return 'json';
  throw new Error(`Unsupported input file type "${ext || '(none)'}": expected .csv or .json`);
}

/**
 * Parse CSV text into rows keyed by header.
 */
export function parseCsvRows(content: string): Record<string, string>[] {
  const rows: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  return CsvRowsSchema.parse(rows);
}

/**
 * Parse JSON text holding an array of row objects.
 *
 * @throws Error if the text is not JSON or not an array of objects
 */
export function parseJsonRows(content: string): Record<string, unknown>[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error('Input is not valid JSON', { cause: error });
  }

  const parsed = JsonRowsSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error('JSON input must be an array of objects');
  }
  return parsed.data;
}

/**
 * Read a .csv or .json file into RawRecords.
 *
 * @example
 * ```typescript
 * const records = await readRowsFromFile('./prospects.csv');
 * records[0]; // { rowIndex: 0, values: { Address: '123 Main St', City: 'Springfield', ... } }
 * ```
 */
export async function readRowsFromFile(filePath: string): Promise<RawRecord[]> {
  const format = detectInputFormat(filePath);
  const content = await fs.readFile(filePath, 'utf-8');

  const rows = format === 'csv' ? parseCsvRows(content) : parseJsonRows(content);
  return toRawRecords(rows);
}
