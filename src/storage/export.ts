/**
 * CSV Export
 *
 * Writes the cleaned prospect list: one line per unique address, canonical
 * columns first, then every other column of the representative row.
 *
 * @module storage/export
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { BatchResult, RepresentativeRecord } from '../schemas/batch.js';

export const EXPORT_COLUMNS = [
  'Full Address',
  'Address',
  'City',
  'State',
  'Zipcode',
  'Confidence',
  'Group Size',
  'Row',
] as const;

function toExportRow(representative: RepresentativeRecord): Record<string, string> {
  const { address } = representative;
  const street = [address.houseNumber, address.street, address.unit]
    .filter((part): part is string => part !== undefined)
    .join(' ');

  return {
    ...representative.values,
    'Full Address': representative.fullAddress,
    Address: street,
    City: address.city ?? '',
    State: address.state ?? '',
    Zipcode: address.postalCode ?? '',
    Confidence: address.confidence,
    'Group Size': String(representative.groupSize),
    Row: String(representative.rowIndex),
  };
}

/**
 * Render representatives as CSV text.
 */
export function representativesToCsv(result: Pick<BatchResult, 'representatives'>): string {
  const fixed = new Set<string>(EXPORT_COLUMNS);
  const extra: string[] = [];
  for (const representative of result.representatives) {
    for (const key of Object.keys(representative.values)) {
      if (!fixed.has(key) && !extra.includes(key)) {
        extra.push(key);
      }
    }
  }

  return stringify(result.representatives.map(toExportRow), {
    header: true,
    columns: [...EXPORT_COLUMNS, ...extra],
  });
}

/**
 * Write the cleaned list to a CSV file.
 *
 * @returns Number of data rows written
 */
export async function exportRepresentativesCsv(
  result: Pick<BatchResult, 'representatives'>,
  filePath: string
): Promise<number> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, representativesToCsv(result), 'utf-8');
  return result.representatives.length;
}
