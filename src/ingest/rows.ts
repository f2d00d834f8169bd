/**
 * Row Conversion
 *
 * Turns loosely typed input rows into RawRecords and pulls the address text
 * out of one or more columns.
 *
 * @module ingest/rows
 */

import type { RawRecord } from '../schemas/record.js';

/**
 * Default address columns of the county export layout.
 */
export const DEFAULT_ADDRESS_FIELDS = ['Address', 'City', 'State', 'Zipcode'] as const;

function cellToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Convert input rows to RawRecords, numbering them by position.
 *
 * @example
 * ```typescript
 * toRawRecords([{ Address: '123 Main St', Units: 4, Owner: null }]);
 * // [{ rowIndex: 0, values: { Address: '123 Main St', Units: '4', Owner: '' } }]
 * ```
 */
export function toRawRecords(rows: readonly Record<string, unknown>[]): RawRecord[] {
  return rows.map((row, rowIndex) => {
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) {
      values[key] = cellToString(value);
    }
    return { rowIndex, values };
  });
}

/**
 * Address text of a record: the named column, or the named columns joined
 * with ", " after dropping blank cells.
 *
 * @returns The address, or undefined when every column is missing or blank
 */
export function composeAddress(
  record: RawRecord,
  fields: string | readonly string[]
): string | undefined {
  const keys = typeof fields === 'string' ? [fields] : fields;
  const parts = keys
    .map((key) => record.values[key]?.trim() ?? '')
    .filter((part) => part.length > 0);

  return parts.length > 0 ? parts.join(', ') : undefined;
}
