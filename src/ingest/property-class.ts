/**
 * Property Class Filter
 *
 * County exports tag each parcel with a building class code. Prospect lists
 * keep only the commercial and multi-unit residential classes. "CO" (letter
 * O) is a common typo of "C0" and is read as the same class.
 *
 * @module ingest/property-class
 */

import type { RawRecord } from '../schemas/record.js';

/** Column holding the class code in the county export */
export const DEFAULT_CLASS_COLUMN = 'Property class';

export const PROPERTY_CLASS_DESCRIPTIONS: Readonly<Record<string, string>> = {
  CD: 'Residential Condominium',
  B9: 'Mixed Residential & Commercial',
  B2: 'Office Buildings',
  B3: 'Industrial & Manufacturing',
  C0: 'Commercial Condominium',
  B1: 'Hotels & Apartments',
  C1: 'Walk-up Apartments',
  A9: 'Luxury Residential',
  C2: 'Elevator Apartments',
};

export const DEFAULT_PROPERTY_CLASSES: readonly string[] = Object.keys(PROPERTY_CLASS_DESCRIPTIONS);

const CLASS_ALIASES: Readonly<Record<string, string>> = {
  CO: 'C0',
};

export interface PropertyClassFilterOptions {
  /** Column to read (default: 'Property class') */
  column?: string;
  /** Allowed class codes, any spelling (default: DEFAULT_PROPERTY_CLASSES) */
  allowed?: readonly string[];
}

export interface PropertyClassCount {
  code: string;
  count: number;
  description: string;
}

export interface PropertyClassStats {
  total: number;
  kept: number;
  filteredOut: number;
  /** Allowed classes present in the input, most frequent first */
  validClasses: PropertyClassCount[];
  /** Other class codes seen, with counts ('' for a blank cell) */
  invalidClasses: Record<string, number>;
}

export interface PropertyClassFilterResult {
  records: RawRecord[];
  stats: PropertyClassStats;
}

/**
 * Uppercase, trim and map known aliases.
 *
 * @example
 * ```typescript
 * standardizePropertyClass(' co '); // 'C0'
 * standardizePropertyClass('b9');   // 'B9'
 * ```
 */
export function standardizePropertyClass(value: string): string {
  const code = value.trim().toUpperCase();
  return CLASS_ALIASES[code] ?? code;
}

/**
 * Keep records whose standardized class is allowed. Kept records keep their
 * original `rowIndex`.
 */
export function filterByPropertyClass(
  records: readonly RawRecord[],
  options: PropertyClassFilterOptions = {}
): PropertyClassFilterResult {
  const column = options.column ?? DEFAULT_CLASS_COLUMN;
  const allowed = new Set((options.allowed ?? DEFAULT_PROPERTY_CLASSES).map(standardizePropertyClass));

  const kept: RawRecord[] = [];
  const validCounts = new Map<string, number>();
  const invalidClasses: Record<string, number> = {};

  for (const record of records) {
    const code = standardizePropertyClass(record.values[column] ?? '');
    if (allowed.has(code)) {
      kept.push(record);
      validCounts.set(code, (validCounts.get(code) ?? 0) + 1);
    } else {
      invalidClasses[code] = (invalidClasses[code] ?? 0) + 1;
    }
  }

  const validClasses = Array.from(validCounts, ([code, count]) => ({
    code,
    count,
    description: PROPERTY_CLASS_DESCRIPTIONS[code] ?? 'Unknown',
  })).sort((a, b) => b.count - a.count || a.code.localeCompare(b.code));

  return {
    records: kept,
    stats: {
      total: records.length,
      kept: kept.length,
      filteredOut: records.length - kept.length,
      validClasses,
      invalidClasses,
    },
  };
}
