/**
 * Tests for input ingestion: row conversion, file readers and the property
 * class filter.
 *
 * @module ingest/ingest.test
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { composeAddress, toRawRecords } from './rows.js';
import { detectInputFormat, parseCsvRows, parseJsonRows, readRowsFromFile } from './files.js';
import { filterByPropertyClass, standardizePropertyClass } from './property-class.js';

// ============================================================================
// Rows
// ============================================================================

describe('toRawRecords', () => {
  it('stringifies cells and numbers rows by position', () => {
    expect(
      toRawRecords([
        { Address: '123 Main St', Units: 4, Owner: null, Vacant: false },
        { Address: undefined, Tags: ['a'] },
      ])
    ).toEqual([
      { rowIndex: 0, values: { Address: '123 Main St', Units: '4', Owner: '', Vacant: 'false' } },
      { rowIndex: 1, values: { Address: '', Tags: '["a"]' } },
    ]);
  });
});

describe('composeAddress', () => {
  const record = {
    rowIndex: 0,
    values: { Address: ' 123 Main St ', City: 'Springfield', State: '', Zipcode: '62704' },
  };

  it('reads a single column', () => {
    expect(composeAddress(record, 'Address')).toBe('123 Main St');
  });

  it('joins several columns and skips blanks', () => {
    expect(composeAddress(record, ['Address', 'City', 'State', 'Zipcode'])).toBe(
      '123 Main St, Springfield, 62704'
    );
  });

  it('returns undefined when nothing is present', () => {
    expect(composeAddress(record, ['State', 'County'])).toBeUndefined();
  });
});

// ============================================================================
// Files
// ============================================================================

describe('detectInputFormat', () => {
  it('recognizes csv and json extensions', () => {
    expect(detectInputFormat('list.CSV')).toBe('csv');
    expect(detectInputFormat('/tmp/list.json')).toBe('json');
  });

  it('rejects anything else', () => {
    expect(() => detectInputFormat('list.xlsx')).toThrow(
      'Unsupported input file type ".xlsx": expected .csv or .json'
    );
    expect(() => detectInputFormat('list')).toThrow('Unsupported input file type "(none)"');
  });
});

describe('parseCsvRows', () => {
  it('keys rows by header and trims cells', () => {
    const csv = '\uFEFFAddress,City\n"123 Main St, Apt 2", Springfield \n\n9 Pine Rd,Boston\n';
    expect(parseCsvRows(csv)).toEqual([
      { Address: '123 Main St, Apt 2', City: 'Springfield' },
      { Address: '9 Pine Rd', City: 'Boston' },
    ]);
  });
});

describe('parseJsonRows', () => {
  it('accepts an array of objects', () => {
    expect(parseJsonRows('[{"Address":"123 Main St","Units":4}]')).toEqual([
      { Address: '123 Main St', Units: 4 },
    ]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseJsonRows('{')).toThrow('Input is not valid JSON');
  });

  it('rejects other shapes', () => {
    expect(() => parseJsonRows('{"Address":"123 Main St"}')).toThrow(
      'JSON input must be an array of objects'
    );
    expect(() => parseJsonRows('["123 Main St"]')).toThrow('JSON input must be an array of objects');
  });
});

describe('readRowsFromFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ingest-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads a CSV file into records', async () => {
    const filePath = path.join(tempDir, 'prospects.csv');
    await fs.writeFile(filePath, 'Address,Zipcode\n123 Main St,62704\n');

    expect(await readRowsFromFile(filePath)).toEqual([
      { rowIndex: 0, values: { Address: '123 Main St', Zipcode: '62704' } },
    ]);
  });

  it('reads a JSON file into records', async () => {
    const filePath = path.join(tempDir, 'prospects.json');
    await fs.writeFile(filePath, '[{"Address":"123 Main St","Zipcode":62704}]');

    expect(await readRowsFromFile(filePath)).toEqual([
      { rowIndex: 0, values: { Address: '123 Main St', Zipcode: '62704' } },
    ]);
  });
});

// ============================================================================
// Property Class
// ============================================================================

describe('standardizePropertyClass', () => {
  it('trims, uppercases and maps the CO typo', () => {
    expect(standardizePropertyClass(' b9 ')).toBe('B9');
    expect(standardizePropertyClass('co')).toBe('C0');
  });
});

describe('filterByPropertyClass', () => {
  const records = toRawRecords([
    { Address: '1 A St', 'Property class': 'C1' },
    { Address: '2 B St', 'Property class': 'CO' },
    { Address: '3 C St', 'Property class': 'R4' },
    { Address: '4 D St', 'Property class': 'c1' },
    { Address: '5 E St' },
  ]);

  it('keeps allowed classes with their row indices', () => {
    const { records: kept, stats } = filterByPropertyClass(records);

    expect(kept.map((record) => record.rowIndex)).toEqual([0, 1, 3]);
    expect(stats).toEqual({
      total: 5,
      kept: 3,
      filteredOut: 2,
      validClasses: [
        { code: 'C1', count: 2, description: 'Walk-up Apartments' },
        { code: 'C0', count: 1, description: 'Commercial Condominium' },
      ],
      invalidClasses: { R4: 1, '': 1 },
    });
  });

  it('honors a custom column and class list', () => {
    const rows = toRawRecords([
      { Address: '1 A St', Class: 'r4' },
      { Address: '2 B St', Class: 'C1' },
    ]);

    const { records: kept, stats } = filterByPropertyClass(rows, { column: 'Class', allowed: ['R4'] });

    expect(kept.map((record) => record.rowIndex)).toEqual([0]);
    expect(stats.validClasses).toEqual([{ code: 'R4', count: 1, description: 'Unknown' }]);
  });
});
