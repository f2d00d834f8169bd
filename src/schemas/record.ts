/**
 * Raw Record Schema
 *
 * A row handed to the engine by the ingestion boundary: column name to text,
 * plus the row's position in the input for traceability.
 *
 * @module schemas/record
 */

import { z } from 'zod';

export const RawRecordSchema = z.object({
  /** 0-based position of the row in the input */
  rowIndex: z.number().int().nonnegative(),
  /** Column name to cell text */
  values: z.record(z.string(), z.string()),
});

export type RawRecord = z.infer<typeof RawRecordSchema>;
