/**
 * Batch Schemas
 *
 * Shapes produced by the deduplication engine and the batch orchestrator.
 * BatchResult is the value handed to the persistence boundary; the schema is
 * also used to validate saved batches when they are read back.
 *
 * @module schemas/batch
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { CanonicalAddressSchema } from './address.js';
import { RawRecordSchema } from './record.js';

// ============================================================================
// Dedup Groups
// ============================================================================

/**
 * A successfully canonicalized row with its dedup key.
 */
export const DedupItemSchema = z.object({
  record: RawRecordSchema,
  address: CanonicalAddressSchema,
  fingerprint: z.string(),
});

export type DedupItem = z.infer<typeof DedupItemSchema>;

/**
 * All rows sharing one fingerprint.
 */
export const DedupGroupSchema = z.object({
  fingerprint: z.string(),
  /** Members in first-seen order */
  members: z.array(DedupItemSchema),
  representative: DedupItemSchema,
  size: z.number().int().positive(),
  /** Row indices of every member, first-seen order */
  rowIndices: z.array(z.number().int().nonnegative()),
  /** Row indices of members other than the representative */
  absorbedRowIndices: z.array(z.number().int().nonnegative()),
});

export type DedupGroup = z.infer<typeof DedupGroupSchema>;

// ============================================================================
// Failed Rows
// ============================================================================

export const FailureReasonSchema = z.enum([
  'unrecognized format',
  'missing address field',
  'cancelled',
]);

export type FailureReason = z.infer<typeof FailureReasonSchema>;

export const FailedRowSchema = z.object({
  rowIndex: z.number().int().nonnegative(),
  reason: FailureReasonSchema,
  /** Address text the row carried ('' when none) */
  raw: z.string(),
});

export type FailedRow = z.infer<typeof FailedRowSchema>;

// ============================================================================
// Batch Result
// ============================================================================

/**
 * One emitted record per unique address.
 */
export const RepresentativeRecordSchema = z.object({
  rowIndex: z.number().int().nonnegative(),
  values: z.record(z.string(), z.string()),
  address: CanonicalAddressSchema,
  /** Canonical single-line rendering */
  fullAddress: z.string(),
  fingerprint: z.string(),
  groupSize: z.number().int().positive(),
  absorbedRowIndices: z.array(z.number().int().nonnegative()),
});

export type RepresentativeRecord = z.infer<typeof RepresentativeRecordSchema>;

export const BatchCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  /** Rows that produced a canonical address and entered deduplication */
  parsed: z.number().int().nonnegative(),
  parseFailed: z.number().int().nonnegative(),
  uniqueAfterDedup: z.number().int().nonnegative(),
  duplicatesAbsorbed: z.number().int().nonnegative(),
  exact: z.number().int().nonnegative(),
  resolved: z.number().int().nonnegative(),
  partial: z.number().int().nonnegative(),
});

export type BatchCounts = z.infer<typeof BatchCountsSchema>;

export const BatchStatusSchema = z.enum(['completed', 'cancelled']);

export type BatchStatus = z.infer<typeof BatchStatusSchema>;

export const BatchResultSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSIONS.batch),
  status: BatchStatusSchema,
  representatives: z.array(RepresentativeRecordSchema),
  groups: z.array(DedupGroupSchema),
  failedRows: z.array(FailedRowSchema),
  counts: BatchCountsSchema,
  timing: z.object({
    startedAt: z.string().datetime(),
    completedAt: z.string().datetime(),
    durationMs: z.number().nonnegative(),
  }),
});

export type BatchResult = z.infer<typeof BatchResultSchema>;
