/**
 * Version numbers written into every persisted document. Loading a file
 * whose schemaVersion differs fails validation instead of misreading it.
 *
 * @module schemas/versions
 */

export const SCHEMA_VERSIONS = {
  /** Saved batch results under batches/ */
  batch: 1,
  /** cache/lookup-cache.json */
  lookupCache: 1,
} as const;
