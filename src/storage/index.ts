/**
 * Storage Layer
 *
 * File-based persistence for batch results, the lookup cache and CSV exports.
 * All JSON writes use the atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  getDataDir,
  getBatchesDir,
  getBatchFilePath,
  getLookupCachePath,
  resolveDir,
  validateIdSecurity,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, readValidatedJson, fileExists } from './atomic.js';

// Batch operations
export {
  saveBatchResult,
  loadBatchResult,
  listBatches,
  generateBatchId,
  generateSlug,
  type SaveBatchOptions,
} from './batches.js';

// CSV export
export { exportRepresentativesCsv, representativesToCsv, EXPORT_COLUMNS } from './export.js';
