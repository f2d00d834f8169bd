/**
 * Batch Pipeline
 *
 * Orchestrates parse, canonicalize, fingerprint and deduplicate over a batch
 * of rows, and wires the engine from configuration.
 *
 * @module pipeline
 */

export type { Logger, BatchOptions, BatchProgress } from './types.js';

export {
  runBatch,
  validateBatchOptions,
  deepFreeze,
  DEFAULT_ROW_CONCURRENCY,
} from './orchestrator.js';

export {
  createBatchEngine,
  type BatchEngine,
  type BatchEngineOptions,
  type EngineRunOptions,
} from './engine.js';
