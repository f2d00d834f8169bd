/**
 * Pipeline Type Definitions
 *
 * Contracts shared by the batch orchestrator and the components it drives:
 * the logger interface, batch options and progress reporting.
 *
 * @module pipeline/types
 */

import type { Geocoder } from '../geocoding/types.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Batch Options
// ============================================================================

/**
 * Progress snapshot reported after each row settles.
 */
export interface BatchProgress {
  completed: number;
  total: number;
}

/**
 * Options for {@link runBatch}.
 */
export interface BatchOptions {
  /**
   * Column holding the address, or an ordered list of columns joined with
   * ", " (empty cells skipped), e.g. ['Address', 'City', 'State', 'Zipcode'].
   */
  addressField: string | readonly string[];

  /** Lookup service for ambiguous addresses; omit to run fully offline */
  geocoder?: Geocoder;

  /** Maximum rows in flight (default: 8) */
  concurrency?: number;

  /** Cancels the batch; no groups are emitted once aborted */
  signal?: AbortSignal;

  logger?: Logger;

  onProgress?: (progress: BatchProgress) => void;
}
