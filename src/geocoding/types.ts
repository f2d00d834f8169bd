/**
 * Geocoding Capability
 *
 * The engine consults an external geocoder for ambiguous addresses through
 * the {@link Geocoder} interface. Implementations never throw for expected
 * failures: they return `{ ok: false, error }` with a {@link LookupError}.
 *
 * @module geocoding/types
 */

import type { GeocodeComponents } from '../schemas/geocode.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Failure categories for a lookup.
 */
export type LookupErrorKind =
  | 'timeout'
  | 'network'
  | 'http'
  | 'malformed'
  | 'not_found'
  | 'aborted';

/**
 * Lookup failure with additional context.
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public readonly kind: LookupErrorKind,
    public readonly statusCode?: number,
    public readonly isRetryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LookupError';
  }
}

/**
 * Type guard for LookupError
 */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}

/**
 * Wrap any thrown value as a LookupError.
 */
export function toLookupError(error: unknown): LookupError {
  if (isLookupError(error)) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new LookupError('Lookup aborted', 'aborted', undefined, false, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LookupError(`Lookup failed: ${message}`, 'network', undefined, true, { cause: error });
}

// ============================================================================
// Capability
// ============================================================================

export type GeocodeResult =
  | { ok: true; components: GeocodeComponents }
  | { ok: false; error: LookupError };

export interface ResolveOptions {
  /** Abandons the lookup when aborted */
  signal?: AbortSignal;
}

/**
 * Resolves a single-line address into structured components.
 */
export interface Geocoder {
  resolve(query: string, options?: ResolveOptions): Promise<GeocodeResult>;
}

/**
 * Shorthand for a failed result.
 */
export function lookupFailure(error: LookupError): GeocodeResult {
  return { ok: false, error };
}
