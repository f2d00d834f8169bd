/**
 * Gated Geocoder
 *
 * Wraps a {@link Geocoder} with the shared resources every lookup goes
 * through: the read-through cache, the concurrency limiter with its start
 * spacing, and a per-lookup timeout measured from the moment the lookup
 * holds a slot.
 *
 * @module geocoding/gate
 */

import type { Logger } from '../pipeline/types.js';
import type { LookupCache } from './cache.js';
import type { ConcurrencyLimiter } from './concurrency.js';
import {
  LookupError,
  lookupFailure,
  toLookupError,
  type GeocodeResult,
  type Geocoder,
  type ResolveOptions,
} from './types.js';

export interface GatedGeocoderOptions {
  geocoder: Geocoder;
  limiter: ConcurrencyLimiter;
  cache?: LookupCache;
  /** Timeout per lookup, from slot acquisition (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
}

export interface GateStats {
  lookups: number;
  cacheHits: number;
  failures: number;
  timeouts: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class GatedGeocoder implements Geocoder {
  private readonly geocoder: Geocoder;
  private readonly limiter: ConcurrencyLimiter;
  private readonly cache?: LookupCache;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly stats: GateStats = { lookups: 0, cacheHits: 0, failures: 0, timeouts: 0 };

  constructor(options: GatedGeocoderOptions) {
    this.geocoder = options.geocoder;
    this.limiter = options.limiter;
    this.cache = options.cache;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /**
   * Resolve through cache, limiter and timeout. Never rejects.
   */
  async resolve(query: string, options: ResolveOptions = {}): Promise<GeocodeResult> {
    const cached = this.cache?.get(query);
    if (cached) {
      this.stats.cacheHits++;
      return { ok: true, components: cached };
    }

    const { signal } = options;
    if (signal?.aborted) {
      return lookupFailure(new LookupError('Lookup aborted', 'aborted'));
    }

    let result: GeocodeResult;
    try {
      result = await this.limiter.run(() => this.attempt(query, signal), { signal });
    } catch (error) {
      result = lookupFailure(toLookupError(error));
    }

    if (result.ok) {
      this.cache?.set(query, result.components);
    } else {
      this.stats.failures++;
      if (result.error.kind === 'timeout') this.stats.timeouts++;
      this.logger?.debug(`[geocoder] ${result.error.kind}: ${result.error.message}`);
    }
    return result;
  }

  getStats(): GateStats {
    return { ...this.stats };
  }

  /**
   * One lookup while holding a limiter slot. Races the geocoder against the
   * timeout and the caller's signal; the inner call is aborted when it loses.
   */
  private async attempt(query: string, signal?: AbortSignal): Promise<GeocodeResult> {
    if (signal?.aborted) {
      return lookupFailure(new LookupError('Lookup aborted', 'aborted'));
    }
    this.stats.lookups++;

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timeoutId: NodeJS.Timeout | undefined;

    // Resolved before aborting so the race reports the timeout, not the abort
    const timeout = new Promise<GeocodeResult>((resolve) => {
      timeoutId = setTimeout(() => {
        resolve(
          lookupFailure(
            new LookupError(`Lookup timed out after ${this.timeoutMs}ms`, 'timeout', undefined, true)
          )
        );
        controller.abort();
      }, this.timeoutMs);
    });

    const aborted = new Promise<GeocodeResult>((resolve) => {
      controller.signal.addEventListener(
        'abort',
        () => resolve(lookupFailure(new LookupError('Lookup aborted', 'aborted'))),
        { once: true }
      );
    });

    const call = this.geocoder
      .resolve(query, { signal: controller.signal })
      .catch((error: unknown) => lookupFailure(toLookupError(error)));

    try {
      return await Promise.race([call, timeout, aborted]);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
