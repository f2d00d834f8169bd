/**
 * Batch Engine Wiring
 *
 * Builds a ready-to-run engine from the application configuration: the
 * Nominatim client behind the lookup gate (limiter, cache, timeout), and a
 * `run` function bound to it.
 *
 * @module pipeline/engine
 */

import { requireGeocoderUserAgent, type AppConfig } from '../config/index.js';
import { LookupCache } from '../geocoding/cache.js';
import { ConcurrencyLimiter } from '../geocoding/concurrency.js';
import { GatedGeocoder } from '../geocoding/gate.js';
import { NominatimGeocoder } from '../geocoding/nominatim.js';
import type { Geocoder } from '../geocoding/types.js';
import type { BatchResult } from '../schemas/batch.js';
import type { RawRecord } from '../schemas/record.js';
import { runBatch } from './orchestrator.js';
import type { BatchOptions, Logger } from './types.js';

export interface BatchEngineOptions {
  /** Skip the geocoder entirely; ambiguous addresses end up 'partial' */
  offline?: boolean;
  /** Shared lookup cache; one sized from the config is created when omitted */
  cache?: LookupCache;
  /** Replaces the Nominatim client, e.g. with a fake in tests */
  geocoder?: Geocoder;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export type EngineRunOptions = Omit<BatchOptions, 'geocoder' | 'logger'>;

export interface BatchEngine {
  /** Gated geocoder, absent when offline */
  readonly geocoder?: GatedGeocoder;
  /** Lookup cache, absent when offline */
  readonly cache?: LookupCache;
  run(rows: readonly RawRecord[], options: EngineRunOptions): Promise<BatchResult>;
}

/**
 * Wire an engine from configuration.
 *
 * @throws ConfigurationError when lookups are enabled without GEOCODER_USER_AGENT
 *
 * @example
 * ```typescript
 * const engine = createBatchEngine(loadConfig(), { logger });
 * const result = await engine.run(records, { addressField: 'Address' });
 * ```
 */
export function createBatchEngine(
  config: Readonly<AppConfig>,
  options: BatchEngineOptions = {}
): BatchEngine {
  const { logger } = options;

  if (options.offline) {
    return {
      run: (rows, runOptions) =>
        runBatch(rows, { concurrency: config.rowConcurrency, ...runOptions, logger }),
    };
  }

  const settings = config.geocoder;
  const inner =
    options.geocoder ??
    new NominatimGeocoder({
      userAgent: requireGeocoderUserAgent(config),
      baseUrl: settings.baseUrl,
      countryCodes: settings.countryCodes,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      fetchImpl: options.fetchImpl,
      logger,
    });

  const cache = options.cache ?? new LookupCache({ maxEntries: config.lookupCacheMaxEntries });
  const geocoder = new GatedGeocoder({
    geocoder: inner,
    limiter: new ConcurrencyLimiter(settings.concurrency, {
      minIntervalMs: settings.minIntervalMs,
      logger,
    }),
    cache,
    timeoutMs: settings.timeoutMs,
    logger,
  });

  return {
    geocoder,
    cache,
    run: (rows, runOptions) =>
      runBatch(rows, { concurrency: config.rowConcurrency, ...runOptions, geocoder, logger }),
  };
}
