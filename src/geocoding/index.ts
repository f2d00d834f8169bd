/**
 * Geocoding Module
 *
 * @module geocoding
 */

export {
  LookupError,
  isLookupError,
  toLookupError,
  lookupFailure,
  type LookupErrorKind,
  type GeocodeResult,
  type Geocoder,
  type ResolveOptions,
} from './types.js';
export {
  NominatimGeocoder,
  toGeocodeComponents,
  calculateBackoff,
  type NominatimGeocoderOptions,
} from './nominatim.js';
export {
  ConcurrencyLimiter,
  type ConcurrencyStats,
  type ConcurrencyLimiterOptions,
  type LimiterRunOptions,
} from './concurrency.js';
export { LookupCache, toCacheKey, type LookupCacheStats, type LookupCacheOptions } from './cache.js';
export { GatedGeocoder, type GatedGeocoderOptions, type GateStats } from './gate.js';
