/**
 * Prospect Address Cleaner
 *
 * Library entry point: address normalization, deduplication and the batch
 * engine, plus the ingestion and storage adapters used by the CLI.
 */

export * from './schemas/index.js';
export * from './address/index.js';
export * from './dedupe/index.js';
export * from './geocoding/index.js';
export * from './pipeline/index.js';
export * from './ingest/index.js';
export * from './storage/index.js';
export {
  loadConfig,
  requireGeocoderUserAgent,
  ConfigurationError,
  isConfigurationError,
  type AppConfig,
  type GeocoderConfig,
} from './config/index.js';
