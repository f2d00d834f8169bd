/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used by the engine.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Records and Addresses
// ============================================================================

export { RawRecordSchema, type RawRecord } from './record.js';

export {
  ADDRESS_FIELDS,
  ParsedAddressSchema,
  ConfidenceSchema,
  CONFIDENCE_RANK,
  CanonicalAddressSchema,
  isParseFailure,
  countAbsentFields,
  type AddressField,
  type ParsedAddress,
  type Confidence,
  type CanonicalAddress,
  type ParseFailure,
} from './address.js';

// ============================================================================
// Batch Results
// ============================================================================

export {
  DedupItemSchema,
  DedupGroupSchema,
  FailureReasonSchema,
  FailedRowSchema,
  RepresentativeRecordSchema,
  BatchCountsSchema,
  BatchStatusSchema,
  BatchResultSchema,
  type DedupItem,
  type DedupGroup,
  type FailureReason,
  type FailedRow,
  type RepresentativeRecord,
  type BatchCounts,
  type BatchStatus,
  type BatchResult,
} from './batch.js';

// ============================================================================
// Geocoding
// ============================================================================

export {
  NominatimAddressSchema,
  NominatimPlaceSchema,
  NominatimSearchResponseSchema,
  GeocodeComponentsSchema,
  LookupCacheFileSchema,
  type NominatimAddress,
  type NominatimPlace,
  type GeocodeComponents,
  type LookupCacheFile,
} from './geocode.js';
