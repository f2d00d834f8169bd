/**
 * Geocoding Schemas
 *
 * The geocoder's response is untrusted: payloads are validated against these
 * schemas and anything that does not match is treated as a malformed reply.
 *
 * @module schemas/geocode
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Nominatim Payload
// ============================================================================

/**
 * `address` block of a Nominatim search hit (addressdetails=1).
 * Unknown keys are ignored.
 */
export const NominatimAddressSchema = z
  .object({
    house_number: z.string().optional(),
    road: z.string().optional(),
    city: z.string().optional(),
    town: z.string().optional(),
    village: z.string().optional(),
    hamlet: z.string().optional(),
    suburb: z.string().optional(),
    neighbourhood: z.string().optional(),
    state: z.string().optional(),
    'ISO3166-2-lvl4': z.string().optional(),
    postcode: z.string().optional(),
    country_code: z.string().optional(),
  })
  .passthrough();

export type NominatimAddress = z.infer<typeof NominatimAddressSchema>;

export const NominatimPlaceSchema = z
  .object({
    display_name: z.string(),
    address: NominatimAddressSchema,
  })
  .passthrough();

export const NominatimSearchResponseSchema = z.array(NominatimPlaceSchema);

export type NominatimPlace = z.infer<typeof NominatimPlaceSchema>;

// ============================================================================
// Resolved Components
// ============================================================================

/**
 * Components returned by a successful lookup, before canonicalization.
 */
export const GeocodeComponentsSchema = z.object({
  houseNumber: z.string().optional(),
  street: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  /** Full display string reported by the service */
  displayName: z.string().optional(),
});

export type GeocodeComponents = z.infer<typeof GeocodeComponentsSchema>;

// ============================================================================
// Persisted Lookup Cache
// ============================================================================

export const LookupCacheFileSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSIONS.lookupCache),
  savedAt: z.string().datetime(),
  entries: z.array(z.tuple([z.string(), GeocodeComponentsSchema])),
});

export type LookupCacheFile = z.infer<typeof LookupCacheFileSchema>;
