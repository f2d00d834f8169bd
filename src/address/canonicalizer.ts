/**
 * Canonicalizer
 *
 * Normalizes parsed components into the canonical form used for
 * fingerprinting: uppercase, street types expanded, directionals and unit
 * designators contracted, state names mapped to codes, ZIP+4 hyphenated.
 *
 * Addresses the local rules cannot settle (no recognizable street, bad
 * postal code) are sent to the optional geocoder. Lookup failures only
 * lower the confidence tag; they never propagate.
 *
 * @module address/canonicalizer
 */

import type {
  AddressField,
  CanonicalAddress,
  ParsedAddress,
} from '../schemas/address.js';
import type { GeocodeComponents } from '../schemas/geocode.js';
import type { Geocoder } from '../geocoding/types.js';
import { toLookupError } from '../geocoding/types.js';
import type { Logger } from '../pipeline/types.js';
import { findStreetTypeIndex } from './parser.js';
import {
  contractDirectional,
  contractUnitDesignator,
  expandStreetType,
  isDirectional,
  toStateCode,
} from './vocabulary.js';

// ============================================================================
// Types
// ============================================================================

export interface LocalCanonicalization {
  /** Normalized components, tagged 'exact' or 'partial' */
  address: CanonicalAddress;
  /** Fields the local rules could not settle */
  ambiguities: AddressField[];
}

export interface CanonicalizeOptions {
  /** Consulted for ambiguous addresses; omitted means offline */
  geocoder?: Geocoder;
  signal?: AbortSignal;
  logger?: Logger;
}

const VALID_POSTAL_CODE = /^\d{5}(?:-\d{4})?$/;

// ============================================================================
// Field Normalizers
// ============================================================================

function collapse(value: string): string | undefined {
  const result = value.replace(/\s+/g, ' ').trim();
  return result.length > 0 ? result : undefined;
}

export function normalizeHouseNumber(value: string): string | undefined {
  return collapse(value.toUpperCase().replace(/[^A-Z0-9\s\-\/]/g, ''));
}

/**
 * Normalize a street and report whether it ends in a known street type.
 */
export function normalizeStreet(value: string): { street?: string; typed: boolean } {
  const tokens = value
    .toUpperCase()
    .split(/\s+/)
    .map((token) => token.replace(/[^A-Z0-9]/g, ''))
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return { typed: false };
  }

  const typeIndex = findStreetTypeIndex(tokens);
  const nameWords = tokens.filter(
    (token, index) => index !== typeIndex && !isDirectional(token)
  ).length;

  const normalized = tokens.map((token, index) => {
    if (index === typeIndex) {
      return expandStreetType(token) ?? token;
    }
    // Leading and post-type directionals, kept spelled out when they are the name
    const isDirectionalSlot = index === 0 || (typeIndex >= 0 && index === typeIndex + 1);
    if (isDirectionalSlot && nameWords > 0) {
      return contractDirectional(token) ?? token;
    }
    return token;
  });

  return { street: normalized.join(' '), typed: typeIndex >= 0 };
}

export function normalizeUnit(value: string): string | undefined {
  const tokens = value
    .toUpperCase()
    .split(/\s+/)
    .map((token) => token.replace(/[^A-Z0-9#\-]/g, ''))
    .filter((token) => token.length > 0);

  const first = tokens[0];
  if (first !== undefined) {
    tokens[0] = contractUnitDesignator(first) ?? first;
  }
  return collapse(tokens.join(' '));
}

export function normalizeCity(value: string): string | undefined {
  return collapse(value.toUpperCase().replace(/[^A-Z0-9\s\-]/g, ''));
}

export function normalizeState(value: string): string | undefined {
  return toStateCode(value) ?? collapse(value.toUpperCase().replace(/[^A-Z\s]/g, ''));
}

/**
 * Normalize a postal code. Short ZIPs get their leading zeros back and nine
 * bare digits become ZIP+4.
 */
export function normalizePostalCode(value: string): { postalCode?: string; valid: boolean } {
  const digits = value.replace(/[^0-9\-]/g, '');

  let candidate = digits;
  if (/^\d{9}$/.test(digits)) {
    candidate = `${digits.slice(0, 5)}-${digits.slice(5)}`;
  } else {
    const short = /^(\d{3,4})(-\d{4})?$/.exec(digits);
    if (short) {
      candidate = `${short[1].padStart(5, '0')}${short[2] ?? ''}`;
    }
  }

  if (VALID_POSTAL_CODE.test(candidate)) {
    return { postalCode: candidate, valid: true };
  }
  return { postalCode: collapse(value.toUpperCase()), valid: false };
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Single-line rendering: "123 MAIN STREET APT 4B, SPRINGFIELD, IL 62704".
 * Absent components are skipped.
 */
export function formatAddressLine(address: ParsedAddress): string {
  const line = [address.houseNumber, address.street, address.unit]
    .filter((part): part is string => part !== undefined && part.length > 0)
    .join(' ');
  const region = [address.state, address.postalCode]
    .filter((part): part is string => part !== undefined && part.length > 0)
    .join(' ');

  return [line, address.city ?? '', region].filter((part) => part.length > 0).join(', ');
}

// ============================================================================
// Local Step
// ============================================================================

/**
 * Normalize without any external lookup.
 *
 * @example
 * ```typescript
 * canonicalizeLocal({ houseNumber: '123', street: 'Main St' });
 * // { address: { houseNumber: '123', street: 'MAIN STREET', confidence: 'exact' },
 * //   ambiguities: [] }
 * ```
 */
export function canonicalizeLocal(parsed: ParsedAddress): LocalCanonicalization {
  const ambiguities: AddressField[] = [];
  const address: CanonicalAddress = { confidence: 'exact' };

  if (parsed.houseNumber !== undefined) {
    const houseNumber = normalizeHouseNumber(parsed.houseNumber);
    if (houseNumber !== undefined) address.houseNumber = houseNumber;
  }

  const street = parsed.street !== undefined ? normalizeStreet(parsed.street) : { typed: false };
  if (street.street !== undefined) address.street = street.street;
  if (!street.typed) ambiguities.push('street');

  if (parsed.unit !== undefined) {
    const unit = normalizeUnit(parsed.unit);
    if (unit !== undefined) address.unit = unit;
  }

  if (parsed.city !== undefined) {
    const city = normalizeCity(parsed.city);
    if (city !== undefined) address.city = city;
  }

  if (parsed.state !== undefined) {
    const state = normalizeState(parsed.state);
    if (state !== undefined) address.state = state;
  }

  if (parsed.postalCode !== undefined) {
    const postal = normalizePostalCode(parsed.postalCode);
    if (postal.postalCode !== undefined) address.postalCode = postal.postalCode;
    if (!postal.valid) ambiguities.push('postalCode');
  }

  if (ambiguities.length > 0) {
    address.confidence = 'partial';
  }

  return { address, ambiguities };
}

// ============================================================================
// Lookup Merge
// ============================================================================

/**
 * Merge looked-up components over the local result. Street, postal code,
 * city and state from the lookup win; the house number only fills a gap;
 * the unit always stays local.
 */
export function mergeLookup(
  local: CanonicalAddress,
  remote: GeocodeComponents
): CanonicalAddress {
  const merged: CanonicalAddress = { ...local, confidence: 'resolved' };

  if (merged.houseNumber === undefined && remote.houseNumber !== undefined) {
    const houseNumber = normalizeHouseNumber(remote.houseNumber);
    if (houseNumber !== undefined) merged.houseNumber = houseNumber;
  }
  if (remote.street !== undefined) {
    const street = normalizeStreet(remote.street).street;
    if (street !== undefined) merged.street = street;
  }
  if (remote.city !== undefined) {
    const city = normalizeCity(remote.city);
    if (city !== undefined) merged.city = city;
  }
  if (remote.state !== undefined) {
    const state = normalizeState(remote.state);
    if (state !== undefined) merged.state = state;
  }
  if (remote.postalCode !== undefined) {
    const postal = normalizePostalCode(remote.postalCode);
    if (postal.valid && postal.postalCode !== undefined) merged.postalCode = postal.postalCode;
  }

  return merged;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Canonicalize parsed components, consulting the geocoder when the local
 * rules leave a field ambiguous.
 *
 * Confidence:
 * - 'exact' when nothing was ambiguous
 * - 'resolved' when the lookup succeeded
 * - 'partial' when there is no geocoder or the lookup failed
 */
export async function canonicalize(
  parsed: ParsedAddress,
  options: CanonicalizeOptions = {}
): Promise<CanonicalAddress> {
  const { address, ambiguities } = canonicalizeLocal(parsed);
  if (ambiguities.length === 0) {
    return address;
  }

  const { geocoder, signal, logger } = options;
  const query = formatAddressLine({ ...address, unit: undefined });
  if (!geocoder || query.length === 0) {
    return address;
  }

  try {
    const result = await geocoder.resolve(query, { signal });
    if (result.ok) {
      return mergeLookup(address, result.components);
    }
    logger?.debug(`[canonicalize] Lookup failed (${result.error.kind}) for "${query}"`);
  } catch (error) {
    const lookupError = toLookupError(error);
    logger?.warn(`[canonicalize] Geocoder threw (${lookupError.kind}): ${lookupError.message}`);
  }

  return address;
}
