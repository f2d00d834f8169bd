/**
 * Address Module
 *
 * Parsing, canonicalization and fingerprinting of free-text addresses.
 *
 * @module address
 */

import type { CanonicalAddress, ParseFailure } from '../schemas/address.js';
import { isParseFailure } from '../schemas/address.js';
import { parseAddress } from './parser.js';
import { canonicalize, type CanonicalizeOptions } from './canonicalizer.js';
import { fingerprint } from './fingerprint.js';

export { parseAddress, findStreetTypeIndex } from './parser.js';
export {
  canonicalize,
  canonicalizeLocal,
  mergeLookup,
  formatAddressLine,
  normalizeHouseNumber,
  normalizeStreet,
  normalizeUnit,
  normalizeCity,
  normalizeState,
  normalizePostalCode,
  type CanonicalizeOptions,
  type LocalCanonicalization,
} from './canonicalizer.js';
export { fingerprint, fingerprintSeed } from './fingerprint.js';
export {
  toKey,
  isStreetType,
  expandStreetType,
  toStateCode,
  isDirectional,
  contractDirectional,
  isUnitDesignator,
  contractUnitDesignator,
} from './vocabulary.js';

/**
 * Result of running one address through parse, canonicalize and fingerprint.
 */
export interface NormalizedAddress {
  address: CanonicalAddress;
  fingerprint: string;
}

/**
 * Parse, canonicalize and fingerprint a single address.
 *
 * @returns The canonical address with its fingerprint, or the ParseFailure
 */
export async function normalizeAddress(
  raw: string,
  options: CanonicalizeOptions = {}
): Promise<NormalizedAddress | ParseFailure> {
  const parsed = parseAddress(raw);
  if (isParseFailure(parsed)) {
    return parsed;
  }

  const address = await canonicalize(parsed, options);
  return { address, fingerprint: fingerprint(address) };
}
