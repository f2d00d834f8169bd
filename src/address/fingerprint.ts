/**
 * Address Fingerprints
 *
 * Stable dedup keys for canonical addresses. Two addresses with the same
 * house number, street and ZIP (or city/state when there is no ZIP) share a
 * fingerprint. The unit is excluded, so every unit in a building collapses
 * into one property.
 *
 * @module address/fingerprint
 */

import { createHash } from 'crypto';
import type { CanonicalAddress } from '../schemas/address.js';

const ZIP5_PATTERN = /^(\d{5})(?:-\d{4})?$/;

/**
 * Build the string that is hashed into the fingerprint.
 *
 * Seed formats:
 * - with a postal code: `zip|${house}|${street}|${zip5}`
 * - without: `loc|${house}|${street}|${city}|${state}`
 *
 * @example
 * ```typescript
 * fingerprintSeed({ houseNumber: '123', street: 'MAIN STREET', postalCode: '62704-1234', confidence: 'exact' });
 * // Returns: 'zip|123|MAIN STREET|62704'
 * ```
 */
export function fingerprintSeed(address: CanonicalAddress): string {
  const house = address.houseNumber ?? '';
  const street = address.street ?? '';

  if (address.postalCode !== undefined) {
    const zip5 = ZIP5_PATTERN.exec(address.postalCode)?.[1] ?? address.postalCode;
    return `zip|${house}|${street}|${zip5}`;
  }

  return `loc|${house}|${street}|${address.city ?? ''}|${address.state ?? ''}`;
}

/**
 * Generate the fingerprint for a canonical address.
 *
 * @returns 16-character hex string (truncated SHA-256)
 */
export function fingerprint(address: CanonicalAddress): string {
  return createHash('sha256').update(fingerprintSeed(address)).digest('hex').substring(0, 16);
}
