/**
 * Address Schemas
 *
 * Structured address shapes produced by the parser and canonicalizer.
 * Every component is optional: an absent field (`undefined`) means the
 * component could not be determined, which is distinct from an empty string.
 *
 * @module schemas/address
 */

import { z } from 'zod';

// ============================================================================
// Components
// ============================================================================

/**
 * The six address components, in display order.
 */
export const ADDRESS_FIELDS = [
  'houseNumber',
  'street',
  'unit',
  'city',
  'state',
  'postalCode',
] as const;

export type AddressField = (typeof ADDRESS_FIELDS)[number];

/**
 * ParsedAddress: components split out of a raw address string.
 */
export const ParsedAddressSchema = z.object({
  /** House number, e.g. "123", "123-A", "12-34" */
  houseNumber: z.string().optional(),
  /** Street name including type and directionals */
  street: z.string().optional(),
  /** Unit / suite designator and number, e.g. "APT 4B" */
  unit: z.string().optional(),
  city: z.string().optional(),
  /** State or region code */
  state: z.string().optional(),
  postalCode: z.string().optional(),
});

export type ParsedAddress = z.infer<typeof ParsedAddressSchema>;

// ============================================================================
// Confidence
// ============================================================================

/**
 * How an address reached its canonical form.
 * - 'exact': fully parsed and normalized locally
 * - 'resolved': required the external lookup, which succeeded
 * - 'partial': normalization incomplete, some fields retained raw
 */
export const ConfidenceSchema = z.enum(['exact', 'resolved', 'partial']);

export type Confidence = z.infer<typeof ConfidenceSchema>;

/**
 * Ordering used when picking a group representative (higher wins).
 */
export const CONFIDENCE_RANK: Record<Confidence, number> = {
  exact: 3,
  resolved: 2,
  partial: 1,
};

/**
 * CanonicalAddress: every present field has passed normalization.
 */
export const CanonicalAddressSchema = ParsedAddressSchema.extend({
  confidence: ConfidenceSchema,
});

export type CanonicalAddress = z.infer<typeof CanonicalAddressSchema>;

// ============================================================================
// Parse Failure
// ============================================================================

/**
 * Returned by the parser when a string has no recoverable structure.
 */
export interface ParseFailure {
  type: 'parse_failure';
  reason: 'unrecognized format';
  raw: string;
}

/**
 * Type guard for parser output.
 */
export function isParseFailure<T extends object>(value: T | ParseFailure): value is ParseFailure {
  return 'type' in value && value.type === 'parse_failure';
}

/**
 * Count how many of the six components are absent.
 */
export function countAbsentFields(address: ParsedAddress): number {
  return ADDRESS_FIELDS.filter((field) => address[field] === undefined).length;
}
