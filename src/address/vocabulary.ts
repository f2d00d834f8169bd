/**
 * Address Vocabulary
 *
 * Lookup tables shared by the parser and the canonicalizer: street types,
 * US states, directionals and unit designators. The two large tables live in
 * `./data/*.json` and are validated once at load.
 *
 * All keys are uppercase with punctuation removed; use {@link toKey} before
 * looking a token up.
 *
 * @module address/vocabulary
 */

import { z } from 'zod';
import streetTypesData from './data/street-types.json';
import usStatesData from './data/us-states.json';

// ============================================================================
// Table Schemas
// ============================================================================

const StreetTypeTableSchema = z.array(
  z.object({
    /** Canonical (expanded) form, e.g. "STREET" */
    name: z.string().regex(/^[A-Z]+$/),
    /** Accepted abbreviations, e.g. ["ST", "STR"] */
    abbreviations: z.array(z.string().regex(/^[A-Z]+$/)),
  })
);

const StateTableSchema = z.array(
  z.object({
    code: z.string().regex(/^[A-Z]{2}$/),
    name: z.string().regex(/^[A-Z ]+$/),
  })
);

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize a token for table lookups: uppercase, punctuation removed.
 *
 * @example
 * ```typescript
 * toKey('St.'); // 'ST'
 * ```
 */
export function toKey(token: string): string {
  return token.toUpperCase().replace(/[^A-Z0-9#]/g, '');
}

// ============================================================================
// Street Types
// ============================================================================

/** Abbreviation or full name -> canonical full name */
const STREET_TYPES = new Map<string, string>();

for (const entry of StreetTypeTableSchema.parse(streetTypesData)) {
  STREET_TYPES.set(entry.name, entry.name);
  for (const abbreviation of entry.abbreviations) {
    STREET_TYPES.set(abbreviation, entry.name);
  }
}

export function isStreetType(token: string): boolean {
  return STREET_TYPES.has(toKey(token));
}

/**
 * Expanded form of a street type token, or undefined if not a street type.
 */
export function expandStreetType(token: string): string | undefined {
  return STREET_TYPES.get(toKey(token));
}

// ============================================================================
// States
// ============================================================================

const STATE_NAME_BY_CODE = new Map<string, string>();
const STATE_CODE_BY_NAME = new Map<string, string>();

for (const entry of StateTableSchema.parse(usStatesData)) {
  STATE_NAME_BY_CODE.set(entry.code, entry.name);
  STATE_CODE_BY_NAME.set(entry.name, entry.code);
}

/** Longest state name, in words ("NORTHERN MARIANA ISLANDS") */
const MAX_STATE_NAME_WORDS = Math.max(
  ...Array.from(STATE_CODE_BY_NAME.keys()).map((name) => name.split(' ').length)
);

/**
 * Two-letter code for a state code or full state name.
 *
 * @example
 * ```typescript
 * toStateCode('Illinois');   // 'IL'
 * toStateCode('il');         // 'IL'
 * toStateCode('Atlantis');   // undefined
 * ```
 */
export function toStateCode(value: string): string | undefined {
  const key = value
    .toUpperCase()
    .replace(/[^A-Z ]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  if (STATE_NAME_BY_CODE.has(key)) {
    return key;
  }
  return STATE_CODE_BY_NAME.get(key);
}

/**
 * Number of trailing tokens that together name a state (0 if none).
 * Longer names win, so "WEST VIRGINIA" is preferred over "VIRGINIA".
 */
export function matchTrailingState(tokens: readonly string[]): number {
  const maxWords = Math.min(MAX_STATE_NAME_WORDS, tokens.length);
  for (let words = maxWords; words >= 1; words--) {
    const candidate = tokens.slice(tokens.length - words).join(' ');
    if (toStateCode(candidate) !== undefined) {
      return words;
    }
  }
  return 0;
}

// ============================================================================
// Directionals
// ============================================================================

const DIRECTIONALS = new Map<string, string>([
  ['N', 'N'],
  ['NORTH', 'N'],
  ['S', 'S'],
  ['SOUTH', 'S'],
  ['E', 'E'],
  ['EAST', 'E'],
  ['W', 'W'],
  ['WEST', 'W'],
  ['NE', 'NE'],
  ['NORTHEAST', 'NE'],
  ['NW', 'NW'],
  ['NORTHWEST', 'NW'],
  ['SE', 'SE'],
  ['SOUTHEAST', 'SE'],
  ['SW', 'SW'],
  ['SOUTHWEST', 'SW'],
]);

export function isDirectional(token: string): boolean {
  return DIRECTIONALS.has(toKey(token));
}

/**
 * Letter form of a directional ("NORTH" -> "N"), or undefined.
 */
export function contractDirectional(token: string): string | undefined {
  return DIRECTIONALS.get(toKey(token));
}

// ============================================================================
// Unit Designators
// ============================================================================

const UNIT_DESIGNATORS = new Map<string, string>([
  ['APT', 'APT'],
  ['APARTMENT', 'APT'],
  ['UNIT', 'UNIT'],
  ['#', 'UNIT'],
  ['SUITE', 'STE'],
  ['STE', 'STE'],
  ['RM', 'RM'],
  ['ROOM', 'RM'],
  ['FL', 'FL'],
  ['FLOOR', 'FL'],
  ['BLDG', 'BLDG'],
  ['BUILDING', 'BLDG'],
]);

export function isUnitDesignator(token: string): boolean {
  return UNIT_DESIGNATORS.has(toKey(token));
}

/**
 * Short form of a unit designator ("APARTMENT" -> "APT", "#" -> "UNIT").
 */
export function contractUnitDesignator(token: string): string | undefined {
  return UNIT_DESIGNATORS.get(toKey(token));
}
