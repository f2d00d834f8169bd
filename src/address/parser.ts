/**
 * Address Parser
 *
 * Splits a free-text address into house number, street, unit, city, state
 * and postal code. Rules run in a fixed priority order and each field is
 * settled by the first rule that matches; there is no backtracking across
 * fields:
 *
 * 1. Postal code (trailing ZIP or ZIP+4 on the last comma segment)
 * 2. State (trailing code or full name)
 * 3. Unit segments and city segment (comma-separated inputs)
 * 4. Unit marker inside the street line ("Apt 4B", "#4B")
 * 5. House number (leading numeric token)
 * 6. Street (up to and including the last street-type token)
 *
 * Fields that cannot be determined are left absent. Parsing fails only when
 * neither a house number nor a street-type token is found.
 *
 * The parser is pure and keeps the input's casing; normalization happens in
 * the canonicalizer.
 *
 * @module address/parser
 */

import type { ParsedAddress, ParseFailure } from '../schemas/address.js';
import {
  isDirectional,
  isStreetType,
  isUnitDesignator,
  matchTrailingState,
} from './vocabulary.js';

// ============================================================================
// Patterns
// ============================================================================

/** 5-digit ZIP with optional +4 */
const ZIP_PATTERN = /^\d{5}(?:-\d{4})?$/;

/** ZIP that lost its leading zeros in a spreadsheet export ("2134") */
const SHORT_ZIP_PATTERN = /^\d{3,4}(?:-\d{4})?$/;

/** "123", "123A", "123-A", "12-34" */
const HOUSE_NUMBER_PATTERN = /^\d+[A-Z]?(?:-\d+[A-Z]?|-[A-Z])?$/i;

/** "1/2" following a house number */
const FRACTION_PATTERN = /^\d\/\d$/;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Strip characters that never carry address structure and split into
 * comma segments of whitespace tokens.
 */
function tokenize(raw: string): string[][] {
  const cleaned = raw
    .replace(/['’.]/g, '')
    .replace(/[^A-Za-z0-9\s,#\-\/]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return cleaned
    .split(',')
    .map((segment) =>
      segment
        .trim()
        .split(' ')
        .filter((token) => token.length > 0 && (token === '#' || !/^[-\/#]+$/.test(token)))
    )
    .filter((tokens) => tokens.length > 0);
}

function lastOf<T>(items: readonly T[]): T | undefined {
  return items[items.length - 1];
}

/**
 * Drop the final segment if an extraction emptied it.
 */
function dropEmptyTail(segments: string[][]): void {
  const tail = lastOf(segments);
  if (tail && tail.length === 0) {
    segments.pop();
  }
}

function failure(raw: string): ParseFailure {
  return { type: 'parse_failure', reason: 'unrecognized format', raw };
}

// ============================================================================
// Field Rules
// ============================================================================

/**
 * Rule 1: trailing postal code of the last segment.
 */
function takePostalCode(segments: string[][]): string | undefined {
  const tail = lastOf(segments);
  const token = tail ? lastOf(tail) : undefined;
  if (!tail || token === undefined) {
    return undefined;
  }

  const standsAlone = tail.length === 1;
  // A lone token in a single-segment input is a house number, not a ZIP
  if (standsAlone && segments.length === 1) {
    return undefined;
  }

  const isZip = ZIP_PATTERN.test(token);
  const isShortZip =
    SHORT_ZIP_PATTERN.test(token) &&
    (standsAlone || matchTrailingState(tail.slice(0, -1)) > 0);

  if (!isZip && !isShortZip) {
    return undefined;
  }

  tail.pop();
  dropEmptyTail(segments);
  return token;
}

/**
 * Rule 2: trailing state code or name. Only taken from the street line when a
 * postal code followed it, since codes like "CT" double as street types; a
 * state after the street type is split off the city words instead.
 */
function takeState(segments: string[][], hadPostalCode: boolean): string | undefined {
  const tail = lastOf(segments);
  if (!tail) {
    return undefined;
  }
  if (segments.length === 1 && !hadPostalCode) {
    return undefined;
  }

  const words = matchTrailingState(tail);
  if (words === 0) {
    return undefined;
  }
  // Never consume the whole street line
  if (segments.length === 1 && words >= tail.length) {
    return undefined;
  }

  const state = tail.splice(tail.length - words, words).join(' ');
  dropEmptyTail(segments);
  return state;
}

/**
 * Rule 3a: whole segments that start with a unit marker.
 */
function takeUnitSegments(segments: string[][]): string | undefined {
  if (segments.length < 2) {
    return undefined;
  }

  const units: string[] = [];
  for (let i = segments.length - 1; i >= 0; i--) {
    const first = segments[i][0];
    if (first !== undefined && (isUnitDesignator(first) || first.startsWith('#'))) {
      units.unshift(formatUnit(segments[i]));
      segments.splice(i, 1);
    }
  }

  return units.length > 0 ? units.join(' ') : undefined;
}

/**
 * Render unit tokens, splitting an attached "#4B" into "# 4B".
 */
function formatUnit(tokens: readonly string[]): string {
  return tokens
    .flatMap((token) => (token.length > 1 && token.startsWith('#') ? ['#', token.slice(1)] : [token]))
    .join(' ');
}

/**
 * Rule 3b: the first segment after the street line is the city. Any further
 * segments (county, country) are ignored.
 */
function takeCity(segments: string[][]): string | undefined {
  if (segments.length < 2) {
    return undefined;
  }
  const city = segments[1].join(' ');
  segments.splice(1);
  return city;
}

/**
 * Rule 4: a unit marker inside the street line, with its designator. A bare
 * marker ending the line has nothing to designate and is dropped.
 */
function takeInlineUnit(tokens: string[]): string | undefined {
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.length > 1 && token.startsWith('#')) {
      tokens.splice(i, 1);
      return formatUnit([token]);
    }
    if (!isUnitDesignator(token)) {
      continue;
    }
    const next = tokens[i + 1];
    if (next === undefined) {
      tokens.pop();
      return undefined;
    }
    tokens.splice(i, 2);
    return `${token} ${next}`;
  }
  return undefined;
}

/**
 * Split words following the street type into city and trailing state,
 * keeping at least one word for the city.
 */
function splitCityState(words: readonly string[]): { city: string; state?: string } {
  const stateWords = matchTrailingState(words);
  if (stateWords === 0 || stateWords >= words.length) {
    return { city: words.join(' ') };
  }
  return {
    city: words.slice(0, words.length - stateWords).join(' '),
    state: words.slice(words.length - stateWords).join(' '),
  };
}

/**
 * Rule 5: leading house number, with an optional trailing fraction.
 */
function takeHouseNumber(tokens: string[]): string | undefined {
  const first = tokens[0];
  if (first === undefined || !HOUSE_NUMBER_PATTERN.test(first)) {
    return undefined;
  }

  const second = tokens[1];
  if (second !== undefined && FRACTION_PATTERN.test(second)) {
    tokens.splice(0, 2);
    return `${first} ${second}`;
  }

  tokens.shift();
  return first;
}

/**
 * Index of the street-type token that ends the street name, or -1.
 * A type needs at least one name word before it; a leading type followed by
 * a name ("Avenue B") is accepted when no later type exists.
 */
export function findStreetTypeIndex(tokens: readonly string[]): number {
  for (let i = tokens.length - 1; i >= 1; i--) {
    if (isStreetType(tokens[i])) {
      return i;
    }
  }
  if (tokens.length > 1 && isStreetType(tokens[0])) {
    return 0;
  }
  return -1;
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Parse a raw address string into components.
 *
 * @param raw - Free-text address, any formatting
 * @returns Parsed components, or a ParseFailure with reason "unrecognized format"
 *
 * @example
 * ```typescript
 * parseAddress('123 Main St Apt 4B, Springfield, IL 62704');
 * // { houseNumber: '123', street: 'Main St', unit: 'Apt 4B',
 * //   city: 'Springfield', state: 'IL', postalCode: '62704' }
 *
 * parseAddress('not an address');
 * // { type: 'parse_failure', reason: 'unrecognized format', raw: 'not an address' }
 * ```
 */
export function parseAddress(raw: string): ParsedAddress | ParseFailure {
  const segments = tokenize(raw);
  if (segments.length === 0) {
    return failure(raw);
  }

  const postalCode = takePostalCode(segments);
  let state = takeState(segments, postalCode !== undefined);
  const segmentUnit = takeUnitSegments(segments);
  let city = takeCity(segments);

  const tokens = segments[0] ?? [];
  const unit = segmentUnit ?? takeInlineUnit(tokens);
  const houseNumber = takeHouseNumber(tokens);

  const typeIndex = findStreetTypeIndex(tokens);
  if (houseNumber === undefined && typeIndex === -1) {
    return failure(raw);
  }

  let street: string | undefined;
  if (typeIndex === -1 || typeIndex === 0) {
    street = tokens.length > 0 ? tokens.join(' ') : undefined;
  } else {
    let end = typeIndex + 1;
    const after = tokens[end];
    if (after !== undefined && isDirectional(after)) {
      end++;
    }
    const nameTokens = tokens.slice(0, end);
    const leftover = tokens.slice(end);
    if (leftover.length > 0 && city === undefined) {
      if (state === undefined) {
        ({ city, state } = splitCityState(leftover));
      } else {
        city = leftover.join(' ');
      }
      street = nameTokens.join(' ');
    } else {
      street = [...nameTokens, ...leftover].join(' ');
    }
  }

  const parsed: ParsedAddress = {};
  if (houseNumber !== undefined) parsed.houseNumber = houseNumber;
  if (street !== undefined) parsed.street = street;
  if (unit !== undefined) parsed.unit = unit;
  if (city !== undefined) parsed.city = city;
  if (state !== undefined) parsed.state = state;
  if (postalCode !== undefined) parsed.postalCode = postalCode;

  return parsed;
}

