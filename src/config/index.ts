/**
 * Configuration Module
 *
 * Loads and validates environment variables for the address cleaner.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { resolveDir } from '../storage/paths.js';
import { ConfigurationError } from './errors.js';

export { ConfigurationError, isConfigurationError } from './errors.js';

/** Blank variables count as unset */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Geocoder
  GEOCODER_USER_AGENT: z.preprocess(blankToUndefined, z.string().optional()),
  GEOCODER_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://nominatim.openstreetmap.org')
  ),
  GEOCODER_CONCURRENCY: positiveInt(1),
  GEOCODER_TIMEOUT_MS: positiveInt(10_000),
  GEOCODER_MIN_INTERVAL_MS: nonNegativeInt(1_100),
  GEOCODER_MAX_RETRIES: nonNegativeInt(2),
  GEOCODER_COUNTRY_CODES: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[a-z]{2}(,[a-z]{2})*$/i, 'Expected comma-separated ISO country codes')
      .default('us')
  ),

  // Engine
  LOOKUP_CACHE_MAX_ENTRIES: positiveInt(5_000),
  ROW_CONCURRENCY: positiveInt(8),

  // Data directory
  ADDRCLEAN_DATA_DIR: z.preprocess(blankToUndefined, z.string().optional()),

  // Runtime options
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(['development', 'test', 'production']).default('development')
  ),
});

export interface GeocoderConfig {
  /** Identifying client string sent as User-Agent */
  userAgent?: string;
  baseUrl: string;
  concurrency: number;
  timeoutMs: number;
  minIntervalMs: number;
  maxRetries: number;
  countryCodes: string;
}

/**
 * Application configuration
 */
export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isTest: boolean;
  geocoder: Readonly<GeocoderConfig>;
  lookupCacheMaxEntries: number;
  rowConcurrency: number;
  dataDir: string;
}

/**
 * Validate the environment and build the configuration.
 *
 * @param env - Environment to read (default: process.env, after .env is loaded)
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ GEOCODER_USER_AGENT: 'acme-cleaner/1.0', ROW_CONCURRENCY: '4' });
 * config.rowConcurrency; // 4
 * config.geocoder.minIntervalMs; // 1100
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const problems = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    const settings = parseResult.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid environment variables:\n  ${problems.join('\n  ')}`,
      Array.from(new Set(settings))
    );
  }

  const parsed = parseResult.data;

  const geocoder: Readonly<GeocoderConfig> = Object.freeze({
    userAgent: parsed.GEOCODER_USER_AGENT?.trim(),
    baseUrl: parsed.GEOCODER_BASE_URL,
    concurrency: parsed.GEOCODER_CONCURRENCY,
    timeoutMs: parsed.GEOCODER_TIMEOUT_MS,
    minIntervalMs: parsed.GEOCODER_MIN_INTERVAL_MS,
    maxRetries: parsed.GEOCODER_MAX_RETRIES,
    countryCodes: parsed.GEOCODER_COUNTRY_CODES.toLowerCase(),
  });

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isTest: parsed.NODE_ENV === 'test',
    geocoder,
    lookupCacheMaxEntries: parsed.LOOKUP_CACHE_MAX_ENTRIES,
    rowConcurrency: parsed.ROW_CONCURRENCY,
    dataDir: parsed.ADDRCLEAN_DATA_DIR
      ? resolveDir(parsed.ADDRCLEAN_DATA_DIR)
      : join(homedir(), '.addrclean'),
  });
}

/**
 * Get the geocoder identifier or throw if not configured
 */
export function requireGeocoderUserAgent(config: Pick<AppConfig, 'geocoder'>): string {
  const userAgent = config.geocoder.userAgent;
  if (!userAgent) {
    throw new ConfigurationError(
      'Missing required setting: GEOCODER_USER_AGENT. ' +
        'Set it in your .env file, or run with --offline.',
      ['GEOCODER_USER_AGENT']
    );
  }
  return userAgent;
}
