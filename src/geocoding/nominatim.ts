/**
 * Nominatim Geocoder
 *
 * Client for the OpenStreetMap Nominatim search endpoint. Sends a
 * free-form query, validates the reply and maps the first hit to
 * {@link GeocodeComponents}.
 *
 * Every request carries the configured User-Agent, as the Nominatim usage
 * policy requires. Rate limiting is not done here; wrap the client in a
 * {@link GatedGeocoder}.
 *
 * @module geocoding/nominatim
 */

import { ConfigurationError } from '../config/errors.js';
import type { Logger } from '../pipeline/types.js';
import {
  NominatimSearchResponseSchema,
  type GeocodeComponents,
  type NominatimPlace,
} from '../schemas/geocode.js';
import {
  LookupError,
  lookupFailure,
  toLookupError,
  type GeocodeResult,
  type Geocoder,
  type ResolveOptions,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface NominatimGeocoderOptions {
  /** Identifying client string, e.g. "acme-address-cleaner/1.0 (ops@example.com)" */
  userAgent: string;
  /** Service root (default: https://nominatim.openstreetmap.org) */
  baseUrl?: string;
  /** Comma-separated ISO country codes (default: 'us') */
  countryCodes?: string;
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Retries for retryable failures (default: 2) */
  maxRetries?: number;
  /** Base backoff delay in milliseconds (default: 1000) */
  retryBaseDelayMs?: number;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  baseUrl: 'https://nominatim.openstreetmap.org',
  countryCodes: 'us',
  timeoutMs: 10_000,
  maxRetries: 2,
  retryBaseDelayMs: 1_000,
} as const;

const MAX_DELAY_MS = 8_000;

/** Locality keys in order of preference */
const CITY_KEYS = ['city', 'town', 'village', 'hamlet', 'suburb', 'neighbourhood'] as const;

const ISO_SUBDIVISION = /^US-([A-Z]{2})$/;

// ============================================================================
// Helpers
// ============================================================================

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with up to 25% jitter.
 */
export function calculateBackoff(attempt: number, baseDelayMs: number): number {
  const exponential = Math.min(MAX_DELAY_MS, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * exponential * 0.25;
  return Math.round(exponential + jitter);
}

/**
 * Map a Nominatim hit to address components.
 *
 * @example
 * ```typescript
 * toGeocodeComponents({
 *   display_name: '123, Main Street, Springfield, Illinois, 62704, United States',
 *   address: { house_number: '123', road: 'Main Street', city: 'Springfield',
 *              state: 'Illinois', 'ISO3166-2-lvl4': 'US-IL', postcode: '62704' },
 * });
 * // { houseNumber: '123', street: 'Main Street', city: 'Springfield',
 * //   state: 'IL', postalCode: '62704', displayName: '123, Main Street, ...' }
 * ```
 */
export function toGeocodeComponents(place: NominatimPlace): GeocodeComponents {
  const address = place.address;
  const components: GeocodeComponents = { displayName: place.display_name };

  if (address.house_number) components.houseNumber = address.house_number;
  if (address.road) components.street = address.road;

  for (const key of CITY_KEYS) {
    const value = address[key];
    if (value) {
      components.city = value;
      break;
    }
  }

  const subdivision = ISO_SUBDIVISION.exec(address['ISO3166-2-lvl4'] ?? '');
  const state = subdivision ? subdivision[1] : address.state;
  if (state) components.state = state;

  if (address.postcode) components.postalCode = address.postcode;

  return components;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Nominatim implementation of the {@link Geocoder} capability.
 *
 * @example
 * ```typescript
 * const geocoder = new NominatimGeocoder({ userAgent: 'my-app/1.0 (me@example.com)' });
 * const result = await geocoder.resolve('123 Main St, Springfield, IL');
 * if (result.ok) console.log(result.components.postalCode);
 * ```
 */
export class NominatimGeocoder implements Geocoder {
  private readonly userAgent: string;
  private readonly baseUrl: string;
  private readonly countryCodes: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;
  private requestCount = 0;

  /**
   * @throws ConfigurationError if the user agent is blank
   */
  constructor(options: NominatimGeocoderOptions) {
    if (options.userAgent.trim().length === 0) {
      throw new ConfigurationError(
        'GEOCODER_USER_AGENT is required when address lookups are enabled'
      );
    }
    this.userAgent = options.userAgent.trim();
    this.baseUrl = (options.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.countryCodes = options.countryCodes ?? DEFAULTS.countryCodes;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  async resolve(query: string, options: ResolveOptions = {}): Promise<GeocodeResult> {
    for (let attempt = 0; ; attempt++) {
      try {
        const components = await this.search(query, options.signal);
        return { ok: true, components };
      } catch (error) {
        const lookupError = toLookupError(error);
        const canRetry =
          lookupError.isRetryable && attempt < this.maxRetries && !options.signal?.aborted;
        if (!canRetry) {
          return lookupFailure(lookupError);
        }

        const delay = calculateBackoff(attempt, this.retryBaseDelayMs);
        this.logger?.debug(
          `[geocoder] ${lookupError.kind} error, retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxRetries})`
        );
        await sleep(delay);
      }
    }
  }

  /**
   * Number of HTTP requests sent, retries included.
   */
  getRequestCount(): number {
    return this.requestCount;
  }

  private buildUrl(query: string): string {
    const params = new URLSearchParams({
      q: query,
      format: 'jsonv2',
      addressdetails: '1',
      limit: '1',
    });
    if (this.countryCodes.length > 0) {
      params.set('countrycodes', this.countryCodes);
    }
    return `${this.baseUrl}/search?${params.toString()}`;
  }

  /**
   * One request, no retries.
   *
   * @throws LookupError on any failure
   */
  private async search(query: string, signal?: AbortSignal): Promise<GeocodeComponents> {
    const response = await this.fetchWithTimeout(this.buildUrl(query), signal);

    if (!response.ok) {
      await this.handleHttpError(response);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new LookupError('Response is not valid JSON', 'malformed', response.status, false, {
        cause: error,
      });
    }

    const parsed = NominatimSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new LookupError(
        `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'malformed',
        response.status
      );
    }

    const place = parsed.data[0];
    if (!place) {
      throw new LookupError(`No match for "${query}"`, 'not_found');
    }

    return toGeocodeComponents(place);
  }

  /**
   * Execute fetch with timeout using AbortController, honoring the caller's
   * signal as well.
   *
   * @throws LookupError of kind 'timeout', 'aborted' or 'network'
   */
  private async fetchWithTimeout(url: string, signal?: AbortSignal): Promise<Response> {
    if (signal?.aborted) {
      throw new LookupError('Lookup aborted', 'aborted');
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      this.requestCount++;
      return await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new LookupError(`Request timed out after ${this.timeoutMs}ms`, 'timeout', undefined, true, {
          cause: error,
        });
      }
      if (signal?.aborted) {
        throw new LookupError('Lookup aborted', 'aborted', undefined, false, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LookupError(`Network error: ${message}`, 'network', undefined, true, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * @throws LookupError of kind 'http'; 429 and 5xx are retryable
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');
    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Rate limited: ${text}`;
    } else if (response.status === 403) {
      message = 'Request refused: check GEOCODER_USER_AGENT and the usage policy';
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new LookupError(message, 'http', response.status, isRetryable);
  }
}
