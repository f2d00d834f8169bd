/**
 * Tests for the Nominatim client
 *
 * @module geocoding/nominatim.test
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { NominatimGeocoder, calculateBackoff, toGeocodeComponents } from './nominatim.js';
import { ConfigurationError } from '../config/errors.js';
import type { GeocodeResult } from './types.js';

// ============================================================================
// Fixtures
// ============================================================================

const mockFetch = jest.fn<typeof fetch>();

const mainStreetHit = {
  place_id: 1,
  display_name: '123, Main Street, Springfield, Sangamon County, Illinois, 62704, United States',
  address: {
    house_number: '123',
    road: 'Main Street',
    city: 'Springfield',
    county: 'Sangamon County',
    state: 'Illinois',
    'ISO3166-2-lvl4': 'US-IL',
    postcode: '62704',
    country_code: 'us',
  },
};

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(overrides: Partial<ConstructorParameters<typeof NominatimGeocoder>[0]> = {}) {
  return new NominatimGeocoder({
    userAgent: 'addrclean-tests/1.0',
    baseUrl: 'https://geo.example.test/',
    retryBaseDelayMs: 1,
    fetchImpl: mockFetch,
    ...overrides,
  });
}

function expectFailure(result: GeocodeResult) {
  if (result.ok) {
    throw new Error('expected a failed lookup');
  }
  return result.error;
}

// ============================================================================
// Tests
// ============================================================================

describe('toGeocodeComponents', () => {
  it('maps a hit with an ISO subdivision', () => {
    expect(toGeocodeComponents(mainStreetHit)).toEqual({
      houseNumber: '123',
      street: 'Main Street',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62704',
      displayName: mainStreetHit.display_name,
    });
  });

  it('falls back to town and the state name', () => {
    expect(
      toGeocodeComponents({
        display_name: 'Elm Road, Smallville, Kansas',
        address: { road: 'Elm Road', town: 'Smallville', state: 'Kansas' },
      })
    ).toEqual({
      street: 'Elm Road',
      city: 'Smallville',
      state: 'Kansas',
      displayName: 'Elm Road, Smallville, Kansas',
    });
  });
});

describe('calculateBackoff', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('doubles per attempt up to the cap', () => {
    jest.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoff(0, 1000)).toBe(1000);
    expect(calculateBackoff(2, 1000)).toBe(4000);
    expect(calculateBackoff(5, 1000)).toBe(8000);
  });

  it('adds up to a quarter of jitter', () => {
    jest.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoff(0, 1000)).toBe(1250);
  });
});

describe('NominatimGeocoder', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('requires a user agent', () => {
    expect(() => createClient({ userAgent: '  ' })).toThrow(ConfigurationError);
  });

  it('sends the search request with the user agent', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([mainStreetHit]));

    const result = await createClient().resolve('123 MAIN STREET, SPRINGFIELD, IL');

    expect(result.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(
      'https://geo.example.test/search?q=123+MAIN+STREET%2C+SPRINGFIELD%2C+IL' +
        '&format=jsonv2&addressdetails=1&limit=1&countrycodes=us'
    );
    expect(init?.headers).toEqual({ 'User-Agent': 'addrclean-tests/1.0', Accept: 'application/json' });
  });

  it('returns the mapped components', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([mainStreetHit]));

    const result = await createClient().resolve('123 main st springfield');

    expect(result).toEqual({ ok: true, components: toGeocodeComponents(mainStreetHit) });
  });

  it('reports an empty result as not_found without retrying', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([]));

    const error = expectFailure(await createClient().resolve('nowhere'));

    expect(error.kind).toBe('not_found');
    expect(error.message).toBe('No match for "nowhere"');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('reports an unexpected payload as malformed', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([{ lat: '1.0' }]));

    const error = expectFailure(await createClient().resolve('x'));

    expect(error.kind).toBe('malformed');
    expect(error.isRetryable).toBe(false);
  });

  it('reports a non-JSON body as malformed', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>busy</html>', { status: 200 }));

    const error = expectFailure(await createClient().resolve('x'));

    expect(error.kind).toBe('malformed');
    expect(error.message).toBe('Response is not valid JSON');
  });

  it('retries a server error and then succeeds', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('down', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse([mainStreetHit]));

    const client = createClient();
    const result = await client.resolve('123 main st');

    expect(result.ok).toBe(true);
    expect(client.getRequestCount()).toBe(2);
  });

  it('gives up on rate limiting after the configured retries', async () => {
    mockFetch.mockImplementation(async () => new Response('slow down', { status: 429 }));

    const error = expectFailure(await createClient({ maxRetries: 1 }).resolve('x'));

    expect(error.kind).toBe('http');
    expect(error.statusCode).toBe(429);
    expect(error.message).toBe('Rate limited: slow down');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('bad', { status: 400 }));

    const error = expectFailure(await createClient().resolve('x'));

    expect(error.kind).toBe('http');
    expect(error.message).toBe('API error (400): bad');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('retries network errors', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    const error = expectFailure(await createClient({ maxRetries: 2 }).resolve('x'));

    expect(error.kind).toBe('network');
    expect(error.message).toBe('Network error: fetch failed');
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('times out a request that does not answer', async () => {
    mockFetch.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const error = expectFailure(await createClient({ timeoutMs: 10, maxRetries: 0 }).resolve('x'));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('Request timed out after 10ms');
  });

  it('does not send a request once the caller aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = expectFailure(await createClient().resolve('x', { signal: controller.signal }));

    expect(error.kind).toBe('aborted');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
