/**
 * Nominatim Geocoder Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { NominatimGeocoder, usablePoint } from '../../../geocoding/nominatim.js';

const noSleep = async (): Promise<void> => {};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('NominatimGeocoder', () => {
  it('should request a single JSON result with the user agent', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse([{ lat: '42.3959', lon: '-71.1786', display_name: 'Belmont, MA' }])
    );
    const geocoder = new NominatimGeocoder({
      endpoint: 'https://geocoder.test/search',
      userAgent: 'restroom-finder-test',
      fetchFn,
      sleepFn: noSleep,
    });

    const result = await geocoder.geocode('336 Concord Ave, 02478');
    expect(result).toEqual({
      status: 'found',
      point: { lat: 42.3959, lon: -71.1786 },
      displayName: 'Belmont, MA',
    });

    const call = fetchFn.mock.calls[0];
    if (!call) throw new Error('fetch was not called');
    const [input, init] = call;
    const url = new URL(String(input));
    expect(url.origin + url.pathname).toBe('https://geocoder.test/search');
    expect(url.searchParams.get('q')).toBe('336 Concord Ave, 02478');
    expect(url.searchParams.get('format')).toBe('json');
    expect(url.searchParams.get('limit')).toBe('1');
    expect(new Headers(init?.headers).get('User-Agent')).toBe('restroom-finder-test');
  });

  it('should report an empty result list as not found', async () => {
    const geocoder = new NominatimGeocoder({ fetchFn: async () => jsonResponse([]), sleepFn: noSleep });
    expect(await geocoder.geocode('nowhere')).toEqual({ status: 'not-found', reason: 'no-match' });
  });

  it('should classify failures without throwing', async () => {
    const http = new NominatimGeocoder({ fetchFn: async () => jsonResponse([], 503), sleepFn: noSleep });
    expect(await http.geocode('x')).toEqual({ status: 'failed', reason: 'http-status', detail: 'HTTP 503' });

    const shape = new NominatimGeocoder({
      fetchFn: async () => jsonResponse({ error: 'bad request' }),
      sleepFn: noSleep,
    });
    expect(await shape.geocode('x')).toEqual({
      status: 'failed',
      reason: 'invalid-response',
      detail: 'Expected a JSON array',
    });

    const missing = new NominatimGeocoder({
      fetchFn: async () => jsonResponse([{ display_name: 'Somewhere' }]),
      sleepFn: noSleep,
    });
    expect(await missing.geocode('x')).toEqual({
      status: 'failed',
      reason: 'invalid-response',
      detail: 'Result missing lat/lon',
    });

    const numeric = new NominatimGeocoder({
      fetchFn: async () => jsonResponse([{ lat: 42.3959, lon: -71.1786 }]),
      sleepFn: noSleep,
    });
    expect(await numeric.geocode('x')).toEqual({
      status: 'failed',
      reason: 'invalid-response',
      detail: 'Result missing lat/lon',
    });

    const garbled = new NominatimGeocoder({
      fetchFn: async () => jsonResponse([{ lat: 'north', lon: '-71.1786' }]),
      sleepFn: noSleep,
    });
    expect(await garbled.geocode('x')).toEqual({
      status: 'failed',
      reason: 'invalid-response',
      detail: 'Non-numeric lat/lon',
    });

    const network = new NominatimGeocoder({
      fetchFn: async () => {
        throw new TypeError('fetch failed');
      },
      sleepFn: noSleep,
    });
    expect(await network.geocode('x')).toEqual({
      status: 'failed',
      reason: 'network',
      detail: 'fetch failed',
    });
  });
});

describe('usablePoint', () => {
  it('should accept found points within range', () => {
    expect(usablePoint({ status: 'found', point: { lat: 42.3959, lon: -71.1786 } })).toEqual({
      ok: true,
      point: { lat: 42.3959, lon: -71.1786 },
    });
  });

  it('should reject out-of-range points and carry miss reasons', () => {
    expect(usablePoint({ status: 'found', point: { lat: 95, lon: -71 } })).toEqual({
      ok: false,
      reason: 'out-of-range',
    });
    expect(usablePoint({ status: 'not-found', reason: 'no-match' })).toEqual({ ok: false, reason: 'no-match' });
    expect(usablePoint({ status: 'failed', reason: 'timeout', detail: 'slow' })).toEqual({
      ok: false,
      reason: 'timeout',
    });
  });
});
