/**
 * Overpass Hours Lookup Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  OverpassHoursSource,
  buildHoursQuery,
  pickHours,
} from '../../../enrichment/overpass-hours.js';

const POINT = { lat: 42.5, lon: -71.25 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('buildHoursQuery', () => {
  it('should search tagged nodes and ways around the point', () => {
    expect(buildHoursQuery(POINT, 80)).toBe(
      '[out:json][timeout:5];' +
        '(node(around:80,42.5,-71.25)[opening_hours];way(around:80,42.5,-71.25)[opening_hours];);' +
        'out body tags;'
    );
  });
});

describe('pickHours', () => {
  it('should accept trimmed opening_hours text', () => {
    expect(pickHours({ opening_hours: ' Mo-Fr 09:00-17:00 ' })).toBe('Mo-Fr 09:00-17:00');
    expect(pickHours({ 'opening_hours:source': 'Mo-Su 06:00-22:00' })).toBe('Mo-Su 06:00-22:00');
  });

  it('should reject short values and numeric codes', () => {
    expect(pickHours({ opening_hours: '24' })).toBeNull();
    expect(pickHours({ opening_hours: '1234' })).toBeNull();
    expect(pickHours({ name: 'Town Hall' })).toBeNull();
    expect(pickHours(undefined)).toBeNull();
  });
});

describe('OverpassHoursSource', () => {
  it('should post the query and return the first usable hours', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        elements: [
          { tags: { name: 'Library' } },
          { tags: { opening_hours: 'Mo-Sa 10:00-18:00' } },
        ],
      })
    );
    const source = new OverpassHoursSource({
      endpoint: 'https://overpass.test/api/interpreter',
      userAgent: 'restroom-finder-test',
      fetchFn,
    });

    expect(await source.lookup(POINT, 80)).toEqual({ status: 'found', hours: 'Mo-Sa 10:00-18:00' });

    const call = fetchFn.mock.calls[0];
    if (!call) throw new Error('fetch was not called');
    const [input, init] = call;
    expect(input).toBe('https://overpass.test/api/interpreter');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(`data=${encodeURIComponent(buildHoursQuery(POINT, 80))}`);
  });

  it('should report not-found when no element carries hours', async () => {
    const source = new OverpassHoursSource({ fetchFn: async () => jsonResponse({ elements: [] }) });
    expect(await source.lookup(POINT)).toEqual({ status: 'not-found' });
  });

  it('should turn HTTP errors into failed results', async () => {
    const source = new OverpassHoursSource({ fetchFn: async () => jsonResponse({}, 429) });
    expect(await source.lookup(POINT)).toEqual({
      status: 'failed',
      reason: 'http-status',
      detail: 'HTTP 429',
    });
  });

  it('should flag payloads that are not Overpass JSON', async () => {
    const notJson = new OverpassHoursSource({
      fetchFn: async () => new Response('<html>busy</html>', { status: 200 }),
    });
    expect(await notJson.lookup(POINT)).toMatchObject({ status: 'failed', reason: 'invalid-response' });

    const wrongShape = new OverpassHoursSource({
      fetchFn: async () => jsonResponse({ elements: 'none' }),
    });
    expect(await wrongShape.lookup(POINT)).toMatchObject({
      status: 'failed',
      reason: 'invalid-response',
    });
  });

  it('should report network errors', async () => {
    const source = new OverpassHoursSource({
      fetchFn: async () => {
        throw new TypeError('fetch failed');
      },
    });
    expect(await source.lookup(POINT)).toEqual({
      status: 'failed',
      reason: 'network',
      detail: 'fetch failed',
    });
  });
});
