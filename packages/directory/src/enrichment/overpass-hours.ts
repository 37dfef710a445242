/**
 * Opening-Hours Lookup via OSM Overpass
 *
 * Finds `opening_hours` tags on nodes and ways near a point. Every failure
 * (network, timeout, bad status, unexpected payload) comes back as a result
 * value; callers decide whether to log it.
 */

import { z } from 'zod';
import { HOURS_SEARCH_RADIUS_METERS } from '../core/constants.js';
import { errorMessage } from '../core/errors.js';
import type { GeoPoint } from '../core/types.js';
import { isNumericCode } from '../text/hours.js';

export type HoursLookupFailure = 'network' | 'timeout' | 'http-status' | 'invalid-response';

export type HoursLookup =
  | { readonly status: 'found'; readonly hours: string }
  | { readonly status: 'not-found' }
  | { readonly status: 'failed'; readonly reason: HoursLookupFailure; readonly detail: string };

export interface HoursSource {
  lookup(point: GeoPoint, radiusMeters?: number): Promise<HoursLookup>;
}

export interface OverpassOptions {
  readonly endpoint?: string;
  readonly userAgent?: string;
  readonly timeoutMs?: number;
  readonly fetchFn?: typeof fetch;
}

export const DEFAULT_OVERPASS_ENDPOINT = 'https://overpass-api.de/api/interpreter';

const OverpassResponseSchema = z.object({
  elements: z
    .array(
      z.object({
        tags: z.record(z.string()).optional(),
      })
    )
    .default([]),
});

/**
 * Overpass QL for tagged nodes and ways within `radius` meters
 */
export function buildHoursQuery(point: GeoPoint, radius: number = HOURS_SEARCH_RADIUS_METERS): string {
  const around = `around:${radius},${point.lat},${point.lon}`;
  return (
    '[out:json][timeout:5];' +
    `(node(${around})[opening_hours];way(${around})[opening_hours];);` +
    'out body tags;'
  );
}

/**
 * Accept tag text longer than 3 characters that is not a numeric code
 */
export function pickHours(tags: Readonly<Record<string, string>> | undefined): string | null {
  const candidate = (tags?.['opening_hours'] || tags?.['opening_hours:source'])?.trim();
  if (!candidate || candidate.length <= 3 || isNumericCode(candidate)) return null;
  return candidate;
}

export class OverpassHoursSource implements HoursSource {
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: OverpassOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_OVERPASS_ENDPOINT;
    this.userAgent = options.userAgent ?? 'restroom-finder/0.1';
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async lookup(point: GeoPoint, radiusMeters?: number): Promise<HoursLookup> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        body: `data=${encodeURIComponent(buildHoursQuery(point, radiusMeters))}`,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.userAgent,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return { status: 'failed', reason: 'http-status', detail: `HTTP ${response.status}` };
      }

      const parsed = OverpassResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { status: 'failed', reason: 'invalid-response', detail: parsed.error.message };
      }

      for (const element of parsed.data.elements) {
        const hours = pickHours(element.tags);
        if (hours) return { status: 'found', hours };
      }
      return { status: 'not-found' };
    } catch (error) {
      if (controller.signal.aborted) {
        return { status: 'failed', reason: 'timeout', detail: `No response within ${this.timeoutMs}ms` };
      }
      if (error instanceof SyntaxError) {
        return { status: 'failed', reason: 'invalid-response', detail: error.message };
      }
      return { status: 'failed', reason: 'network', detail: errorMessage(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
