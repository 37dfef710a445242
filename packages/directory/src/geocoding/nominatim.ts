/**
 * Geocoding Resolver
 *
 * Resolves free text ("1 Elm St, 02138", "belmont, massachusetts") to a
 * point. Misses and failures are returned as values with a reason code; the
 * ingestion fallback turns a miss into zero coordinates and the place lookup
 * turns it into "no result". There is no retry.
 */

import { z } from 'zod';
import type { GeoPoint } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { Throttle, type SleepFn } from '../core/utils/throttle.js';

const log = createLogger({ module: 'geocoding' });

export type GeocodeFailureReason = 'network' | 'timeout' | 'http-status' | 'invalid-response';

export type GeocodeResult =
  | { readonly status: 'found'; readonly point: GeoPoint; readonly displayName?: string }
  | { readonly status: 'not-found'; readonly reason: 'no-match' }
  | { readonly status: 'failed'; readonly reason: GeocodeFailureReason; readonly detail: string };

export type UnusableReason = 'no-match' | 'out-of-range' | GeocodeFailureReason;

export type UsablePoint =
  | { readonly ok: true; readonly point: GeoPoint }
  | { readonly ok: false; readonly reason: UnusableReason };

/**
 * The found point if it lies within geographic ranges
 */
export function usablePoint(result: GeocodeResult): UsablePoint {
  if (result.status !== 'found') return { ok: false, reason: result.reason };
  const { lat, lon } = result.point;
  return isValidCoordinate(lat, lon) ? { ok: true, point: result.point } : { ok: false, reason: 'out-of-range' };
}

/**
 * Anything that can turn a place description into coordinates
 */
export interface Geocoder {
  geocode(query: string): Promise<GeocodeResult>;
}

export interface NominatimOptions {
  readonly endpoint?: string;
  /** Nominatim's usage policy requires an identifying User-Agent */
  readonly userAgent?: string;
  readonly timeoutMs?: number;
  /** Minimum spacing between requests */
  readonly minIntervalMs?: number;
  readonly fetchFn?: typeof fetch;
  readonly sleepFn?: SleepFn;
}

const NominatimResponseSchema = z.array(z.unknown());

/** Nominatim returns coordinates as decimal strings */
const NominatimHitSchema = z.object({
  lat: z.string(),
  lon: z.string(),
  display_name: z.string().optional(),
});

export const DEFAULT_NOMINATIM_ENDPOINT = 'https://nominatim.openstreetmap.org/search';
export const DEFAULT_USER_AGENT = 'restroom-finder/0.1 (public restroom directory)';

/**
 * OpenStreetMap Nominatim geocoder
 */
export class NominatimGeocoder implements Geocoder {
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly throttle: Throttle;

  constructor(options: NominatimOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_NOMINATIM_ENDPOINT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.throttle = new Throttle(options.minIntervalMs ?? 1000, options.sleepFn);
  }

  async geocode(query: string): Promise<GeocodeResult> {
    const url = new URL(this.endpoint);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');

    await this.throttle.wait();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      });

      if (!response.ok) {
        log.debug('Geocoder returned error status', { query, status: response.status });
        return { status: 'failed', reason: 'http-status', detail: `HTTP ${response.status}` };
      }

      const body = NominatimResponseSchema.safeParse(await response.json());
      if (!body.success) {
        return { status: 'failed', reason: 'invalid-response', detail: 'Expected a JSON array' };
      }

      if (body.data.length === 0) {
        return { status: 'not-found', reason: 'no-match' };
      }
      const parsed = NominatimHitSchema.safeParse(body.data[0]);
      if (!parsed.success) {
        return { status: 'failed', reason: 'invalid-response', detail: 'Result missing lat/lon' };
      }
      const hit = parsed.data;

      const lat = parseFloat(hit.lat);
      const lon = parseFloat(hit.lon);
      if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
        return { status: 'failed', reason: 'invalid-response', detail: 'Non-numeric lat/lon' };
      }

      return { status: 'found', point: { lat, lon }, displayName: hit.display_name };
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'AbortError';
      log.debug('Geocoding request failed', { query, error: errorMessage(error) });
      return {
        status: 'failed',
        reason: timedOut ? 'timeout' : 'network',
        detail: timedOut ? `Timed out after ${this.timeoutMs}ms` : errorMessage(error),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
