/**
 * Hours Enricher
 *
 * Fills missing opening hours from an `HoursSource`, one lookup at a time and
 * no faster than one per `intervalMs`. Lookup failures never abort the pass.
 */

import { HOURS_LOOKUP_INTERVAL_MS, HOURS_SEARCH_RADIUS_METERS } from '../core/constants.js';
import type { RestroomRecord } from '../core/types.js';
import { toGeoPoint } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { Throttle, type ClockFn, type SleepFn } from '../core/utils/throttle.js';
import { hasGenuineHours } from '../text/hours.js';
import type { HoursSource } from './overpass-hours.js';

const log = createLogger({ module: 'hours-enricher' });

export interface HoursEnricherOptions {
  readonly intervalMs?: number;
  readonly radiusMeters?: number;
  readonly sleepFn?: SleepFn;
  readonly clock?: ClockFn;
}

export interface EnrichmentStats {
  readonly attempted: number;
  readonly found: number;
  readonly failed: number;
}

type EnrichableRecord = Pick<RestroomRecord, 'id' | 'latitude' | 'longitude' | 'hours'>;

/**
 * True when a record lacks hours and has a usable, non-placeholder location
 *
 * (0, 0) is the geocoding-miss placeholder and is not looked up.
 */
export function needsHoursLookup(record: EnrichableRecord): boolean {
  if (hasGenuineHours(record.hours)) return false;
  const point = toGeoPoint(record.latitude, record.longitude);
  return point !== null && !(point.lat === 0 && point.lon === 0);
}

export class HoursEnricher {
  private readonly throttle: Throttle;
  private readonly radiusMeters: number;

  constructor(
    private readonly source: HoursSource,
    options: HoursEnricherOptions = {}
  ) {
    this.throttle = new Throttle(
      options.intervalMs ?? HOURS_LOOKUP_INTERVAL_MS,
      options.sleepFn,
      options.clock
    );
    this.radiusMeters = options.radiusMeters ?? HOURS_SEARCH_RADIUS_METERS;
  }

  /**
   * Look up hours for every record that needs them, in input order
   *
   * Returns found hours keyed by record id.
   */
  async enrich(
    records: readonly EnrichableRecord[]
  ): Promise<{ readonly hours: ReadonlyMap<number, string>; readonly stats: EnrichmentStats }> {
    const hours = new Map<number, string>();
    let attempted = 0;
    let failed = 0;

    for (const record of records) {
      if (!needsHoursLookup(record)) continue;
      attempted++;

      const point = toGeoPoint(record.latitude, record.longitude);
      if (!point) continue;

      await this.throttle.wait();
      const result = await this.source.lookup(point, this.radiusMeters);

      if (result.status === 'found') {
        hours.set(record.id, result.hours);
      } else if (result.status === 'failed') {
        failed++;
        log.debug('Hours lookup failed', {
          id: record.id,
          reason: result.reason,
          detail: result.detail,
        });
      }
    }

    log.info('Hours enrichment complete', { attempted, found: hours.size, failed });

    return { hours, stats: { attempted, found: hours.size, failed } };
  }
}
