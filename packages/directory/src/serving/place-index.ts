/**
 * Place Index
 *
 * Aggregates records into named places ("Belmont, MA") with the mean
 * coordinate of their members, for place search and city-slug lookup.
 *
 * The index is rebuilt wholesale once it is older than its TTL. A rebuild
 * fills new maps and swaps one reference, so readers never see a partial
 * index; callers arriving during a rebuild wait on the same build.
 */

import { PLACE_INDEX_TTL_SECONDS } from '../core/constants.js';
import type { RestroomRecord } from '../core/types.js';
import { toGeoPoint } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { citySlug, parseCityStateFromAddress } from '../text/address.js';
import { getDefaultZipLookup, type ZipStateLookup } from '../text/zip-lookup.js';

const log = createLogger({ module: 'place-index' });

export interface PlaceEntry {
  /** "City, ST", or "City" when no state resolved */
  readonly name: string;
  readonly city: string;
  readonly state: string | null;
  readonly latitude: number;
  readonly longitude: number;
  /** `city-statefullname`; null when the state did not resolve */
  readonly slug: string | null;
  readonly count: number;
}

export interface PlaceIndex {
  readonly byName: ReadonlyMap<string, PlaceEntry>;
  readonly bySlug: ReadonlyMap<string, PlaceEntry>;
  /** Epoch milliseconds */
  readonly builtAt: number;
}

export type PlaceRecordSource = () => Promise<readonly RestroomRecord[]>;

interface Accumulator {
  city: string;
  state: string | null;
  count: number;
  meanLat: number;
  meanLon: number;
}

/**
 * Build an index from records with usable coordinates
 */
export function buildPlaceIndex(
  records: readonly RestroomRecord[],
  builtAt: number,
  zipLookup: ZipStateLookup = getDefaultZipLookup()
): PlaceIndex {
  const groups = new Map<string, Accumulator>();

  for (const record of records) {
    const point = toGeoPoint(record.latitude, record.longitude);
    if (!point) continue;

    const { city, state } = parseCityStateFromAddress(record.address, record.zip || null, zipLookup);
    if (!city) continue;

    const key = `${city.toLowerCase()}|${state ?? ''}`;
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { city, state, count: 1, meanLat: point.lat, meanLon: point.lon });
      continue;
    }

    group.count++;
    group.meanLat += (point.lat - group.meanLat) / group.count;
    group.meanLon += (point.lon - group.meanLon) / group.count;
  }

  const byName = new Map<string, PlaceEntry>();
  const bySlug = new Map<string, PlaceEntry>();

  for (const group of groups.values()) {
    const entry: PlaceEntry = {
      name: group.state ? `${group.city}, ${group.state}` : group.city,
      city: group.city,
      state: group.state,
      latitude: group.meanLat,
      longitude: group.meanLon,
      slug: citySlug(group.city, group.state),
      count: group.count,
    };
    byName.set(entry.name, entry);
    if (entry.slug) bySlug.set(entry.slug, entry);
  }

  return { byName, bySlug, builtAt };
}

export class PlaceIndexCache {
  private current: PlaceIndex | null = null;
  private inflight: Promise<PlaceIndex> | null = null;
  private readonly ttlMs: number;

  constructor(
    ttlSeconds: number = PLACE_INDEX_TTL_SECONDS,
    private readonly zipLookup: ZipStateLookup = getDefaultZipLookup()
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  /**
   * Current index, rebuilt from `source` when absent or older than the TTL
   *
   * @param now - Epoch milliseconds
   */
  async getOrRebuild(now: number, source: PlaceRecordSource): Promise<PlaceIndex> {
    const current = this.current;
    if (current && now - current.builtAt <= this.ttlMs) {
      return current;
    }

    if (!this.inflight) {
      this.inflight = this.rebuild(now, source).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Drop the index so the next read rebuilds it */
  invalidate(): void {
    this.current = null;
  }

  private async rebuild(now: number, source: PlaceRecordSource): Promise<PlaceIndex> {
    const records = await source();
    const index = buildPlaceIndex(records, now, this.zipLookup);
    this.current = index;

    log.debug('Rebuilt place index', { places: index.byName.size, slugs: index.bySlug.size });
    return index;
  }
}
