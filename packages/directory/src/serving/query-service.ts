/**
 * Geospatial Query Engine
 *
 * Read-side operations behind the HTTP surface: viewport queries, nearest
 * restrooms to a center point, place search and city-slug resolution.
 * Addresses are completed with their state at read time; stored records are
 * not modified.
 */

import {
  BOUNDING_BOX_LIMIT,
  DEFAULT_CENTER,
  NEAREST_LIMIT,
  PLACE_SEARCH_LIMIT,
} from '../core/constants.js';
import type { GeoPoint, RestroomRecord, ViewportBounds } from '../core/types.js';
import { distanceMiles, isValidCoordinate, normalizeBounds, toGeoPoint } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { usablePoint, type Geocoder } from '../geocoding/nominatim.js';
import type { RecordStore } from '../persistence/record-store.js';
import { ensureStateInAddress, parseCitySlug } from '../text/address.js';
import { titleCase } from '../text/normalize.js';
import { getDefaultZipLookup, type ZipStateLookup } from '../text/zip-lookup.js';
import { PlaceIndexCache, type PlaceIndex } from './place-index.js';

const log = createLogger({ module: 'query-service' });

/**
 * Record as served: coordinates always present
 */
export interface RestroomView {
  readonly id: number;
  readonly name: string;
  readonly address: string;
  readonly zip: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly hours: string;
  readonly remarks: string;
}

export interface NearestRestroom extends RestroomView {
  readonly distanceMiles: number;
}

export interface PlaceMatch {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly slug: string | null;
}

export interface ResolvedPlace extends PlaceMatch {
  readonly source: 'index' | 'geocoder';
}

export interface CenterQuery {
  readonly lat?: number | null;
  readonly lon?: number | null;
}

export interface QueryServiceOptions {
  readonly store: RecordStore;
  /** Used by `resolvePlace` for slugs missing from the index */
  readonly geocoder?: Geocoder;
  readonly placeIndex?: PlaceIndexCache;
  readonly defaultCenter?: GeoPoint;
  readonly zipLookup?: ZipStateLookup;
  /** Epoch milliseconds */
  readonly clock?: () => number;
}

export class QueryService {
  private readonly store: RecordStore;
  private readonly geocoder: Geocoder | undefined;
  private readonly placeIndex: PlaceIndexCache;
  private readonly defaultCenter: GeoPoint;
  private readonly zipLookup: ZipStateLookup;
  private readonly clock: () => number;

  constructor(options: QueryServiceOptions) {
    this.store = options.store;
    this.geocoder = options.geocoder;
    this.zipLookup = options.zipLookup ?? getDefaultZipLookup();
    this.placeIndex = options.placeIndex ?? new PlaceIndexCache(undefined, this.zipLookup);
    this.defaultCenter = options.defaultCenter ?? DEFAULT_CENTER;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Records inside a viewport, in no particular order
   */
  async withinBounds(bounds: ViewportBounds): Promise<RestroomView[]> {
    const range = normalizeBounds(bounds);
    const records = await this.store.withCoordinates(range, BOUNDING_BOX_LIMIT);

    const views: RestroomView[] = [];
    for (const record of records) {
      const view = this.toView(record);
      if (view) views.push(view);
    }
    return views;
  }

  /**
   * One record by id; null when absent or without usable coordinates
   */
  async getRestroom(id: number): Promise<RestroomView | null> {
    const record = await this.store.get(id);
    return record ? this.toView(record) : null;
  }

  /**
   * Records ordered by great-circle distance from the center
   *
   * A missing or unusable center falls back to the default center.
   */
  async nearest(query: CenterQuery = {}): Promise<NearestRestroom[]> {
    const center = this.resolveCenter(query);
    const records = await this.store.withCoordinates();

    const ranked: NearestRestroom[] = [];
    for (const record of records) {
      const view = this.toView(record);
      if (!view) continue;
      ranked.push({
        ...view,
        distanceMiles: distanceMiles(center, { lat: view.latitude, lon: view.longitude }),
      });
    }

    ranked.sort((a, b) => a.distanceMiles - b.distanceMiles);
    return ranked.slice(0, NEAREST_LIMIT);
  }

  /**
   * Places whose display name contains the query (case-insensitive)
   *
   * Prefix matches come first, then the rest; each group sorted by name.
   */
  async searchPlaces(query: string): Promise<PlaceMatch[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    const index = await this.getIndex();
    const matches = [...index.byName.values()].filter((entry) =>
      entry.name.toLowerCase().includes(needle)
    );

    matches.sort((a, b) => {
      const aPrefix = a.name.toLowerCase().startsWith(needle) ? 0 : 1;
      const bPrefix = b.name.toLowerCase().startsWith(needle) ? 0 : 1;
      if (aPrefix !== bPrefix) return aPrefix - bPrefix;
      if (a.name === b.name) return 0;
      return a.name < b.name ? -1 : 1;
    });

    return matches.slice(0, PLACE_SEARCH_LIMIT).map((entry) => ({
      name: entry.name,
      latitude: entry.latitude,
      longitude: entry.longitude,
      slug: entry.slug,
    }));
  }

  /**
   * Center of a city slug such as `belmont-massachusetts`
   *
   * Index hits never touch the geocoder. A miss is geocoded only when the
   * slug ends in a recognized state name.
   */
  async resolvePlace(slug: string): Promise<ResolvedPlace | null> {
    const normalized = slug.trim().toLowerCase();
    if (!normalized) return null;

    const index = await this.getIndex();
    const hit = index.bySlug.get(normalized);
    if (hit) {
      return {
        name: hit.name,
        latitude: hit.latitude,
        longitude: hit.longitude,
        slug: hit.slug,
        source: 'index',
      };
    }

    const parsed = parseCitySlug(normalized);
    if (!parsed || !parsed.city || !parsed.stateRecognized || !this.geocoder) {
      return null;
    }

    const resolved = usablePoint(await this.geocoder.geocode(`${parsed.city}, ${parsed.state}`));
    if (!resolved.ok) {
      log.debug('Place slug did not geocode', { slug: normalized, reason: resolved.reason });
      return null;
    }

    return {
      name: titleCase(`${parsed.city}, ${parsed.state}`),
      latitude: resolved.point.lat,
      longitude: resolved.point.lon,
      slug: normalized,
      source: 'geocoder',
    };
  }

  private getIndex(): Promise<PlaceIndex> {
    return this.placeIndex.getOrRebuild(this.clock(), () => this.store.withCoordinates());
  }

  private resolveCenter(query: CenterQuery): GeoPoint {
    const { lat, lon } = query;
    if (
      lat === null ||
      lat === undefined ||
      lon === null ||
      lon === undefined ||
      !isValidCoordinate(lat, lon)
    ) {
      return this.defaultCenter;
    }
    return { lat, lon };
  }

  private toView(record: RestroomRecord): RestroomView | null {
    const point = toGeoPoint(record.latitude, record.longitude);
    if (!point) return null;

    return {
      id: record.id,
      name: record.name,
      address: ensureStateInAddress(record.address, record.zip, this.zipLookup),
      zip: record.zip,
      latitude: point.lat,
      longitude: point.lon,
      hours: record.hours,
      remarks: record.remarks,
    };
  }
}
