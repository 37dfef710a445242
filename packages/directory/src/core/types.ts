/**
 * Core Restroom Directory Types
 *
 * The canonical record shape shared by ingestion, cleaning, persistence and
 * serving. Coordinates are decimal degrees; the store keeps 6 fractional digits.
 */

/**
 * Persisted restroom record
 */
export interface RestroomRecord {
  readonly id: number;
  readonly name: string;
  readonly address: string;
  /** Five digits when valid; "00000" marks an unknown zip */
  readonly zip: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly hours: string;
  readonly remarks: string;
}

/**
 * Record fields supplied on creation (id assigned by the store)
 */
export type RestroomInput = Omit<RestroomRecord, 'id'>;

/**
 * Partial update applied by the cleaning pass
 */
export type RestroomPatch = Partial<RestroomInput>;

/**
 * Geographic point (latitude/longitude)
 */
export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

/**
 * Viewport bounds as supplied by a map client (corner order not guaranteed)
 */
export interface ViewportBounds {
  readonly swLat: number;
  readonly swLon: number;
  readonly neLat: number;
  readonly neLon: number;
}

/**
 * Normalized coordinate range
 */
export interface CoordinateRange {
  readonly latMin: number;
  readonly latMax: number;
  readonly lonMin: number;
  readonly lonMax: number;
}

/**
 * Outcome of a tabular or shapefile import
 */
export interface ImportResult {
  readonly created: number;
  /** Row-level messages in source order */
  readonly errors: readonly string[];
}
