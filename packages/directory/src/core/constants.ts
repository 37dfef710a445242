/**
 * Restroom Directory Constants
 *
 * Limits and fixed values shared across ingestion, cleaning and serving.
 */

import type { GeoPoint } from './types.js';

/** Fractional digits kept for stored coordinates */
export const COORDINATE_PRECISION = 6;

/** Fractional digits of the deduplication spatial key (~1 m) */
export const SPATIAL_KEY_PRECISION = 5;

/** Zip placeholder for records whose source has none */
export const UNKNOWN_ZIP = '00000';

/** Address placeholder for shapefile features without address or name */
export const ADDRESS_UNAVAILABLE = 'Address unavailable';

/** Maximum rows returned by a viewport query */
export const BOUNDING_BOX_LIMIT = 25_000;

/** Maximum rows returned by a nearest-to-center query */
export const NEAREST_LIMIT = 2_000;

/** Maximum place matches returned by a place search */
export const PLACE_SEARCH_LIMIT = 12;

/** Place index time-to-live in seconds */
export const PLACE_INDEX_TTL_SECONDS = 300;

/** Center used when a nearest query has no usable point (Boston, MA) */
export const DEFAULT_CENTER: GeoPoint = { lat: 42.3601, lon: -71.0589 };

/** Search radius for opening-hours lookups, in meters */
export const HOURS_SEARCH_RADIUS_METERS = 80;

/** Minimum spacing between opening-hours lookups, in milliseconds */
export const HOURS_LOOKUP_INTERVAL_MS = 1050;

/** Number of row errors shown by default after an import */
export const IMPORT_ERROR_PREVIEW = 10;
