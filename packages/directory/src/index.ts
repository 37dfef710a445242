/**
 * Restroom Directory
 *
 * @restroom-finder/directory provides:
 * - CSV and zipped-shapefile import with geocoding and reprojection
 * - Name, address and hours normalization with OSM hours enrichment
 * - Spatial deduplication
 * - Viewport, nearest and place queries behind a small HTTP API
 *
 * @packageDocumentation
 */

// Core types
export type {
  RestroomRecord,
  RestroomInput,
  RestroomPatch,
  GeoPoint,
  ViewportBounds,
  CoordinateRange,
  ImportResult,
} from './core/types.js';
export { ImportError, InvalidRecordError, type ImportErrorCode } from './core/errors.js';
export { distanceMiles, normalizeBounds, isValidCoordinate, toGeoPoint } from './core/geo-utils.js';
export { createLogger, logger, type LogLevel } from './core/utils/logger.js';

// Text normalization
export { titleCase, ensureSuffix } from './text/normalize.js';
export { isBogusHours, hasGenuineHours } from './text/hours.js';
export {
  ensureStateInAddress,
  parseCityStateFromAddress,
  citySlug,
  parseCitySlug,
  type CityState,
  type ParsedCitySlug,
} from './text/address.js';
export {
  PrefixZipStateLookup,
  getDefaultZipLookup,
  normalizeZip,
  type ZipStateLookup,
} from './text/zip-lookup.js';

// Ingestion
export { importTabular, type TabularImportOptions } from './ingestion/tabular-import.js';
export { importShapefileArchive, type ShapefileImportOptions } from './ingestion/shapefile-import.js';
export { createReprojector, projectPoint, type Reprojector } from './ingestion/reprojector.js';
export { decodeText, type DecodedText } from './ingestion/encoding.js';
export { summarizeImport, formatImportSummary, type ImportSummary } from './ingestion/report.js';

// External services
export {
  NominatimGeocoder,
  type Geocoder,
  type GeocodeResult,
  type NominatimOptions,
} from './geocoding/nominatim.js';
export {
  OverpassHoursSource,
  buildHoursQuery,
  pickHours,
  type HoursSource,
  type HoursLookup,
} from './enrichment/overpass-hours.js';
export { HoursEnricher, needsHoursLookup, type EnrichmentStats } from './enrichment/hours-enricher.js';

// Cleaning
export { planDeduplication, compareForKeep, spatialKey } from './cleaning/deduplicate.js';
export {
  runMaintenance,
  formatSummary,
  type MaintenanceOptions,
  type MaintenanceSummary,
} from './cleaning/maintenance.js';

// Persistence
export { prepareCoordinates, type RecordStore } from './persistence/record-store.js';
export { SqliteRecordStore } from './persistence/sqlite-record-store.js';

// Serving
export {
  QueryService,
  type RestroomView,
  type NearestRestroom,
  type PlaceMatch,
  type ResolvedPlace,
} from './serving/query-service.js';
export { PlaceIndexCache, buildPlaceIndex, type PlaceEntry, type PlaceIndex } from './serving/place-index.js';
export { RestroomAPI, type APIResponse, type RestroomAPIOptions } from './serving/api.js';
