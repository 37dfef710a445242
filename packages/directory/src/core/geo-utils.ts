/**
 * Geographic Utilities - Shared Coordinate Functions
 *
 * Range checks, fixed-point rounding, viewport normalization and great-circle
 * distance. Import these instead of redefining them per module.
 */

import * as turf from '@turf/turf';
import type { CoordinateRange, GeoPoint, ViewportBounds } from './types.js';

// ============================================================================
// Validation
// ============================================================================

/**
 * True when both values are finite and within geographic ranges
 */
export function isValidCoordinate(
  latitude: number | null | undefined,
  longitude: number | null | undefined
): boolean {
  if (latitude === null || latitude === undefined) return false;
  if (longitude === null || longitude === undefined) return false;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return false;
  return latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180;
}

/**
 * Narrow a record's nullable coordinates to a point, or null when unusable
 */
export function toGeoPoint(
  latitude: number | null,
  longitude: number | null
): GeoPoint | null {
  if (latitude === null || longitude === null) return null;
  return isValidCoordinate(latitude, longitude) ? { lat: latitude, lon: longitude } : null;
}

// ============================================================================
// Rounding
// ============================================================================

/**
 * Round half away from zero to a fixed number of fractional digits
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
  // Avoid -0 leaking into keys and output
  return rounded === 0 ? 0 : rounded;
}

// ============================================================================
// Viewports and Distance
// ============================================================================

/**
 * Normalize viewport corners to min/max ranges regardless of corner order
 */
export function normalizeBounds(bounds: ViewportBounds): CoordinateRange {
  return {
    latMin: Math.min(bounds.swLat, bounds.neLat),
    latMax: Math.max(bounds.swLat, bounds.neLat),
    lonMin: Math.min(bounds.swLon, bounds.neLon),
    lonMax: Math.max(bounds.swLon, bounds.neLon),
  };
}

/**
 * True when a point lies inside the (inclusive) range
 */
export function isWithinRange(point: GeoPoint, range: CoordinateRange): boolean {
  return (
    point.lat >= range.latMin &&
    point.lat <= range.latMax &&
    point.lon >= range.lonMin &&
    point.lon <= range.lonMax
  );
}

/**
 * Great-circle distance between two points in miles
 */
export function distanceMiles(from: GeoPoint, to: GeoPoint): number {
  return turf.distance(
    turf.point([from.lon, from.lat]),
    turf.point([to.lon, to.lat]),
    { units: 'miles' }
  );
}
