/**
 * Coordinate Reprojector
 *
 * Converts shapefile point coordinates from the CRS described by a `.prj`
 * (well-known text) to WGS84 longitude/latitude with proj4.
 *
 * A missing or unparseable descriptor produces the identity transform: the
 * points are assumed to be geographic already. That is accepted, not an
 * error; out-of-range results are caught later by the range check.
 */

import proj4 from 'proj4';
import { errorMessage } from '../core/errors.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'reprojector' });

const WGS84 = 'EPSG:4326';

/** [x, y] in source units, or [lon, lat] after projection */
export type Position2D = readonly [number, number];

export type IdentityReason = 'no-descriptor' | 'invalid-descriptor';

export type Reprojector =
  | {
      readonly kind: 'proj4';
      project(position: Position2D): Position2D;
    }
  | {
      readonly kind: 'identity';
      readonly reason: IdentityReason;
      readonly detail?: string;
      project(position: Position2D): Position2D;
    };

export type ProjectedPoint =
  | { readonly ok: true; readonly lat: number; readonly lon: number }
  | { readonly ok: false; readonly message: string };

/**
 * Build a reprojector from `.prj` text (or its absence)
 */
export function createReprojector(prjText: string | null | undefined): Reprojector {
  const descriptor = prjText?.trim() ?? '';
  if (!descriptor) {
    return { kind: 'identity', reason: 'no-descriptor', project: (position) => position };
  }

  try {
    const converter = proj4(descriptor, WGS84);
    return {
      kind: 'proj4',
      project: (position) => {
        const [lon, lat] = converter.forward([position[0], position[1]]);
        return [lon ?? NaN, lat ?? NaN];
      },
    };
  } catch (error) {
    const detail = errorMessage(error);
    log.warn('Projection descriptor could not be parsed, assuming geographic coordinates', {
      detail,
    });
    return {
      kind: 'identity',
      reason: 'invalid-descriptor',
      detail,
      project: (position) => position,
    };
  }
}

/**
 * Project one point and check the result against geographic ranges
 */
export function projectPoint(reprojector: Reprojector, position: Position2D): ProjectedPoint {
  let lon: number;
  let lat: number;

  try {
    [lon, lat] = reprojector.project(position);
  } catch (error) {
    return { ok: false, message: `reprojection failed (${errorMessage(error)})` };
  }

  if (!isValidCoordinate(lat, lon)) {
    return {
      ok: false,
      message:
        `coordinates out of range (lat=${lat}, lon=${lon}); ` +
        'the .prj projection file is probably missing or wrong',
    };
  }

  return { ok: true, lat, lon };
}
