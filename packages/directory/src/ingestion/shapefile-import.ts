/**
 * Shapefile Import
 *
 * Reads a zipped point shapefile (.shp + .dbf, optional .prj) into restroom
 * records. Coordinates are reprojected to WGS84 from the .prj when present.
 *
 * Archive problems and layers without point features abort the import;
 * individual bad features are reported as `Feature N: ...` and skipped.
 */

import AdmZip from 'adm-zip';
import shapefile from 'shapefile';
import type { Geometry, GeoJsonProperties } from 'geojson';
import type { ImportResult, RestroomInput } from '../core/types.js';
import { ADDRESS_UNAVAILABLE, COORDINATE_PRECISION, UNKNOWN_ZIP } from '../core/constants.js';
import { ImportError, errorMessage } from '../core/errors.js';
import { roundTo } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import type { RecordStore } from '../persistence/record-store.js';
import { FieldMapper, SHAPEFILE_SYNONYMS } from './field-mapper.js';
import { createReprojector, projectPoint, type Position2D } from './reprojector.js';
import { truncateZip } from './tabular-import.js';

const log = createLogger({ module: 'shapefile-import' });

export interface ShapefileImportOptions {
  readonly store: RecordStore;
}

interface ShapefileComponents {
  readonly shpName: string;
  readonly shp: ArrayBuffer;
  readonly dbf: ArrayBuffer | undefined;
  readonly prj: string | undefined;
}

type PointExtraction =
  | { readonly kind: 'point'; readonly position: Position2D }
  | { readonly kind: 'empty' }
  | { readonly kind: 'unsupported'; readonly type: string };

type ShapefileField = keyof typeof SHAPEFILE_SYNONYMS;

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

function baseName(entryName: string): string {
  return entryName.replace(/\.[^./]*$/, '').toLowerCase();
}

/**
 * Locate the first .shp and its siblings (matched by base name, any case)
 */
function extractComponents(archive: Uint8Array): ShapefileComponents {
  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(Buffer.from(archive)).getEntries();
  } catch (error) {
    throw new ImportError('MALFORMED_ARCHIVE', `Could not open zip archive: ${errorMessage(error)}`);
  }

  const files = entries.filter((entry) => !entry.isDirectory);
  const shpEntry = files.find((entry) => entry.entryName.toLowerCase().endsWith('.shp'));
  if (!shpEntry) {
    throw new ImportError('NO_SHAPEFILE', 'No .shp file found in zip archive');
  }

  const stem = baseName(shpEntry.entryName);
  const sibling = (extension: string): AdmZip.IZipEntry | undefined =>
    files.find((entry) => entry.entryName.toLowerCase() === `${stem}${extension}`);

  try {
    const dbfEntry = sibling('.dbf');
    const prjEntry = sibling('.prj');

    return {
      shpName: shpEntry.entryName,
      shp: toArrayBuffer(shpEntry.getData()),
      dbf: dbfEntry ? toArrayBuffer(dbfEntry.getData()) : undefined,
      prj: prjEntry ? prjEntry.getData().toString('utf-8') : undefined,
    };
  } catch (error) {
    throw new ImportError('MALFORMED_ARCHIVE', `Could not extract shapefile: ${errorMessage(error)}`);
  }
}

function extractPoint(geometry: Geometry | null): PointExtraction {
  if (geometry === null) return { kind: 'empty' };

  switch (geometry.type) {
    case 'Point': {
      const [x, y] = geometry.coordinates;
      return x === undefined || y === undefined ? { kind: 'empty' } : { kind: 'point', position: [x, y] };
    }
    case 'MultiPoint': {
      const first = geometry.coordinates[0];
      if (!first) return { kind: 'empty' };
      const [x, y] = first;
      return x === undefined || y === undefined ? { kind: 'empty' } : { kind: 'point', position: [x, y] };
    }
    default:
      return { kind: 'unsupported', type: geometry.type };
  }
}

/**
 * True when the last comma-separated part of `address` is `component`
 */
function endsWithComponent(address: string, component: string): boolean {
  const last = address.split(',').pop()?.trim().toLowerCase() ?? '';
  return last === component.trim().toLowerCase();
}

function toRecord(
  fields: FieldMapper<ShapefileField>,
  properties: GeoJsonProperties,
  lat: number,
  lon: number
): RestroomInput {
  const row = properties ?? {};
  const rawName = fields.get(row, 'name');
  const rawAddress = fields.get(row, 'address');
  const city = fields.get(row, 'city');
  const zip = fields.get(row, 'zip');

  let address = rawAddress || rawName || ADDRESS_UNAVAILABLE;
  if (rawAddress && city && !endsWithComponent(rawAddress, city)) {
    address = `${rawAddress}, ${city}`;
  }

  return {
    name: rawName || address,
    address,
    zip: zip ? truncateZip(zip) : UNKNOWN_ZIP,
    latitude: roundTo(lat, COORDINATE_PRECISION),
    longitude: roundTo(lon, COORDINATE_PRECISION),
    hours: '',
    remarks: '',
  };
}

/**
 * Import a zipped point shapefile into the store
 *
 * @throws ImportError for unreadable archives, a missing .shp, or a layer
 *   without any point features
 */
export async function importShapefileArchive(
  archive: Uint8Array,
  options: ShapefileImportOptions
): Promise<ImportResult> {
  const components = extractComponents(archive);
  const reprojector = createReprojector(components.prj);

  log.info('Opened shapefile archive', {
    shp: components.shpName,
    hasDbf: components.dbf !== undefined,
    projection: reprojector.kind === 'proj4' ? 'proj4' : `identity (${reprojector.reason})`,
  });

  let source: Awaited<ReturnType<typeof shapefile.open>>;
  try {
    source = await shapefile.open(components.shp, components.dbf, { encoding: 'utf-8' });
  } catch (error) {
    throw new ImportError('MALFORMED_ARCHIVE', `Could not read shapefile: ${errorMessage(error)}`);
  }

  const errors: string[] = [];
  const pending: RestroomInput[] = [];
  let fields: FieldMapper<ShapefileField> | null = null;
  let featureCount = 0;
  let pointFeatures = 0;

  for (;;) {
    let result: Awaited<ReturnType<typeof source.read>>;
    try {
      result = await source.read();
    } catch (error) {
      throw new ImportError('MALFORMED_ARCHIVE', `Could not read shapefile: ${errorMessage(error)}`);
    }
    if (result.done) break;

    featureCount++;
    const featureNumber = featureCount;
    const feature = result.value;
    const geometry: Geometry | null = feature.geometry;

    const extracted = extractPoint(geometry);
    if (extracted.kind === 'unsupported') {
      errors.push(`Feature ${featureNumber}: unsupported geometry type ${extracted.type}`);
      continue;
    }
    if (extracted.kind === 'empty') {
      errors.push(`Feature ${featureNumber}: empty geometry`);
      continue;
    }
    pointFeatures++;

    const projected = projectPoint(reprojector, extracted.position);
    if (!projected.ok) {
      errors.push(`Feature ${featureNumber}: ${projected.message}`);
      continue;
    }

    fields ??= FieldMapper.resolve(SHAPEFILE_SYNONYMS, Object.keys(feature.properties ?? {}));
    pending.push(toRecord(fields, feature.properties, projected.lat, projected.lon));
  }

  if (featureCount > 0 && pointFeatures === 0) {
    throw new ImportError(
      'NO_POINT_GEOMETRY',
      'Shapefile contains no point features; only Point and MultiPoint layers can be imported'
    );
  }

  const created = await options.store.insertMany(pending);

  log.info('Shapefile import complete', {
    features: featureCount,
    created,
    featureErrors: errors.length,
  });

  return { created, errors };
}
