/**
 * Tabular (CSV) Import
 *
 * Turns a spreadsheet export into restroom records:
 *
 * 1. Decode bytes (UTF-8 with/without BOM, Windows-1252, Latin-1)
 * 2. Parse header + rows with csv-parse; headers trimmed and lower-cased
 * 3. Require `address` and `zip`; resolve column synonyms once
 * 4. Per row: compose address + city, truncate zip, keep genuine hours,
 *    parse coordinates or geocode "address, zip"
 * 5. Insert all accepted rows in one store transaction
 *
 * Bad rows are skipped with a message; only undecodable files and missing
 * required columns abort the import.
 */

import { parse } from 'csv-parse/sync';
import type { ImportResult, RestroomInput } from '../core/types.js';
import { ImportError, errorMessage } from '../core/errors.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { usablePoint, type Geocoder } from '../geocoding/nominatim.js';
import type { RecordStore } from '../persistence/record-store.js';
import { hasGenuineHours } from '../text/hours.js';
import { decodeText } from './encoding.js';
import { FieldMapper, TABULAR_SYNONYMS } from './field-mapper.js';

const log = createLogger({ module: 'tabular-import' });

const REQUIRED_COLUMNS = ['address', 'zip'] as const;

const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export interface TabularImportOptions {
  readonly store: RecordStore;
  /** Used for rows without explicit coordinates */
  readonly geocoder: Geocoder;
}

type CoordinateParse =
  | { readonly kind: 'absent' }
  | { readonly kind: 'malformed' }
  | { readonly kind: 'parsed'; readonly latitude: number; readonly longitude: number };

/**
 * Apply the shared zip rule: "02138-1234" -> "02138"
 */
export function truncateZip(zip: string): string {
  return zip.length > 5 && /^\d{5}/.test(zip) ? zip.slice(0, 5) : zip;
}

/**
 * Strict decimal parse; "", "abc", "1.2.3" and "42N" are rejected
 */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseCoordinates(latText: string, lonText: string): CoordinateParse {
  if (!latText || !lonText) return { kind: 'absent' };

  const latitude = parseDecimal(latText);
  const longitude = parseDecimal(lonText);
  if (latitude === null || longitude === null) return { kind: 'malformed' };

  return { kind: 'parsed', latitude, longitude };
}

function parseTable(text: string): string[][] {
  try {
    return parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new ImportError('MALFORMED_CSV', `Could not parse CSV: ${errorMessage(error)}`);
  }
}

/**
 * Import a CSV export into the store
 *
 * @throws ImportError when the file cannot be decoded or parsed, or lacks required columns
 */
export async function importTabular(
  bytes: Uint8Array,
  options: TabularImportOptions
): Promise<ImportResult> {
  const { text, encoding } = decodeText(bytes);
  const table = parseTable(text);
  const [headerRow, ...dataRows] = table;

  const header = (headerRow ?? []).map((column) => column.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new ImportError(
      'MISSING_COLUMNS',
      `CSV must have columns: ${REQUIRED_COLUMNS.join(', ')} (missing: ${missing.join(', ')})`
    );
  }

  log.info('Parsed CSV', { encoding, columns: header, rows: dataRows.length });

  const fields = FieldMapper.resolve(TABULAR_SYNONYMS, header);
  const errors: string[] = [];
  const pending: RestroomInput[] = [];
  let geocodeMisses = 0;

  for (const [index, cells] of dataRows.entries()) {
    const rowNumber = index + 2;
    const row: Record<string, string> = {};
    header.forEach((column, i) => {
      if (!Object.hasOwn(row, column)) row[column] = cells[i] ?? '';
    });

    let address = fields.get(row, 'address');
    let zip = fields.get(row, 'zip');

    if (!address || !zip) {
      errors.push(`Row ${rowNumber}: missing address or zip`);
      continue;
    }

    zip = truncateZip(zip);
    if (!/^\d{5}$/.test(zip)) {
      errors.push(`Row ${rowNumber}: invalid zip "${zip}"`);
      continue;
    }

    const city = fields.get(row, 'city');
    if (city) {
      address = `${address}, ${city}`;
    }

    const hours = fields.get(row, 'hours');
    const coordinates = parseCoordinates(fields.get(row, 'latitude'), fields.get(row, 'longitude'));

    let latitude: number;
    let longitude: number;

    if (coordinates.kind === 'parsed') {
      if (!isValidCoordinate(coordinates.latitude, coordinates.longitude)) {
        errors.push(
          `Row ${rowNumber}: coordinates out of range ` +
            `(lat=${coordinates.latitude}, lon=${coordinates.longitude})`
        );
        continue;
      }
      latitude = coordinates.latitude;
      longitude = coordinates.longitude;
    } else {
      if (coordinates.kind === 'malformed') {
        errors.push(`Row ${rowNumber}: invalid latitude/longitude, geocoding address instead`);
      }

      // A miss is stored as (0, 0); see DESIGN.md on the unresolved sentinel
      const resolved = usablePoint(await options.geocoder.geocode(`${address}, ${zip}`));
      if (resolved.ok) {
        latitude = resolved.point.lat;
        longitude = resolved.point.lon;
      } else {
        geocodeMisses++;
        log.debug('Geocoding fell back to zero coordinates', {
          row: rowNumber,
          reason: resolved.reason,
        });
        latitude = 0;
        longitude = 0;
      }
    }

    pending.push({
      name: fields.get(row, 'name'),
      address,
      zip,
      latitude,
      longitude,
      hours: hasGenuineHours(hours) ? hours : '',
      remarks: fields.get(row, 'remarks'),
    });
  }

  const created = await options.store.insertMany(pending);

  log.info('CSV import complete', {
    created,
    rowErrors: errors.length,
    geocodeMisses,
  });

  return { created, errors };
}
