/**
 * Record Store Interface
 *
 * The persistence boundary for restroom records: CRUD by primary key,
 * coordinate range filtering and exclusion of records without coordinates.
 * Ingestion, cleaning and serving only talk to this interface.
 */

import type {
  CoordinateRange,
  RestroomInput,
  RestroomPatch,
  RestroomRecord,
} from '../core/types.js';
import { InvalidRecordError } from '../core/errors.js';
import { COORDINATE_PRECISION } from '../core/constants.js';
import { roundTo } from '../core/geo-utils.js';

export interface RecordStore {
  /** Insert a single record and return it with its id */
  insert(record: RestroomInput): Promise<RestroomRecord>;

  /** Insert records atomically; nothing is written if any record is rejected */
  insertMany(records: readonly RestroomInput[]): Promise<number>;

  get(id: number): Promise<RestroomRecord | null>;

  update(id: number, patch: RestroomPatch): Promise<void>;

  /** Delete records atomically, returning the number removed */
  deleteMany(ids: readonly number[]): Promise<number>;

  /** Every record, in id order */
  all(): Promise<readonly RestroomRecord[]>;

  /**
   * Records with non-null coordinates, optionally restricted to a range, in
   * id order
   */
  withCoordinates(range?: CoordinateRange, limit?: number): Promise<readonly RestroomRecord[]>;

  count(): Promise<number>;

  close(): Promise<void>;
}

function describe(record: RestroomPatch): string {
  return `lat=${String(record.latitude)}, lon=${String(record.longitude)}`;
}

/**
 * Reject coordinates outside geographic ranges and round to storage precision
 *
 * Null coordinates are allowed (records created before geocoding). A
 * half-null pair is rejected.
 *
 * @throws InvalidRecordError
 */
export function prepareCoordinates<T extends RestroomPatch>(record: T): T {
  const { latitude, longitude } = record;
  if (latitude === undefined && longitude === undefined) return record;

  if ((latitude ?? null) === null && (longitude ?? null) === null) {
    return { ...record, latitude: null, longitude: null };
  }

  if (
    typeof latitude !== 'number' ||
    typeof longitude !== 'number' ||
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    latitude < -90 ||
    latitude > 90 ||
    longitude < -180 ||
    longitude > 180
  ) {
    throw new InvalidRecordError(
      `Refusing to store out-of-range coordinates (${describe(record)})`,
      typeof latitude === 'number' ? latitude : null,
      typeof longitude === 'number' ? longitude : null
    );
  }

  return {
    ...record,
    latitude: roundTo(latitude, COORDINATE_PRECISION),
    longitude: roundTo(longitude, COORDINATE_PRECISION),
  };
}
