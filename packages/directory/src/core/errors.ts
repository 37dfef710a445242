/**
 * Restroom Directory Error Types
 *
 * Only fatal conditions are thrown. Row-level problems, geocoding misses and
 * enrichment failures travel as data (message lists and result objects).
 */

/**
 * Reasons an entire import is aborted
 */
export type ImportErrorCode =
  | 'DECODE_FAILED'
  | 'MALFORMED_CSV'
  | 'MISSING_COLUMNS'
  | 'MALFORMED_ARCHIVE'
  | 'NO_SHAPEFILE'
  | 'NO_POINT_GEOMETRY';

/**
 * Error thrown when an import cannot proceed at all
 *
 * Nothing is written to the store when this is raised.
 */
export class ImportError extends Error {
  constructor(
    public readonly code: ImportErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ImportError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ImportError);
    }
  }
}

/**
 * Error thrown by a record store asked to persist out-of-range coordinates
 */
export class InvalidRecordError extends Error {
  constructor(
    message: string,
    public readonly latitude: number | null,
    public readonly longitude: number | null
  ) {
    super(message);
    this.name = 'InvalidRecordError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRecordError);
    }
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
