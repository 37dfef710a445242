/**
 * Command Context
 *
 * Shared wiring for CLI commands: configuration, logger and factories for
 * the store and external services. Commands receive a context instead of
 * building collaborators themselves, so tests can hand in fakes.
 *
 * @module cli/lib/context
 */

import { ImportError, InvalidRecordError } from '../../core/errors.js';
import { HoursEnricher } from '../../enrichment/hours-enricher.js';
import { OverpassHoursSource, type HoursSource } from '../../enrichment/overpass-hours.js';
import { NominatimGeocoder, type Geocoder } from '../../geocoding/nominatim.js';
import type { RecordStore } from '../../persistence/record-store.js';
import { SqliteRecordStore } from '../../persistence/sqlite-record-store.js';
import { ConfigError, type CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof ImportError || error instanceof InvalidRecordError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  openStore(): RecordStore;
  createGeocoder(): Geocoder;
  createHoursEnricher(): HoursEnricher;
}

export function createCommandContext(config: CLIConfig, logger: CLILogger): CommandContext {
  return {
    config,
    logger,
    openStore: () => new SqliteRecordStore(config.databasePath),
    createGeocoder: () =>
      new NominatimGeocoder({
        endpoint: config.geocoder.endpoint,
        userAgent: config.userAgent,
        timeoutMs: config.geocoder.timeoutMs,
        minIntervalMs: config.geocoder.minIntervalMs,
      }),
    createHoursEnricher: () => {
      const source: HoursSource = new OverpassHoursSource({
        endpoint: config.overpass.endpoint,
        userAgent: config.userAgent,
        timeoutMs: config.overpass.timeoutMs,
      });
      return new HoursEnricher(source, { intervalMs: config.overpass.intervalMs });
    },
  };
}

/**
 * Open the store, run `fn`, and close the store even when `fn` throws
 */
export async function withStore<T>(
  context: CommandContext,
  fn: (store: RecordStore) => Promise<T>
): Promise<T> {
  const store = context.openStore();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
