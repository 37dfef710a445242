/**
 * Add Command
 *
 * Create a single restroom by hand.
 *
 * Usage:
 *   restroom-finder add --name <name> --address <address> --zip <zip>
 *     [--hours <hours>] [--remarks <text>] [--lat <lat> --lon <lon>]
 *
 * Without coordinates the address is geocoded as "address, zip"; a miss
 * stores (0, 0), the same placeholder CSV import uses.
 */

import type { Command } from 'commander';
import { errorMessage } from '../../../core/errors.js';
import type { GeoPoint, RestroomInput, RestroomRecord } from '../../../core/types.js';
import { usablePoint } from '../../../geocoding/nominatim.js';
import { truncateZip } from '../../../ingestion/tabular-import.js';
import {
  EXIT_CODES,
  exitCodeFor,
  withStore,
  type CommandContext,
  type ExitCode,
} from '../../lib/context.js';
import { parseLatitude, parseLongitude } from '../../lib/parsers.js';

export interface AddOptions {
  readonly name: string;
  readonly address: string;
  readonly zip: string;
  readonly hours?: string;
  readonly remarks?: string;
  readonly lat?: number;
  readonly lon?: number;
}

export function registerAddCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('add')
    .description('Add a single restroom')
    .requiredOption('--name <name>', 'Location name')
    .requiredOption('--address <address>', 'Street address')
    .requiredOption('--zip <zip>', 'Zip code')
    .option('--hours <hours>', 'Opening hours')
    .option('--remarks <text>', 'Free-form notes')
    .option('--lat <lat>', 'Latitude', parseLatitude)
    .option('--lon <lon>', 'Longitude', parseLongitude)
    .action(async (options: AddOptions) => {
      process.exitCode = await executeAdd(options, getContext());
    });
}

export async function executeAdd(options: AddOptions, context: CommandContext): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('add', { name: options.name });

  if ((options.lat === undefined) !== (options.lon === undefined)) {
    logger.error('--lat and --lon must be given together');
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }

  try {
    const point = await resolvePoint(options, context);
    const input: RestroomInput = {
      name: options.name.trim(),
      address: options.address.trim(),
      zip: truncateZip(options.zip.trim()),
      latitude: point.lat,
      longitude: point.lon,
      hours: options.hours?.trim() ?? '',
      remarks: options.remarks?.trim() ?? '',
    };

    const record = await withStore(context, (store) => store.insert(input));
    logger.commandEnd(true, { id: record.id });
    printRecord(context, record);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.commandEnd(false, { error: errorMessage(error) });
    return exitCodeFor(error);
  }
}

async function resolvePoint(options: AddOptions, context: CommandContext): Promise<GeoPoint> {
  if (options.lat !== undefined && options.lon !== undefined) {
    return { lat: options.lat, lon: options.lon };
  }

  const query = `${options.address.trim()}, ${options.zip.trim()}`;
  const resolved = usablePoint(await context.createGeocoder().geocode(query));
  if (resolved.ok) return resolved.point;

  context.logger.warn('Address did not geocode; storing 0,0', {
    query,
    reason: resolved.reason,
  });
  return { lat: 0, lon: 0 };
}

function printRecord(context: CommandContext, record: RestroomRecord): void {
  const { logger } = context;
  if (logger.json) {
    logger.print(JSON.stringify({ success: true, restroom: record }, null, 2));
    return;
  }
  logger.print(`Added restroom ${record.id}: ${record.name}`);
  logger.print(`  ${record.address} ${record.zip}`);
  logger.print(`  ${String(record.latitude)}, ${String(record.longitude)}`);
}
