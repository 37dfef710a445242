/**
 * Clean Command
 *
 * Usage:
 *   restroom-finder clean [--dry-run] [--skip-hours-fetch]
 *
 * Runs the maintenance pass over every stored record and prints one line per
 * stage. Hours fetching is throttled to about one request per second, so a
 * full pass over a large directory takes a while; pass --skip-hours-fetch to
 * run only the offline stages.
 */

import type { Command } from 'commander';
import { errorMessage } from '../../../core/errors.js';
import { formatSummary, runMaintenance } from '../../../cleaning/maintenance.js';
import {
  EXIT_CODES,
  exitCodeFor,
  withStore,
  type CommandContext,
  type ExitCode,
} from '../../lib/context.js';
import { formatDuration } from '../../lib/logger.js';

export interface CleanOptions {
  readonly dryRun?: boolean;
  readonly skipHoursFetch?: boolean;
}

export function registerCleanCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('clean')
    .description('Normalize names and addresses, fill hours and remove duplicates')
    .option('--dry-run', 'Report changes without saving them')
    .option('--skip-hours-fetch', 'Do not look up missing hours in OpenStreetMap')
    .action(async (options: CleanOptions) => {
      process.exitCode = await executeClean(options, getContext());
    });
}

export async function executeClean(
  options: CleanOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  const startTime = Date.now();
  logger.commandStart('clean', { ...options });

  try {
    const summary = await withStore(context, (store) =>
      runMaintenance({
        store,
        enricher: options.skipHoursFetch ? undefined : context.createHoursEnricher(),
        dryRun: options.dryRun ?? false,
        skipHoursFetch: options.skipHoursFetch ?? false,
      })
    );

    logger.commandEnd(true, { total: summary.total });
    if (logger.json) {
      logger.print(JSON.stringify({ success: true, ...summary }, null, 2));
    } else {
      for (const line of formatSummary(summary)) {
        logger.print(line);
      }
      logger.info(`Finished in ${formatDuration(Date.now() - startTime)}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.commandEnd(false, { error: errorMessage(error) });
    return exitCodeFor(error);
  }
}
