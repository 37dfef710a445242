/**
 * Import CSV Command
 *
 * Usage:
 *   restroom-finder import csv <file> [--preview <n>]
 *
 * Required columns: address, zip. Optional: name (or libname), city, hours,
 * remarks, latitude, longitude (or longitud). Rows without coordinates are
 * geocoded.
 */

import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { IMPORT_ERROR_PREVIEW } from '../../../core/constants.js';
import { importTabular } from '../../../ingestion/tabular-import.js';
import { withStore, type CommandContext, type ExitCode } from '../../lib/context.js';
import { parseNonNegativeInt } from '../../lib/parsers.js';
import { reportImportFailure, reportImportResult } from './report.js';

export interface ImportCsvOptions {
  readonly preview: number;
}

export function registerImportCsvCommand(
  parent: Command,
  getContext: () => CommandContext
): void {
  parent
    .command('csv <file>')
    .description('Import restrooms from a CSV export')
    .option('--preview <n>', 'Number of row errors to show', parseNonNegativeInt, IMPORT_ERROR_PREVIEW)
    .action(async (file: string, options: ImportCsvOptions) => {
      process.exitCode = await executeImportCsv(file, options, getContext());
    });
}

export async function executeImportCsv(
  file: string,
  options: ImportCsvOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('import csv', { file });

  try {
    const bytes = await readFile(file);
    const result = await withStore(context, (store) =>
      importTabular(bytes, { store, geocoder: context.createGeocoder() })
    );
    logger.commandEnd(true, { created: result.created, errors: result.errors.length });
    return reportImportResult(logger, file, result, options.preview);
  } catch (error) {
    logger.commandEnd(false);
    return reportImportFailure(logger, file, error);
  }
}
