/**
 * Import Shapefile Command
 *
 * Usage:
 *   restroom-finder import shapefile <zip> [--preview <n>]
 *
 * The archive must hold a point .shp with its .dbf; a .prj is used for
 * reprojection when present.
 */

import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { IMPORT_ERROR_PREVIEW } from '../../../core/constants.js';
import { importShapefileArchive } from '../../../ingestion/shapefile-import.js';
import { withStore, type CommandContext, type ExitCode } from '../../lib/context.js';
import { parseNonNegativeInt } from '../../lib/parsers.js';
import { reportImportFailure, reportImportResult } from './report.js';

export interface ImportShapefileOptions {
  readonly preview: number;
}

export function registerImportShapefileCommand(
  parent: Command,
  getContext: () => CommandContext
): void {
  parent
    .command('shapefile <zip>')
    .description('Import restrooms from a zipped point shapefile')
    .option('--preview <n>', 'Number of feature errors to show', parseNonNegativeInt, IMPORT_ERROR_PREVIEW)
    .action(async (archive: string, options: ImportShapefileOptions) => {
      process.exitCode = await executeImportShapefile(archive, options, getContext());
    });
}

export async function executeImportShapefile(
  archive: string,
  options: ImportShapefileOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('import shapefile', { archive });

  try {
    const bytes = await readFile(archive);
    const result = await withStore(context, (store) => importShapefileArchive(bytes, { store }));
    logger.commandEnd(true, { created: result.created, errors: result.errors.length });
    return reportImportResult(logger, archive, result, options.preview);
  } catch (error) {
    logger.commandEnd(false);
    return reportImportFailure(logger, archive, error);
  }
}
