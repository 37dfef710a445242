/**
 * Import Commands Index
 *
 * - csv: spreadsheet exports
 * - shapefile: zipped point shapefiles
 */

import type { Command } from 'commander';
import type { CommandContext } from '../../lib/context.js';
import { registerImportCsvCommand } from './csv.js';
import { registerImportShapefileCommand } from './shapefile.js';

export function registerImportCommands(program: Command, getContext: () => CommandContext): void {
  const importCommand = program
    .command('import')
    .description('Load restroom records from files');

  registerImportCsvCommand(importCommand, getContext);
  registerImportShapefileCommand(importCommand, getContext);
}
