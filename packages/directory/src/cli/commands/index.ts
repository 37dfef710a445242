/**
 * CLI Commands Index
 *
 * Central registry of all CLI command groups.
 *
 * @module cli/commands
 */

export { registerImportCommands } from './import/index.js';
export { executeImportCsv } from './import/csv.js';
export { executeImportShapefile } from './import/shapefile.js';
export { registerCleanCommand, executeClean } from './clean/index.js';
export { registerServeCommand, startServer } from './serve/index.js';
export { registerAddCommand, executeAdd } from './add/index.js';
