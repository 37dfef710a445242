#!/usr/bin/env tsx
/**
 * Restroom Finder CLI Entry Point
 *
 * Import, clean and serve the restroom directory.
 *
 * @module restroom-finder-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { errorMessage } from '../src/core/errors.js';
import { loadConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import {
  EXIT_CODES,
  createCommandContext,
  exitCodeFor,
  type CommandContext,
} from '../src/cli/lib/context.js';
import {
  registerAddCommand,
  registerCleanCommand,
  registerImportCommands,
  registerServeCommand,
} from '../src/cli/commands/index.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly db?: string;
}

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

function initializeContext(options: GlobalOptions): CommandContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      databasePath: options.db,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = createCommandContext(config, logger);
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('restroom-finder')
    .description('Public restroom directory: import, clean and serve')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .restroomrc)')
    .option('--db <path>', 'SQLite database file')
    .hook('preAction', () => {
      try {
        initializeContext(program.opts<GlobalOptions>());
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(exitCodeFor(error));
      }
    });

  registerImportCommands(program, getGlobalContext);
  registerCleanCommand(program, getGlobalContext);
  registerServeCommand(program, getGlobalContext);
  registerAddCommand(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', { error: errorMessage(error) });
    } else {
      console.error(`Error: ${errorMessage(error)}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
