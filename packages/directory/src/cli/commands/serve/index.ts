/**
 * Serve Command
 *
 * Start the HTTP API over the configured database.
 *
 * Usage:
 *   restroom-finder serve [--port <n>] [--host <host>]
 */

import type { Command } from 'commander';
import { errorMessage } from '../../../core/errors.js';
import { RestroomAPI } from '../../../serving/api.js';
import { QueryService } from '../../../serving/query-service.js';
import {
  EXIT_CODES,
  exitCodeFor,
  type CommandContext,
  type ExitCode,
} from '../../lib/context.js';
import { parsePort } from '../../lib/parsers.js';

export interface ServeOptions {
  readonly port?: number;
  readonly host?: string;
}

export interface RunningServer {
  stop(): Promise<void>;
}

export function registerServeCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('serve')
    .description('Start the restroom HTTP API')
    .option('-p, --port <n>', 'Port to listen on', parsePort)
    .option('--host <host>', 'Interface to bind')
    .action(async (options: ServeOptions) => {
      const context = getContext();
      const started = await startServer(options, context);
      if (!started.ok) {
        process.exitCode = started.exitCode;
        return;
      }

      const shutdown = (): void => {
        context.logger.info('Received shutdown signal, stopping server...');
        started.server.stop().then(
          () => {
            process.exitCode = EXIT_CODES.SUCCESS;
          },
          (error: unknown) => {
            context.logger.error('Failed to stop server cleanly', { error: errorMessage(error) });
            process.exitCode = EXIT_CODES.ERRORS;
          }
        );
      };
      process.once('SIGTERM', shutdown);
      process.once('SIGINT', shutdown);
    });
}

/**
 * Open the store and bind the API; the returned handle closes both
 */
export async function startServer(
  options: ServeOptions,
  context: CommandContext
): Promise<{ ok: true; server: RunningServer } | { ok: false; exitCode: ExitCode }> {
  const { config, logger } = context;
  const port = options.port ?? config.server.port;
  const host = options.host ?? config.server.host;

  logger.commandStart('serve', { port, host, database: config.databasePath });

  const store = context.openStore();
  const api = new RestroomAPI({
    queryService: new QueryService({
      store,
      geocoder: context.createGeocoder(),
      defaultCenter: config.defaultCenter,
    }),
    store,
    port,
    host,
    corsOrigins: config.server.corsOrigins,
  });

  try {
    await api.start();
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    await store.close();
    return { ok: false, exitCode: exitCodeFor(error) };
  }

  logger.info('Server started successfully', {
    url: `http://${host}:${port}`,
    endpoints: {
      health: `http://${host}:${port}/v1/health`,
      nearest: `http://${host}:${port}/v1/restrooms/nearest?lat={lat}&lon={lon}`,
    },
  });

  return {
    ok: true,
    server: {
      stop: async () => {
        try {
          await api.stop();
        } finally {
          await store.close();
        }
      },
    },
  };
}
