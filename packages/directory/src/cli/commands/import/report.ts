/**
 * Shared output for import commands
 */

import { ImportError, errorMessage } from '../../../core/errors.js';
import type { ImportResult } from '../../../core/types.js';
import { formatImportSummary, summarizeImport } from '../../../ingestion/report.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../../lib/context.js';
import type { CLILogger } from '../../lib/logger.js';

export function reportImportResult(
  logger: CLILogger,
  source: string,
  result: ImportResult,
  previewLimit: number
): ExitCode {
  const summary = summarizeImport(result, previewLimit);

  if (logger.json) {
    logger.print(JSON.stringify({ success: true, source, ...summary }, null, 2));
  } else {
    for (const line of formatImportSummary(summary)) {
      logger.print(line);
    }
  }
  return EXIT_CODES.SUCCESS;
}

export function reportImportFailure(logger: CLILogger, source: string, error: unknown): ExitCode {
  const code = error instanceof ImportError ? error.code : undefined;

  if (logger.json) {
    logger.print(
      JSON.stringify({ success: false, source, code, error: errorMessage(error) }, null, 2)
    );
  } else {
    logger.error(code ? `Import failed (${code}): ${errorMessage(error)}` : `Import failed: ${errorMessage(error)}`, {
      source,
    });
  }
  return exitCodeFor(error);
}
