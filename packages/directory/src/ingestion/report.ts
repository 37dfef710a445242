/**
 * Import outcome formatting shared by the CLI and the HTTP surface
 */

import { IMPORT_ERROR_PREVIEW } from '../core/constants.js';
import type { ImportResult } from '../core/types.js';

export interface ImportSummary {
  readonly created: number;
  readonly errorCount: number;
  /** First `previewLimit` row errors in source order */
  readonly preview: readonly string[];
  /** Row errors not included in the preview */
  readonly hidden: number;
}

export function summarizeImport(
  result: ImportResult,
  previewLimit: number = IMPORT_ERROR_PREVIEW
): ImportSummary {
  const limit = Math.max(0, Math.floor(previewLimit));
  const preview = result.errors.slice(0, limit);
  return {
    created: result.created,
    errorCount: result.errors.length,
    preview,
    hidden: result.errors.length - preview.length,
  };
}

/**
 * Human-readable lines: "Created 12 restroom(s)", errors, "... and N more"
 */
export function formatImportSummary(summary: ImportSummary): string[] {
  const lines = [`Created ${summary.created} restroom(s)`];
  if (summary.errorCount > 0) {
    lines.push(`${summary.errorCount} row error(s):`);
    lines.push(...summary.preview.map((message) => `  ${message}`));
    if (summary.hidden > 0) {
      lines.push(`  ... and ${summary.hidden} more`);
    }
  }
  return lines;
}
