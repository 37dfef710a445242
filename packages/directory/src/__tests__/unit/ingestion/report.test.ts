/**
 * Import Summary Tests
 */

import { describe, it, expect } from 'vitest';
import { formatImportSummary, summarizeImport } from '../../../ingestion/report.js';

describe('summarizeImport', () => {
  it('should preview the first errors and count the rest', () => {
    const summary = summarizeImport({ created: 3, errors: ['Row 2: a', 'Row 3: b', 'Row 4: c'] }, 2);
    expect(summary).toEqual({
      created: 3,
      errorCount: 3,
      preview: ['Row 2: a', 'Row 3: b'],
      hidden: 1,
    });
  });

  it('should default to ten previewed errors', () => {
    const errors = Array.from({ length: 12 }, (_, i) => `Row ${i + 2}: invalid zip`);
    const summary = summarizeImport({ created: 0, errors });
    expect(summary.preview).toHaveLength(10);
    expect(summary.hidden).toBe(2);
  });
});

describe('formatImportSummary', () => {
  it('should list previewed errors with a remainder line', () => {
    const summary = summarizeImport({ created: 3, errors: ['Row 2: a', 'Row 3: b', 'Row 4: c'] }, 2);
    expect(formatImportSummary(summary)).toEqual([
      'Created 3 restroom(s)',
      '3 row error(s):',
      '  Row 2: a',
      '  Row 3: b',
      '  ... and 1 more',
    ]);
  });

  it('should print only the created count without errors', () => {
    expect(formatImportSummary(summarizeImport({ created: 5, errors: [] }))).toEqual([
      'Created 5 restroom(s)',
    ]);
  });
});
