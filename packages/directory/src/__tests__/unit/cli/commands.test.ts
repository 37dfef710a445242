/**
 * CLI Command Tests
 *
 * Commands run against an in-memory store and stub services; output is
 * captured from the logger sink.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeAdd, executeClean, executeImportCsv } from '../../../cli/commands/index.js';
import { EXIT_CODES } from '../../../cli/lib/context.js';
import { InMemoryRecordStore, restroom } from '../../utils/memory-record-store.js';
import { StubGeocoder, StubHoursSource } from '../../utils/stubs.js';
import { createTestContext } from '../../utils/cli-context.js';

describe('import csv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'restroom-import-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeCsv(lines: readonly string[]): string {
    const path = join(dir, 'restrooms.csv');
    writeFileSync(path, `${lines.join('\n')}\n`);
    return path;
  }

  it('should import rows and print the summary', async () => {
    const file = writeCsv([
      'name,address,zip,latitude,longitude',
      'Belmont Library,336 Concord Ave,02478,42.3959,-71.1786',
      'Nowhere,1 Elm St,abc12,,',
    ]);
    const context = createTestContext();

    const exitCode = await executeImportCsv(file, { preview: 10 }, context);

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(context.printed()).toEqual([
      'Created 1 restroom(s)',
      '1 row error(s):',
      '  Row 3: invalid zip "abc12"',
    ]);
    expect(await context.store.count()).toBe(1);
    expect(context.store.closed).toBe(true);
  });

  it('should limit the error preview', async () => {
    const file = writeCsv(['address,zip', ',02478', '1 Main St,', '2 Main St,1']);
    const context = createTestContext();

    await executeImportCsv(file, { preview: 1 }, context);

    expect(context.printed()).toEqual([
      'Created 0 restroom(s)',
      '3 row error(s):',
      '  Row 2: missing address or zip',
      '  ... and 2 more',
    ]);
  });

  it('should exit with a data integrity code when required columns are missing', async () => {
    const file = writeCsv(['name,zip', 'Town Hall,02478']);
    const context = createTestContext({ json: true });

    const exitCode = await executeImportCsv(file, { preview: 10 }, context);

    expect(exitCode).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    expect(JSON.parse(context.printed().join('\n'))).toEqual({
      success: false,
      source: file,
      code: 'MISSING_COLUMNS',
      error: 'CSV must have columns: address, zip (missing: address)',
    });
    expect(context.store.closed).toBe(true);
  });

  it('should not open the store when the file cannot be read', async () => {
    const context = createTestContext();

    const exitCode = await executeImportCsv(join(dir, 'absent.csv'), { preview: 10 }, context);

    expect(exitCode).toBe(EXIT_CODES.ERRORS);
    expect(context.storeOpens()).toBe(0);
    const errors = context.lines.filter((entry) => entry.level === 'error');
    expect(errors.some((entry) => entry.line.includes('Import failed: ENOENT'))).toBe(true);
  });
});

describe('clean', () => {
  function seededStore(): InMemoryRecordStore {
    return new InMemoryRecordStore([
      restroom({
        name: 'BELMONT PUBLIC LIBRARY',
        address: '336 CONCORD AVE, BELMONT',
        hours: 'Mon-Fri 9-5',
      }),
    ]);
  }

  it('should run the offline stages and print one line per stage', async () => {
    const context = createTestContext({ store: seededStore() });

    const exitCode = await executeClean({ skipHoursFetch: true }, context);

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(context.printed()).toEqual([
      'Title case: 1 records updated',
      'State abbreviation added: 1 records updated',
      'Library/Town Hall suffix: 0 records updated',
      'Cleared bogus hours: 0 records',
      'Hours fetched from OSM: skipped',
      'Duplicates removed: 0 records',
      '',
      'Done. 1 restroom locations remain.',
    ]);
    expect(await context.store.get(1)).toMatchObject({
      name: 'Belmont Public Library',
      address: '336 Concord Ave, Belmont, MA',
    });
    expect(context.store.closed).toBe(true);
  });

  it('should leave records untouched on a dry run', async () => {
    const context = createTestContext({ store: seededStore() });

    await executeClean({ dryRun: true, skipHoursFetch: true }, context);

    expect(context.printed()[0]).toBe('DRY RUN - no changes will be saved');
    expect((await context.store.get(1))?.name).toBe('BELMONT PUBLIC LIBRARY');
  });

  it('should fetch missing hours unless skipped', async () => {
    const hoursSource = new StubHoursSource([{ status: 'found', hours: 'Mo-Fr 10:00-18:00' }]);
    const store = new InMemoryRecordStore([restroom({ name: 'Belmont Library' })]);
    const context = createTestContext({ store, hoursSource });

    await executeClean({}, context);

    expect(context.printed()).toContain('Hours fetched from OSM: 1 records');
    expect(hoursSource.calls).toEqual([{ point: { lat: 42.3959, lon: -71.1786 }, radius: 80 }]);
    expect((await store.get(1))?.hours).toBe('Mo-Fr 10:00-18:00');
  });
});

describe('add', () => {
  it('should store explicit coordinates without geocoding', async () => {
    const geocoder = new StubGeocoder();
    const context = createTestContext({ geocoder });

    const exitCode = await executeAdd(
      { name: ' Belmont Town Hall ', address: '455 Concord Ave', zip: '02478-2431', lat: 42.3956, lon: -71.1773 },
      context
    );

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(geocoder.queries).toEqual([]);
    expect(context.printed()).toEqual([
      'Added restroom 1: Belmont Town Hall',
      '  455 Concord Ave 02478',
      '  42.3956, -71.1773',
    ]);
  });

  it('should geocode address and zip when coordinates are absent', async () => {
    const geocoder = new StubGeocoder({ '455 Concord Ave, 02478': { lat: 42.3956, lon: -71.1773 } });
    const context = createTestContext({ geocoder });

    await executeAdd({ name: 'Belmont Town Hall', address: '455 Concord Ave', zip: '02478', hours: 'Mo-Fr 08:00-16:00' }, context);

    expect(geocoder.queries).toEqual(['455 Concord Ave, 02478']);
    expect(await context.store.get(1)).toEqual({
      id: 1,
      name: 'Belmont Town Hall',
      address: '455 Concord Ave',
      zip: '02478',
      latitude: 42.3956,
      longitude: -71.1773,
      hours: 'Mo-Fr 08:00-16:00',
      remarks: '',
    });
  });

  it('should store 0,0 with a warning when geocoding misses', async () => {
    const context = createTestContext();

    const exitCode = await executeAdd({ name: 'Unknown', address: '1 Nowhere Rd', zip: '99999' }, context);

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(await context.store.get(1)).toMatchObject({ latitude: 0, longitude: 0 });
    expect(context.lines.filter((entry) => entry.level === 'warn')).toHaveLength(1);
    expect(context.printed()[2]).toBe('  0, 0');
  });

  it('should store 0,0 when the geocoder answers out of range', async () => {
    const geocoder = new StubGeocoder({ '1 Main St, 02478': { lat: -120, lon: 400 } });
    const context = createTestContext({ geocoder });

    const exitCode = await executeAdd({ name: 'Skewed', address: '1 Main St', zip: '02478' }, context);

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(await context.store.get(1)).toMatchObject({ latitude: 0, longitude: 0 });
    expect(context.lines.filter((entry) => entry.level === 'warn')).toHaveLength(1);
  });

  it('should require latitude and longitude together', async () => {
    const context = createTestContext();

    const exitCode = await executeAdd({ name: 'Half', address: '1 Main St', zip: '02478', lat: 42 }, context);

    expect(exitCode).toBe(EXIT_CODES.ERRORS);
    expect(context.storeOpens()).toBe(0);
  });

  it('should print the stored record as JSON', async () => {
    const context = createTestContext({ json: true });

    await executeAdd({ name: 'Library', address: '1 Main St', zip: '02478', lat: 42.1, lon: -71.1 }, context);

    expect(JSON.parse(context.printed().join('\n'))).toEqual({
      success: true,
      restroom: {
        id: 1,
        name: 'Library',
        address: '1 Main St',
        zip: '02478',
        latitude: 42.1,
        longitude: -71.1,
        hours: '',
        remarks: '',
      },
    });
  });
});
