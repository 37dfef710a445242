/**
 * Maintenance Pass
 *
 * Batch cleanup over the whole record set, in a fixed order:
 *
 * 1. Title-case name and address
 * 2. Append the state abbreviation (from zip) to addresses missing one
 * 3. Add missing "Library" / "Town Hall" / "City Hall" suffixes
 * 4. Clear bogus (numeric-code) hours
 * 5. Fetch missing hours from OSM (optional, throttled)
 * 6. Deduplicate by rounded coordinates
 *
 * Stages run against in-memory working copies, so a dry run sees the same
 * intermediate state, and reports the same counts, as a real run. Unless
 * `dryRun` is set, each stage's changes are written before the next starts.
 */

import type { RestroomPatch, RestroomRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { HoursEnricher } from '../enrichment/hours-enricher.js';
import type { RecordStore } from '../persistence/record-store.js';
import { ensureStateInAddress } from '../text/address.js';
import { isBogusHours } from '../text/hours.js';
import { ensureSuffix, titleCase } from '../text/normalize.js';
import { getDefaultZipLookup, type ZipStateLookup } from '../text/zip-lookup.js';
import { planDeduplication } from './deduplicate.js';

const log = createLogger({ module: 'maintenance' });

export interface MaintenanceOptions {
  readonly store: RecordStore;
  /** Omit to skip the hours-fetch stage */
  readonly enricher?: HoursEnricher;
  readonly dryRun?: boolean;
  readonly skipHoursFetch?: boolean;
  readonly zipLookup?: ZipStateLookup;
}

export interface MaintenanceSummary {
  readonly dryRun: boolean;
  readonly titleCased: number;
  readonly stateAppended: number;
  readonly suffixed: number;
  readonly hoursCleared: number;
  readonly hoursFetched: number;
  /** False when the hours stage was skipped */
  readonly hoursFetchRan: boolean;
  readonly duplicatesRemoved: number;
  /** Records remaining after the pass (projected, for a dry run) */
  readonly total: number;
}

type WorkingRecord = { -readonly [K in keyof RestroomRecord]: RestroomRecord[K] };

type StageEdit = (record: WorkingRecord) => RestroomPatch | null;

/**
 * Apply an edit to every working copy; returns the patches that changed something
 */
function applyStage(records: WorkingRecord[], edit: StageEdit): Map<number, RestroomPatch> {
  const patches = new Map<number, RestroomPatch>();
  for (const record of records) {
    const patch = edit(record);
    if (patch) {
      Object.assign(record, patch);
      patches.set(record.id, patch);
    }
  }
  return patches;
}

export async function runMaintenance(options: MaintenanceOptions): Promise<MaintenanceSummary> {
  const { store } = options;
  const dryRun = options.dryRun ?? false;
  const zipLookup = options.zipLookup ?? getDefaultZipLookup();

  const records: WorkingRecord[] = (await store.all()).map((record) => ({ ...record }));

  const flush = async (stage: string, patches: Map<number, RestroomPatch>): Promise<void> => {
    log.info('Stage complete', { stage, changed: patches.size, dryRun });
    if (dryRun) return;
    for (const [id, patch] of patches) {
      await store.update(id, patch);
    }
  };

  const titled = applyStage(records, (record) => {
    const name = titleCase(record.name);
    const address = titleCase(record.address);
    if (name === record.name && address === record.address) return null;
    return { name, address };
  });
  await flush('title-case', titled);

  const stated = applyStage(records, (record) => {
    const address = ensureStateInAddress(record.address, record.zip, zipLookup);
    return address && address !== record.address ? { address } : null;
  });
  await flush('state-append', stated);

  const suffixed = applyStage(records, (record) => {
    const name = ensureSuffix(titleCase(record.name));
    return name !== record.name ? { name } : null;
  });
  await flush('suffix', suffixed);

  const cleared = applyStage(records, (record) => (isBogusHours(record.hours) ? { hours: '' } : null));
  await flush('clear-bogus-hours', cleared);

  let hoursFetched = 0;
  const hoursFetchRan = !options.skipHoursFetch && options.enricher !== undefined;
  if (options.enricher && hoursFetchRan) {
    const { hours } = await options.enricher.enrich(records);
    const fetched = applyStage(records, (record) => {
      const found = hours.get(record.id);
      return found === undefined ? null : { hours: found };
    });
    hoursFetched = fetched.size;
    await flush('hours-fetch', fetched);
  }

  const { keep, remove } = planDeduplication(records);
  log.info('Stage complete', { stage: 'deduplicate', changed: remove.length, dryRun });
  if (!dryRun) {
    await store.deleteMany(remove.map((record) => record.id));
  }

  const total = dryRun ? keep.length : await store.count();

  return {
    dryRun,
    titleCased: titled.size,
    stateAppended: stated.size,
    suffixed: suffixed.size,
    hoursCleared: cleared.size,
    hoursFetched,
    hoursFetchRan,
    duplicatesRemoved: remove.length,
    total,
  };
}

/**
 * Report lines in stage order
 */
export function formatSummary(summary: MaintenanceSummary): string[] {
  const lines: string[] = [];
  if (summary.dryRun) lines.push('DRY RUN - no changes will be saved');
  lines.push(
    `Title case: ${summary.titleCased} records updated`,
    `State abbreviation added: ${summary.stateAppended} records updated`,
    `Library/Town Hall suffix: ${summary.suffixed} records updated`,
    `Cleared bogus hours: ${summary.hoursCleared} records`,
    summary.hoursFetchRan
      ? `Hours fetched from OSM: ${summary.hoursFetched} records`
      : 'Hours fetched from OSM: skipped',
    `Duplicates removed: ${summary.duplicatesRemoved} records`,
    '',
    `Done. ${summary.total} restroom locations remain.`
  );
  return lines;
}
