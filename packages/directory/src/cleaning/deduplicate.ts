/**
 * Deduplication Engine
 *
 * Records whose coordinates round to the same 5-decimal key (~1 m) are
 * duplicates. Within a group the most informative record survives; the rest
 * are deleted. Near-duplicate text at different coordinates is left alone.
 */

import { SPATIAL_KEY_PRECISION } from '../core/constants.js';
import type { RestroomRecord } from '../core/types.js';
import { roundTo } from '../core/geo-utils.js';
import { hasGenuineHours } from '../text/hours.js';

type DedupCandidate = Pick<RestroomRecord, 'id' | 'latitude' | 'longitude' | 'hours' | 'remarks'>;

/**
 * Preference criterion: higher score wins
 */
interface KeepCriterion {
  readonly name: string;
  readonly score: (record: DedupCandidate) => number;
}

/** Evaluated in order; later criteria only break ties */
export const KEEP_CRITERIA: readonly KeepCriterion[] = [
  { name: 'genuine-hours', score: (r) => (hasGenuineHours(r.hours) ? 1 : 0) },
  { name: 'has-remarks', score: (r) => (r.remarks.trim() ? 1 : 0) },
  { name: 'detail-length', score: (r) => r.hours.length + r.remarks.length },
];

export interface DeduplicationPlan<T extends DedupCandidate> {
  /** One survivor per spatial key, in first-seen key order */
  readonly keep: readonly T[];
  /** Records to delete */
  readonly remove: readonly T[];
}

/**
 * Grouping key "lat,lon" at 5 decimals; null coordinates key as 0,0
 */
export function spatialKey(record: Pick<RestroomRecord, 'latitude' | 'longitude'>): string {
  const lat = roundTo(record.latitude ?? 0, SPATIAL_KEY_PRECISION);
  const lon = roundTo(record.longitude ?? 0, SPATIAL_KEY_PRECISION);
  return `${lat},${lon}`;
}

/**
 * Order records best-first; equal records fall back to ascending id
 */
export function compareForKeep(a: DedupCandidate, b: DedupCandidate): number {
  for (const criterion of KEEP_CRITERIA) {
    const diff = criterion.score(b) - criterion.score(a);
    if (diff !== 0) return diff;
  }
  return a.id - b.id;
}

/**
 * Decide which records survive deduplication
 *
 * The survivor depends only on record contents (and id for exact ties), not
 * on input order.
 */
export function planDeduplication<T extends DedupCandidate>(
  records: readonly T[]
): DeduplicationPlan<T> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const key = spatialKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  const keep: T[] = [];
  const remove: T[] = [];

  for (const group of groups.values()) {
    const [best, ...rest] = [...group].sort(compareForKeep);
    if (best) keep.push(best);
    remove.push(...rest);
  }

  return { keep, remove };
}
