/**
 * Deduplication Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { compareForKeep, planDeduplication, spatialKey } from '../../../cleaning/deduplicate.js';
import type { RestroomRecord } from '../../../core/types.js';

function record(id: number, overrides: Partial<RestroomRecord> = {}): RestroomRecord {
  return {
    id,
    name: `Restroom ${id}`,
    address: '1 Main St',
    zip: '02478',
    latitude: 42.3959,
    longitude: -71.1786,
    hours: '',
    remarks: '',
    ...overrides,
  };
}

describe('spatialKey', () => {
  it('should round coordinates to five decimals', () => {
    expect(spatialKey({ latitude: 42.123456, longitude: -71.000004 })).toBe('42.12346,-71');
  });

  it('should key missing coordinates as 0,0', () => {
    expect(spatialKey({ latitude: null, longitude: null })).toBe('0,0');
  });
});

describe('compareForKeep', () => {
  it('should prefer genuine hours over remarks', () => {
    const withHours = record(2, { hours: 'Mon-Fri 9-5' });
    const withRemarks = record(1, { remarks: 'Ask at the front desk for the key' });
    expect(compareForKeep(withHours, withRemarks)).toBeLessThan(0);
  });

  it('should not count numeric codes as hours', () => {
    const bogus = record(1, { hours: '12345' });
    const withRemarks = record(2, { remarks: 'Lower level' });
    expect(compareForKeep(withRemarks, bogus)).toBeLessThan(0);
  });

  it('should prefer longer detail, then the lower id', () => {
    const short = record(1, { hours: 'Mo-Fr 9-5' });
    const long = record(2, { hours: 'Mo-Fr 09:00-17:00' });
    expect(compareForKeep(long, short)).toBeLessThan(0);
    expect(compareForKeep(record(3), record(4))).toBeLessThan(0);
  });
});

describe('planDeduplication', () => {
  const records = [
    record(1, { latitude: 42.000001, longitude: -71.000001 }),
    record(2, { latitude: 42.000002, longitude: -71.000002, hours: 'Mon-Fri 9-5' }),
    record(3, { latitude: 42.1, longitude: -71.1 }),
    record(4, { latitude: 42.1, longitude: -71.1, remarks: 'Side entrance' }),
    record(5, { latitude: 42.2, longitude: -71.2 }),
  ];

  it('should keep the most informative record per location', () => {
    const plan = planDeduplication(records);
    expect(plan.keep.map((r) => r.id)).toEqual([2, 4, 5]);
    expect(plan.remove.map((r) => r.id).sort()).toEqual([1, 3]);
  });

  it('should choose the same survivors regardless of input order', () => {
    const forward = planDeduplication(records).keep.map((r) => r.id).sort();
    const reversed = planDeduplication([...records].reverse()).keep.map((r) => r.id).sort();
    expect(reversed).toEqual(forward);
  });

  it('should keep records with similar text at different coordinates', () => {
    const plan = planDeduplication([
      record(1, { name: 'Town Hall', latitude: 42.3, longitude: -71.3 }),
      record(2, { name: 'Town Hall', latitude: 42.30002, longitude: -71.3 }),
    ]);
    expect(plan.remove).toEqual([]);
  });
});
