/**
 * Hours Enricher Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { HoursEnricher, needsHoursLookup } from '../../../enrichment/hours-enricher.js';
import { StubHoursSource } from '../../utils/stubs.js';

function candidate(id: number, latitude: number | null, longitude: number | null, hours = '') {
  return { id, latitude, longitude, hours };
}

describe('needsHoursLookup', () => {
  it('should require missing hours and a usable location', () => {
    expect(needsHoursLookup(candidate(1, 42.4, -71.2))).toBe(true);
    expect(needsHoursLookup(candidate(2, 42.4, -71.2, '123'))).toBe(true);
    expect(needsHoursLookup(candidate(3, 42.4, -71.2, 'Mo-Fr 09:00-17:00'))).toBe(false);
    expect(needsHoursLookup(candidate(4, null, null))).toBe(false);
    expect(needsHoursLookup(candidate(5, 0, 0))).toBe(false);
  });
});

describe('HoursEnricher', () => {
  it('should space lookups by the configured interval', async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const source = new StubHoursSource();
    const enricher = new HoursEnricher(source, { sleepFn, clock: () => 5_000 });

    await enricher.enrich([
      candidate(1, 42.1, -71.1),
      candidate(2, 42.2, -71.2),
      candidate(3, 42.3, -71.3),
    ]);

    expect(source.calls).toHaveLength(3);
    expect(sleepFn.mock.calls).toEqual([[1050], [1050]]);
  });

  it('should not sleep when enough time has already passed', async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    let now = 0;
    const enricher = new HoursEnricher(new StubHoursSource(), {
      sleepFn,
      clock: () => (now += 2_000),
    });

    await enricher.enrich([candidate(1, 42.1, -71.1), candidate(2, 42.2, -71.2)]);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it('should collect found hours and count failures without throwing', async () => {
    const source = new StubHoursSource([
      { status: 'failed', reason: 'timeout', detail: 'No response within 5000ms' },
      { status: 'found', hours: 'Mo-Su 06:00-22:00' },
      { status: 'not-found' },
    ]);
    const enricher = new HoursEnricher(source, { sleepFn: async () => {}, radiusMeters: 120 });

    const { hours, stats } = await enricher.enrich([
      candidate(1, 42.1, -71.1),
      candidate(2, 42.2, -71.2),
      candidate(3, 42.3, -71.3),
      candidate(4, 42.4, -71.4, 'Open 24 hours'),
    ]);

    expect([...hours]).toEqual([[2, 'Mo-Su 06:00-22:00']]);
    expect(stats).toEqual({ attempted: 3, found: 1, failed: 1 });
    expect(source.calls.map((call) => call.radius)).toEqual([120, 120, 120]);
  });
});
