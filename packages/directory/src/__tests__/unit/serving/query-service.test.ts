/**
 * Geospatial Query Engine Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { QueryService } from '../../../serving/query-service.js';
import { InMemoryRecordStore, restroom } from '../../utils/memory-record-store.js';
import { StubGeocoder } from '../../utils/stubs.js';

describe('QueryService', () => {
  let store: InMemoryRecordStore;
  let geocoder: StubGeocoder;
  let service: QueryService;

  beforeEach(() => {
    store = new InMemoryRecordStore([
      restroom({ name: 'North', address: '1 Main St, Belmont', zip: '02478', latitude: 42.5, longitude: -71.0 }),
      restroom({ name: 'Near', address: '2 Main St, Belmont, MA', zip: '02478', latitude: 42.1, longitude: -71.0 }),
      restroom({ name: 'West', address: '3 Elm St, Medford', zip: '02155', latitude: 42.0, longitude: -71.2 }),
      restroom({ name: 'Unlocated', address: '4 Elm St, Medford', zip: '02155', latitude: null, longitude: null }),
      restroom({ name: 'Boston Common', address: '139 Tremont St, Boston, MA', zip: '02111', latitude: 42.355, longitude: -71.064 }),
    ]);
    geocoder = new StubGeocoder({ 'springfield, illinois': { lat: 39.7817, lon: -89.6501 } });
    service = new QueryService({
      store,
      geocoder,
      defaultCenter: { lat: 42.5, lon: -71.0 },
      clock: () => 0,
    });
  });

  describe('withinBounds', () => {
    it('should return records inside the viewport with state-completed addresses', async () => {
      const views = await service.withinBounds({ swLat: 42.6, swLon: -70.9, neLat: 42.05, neLon: -71.05 });

      expect(views.map((v) => v.name)).toEqual(['North', 'Near']);
      expect(views[0]?.address).toBe('1 Main St, Belmont, MA');
    });

    it('should not modify stored addresses', async () => {
      await service.withinBounds({ swLat: 42, swLon: -72, neLat: 43, neLon: -70 });
      expect((await store.get(1))?.address).toBe('1 Main St, Belmont');
    });
  });

  describe('nearest', () => {
    it('should order by distance from the center', async () => {
      const ranked = await service.nearest({ lat: 42.0, lon: -71.0 });

      expect(ranked.map((r) => r.name)).toEqual(['Near', 'West', 'Boston Common', 'North']);
      expect(ranked[0]?.distanceMiles).toBeCloseTo(6.91, 1);
    });

    it('should use the default center for missing or invalid points', async () => {
      expect((await service.nearest())[0]?.name).toBe('North');
      expect((await service.nearest({ lat: 200, lon: -71 }))[0]?.name).toBe('North');
      expect((await service.nearest({ lat: Number.NaN, lon: Number.NaN }))[0]?.name).toBe('North');
    });
  });

  describe('getRestroom', () => {
    it('should return located records only', async () => {
      expect(await service.getRestroom(2)).toMatchObject({ id: 2, name: 'Near' });
      expect(await service.getRestroom(4)).toBeNull();
      expect(await service.getRestroom(99)).toBeNull();
    });
  });

  describe('searchPlaces', () => {
    it('should rank prefix matches before other matches', async () => {
      const matches = await service.searchPlaces('m');
      expect(matches.map((m) => m.name)).toEqual(['Medford, MA', 'Belmont, MA', 'Boston, MA']);
    });

    it('should match case-insensitively and ignore blank queries', async () => {
      expect((await service.searchPlaces('BEL')).map((m) => m.slug)).toEqual(['belmont-massachusetts']);
      expect(await service.searchPlaces('   ')).toEqual([]);
    });

    it('should return at most twelve places', async () => {
      const many = new InMemoryRecordStore(
        Array.from({ length: 15 }, (_, i) =>
          restroom({ address: `1 Main St, Town${String(i + 1).padStart(2, '0')}`, zip: '02478' })
        )
      );
      const results = await new QueryService({ store: many }).searchPlaces('town');

      expect(results).toHaveLength(12);
      expect(results[0]?.name).toBe('Town01, MA');
      expect(results[11]?.name).toBe('Town12, MA');
    });
  });

  describe('resolvePlace', () => {
    it('should answer indexed slugs without geocoding', async () => {
      const place = await service.resolvePlace('belmont-massachusetts');

      expect(place).toMatchObject({ name: 'Belmont, MA', slug: 'belmont-massachusetts', source: 'index' });
      expect(place?.latitude).toBeCloseTo(42.3, 10);
      expect(geocoder.queries).toEqual([]);
    });

    it('should geocode unindexed slugs that end in a state name', async () => {
      expect(await service.resolvePlace('springfield-illinois')).toEqual({
        name: 'Springfield, Illinois',
        latitude: 39.7817,
        longitude: -89.6501,
        slug: 'springfield-illinois',
        source: 'geocoder',
      });
      expect(geocoder.queries).toEqual(['springfield, illinois']);
    });

    it('should return null for unknown states and geocoding misses', async () => {
      expect(await service.resolvePlace('springfield-narnia')).toBeNull();
      expect(geocoder.queries).toEqual([]);

      expect(await service.resolvePlace('shelbyville-illinois')).toBeNull();
      expect(geocoder.queries).toEqual(['shelbyville, illinois']);
    });

    it('should ignore geocoder answers outside geographic ranges', async () => {
      const skewed = new QueryService({
        store,
        geocoder: new StubGeocoder({ 'springfield, illinois': { lat: 97, lon: -89.6501 } }),
      });
      expect(await skewed.resolvePlace('springfield-illinois')).toBeNull();
    });

    it('should not geocode without a geocoder', async () => {
      const offline = new QueryService({ store });
      expect(await offline.resolvePlace('springfield-illinois')).toBeNull();
    });
  });
});
