/**
 * Coordinate Reprojector Tests
 */

import { describe, it, expect } from 'vitest';
import { createReprojector, projectPoint } from '../../../ingestion/reprojector.js';
import { UTM_19N_PRJ } from '../../utils/shapefile-fixtures.js';

describe('createReprojector', () => {
  it('should use the identity transform without a descriptor', () => {
    const reprojector = createReprojector(undefined);
    expect(reprojector.kind).toBe('identity');
    expect(createReprojector('   ').kind).toBe('identity');
    expect(reprojector.project([-71.1, 42.4])).toEqual([-71.1, 42.4]);
  });

  it('should fall back to the identity transform for an unparseable descriptor', () => {
    const reprojector = createReprojector('GARBAGE');

    expect(reprojector).toMatchObject({ kind: 'identity', reason: 'invalid-descriptor' });
    expect(reprojector.project([-71.1786, 42.3959])).toEqual([-71.1786, 42.3959]);
    expect(createReprojector(null)).toMatchObject({ kind: 'identity', reason: 'no-descriptor' });
  });

  it('should build a proj4 transform from well-known text', () => {
    const reprojector = createReprojector(UTM_19N_PRJ);
    expect(reprojector.kind).toBe('proj4');

    const projected = projectPoint(reprojector, [330000, 4690000]);
    expect(projected.ok).toBe(true);
    if (projected.ok) {
      expect(projected.lat).toBeGreaterThan(42);
      expect(projected.lat).toBeLessThan(43);
      expect(projected.lon).toBeGreaterThan(-72);
      expect(projected.lon).toBeLessThan(-70);
    }
  });
});

describe('projectPoint', () => {
  it('should pass geographic coordinates through the identity transform', () => {
    expect(projectPoint(createReprojector(null), [-71.1786, 42.3959])).toEqual({
      ok: true,
      lat: 42.3959,
      lon: -71.1786,
    });
  });

  it('should reject projected coordinates read as degrees', () => {
    expect(projectPoint(createReprojector(null), [330000, 4690000])).toEqual({
      ok: false,
      message:
        'coordinates out of range (lat=4690000, lon=330000); ' +
        'the .prj projection file is probably missing or wrong',
    });
  });
});
