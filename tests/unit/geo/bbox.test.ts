import type { Polygon } from 'geojson';
import { describe, expect, it } from 'vitest';
import { assertValidPolygon, computeBbox, polygonToWkt } from '../../../src/geo/bbox.js';
import { bboxToDimensions, utmZoneForLongitude } from '../../../src/geo/crsTransform.js';
import { ConfigError } from '../../../src/types/errors.js';

const square: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [-74.0, 40.7],
      [-74.0, 40.8],
      [-73.9, 40.8],
      [-73.9, 40.7],
      [-74.0, 40.7],
    ],
  ],
};

describe('computeBbox', () => {
  it('returns [minLon, minLat, maxLon, maxLat]', () => {
    expect(computeBbox(square)).toEqual([-74, 40.7, -73.9, 40.8]);
  });
});

describe('polygonToWkt', () => {
  it('serializes a closed ring as is', () => {
    expect(polygonToWkt(square)).toBe('POLYGON((-74 40.7, -74 40.8, -73.9 40.8, -73.9 40.7, -74 40.7))');
  });

  it('closes an open ring', () => {
    const open: Polygon = { type: 'Polygon', coordinates: [[[0, 0], [0, 1], [1, 1]]] };

    expect(polygonToWkt(open)).toBe('POLYGON((0 0, 0 1, 1 1, 0 0))');
  });
});

describe('assertValidPolygon', () => {
  it('rejects a ring with fewer than three vertices', () => {
    expect(() => assertValidPolygon({ type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] })).toThrow(ConfigError);
    expect(() => assertValidPolygon({ type: 'Polygon', coordinates: [] })).toThrow(
      'Area of interest needs at least 3 coordinate pairs'
    );
  });
});

describe('crsTransform', () => {
  it('picks the UTM zone of a longitude', () => {
    expect(utmZoneForLongitude(-180)).toBe(1);
    expect(utmZoneForLongitude(-73.95)).toBe(18);
    expect(utmZoneForLongitude(180)).toBe(60);
  });

  it('derives pixel dimensions in the zone of the bbox centre', () => {
    const dimensions = bboxToDimensions(computeBbox(square), 10);

    expect(dimensions.utmZone).toBe(18);
    // 0.1 degree of longitude at 40.75N is about 8.4 km, 0.1 degree of latitude about 11.1 km
    expect(dimensions.width).toBeGreaterThan(800);
    expect(dimensions.width).toBeLessThan(870);
    expect(dimensions.height).toBeGreaterThan(1080);
    expect(dimensions.height).toBeLessThan(1160);
  });

  it('rejects a non-positive resolution', () => {
    expect(() => bboxToDimensions([0, 0, 1, 1], 0)).toThrow('Resolution must be positive, got 0');
  });
});
