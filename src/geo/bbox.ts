/**
 * Bbox Utility
 *
 * Bounding box and WKT derivation for the area of interest.
 */

import type { Polygon, Position } from 'geojson';
import { ConfigError } from '../types/errors.js';

/** [minLon, minLat, maxLon, maxLat] */
export type Bbox = [number, number, number, number];

/**
 * Ensure the polygon's outer ring has at least three vertices
 * @throws {ConfigError} If the ring is missing or too short
 */
export function assertValidPolygon(polygon: Polygon): Position[] {
  const ring = polygon.coordinates[0];
  if (!ring || ring.length < 3) {
    throw new ConfigError('Area of interest needs at least 3 coordinate pairs', [
      `got ${ring?.length ?? 0} coordinate pairs`,
    ]);
  }
  return ring;
}

/**
 * Compute bounding box of a WGS84 polygon
 *
 * @returns Bbox as [minLon, minLat, maxLon, maxLat]
 */
export function computeBbox(polygon: Polygon): Bbox {
  const ring = assertValidPolygon(polygon);

  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;

  for (const [lon, lat] of ring) {
    minLon = Math.min(minLon, lon);
    minLat = Math.min(minLat, lat);
    maxLon = Math.max(maxLon, lon);
    maxLat = Math.max(maxLat, lat);
  }

  return [minLon, minLat, maxLon, maxLat];
}

function formatPosition([lon, lat]: Position): string {
  return `${lon} ${lat}`;
}

/**
 * Serialize a polygon to WKT, closing the ring if the last vertex does not repeat the first
 */
export function polygonToWkt(polygon: Polygon): string {
  const ring = assertValidPolygon(polygon);
  const first = ring[0];
  const last = ring[ring.length - 1];
  const closed = first[0] === last[0] && first[1] === last[1] ? ring : [...ring, first];
  return `POLYGON((${closed.map(formatPosition).join(', ')}))`;
}
