/**
 * CRS Transformation Utility
 *
 * WGS84 → UTM projection used to express the area of interest in metres.
 */

import proj4 from 'proj4';
import type { Bbox } from './bbox.js';

const EPSG4326_DEF = '+proj=longlat +datum=WGS84 +no_defs';

/**
 * UTM zone number (1-60) for a longitude
 */
export function utmZoneForLongitude(lon: number): number {
  const zone = Math.floor((lon + 180) / 6) + 1;
  return Math.min(Math.max(zone, 1), 60);
}

export function utmProjectionDef(zone: number, southern: boolean): string {
  return `+proj=utm +zone=${zone}${southern ? ' +south' : ''} +datum=WGS84 +units=m +no_defs`;
}

/**
 * Transform a WGS84 position into the given UTM zone
 *
 * @returns [easting, northing] in metres
 */
export function transformWgs84ToUtm(lon: number, lat: number, zone: number, southern: boolean): [number, number] {
  const [x, y] = proj4(EPSG4326_DEF, utmProjectionDef(zone, southern), [lon, lat]);
  return [x, y];
}

export interface BboxDimensions {
  width: number;
  height: number;
  utmZone: number;
}

/**
 * Pixel dimensions of a bbox at the given resolution (metres per pixel).
 * The bbox is projected into the UTM zone of its centre.
 */
export function bboxToDimensions(bbox: Bbox, resolution: number): BboxDimensions {
  if (resolution <= 0) {
    throw new Error(`Resolution must be positive, got ${resolution}`);
  }
  const [minLon, minLat, maxLon, maxLat] = bbox;
  const centerLon = (minLon + maxLon) / 2;
  const centerLat = (minLat + maxLat) / 2;
  const zone = utmZoneForLongitude(centerLon);
  const southern = centerLat < 0;

  const [x0, y0] = transformWgs84ToUtm(minLon, minLat, zone, southern);
  const [x1, y1] = transformWgs84ToUtm(maxLon, maxLat, zone, southern);

  return {
    width: Math.round(Math.abs(x1 - x0) / resolution),
    height: Math.round(Math.abs(y1 - y0) / resolution),
    utmZone: zone,
  };
}
