/**
 * STAC item normalization for the Sentinel Hub Catalog API
 */

import type { SceneRecord } from '../../types/scene.js';
import { RecordParseError } from '../../types/errors.js';
import { parseAcquisitionTime } from '../../utils/dateUtils.js';
import { UNKNOWN } from '../asf/asfRecordNormalizer.js';

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: RawObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function readIndex(source: RawObject, key: string): string | number {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return readString(source, key) ?? UNKNOWN;
}

/**
 * Normalize one STAC feature (`{ id, properties, assets, links }`) into a frozen SceneRecord
 */
export function normalizeStacItem(raw: unknown): SceneRecord {
  const parseErrors: string[] = [];
  const item: RawObject = isObject(raw) ? raw : {};
  const props: RawObject = isObject(item.properties) ? item.properties : {};
  if (!isObject(item.properties)) {
    parseErrors.push(new RecordParseError('properties', 'STAC item has no properties object').message);
  }

  const granuleName = readString(item, 'id') ?? UNKNOWN;
  if (granuleName === UNKNOWN) {
    parseErrors.push(new RecordParseError('granuleName', 'STAC item has no id').message);
  }

  let acquisitionTime: string | null = null;
  const rawTime = readString(props, 'datetime') ?? readString(props, 'start_datetime');
  if (rawTime === undefined) {
    parseErrors.push(new RecordParseError('acquisitionTime', 'none of datetime, start_datetime present').message);
  } else {
    acquisitionTime = parseAcquisitionTime(rawTime);
    if (acquisitionTime === null) {
      parseErrors.push(new RecordParseError('acquisitionTime', `could not parse "${rawTime}"`).message);
    }
  }

  const polarizations = props['sar:polarizations'];
  const polarization = Array.isArray(polarizations)
    ? polarizations.filter((p): p is string => typeof p === 'string').join('+') || UNKNOWN
    : UNKNOWN;

  const record: SceneRecord = {
    granuleName,
    acquisitionTime,
    platform: readString(props, 'platform') ?? 'SENTINEL-1',
    beamMode: readString(props, 'sar:instrument_mode') ?? UNKNOWN,
    orbitDirection: readString(props, 'sat:orbit_state') ?? UNKNOWN,
    polarization,
    url: '',
    sizeMb: 0,
    pathNumber: readIndex(props, 'sat:relative_orbit'),
    frameNumber: UNKNOWN,
    s3Urls: Object.freeze([]),
    source: 'sentinel_hub',
    parseErrors: Object.freeze(parseErrors),
  };
  return Object.freeze(record);
}
