/**
 * ASF record normalization
 *
 * Maps the `properties` object of one ASF search GeoJSON feature onto a
 * SceneRecord. Field names differ between ASF endpoints and product types, so
 * each SceneRecord field reads from an ordered list of candidate keys. A
 * malformed record never fails the batch: missing values become sentinels and
 * the problem is written to `parseErrors`.
 */

import type { SceneRecord } from '../../types/scene.js';
import { RecordParseError } from '../../types/errors.js';
import { parseAcquisitionTime } from '../../utils/dateUtils.js';

export const UNKNOWN = 'unknown';

const GRANULE_NAME_KEYS = ['sceneName', 'fileName', 'granuleName', 'productName'] as const;
const ACQUISITION_TIME_KEYS = ['startTime', 'acquisitionDate', 'sensingTime'] as const;

type RawProperties = Record<string, unknown>;

function isRecord(value: unknown): value is RawProperties {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(props: RawProperties, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = props[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function stringOr(props: RawProperties, key: string, fallback: string): string {
  return firstString(props, [key]) ?? fallback;
}

function indexOr(props: RawProperties, key: string): string | number {
  const value = props[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return UNKNOWN;
}

/**
 * Strip the archive extension ASF puts on `fileName`
 */
function granuleFromValue(key: string, value: string): string {
  return key === 'fileName' ? value.replace(/\.zip$/i, '') : value;
}

/**
 * Normalize one ASF result into a frozen SceneRecord
 */
export function normalizeAsfRecord(raw: unknown): SceneRecord {
  const parseErrors: string[] = [];
  const props: RawProperties = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) {
    parseErrors.push(new RecordParseError('properties', 'record has no properties object').message);
  }

  let granuleName = UNKNOWN;
  for (const key of GRANULE_NAME_KEYS) {
    const value = firstString(props, [key]);
    if (value) {
      granuleName = granuleFromValue(key, value);
      break;
    }
  }
  if (granuleName === UNKNOWN) {
    parseErrors.push(
      new RecordParseError('granuleName', `none of ${GRANULE_NAME_KEYS.join(', ')} present`).message
    );
  }

  let acquisitionTime: string | null = null;
  const rawTime = firstString(props, ACQUISITION_TIME_KEYS);
  if (rawTime === undefined) {
    parseErrors.push(
      new RecordParseError('acquisitionTime', `none of ${ACQUISITION_TIME_KEYS.join(', ')} present`).message
    );
  } else {
    acquisitionTime = parseAcquisitionTime(rawTime);
    if (acquisitionTime === null) {
      parseErrors.push(new RecordParseError('acquisitionTime', `could not parse "${rawTime}"`).message);
    }
  }

  const bytes = props.bytes;
  let sizeMb = 0;
  if (typeof bytes === 'number' && Number.isFinite(bytes) && bytes > 0) {
    sizeMb = bytes / (1024 * 1024);
  } else if (bytes !== undefined && bytes !== null && bytes !== 0) {
    parseErrors.push(new RecordParseError('sizeMb', `invalid byte count ${JSON.stringify(bytes)}`).message);
  }

  const s3Urls = Array.isArray(props.s3Urls)
    ? props.s3Urls.filter((url): url is string => typeof url === 'string')
    : [];

  const record: SceneRecord = {
    granuleName,
    acquisitionTime,
    platform: stringOr(props, 'platform', 'SENTINEL-1'),
    beamMode: firstString(props, ['beamModeType', 'beamMode']) ?? UNKNOWN,
    orbitDirection: stringOr(props, 'flightDirection', UNKNOWN),
    polarization: stringOr(props, 'polarization', UNKNOWN),
    url: stringOr(props, 'url', ''),
    sizeMb,
    pathNumber: indexOr(props, 'pathNumber'),
    frameNumber: indexOr(props, 'frameNumber'),
    s3Urls: Object.freeze(s3Urls),
    source: 'asf',
    parseErrors: Object.freeze(parseErrors),
  };
  return Object.freeze(record);
}
