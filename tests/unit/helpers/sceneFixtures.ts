import { DAY_MS } from '../../../src/utils/dateUtils.js';
import type { SceneRecord } from '../../../src/types/scene.js';

export const NOW = new Date('2024-06-15T12:00:00.000Z');

export function daysBefore(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY_MS);
}

export function makeScene(granuleName: string, time: Date | null, overrides: Partial<SceneRecord> = {}): SceneRecord {
  return {
    granuleName,
    acquisitionTime: time ? time.toISOString() : null,
    platform: 'SENTINEL-1',
    beamMode: 'IW',
    orbitDirection: 'ASCENDING',
    polarization: 'VV+VH',
    url: `https://downloads.example.test/${granuleName}.zip`,
    sizeMb: 4200,
    pathNumber: 33,
    frameNumber: 120,
    s3Urls: [],
    source: 'asf',
    parseErrors: [],
    ...overrides,
  };
}
