/**
 * Scene metadata file schema
 *
 * Validates the per-scene JSON snapshots written by the orchestrator when they
 * are read back by the metadata download tool. Snapshot bookkeeping fields
 * (stage, attemptedAt, ...) are stripped.
 */

import { z } from 'zod';

const UNKNOWN = 'unknown';

const indexSchema = z.union([z.string(), z.number()]).default(UNKNOWN);

export const storedSceneRecordSchema = z.object({
  granuleName: z.string().min(1, 'granuleName must not be empty'),
  acquisitionTime: z.string().nullable().default(null),
  platform: z.string().default('SENTINEL-1'),
  beamMode: z.string().default(UNKNOWN),
  orbitDirection: z.string().default(UNKNOWN),
  polarization: z.string().default(UNKNOWN),
  url: z.string().default(''),
  sizeMb: z.number().nonnegative().default(0),
  pathNumber: indexSchema,
  frameNumber: indexSchema,
  s3Urls: z.array(z.string()).default([]),
  source: z.enum(['asf', 'sentinel_hub']).default('asf'),
  parseErrors: z.array(z.string()).default([]),
});
