/**
 * Pipeline Configuration Schemas
 *
 * Zod schemas for the JSON configuration file. Keys follow the file's
 * snake_case layout; the loader maps them onto PipelineConfig.
 */

import { z } from 'zod';

export const CDSE_BASE_URL = 'https://sh.dataspace.copernicus.eu';
export const CDSE_TOKEN_URL =
  'https://identity.dataspace.copernicus.eu/auth/realms/CDSE/protocol/openid-connect/token';

const positionSchema = z.tuple([
  z.number().min(-180, 'longitude must be >= -180').max(180, 'longitude must be <= 180'),
  z.number().min(-90, 'latitude must be >= -90').max(90, 'latitude must be <= 90'),
]);

const coordinatesSchema = z
  .array(positionSchema)
  .min(3, 'Area of interest needs at least 3 coordinate pairs')
  .refine(
    (coords) => {
      const first = coords[0];
      const last = coords[coords.length - 1];
      return first !== undefined && last !== undefined && first[0] === last[0] && first[1] === last[1];
    },
    { message: 'Area of interest ring must be closed (first and last coordinate pairs equal)' }
  );

export const pipelineConfigFileSchema = z.object({
  data_directory: z.string().min(1, 'data_directory must not be empty'),
  area_of_interest: z.object({
    name: z.string().min(1).default('target_area'),
    coordinates: coordinatesSchema,
  }),
  temporal_range: z.object({
    days_back: z.number().int('days_back must be an integer').nonnegative(),
    max_cloud_cover: z.number().min(0).max(100),
  }),
  sentinel_hub: z.object({
    client_id: z.string().default(''),
    client_secret: z.string().default(''),
    instance_id: z.string().default(''),
    sh_base_url: z.string().url().default(CDSE_BASE_URL),
    sh_token_url: z.string().url().default(CDSE_TOKEN_URL),
  }),
  asf: z.object({
    download_directory: z.string().min(1, 'asf.download_directory must not be empty'),
    max_results: z.number().int().positive('asf.max_results must be positive'),
  }),
  processing: z.object({
    resolution: z.number().positive('processing.resolution must be positive'),
    bbox_size_km: z.number().positive('processing.bbox_size_km must be positive'),
  }),
});

export type PipelineConfigFile = z.infer<typeof pipelineConfigFileSchema>;

/**
 * Input shape of the config file (before defaults are applied)
 */
export type PipelineConfigFileInput = z.input<typeof pipelineConfigFileSchema>;

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
