/**
 * Pipeline Configuration
 *
 * Loads the JSON configuration file once at startup and hands out an immutable
 * PipelineConfig. A missing file is replaced by a generated default.
 */

import fs from 'fs';
import path from 'path';
import type { Polygon, Position } from 'geojson';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../types/errors.js';
import {
  CDSE_BASE_URL,
  CDSE_TOKEN_URL,
  formatZodIssues,
  pipelineConfigFileSchema,
  type PipelineConfigFile,
  type PipelineConfigFileInput,
} from '../validation/pipelineConfigSchemas.js';

export const DEFAULT_CONFIG_FILE = 'pipeline_config.json';

export interface PipelineConfig {
  readonly configPath: string;
  readonly dataDirectory: string;
  readonly areaOfInterest: {
    readonly name: string;
    readonly polygon: Polygon;
  };
  readonly temporalRange: {
    readonly daysBack: number;
    readonly maxCloudCover: number;
  };
  readonly sentinelHub: {
    readonly clientId: string;
    readonly clientSecret: string;
    readonly instanceId: string;
    readonly baseUrl: string;
    readonly tokenUrl: string;
  };
  readonly asf: {
    readonly downloadDirectory: string;
    readonly maxResults: number;
  };
  readonly processing: {
    readonly resolution: number;
    readonly bboxSizeKm: number;
  };
}

/**
 * Directory layout derived from the configuration
 */
export interface PipelinePaths {
  readonly dataDirectory: string;
  /** Per-scene metadata snapshots */
  readonly metadataDirectory: string;
  /** Downloaded archives, kept as a resume cache */
  readonly rawArchiveDirectory: string;
  /** Extracted SAFE products */
  readonly safeDirectory: string;
  readonly sentinelHubDirectory: string;
}

export const DEFAULT_CONFIG: PipelineConfigFileInput = {
  data_directory: './sar_data',
  area_of_interest: {
    name: 'target_area',
    coordinates: [
      [-74.0, 40.7],
      [-74.0, 40.8],
      [-73.9, 40.8],
      [-73.9, 40.7],
      [-74.0, 40.7],
    ],
  },
  temporal_range: {
    days_back: 30,
    max_cloud_cover: 20,
  },
  sentinel_hub: {
    instance_id: '',
    client_id: '',
    client_secret: '',
    sh_base_url: CDSE_BASE_URL,
    sh_token_url: CDSE_TOKEN_URL,
  },
  asf: {
    download_directory: './sar_data/asf',
    max_results: 100,
  },
  processing: {
    resolution: 10,
    bbox_size_km: 50,
  },
};

/**
 * Apply optional environment overrides for the Sentinel Hub client
 */
export interface SentinelHubOverrides {
  clientId?: string;
  clientSecret?: string;
  instanceId?: string;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function toPolygon(coordinates: Array<[number, number]>): Polygon {
  const ring: Position[] = coordinates.map(([lon, lat]) => [lon, lat]);
  return { type: 'Polygon', coordinates: [ring] };
}

/**
 * Map a validated config file onto the immutable runtime configuration
 */
export function buildPipelineConfig(
  file: PipelineConfigFile,
  configPath: string,
  overrides: SentinelHubOverrides = {}
): PipelineConfig {
  const config: PipelineConfig = {
    configPath,
    dataDirectory: path.resolve(file.data_directory),
    areaOfInterest: {
      name: file.area_of_interest.name,
      polygon: toPolygon(file.area_of_interest.coordinates),
    },
    temporalRange: {
      daysBack: file.temporal_range.days_back,
      maxCloudCover: file.temporal_range.max_cloud_cover,
    },
    sentinelHub: {
      clientId: overrides.clientId || file.sentinel_hub.client_id,
      clientSecret: overrides.clientSecret || file.sentinel_hub.client_secret,
      instanceId: overrides.instanceId || file.sentinel_hub.instance_id,
      baseUrl: file.sentinel_hub.sh_base_url,
      tokenUrl: file.sentinel_hub.sh_token_url,
    },
    asf: {
      downloadDirectory: path.resolve(file.asf.download_directory),
      maxResults: file.asf.max_results,
    },
    processing: {
      resolution: file.processing.resolution,
      bboxSizeKm: file.processing.bbox_size_km,
    },
  };
  return deepFreeze(config);
}

/**
 * Parse raw JSON content into a validated config file
 * @throws {ConfigError} on invalid JSON or schema violations
 */
export function parsePipelineConfig(raw: string, configPath: string): PipelineConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}`, [error instanceof Error ? error.message : String(error)], {
      configPath,
    });
  }

  const result = pipelineConfigFileSchema.safeParse(json);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigError(`Invalid configuration in ${configPath}`, issues, { configPath });
  }
  return result.data;
}

/**
 * Write the default configuration file
 */
export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(path.resolve(configPath)), { recursive: true });
  fs.writeFileSync(configPath, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`, 'utf-8');
  logger.info({ configPath }, 'Created default config file');
  logger.info('Please update the configuration with your credentials and area of interest');
}

/**
 * Load, validate and freeze the pipeline configuration
 *
 * @param configPath - Path to the JSON file; created with defaults when missing
 * @throws {ConfigError} If the file is unreadable or invalid
 */
export function loadPipelineConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  overrides: SentinelHubOverrides = {}
): PipelineConfig {
  if (!fs.existsSync(configPath)) {
    logger.warn({ configPath }, 'Config file not found, creating default config');
    writeDefaultConfig(configPath);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const file = parsePipelineConfig(raw, configPath);
  return buildPipelineConfig(file, path.resolve(configPath), overrides);
}

export function resolvePipelinePaths(config: PipelineConfig): PipelinePaths {
  return {
    dataDirectory: config.dataDirectory,
    metadataDirectory: config.asf.downloadDirectory,
    rawArchiveDirectory: path.join(config.dataDirectory, 'raw_zip'),
    safeDirectory: path.join(config.dataDirectory, 'safe_extracted'),
    sentinelHubDirectory: path.join(config.dataDirectory, 'sentinel_hub'),
  };
}

export function ensurePipelineDirectories(paths: PipelinePaths): void {
  for (const dir of Object.values(paths)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export interface ConfigValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate a config file without loading it, collecting errors and warnings
 */
export function validateConfigFile(configPath: string = DEFAULT_CONFIG_FILE): ConfigValidationReport {
  if (!fs.existsSync(configPath)) {
    return { valid: false, errors: [`Config file ${configPath} not found`], warnings: [] };
  }

  let file: PipelineConfigFile;
  try {
    file = parsePipelineConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      return { valid: false, errors: error.issues.length > 0 ? error.issues : [error.message], warnings: [] };
    }
    throw error;
  }

  const warnings: string[] = [];
  if (!file.sentinel_hub.client_id) {
    warnings.push('Sentinel Hub client_id not configured');
  }
  if (!file.sentinel_hub.client_secret) {
    warnings.push('Sentinel Hub client_secret not configured');
  }
  if (!file.sentinel_hub.instance_id) {
    warnings.push('No Instance ID provided - using Copernicus Data Space Ecosystem mode');
  }
  if (!fs.existsSync(file.data_directory)) {
    warnings.push(`Data directory does not exist: ${file.data_directory}`);
  }

  return { valid: true, errors: [], warnings };
}
