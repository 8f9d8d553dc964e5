/**
 * Scene, selection and run types shared by the search adapters, the selector
 * and the acquisition orchestrator.
 */

import type { Polygon } from 'geojson';

export type SceneSource = 'asf' | 'sentinel_hub';

/**
 * One normalized search hit. Frozen after the adapter creates it.
 */
export interface SceneRecord {
  /** De-duplication key across all selection logic */
  readonly granuleName: string;
  /** Normalized ISO-8601 UTC timestamp, or null when the provider value could not be parsed */
  readonly acquisitionTime: string | null;
  readonly platform: string;
  readonly beamMode: string;
  readonly orbitDirection: string;
  readonly polarization: string;
  /** Download URL, may be empty */
  readonly url: string;
  readonly sizeMb: number;
  readonly pathNumber: string | number;
  readonly frameNumber: string | number;
  readonly s3Urls: readonly string[];
  readonly source: SceneSource;
  /** Per-field diagnostics collected while normalizing the raw record */
  readonly parseErrors: readonly string[];
}

/**
 * Spatio-temporal query passed to every provider adapter
 */
export interface SceneSearchQuery {
  areaOfInterest: Polygon;
  start: Date;
  end: Date;
  maxResults: number;
  platform: string;
  productType: string;
}

export interface SearchResponse {
  records: SceneRecord[];
  /** Set when the provider query failed; records is then empty */
  failure?: Error;
  /** Set when the provider was skipped because it is not configured */
  skipped?: string;
}

/**
 * Provider search capability
 */
export interface SceneSearchProvider {
  readonly name: SceneSource;
  search(query: SceneSearchQuery, signal?: AbortSignal): Promise<SearchResponse>;
}

export interface SelectionResult {
  /** At most two distinct scenes, most recent first */
  scenes: SceneRecord[];
  mostRecent: SceneRecord | null;
  closestToTarget: SceneRecord | null;
  targetTime: string;
  /** Whole-day distance between the closest scene and the target */
  daysFromTarget: number | null;
  /** True when no record had a usable acquisition time */
  noValidScenes: boolean;
}

export type AcquisitionStage = 'not_started' | 'downloaded' | 'extracted' | 'verified' | 'failed';

export type Polarization = 'VV' | 'VH' | 'HH' | 'HV';

export type MeasurementFiles = Partial<Record<Polarization, string>>;

/**
 * Result of acquiring one scene. A retry produces a new outcome.
 */
export interface AcquisitionOutcome {
  readonly granuleName: string;
  readonly stageReached: AcquisitionStage;
  readonly finalPath?: string;
  readonly error?: string;
  /** Stage that was being attempted when the scene failed */
  readonly failedStage?: Exclude<AcquisitionStage, 'failed' | 'not_started'>;
  readonly measurementFiles?: MeasurementFiles;
}

export interface ProviderRunCounts {
  found: number;
  searchFailed: boolean;
}

export interface RunSummary {
  readonly executionTime: string;
  readonly timeRange: { readonly start: string; readonly end: string };
  readonly targetDaysBack: number;
  readonly asfResults: ProviderRunCounts & { readonly selected: number; readonly downloaded: number };
  readonly sentinelHubResults: ProviderRunCounts & { readonly processed: number };
  readonly totalFiles: number;
  readonly selectedScenes: readonly string[];
  readonly outcomes: readonly AcquisitionOutcome[];
}

/**
 * Per-scene metadata snapshot written under the ASF download directory
 */
export interface SceneMetadataSnapshot extends SceneRecord {
  stage: AcquisitionStage;
  attemptedAt: string;
  finalPath?: string;
  error?: string;
}
