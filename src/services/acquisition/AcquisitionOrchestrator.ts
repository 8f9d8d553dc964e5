/**
 * AcquisitionOrchestrator - one pipeline run and the per-scene state machine
 *
 * Per scene: not_started → downloaded → extracted → verified, or failed at any
 * stage. Work already on disk is reused: an extracted product that passes
 * verification short-circuits to verified, a cached archive skips the
 * transfer. Scenes are acquired one at a time; a failed scene never stops the
 * run.
 */

import path from 'path';
import { createChildLogger } from '../../utils/logger.js';
import { formatRunTimestamp, subtractDays } from '../../utils/dateUtils.js';
import { isAbortError, throwIfAborted } from '../../utils/sleep.js';
import { pathExists, writeJsonAtomic } from '../../utils/jsonFile.js';
import { ExtractionFailure, getErrorMessage } from '../../types/errors.js';
import {
  resolvePipelinePaths,
  type PipelineConfig,
  type PipelinePaths,
} from '../../config/pipelineConfig.js';
import type {
  AcquisitionOutcome,
  AcquisitionStage,
  MeasurementFiles,
  RunSummary,
  SceneMetadataSnapshot,
  SceneRecord,
  SceneSearchProvider,
  SceneSearchQuery,
  SearchResponse,
} from '../../types/scene.js';
import type { PipelineEvent, PipelineEventListener } from '../../types/pipelineEvents.js';
import type { ArchiveDownloader } from './ArchiveDownloader.js';
import type { ProductArchiveExtractor } from './ProductArchiveExtractor.js';
import { measurementFilesByPolarization, verifySafeProduct } from './SafeProductVerifier.js';
import { selectScenes } from './SceneSelector.js';

const log = createChildLogger({ component: 'AcquisitionOrchestrator' });

export const ASF_PLATFORM = 'SENTINEL-1';
export const ASF_PRODUCT_TYPE = 'SLC';

type FailedStage = NonNullable<AcquisitionOutcome['failedStage']>;

function freezeOutcome(outcome: AcquisitionOutcome): AcquisitionOutcome {
  return Object.freeze(outcome);
}

export interface AcquisitionOrchestratorDeps {
  config: PipelineConfig;
  asfSearch: SceneSearchProvider;
  sentinelHubSearch: SceneSearchProvider;
  downloader: Pick<ArchiveDownloader, 'download'>;
  extractor: Pick<ProductArchiveExtractor, 'extractAndVerify'>;
  onEvent?: PipelineEventListener;
  now?: () => Date;
}

/**
 * Default listener: one structured log line per event
 */
export const logPipelineEvent: PipelineEventListener = (event: PipelineEvent) => {
  switch (event.type) {
    case 'run_started':
      log.info(event.data, 'Pipeline run started');
      break;
    case 'search_completed':
      log.info(event.data, `Search completed for ${event.data.provider}`);
      break;
    case 'scenes_selected':
      log.info(event.data, `Selected ${event.data.granuleNames.length} scenes`);
      break;
    case 'scene_stage':
      log.debug(event.data, 'Scene stage reached');
      break;
    case 'scene_completed':
      if (event.data.stageReached === 'failed') {
        log.warn({ ...event.data, stage: event.data.failedStage }, 'Scene acquisition failed');
      } else {
        log.info({ ...event.data, stage: event.data.stageReached }, 'Scene acquired');
      }
      break;
    case 'run_completed':
      log.info(
        {
          summaryPath: event.data.summaryPath,
          asfResults: event.data.summary.asfResults,
          sentinelHubResults: event.data.summary.sentinelHubResults,
          totalFiles: event.data.summary.totalFiles,
        },
        'Pipeline run completed'
      );
      break;
  }
};

export class AcquisitionOrchestrator {
  private readonly config: PipelineConfig;
  private readonly paths: PipelinePaths;
  private readonly asfSearch: SceneSearchProvider;
  private readonly sentinelHubSearch: SceneSearchProvider;
  private readonly downloader: Pick<ArchiveDownloader, 'download'>;
  private readonly extractor: Pick<ProductArchiveExtractor, 'extractAndVerify'>;
  private readonly onEvent: PipelineEventListener;
  private readonly now: () => Date;

  constructor(deps: AcquisitionOrchestratorDeps) {
    this.config = deps.config;
    this.paths = resolvePipelinePaths(deps.config);
    this.asfSearch = deps.asfSearch;
    this.sentinelHubSearch = deps.sentinelHubSearch;
    this.downloader = deps.downloader;
    this.extractor = deps.extractor;
    this.onEvent = deps.onEvent ?? logPipelineEvent;
    this.now = deps.now ?? (() => new Date());
  }

  metadataPathFor(granuleName: string): string {
    return path.join(this.paths.metadataDirectory, `${granuleName}.json`);
  }

  /**
   * Bring one scene to `verified`, reusing whatever earlier attempts left on disk.
   * Failures are reported in the outcome; only cancellation is thrown.
   */
  async acquire(scene: SceneRecord, signal?: AbortSignal): Promise<AcquisitionOutcome> {
    const attemptedAt = this.now().toISOString();

    let outcome: AcquisitionOutcome;
    try {
      await this.writeSnapshot(scene, { stage: 'not_started', attemptedAt });
    } catch (error) {
      outcome = this.failed(scene.granuleName, 'downloaded', error);
      this.emit({ type: 'scene_completed', timestamp: this.now(), data: outcome });
      return outcome;
    }

    outcome = await this.advance(scene, signal);

    try {
      await this.writeSnapshot(scene, {
        stage: outcome.stageReached,
        attemptedAt,
        finalPath: outcome.finalPath,
        error: outcome.error,
      });
    } catch (error) {
      log.error(
        { granuleName: scene.granuleName, stage: outcome.stageReached, err: error },
        'Could not record the scene outcome in its metadata file'
      );
    }
    this.emit({ type: 'scene_completed', timestamp: this.now(), data: outcome });
    return outcome;
  }

  /**
   * Search both providers, select scenes, acquire them and write the run summary
   */
  async runOnce(daysBack: number = this.config.temporalRange.daysBack, signal?: AbortSignal): Promise<RunSummary> {
    const executionTime = this.now();
    const start = subtractDays(executionTime, daysBack);
    this.emit({
      type: 'run_started',
      timestamp: executionTime,
      data: { daysBack, start: start.toISOString(), end: executionTime.toISOString() },
    });

    const query: SceneSearchQuery = {
      areaOfInterest: this.config.areaOfInterest.polygon,
      start,
      end: executionTime,
      maxResults: this.config.asf.maxResults,
      platform: ASF_PLATFORM,
      productType: ASF_PRODUCT_TYPE,
    };

    const asfResponse = await this.searchProvider(this.asfSearch, query, signal);
    const shResponse = await this.searchProvider(this.sentinelHubSearch, query, signal);

    const selection = selectScenes(asfResponse.records, daysBack, executionTime);
    if (selection.noValidScenes && asfResponse.records.length > 0) {
      log.warn({ found: asfResponse.records.length }, 'No ASF records with a valid acquisition time');
    }
    this.emit({
      type: 'scenes_selected',
      timestamp: this.now(),
      data: {
        granuleNames: selection.scenes.map((s) => s.granuleName),
        targetTime: selection.targetTime,
        daysFromTarget: selection.daysFromTarget,
        noValidScenes: selection.noValidScenes,
      },
    });

    const outcomes: AcquisitionOutcome[] = [];
    for (const scene of selection.scenes) {
      throwIfAborted(signal);
      outcomes.push(await this.acquire(scene, signal));
    }

    const processed = await this.saveSentinelHubMetadata(shResponse.records);
    const downloaded = outcomes.filter((o) => o.stageReached === 'verified').length;

    const summary: RunSummary = {
      executionTime: executionTime.toISOString(),
      timeRange: { start: start.toISOString(), end: executionTime.toISOString() },
      targetDaysBack: daysBack,
      asfResults: {
        found: asfResponse.records.length,
        selected: selection.scenes.length,
        downloaded,
        searchFailed: asfResponse.failure !== undefined,
      },
      sentinelHubResults: {
        found: shResponse.records.length,
        processed,
        searchFailed: shResponse.failure !== undefined,
      },
      totalFiles: downloaded + processed,
      selectedScenes: selection.scenes.map((s) => s.granuleName),
      outcomes,
    };
    Object.freeze(summary);

    const summaryPath = path.join(
      this.paths.dataDirectory,
      `pipeline_summary_${formatRunTimestamp(executionTime)}.json`
    );
    await writeJsonAtomic(summaryPath, summary);
    this.emit({ type: 'run_completed', timestamp: this.now(), data: { summary, summaryPath } });
    return summary;
  }

  private async advance(scene: SceneRecord, signal?: AbortSignal): Promise<AcquisitionOutcome> {
    const { granuleName } = scene;
    const sceneLog = log.child({ granuleName });

    const existingProduct = path.join(this.paths.safeDirectory, `${granuleName}.SAFE`);
    if (await pathExists(existingProduct)) {
      const verification = await verifySafeProduct(existingProduct);
      if (verification.valid) {
        sceneLog.info({ stage: 'verified', productPath: existingProduct }, 'Product already extracted');
        this.emitStage(granuleName, 'verified');
        return freezeOutcome({
          granuleName,
          stageReached: 'verified',
          finalPath: existingProduct,
          measurementFiles: await this.readMeasurementFiles(existingProduct),
        });
      }
      sceneLog.warn(
        { stage: 'verified', productPath: existingProduct, problem: verification.problem },
        'Existing product is invalid, extracting again'
      );
    }

    const archivePath = path.join(this.paths.rawArchiveDirectory, `${granuleName}.zip`);
    if (await pathExists(archivePath)) {
      sceneLog.info({ stage: 'downloaded', archivePath }, 'Archive already downloaded, skipping transfer');
    } else {
      throwIfAborted(signal);
      try {
        await this.downloader.download(granuleName, scene.url, signal);
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        return this.failed(granuleName, 'downloaded', error);
      }
    }
    this.emitStage(granuleName, 'downloaded');

    throwIfAborted(signal);
    try {
      const { productPath, report } = await this.extractor.extractAndVerify(archivePath);
      this.emitStage(granuleName, 'extracted');
      this.emitStage(granuleName, 'verified');
      sceneLog.info({ stage: 'verified', productPath, fileCount: report.fileCount }, 'Product verified');
      return freezeOutcome({
        granuleName,
        stageReached: 'verified',
        finalPath: productPath,
        measurementFiles: report.measurementFiles,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const stage: FailedStage =
        error instanceof ExtractionFailure && error.reason === 'StructureInvalid' ? 'verified' : 'extracted';
      return this.failed(granuleName, stage, error);
    }
  }

  private failed(granuleName: string, failedStage: FailedStage, error: unknown): AcquisitionOutcome {
    const message = getErrorMessage(error);
    log.error({ granuleName, stage: failedStage, err: error }, `Scene failed at ${failedStage}`);
    this.emitStage(granuleName, 'failed');
    return freezeOutcome({ granuleName, stageReached: 'failed', failedStage, error: message });
  }

  private async readMeasurementFiles(productPath: string): Promise<MeasurementFiles> {
    try {
      return await measurementFilesByPolarization(productPath);
    } catch (error) {
      log.warn({ productPath, err: error }, 'Could not list measurement files of existing product');
      return {};
    }
  }

  private async searchProvider(
    provider: SceneSearchProvider,
    query: SceneSearchQuery,
    signal?: AbortSignal
  ): Promise<SearchResponse> {
    throwIfAborted(signal);
    const response = await provider.search(query, signal);
    this.emit({
      type: 'search_completed',
      timestamp: this.now(),
      data: {
        provider: provider.name,
        found: response.records.length,
        failed: response.failure !== undefined,
        skipped: response.skipped,
      },
    });
    return response;
  }

  private async saveSentinelHubMetadata(records: readonly SceneRecord[]): Promise<number> {
    let processed = 0;
    for (const record of records) {
      const target = path.join(this.paths.sentinelHubDirectory, `${record.granuleName}.json`);
      try {
        await writeJsonAtomic(target, record);
        processed++;
      } catch (error) {
        log.error({ granuleName: record.granuleName, err: error }, 'Error saving Sentinel Hub metadata');
      }
    }
    return processed;
  }

  private async writeSnapshot(
    scene: SceneRecord,
    state: Pick<SceneMetadataSnapshot, 'stage' | 'attemptedAt' | 'finalPath' | 'error'>
  ): Promise<void> {
    const snapshot: SceneMetadataSnapshot = { ...scene, ...state };
    await writeJsonAtomic(this.metadataPathFor(scene.granuleName), snapshot);
  }

  private emitStage(granuleName: string, stage: AcquisitionStage): void {
    this.emit({ type: 'scene_stage', timestamp: this.now(), data: { granuleName, stage } });
  }

  private emit(event: PipelineEvent): void {
    try {
      this.onEvent(event);
    } catch (error) {
      log.warn({ err: error, eventType: event.type }, 'Pipeline event listener threw');
    }
  }
}
