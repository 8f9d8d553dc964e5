/**
 * MetadataDownloadService - acquire scenes from stored metadata files
 *
 * Replays the per-scene JSON files a pipeline run left in the metadata
 * directory through the orchestrator's acquire(), so downloads can be resumed
 * or repeated without a new search.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createChildLogger } from '../../utils/logger.js';
import { readJsonFile } from '../../utils/jsonFile.js';
import { throwIfAborted } from '../../utils/sleep.js';
import { getErrorMessage } from '../../types/errors.js';
import type { AcquisitionOutcome, SceneRecord } from '../../types/scene.js';
import { formatZodIssues } from '../../validation/pipelineConfigSchemas.js';
import { storedSceneRecordSchema } from '../../validation/sceneRecordSchemas.js';
import type { EarthdataSession } from '../../adapters/asf/EarthdataSession.js';
import type { AcquisitionOrchestrator } from './AcquisitionOrchestrator.js';

const log = createChildLogger({ component: 'MetadataDownloadService' });

const SUMMARY_PREFIX = 'pipeline_summary';

export interface MetadataDownloadResult {
  /** Metadata files considered, after the scene limit */
  files: string[];
  outcomes: AcquisitionOutcome[];
  /** Files that could not be read as scene metadata */
  unreadable: Array<{ file: string; error: string }>;
}

/**
 * Scene metadata files in a directory, sorted by name, run summaries excluded
 */
export async function listMetadataFiles(metadataDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(metadataDir);
  } catch (error) {
    log.warn({ metadataDir, err: error }, 'Metadata directory is not readable');
    return [];
  }
  return names
    .filter((name) => name.endsWith('.json') && !name.startsWith(SUMMARY_PREFIX))
    .sort()
    .map((name) => path.join(metadataDir, name));
}

export async function readSceneMetadata(filePath: string): Promise<SceneRecord> {
  const parsed = storedSceneRecordSchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid scene metadata: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  const record: SceneRecord = parsed.data;
  return Object.freeze(record);
}

export class MetadataDownloadService {
  constructor(
    private readonly session: Pick<EarthdataSession, 'authenticate'>,
    private readonly orchestrator: Pick<AcquisitionOrchestrator, 'acquire'>
  ) {}

  /**
   * Authenticate, then acquire at most `maxScenes` scenes from `metadataDir`
   * @throws {AuthenticationError} Before any transfer when authentication fails
   */
  async download(metadataDir: string, maxScenes: number, signal?: AbortSignal): Promise<MetadataDownloadResult> {
    const files = (await listMetadataFiles(metadataDir)).slice(0, Math.max(0, maxScenes));
    const result: MetadataDownloadResult = { files, outcomes: [], unreadable: [] };

    if (files.length === 0) {
      log.warn({ metadataDir }, 'No metadata files found, run the pipeline first');
      return result;
    }
    log.info({ metadataDir, files: files.map((f) => path.basename(f)) }, `Found ${files.length} metadata files`);

    await this.session.authenticate(signal);

    for (const file of files) {
      throwIfAborted(signal);
      let scene: SceneRecord;
      try {
        scene = await readSceneMetadata(file);
      } catch (error) {
        const message = getErrorMessage(error);
        log.error({ file, err: error }, 'Skipping unreadable metadata file');
        result.unreadable.push({ file, error: message });
        continue;
      }

      const outcome = await this.orchestrator.acquire(scene, signal);
      result.outcomes.push(outcome);
    }

    return result;
  }
}
