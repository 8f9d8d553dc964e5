import type { AsfCredentials } from '../config/env.js';
import { resolvePipelinePaths, type PipelineConfig } from '../config/pipelineConfig.js';
import { AsfSearchAdapter } from '../adapters/asf/AsfSearchAdapter.js';
import { EarthdataSession } from '../adapters/asf/EarthdataSession.js';
import { SentinelHubSearchAdapter } from '../adapters/cdse/SentinelHubSearchAdapter.js';
import { AcquisitionOrchestrator } from '../services/acquisition/AcquisitionOrchestrator.js';
import { ArchiveDownloader } from '../services/acquisition/ArchiveDownloader.js';
import { ProductArchiveExtractor } from '../services/acquisition/ProductArchiveExtractor.js';
import type { PipelineEventListener } from '../types/pipelineEvents.js';

export interface Pipeline {
    session: EarthdataSession;
    orchestrator: AcquisitionOrchestrator;
}

/**
 * Wire the production adapters and services for one configuration
 */
export function createPipeline(
    config: PipelineConfig,
    asfCredentials: AsfCredentials,
    onEvent?: PipelineEventListener
): Pipeline {
    const paths = resolvePipelinePaths(config);
    const session = new EarthdataSession(asfCredentials);

    const orchestrator = new AcquisitionOrchestrator({
        config,
        asfSearch: new AsfSearchAdapter(),
        sentinelHubSearch: new SentinelHubSearchAdapter(config.sentinelHub, config.processing),
        downloader: new ArchiveDownloader(paths.rawArchiveDirectory, () => session.authorizationHeaders()),
        extractor: new ProductArchiveExtractor(paths.safeDirectory),
        onEvent,
    });

    return { session, orchestrator };
}
