/**
 * CLI command handlers
 *
 * Each handler returns the process exit code. Configuration and
 * authentication failures surface as ConfigError / AuthenticationError and
 * are turned into exit code 1 by the entry point; per-scene failures are
 * reported but leave the exit code at 0.
 */

import path from 'path';
import {
    describeCredentialEnv,
    looksLikeJwt,
    requireAsfCredentials,
    resolveCredentials,
} from '../config/env.js';
import {
    DEFAULT_CONFIG_FILE,
    ensurePipelineDirectories,
    loadPipelineConfig,
    resolvePipelinePaths,
    validateConfigFile,
    writeDefaultConfig,
} from '../config/pipelineConfig.js';
import { closeHttpAgents } from '../config/httpClient.js';
import { EarthdataSession } from '../adapters/asf/EarthdataSession.js';
import { MetadataDownloadService } from '../services/acquisition/MetadataDownloadService.js';
import { PipelineScheduleJob } from '../services/scheduling/PipelineScheduleJob.js';
import type { AcquisitionOutcome, RunSummary } from '../types/scene.js';
import { ConfigError } from '../types/errors.js';
import { readNumberOption, readStringOption, type CommandName, type ParsedArgs } from './args.js';
import { createPipeline } from './pipelineFactory.js';

export const DEFAULT_DAYS_BACK = 7;
export const DEFAULT_INTERVAL_HOURS = 24;
export const DEFAULT_MAX_SCENES = 1;

export interface CommandContext {
    args: ParsedArgs;
    env: Record<string, string | undefined>;
    signal: AbortSignal;
    print: (line: string) => void;
}

function configPathOf(args: ParsedArgs): string {
    return readStringOption(args, 'config') ?? DEFAULT_CONFIG_FILE;
}

function loadForDownload(ctx: CommandContext) {
    const credentials = resolveCredentials(ctx.env);
    const config = loadPipelineConfig(configPathOf(ctx.args), credentials.sentinelHub);
    const asfCredentials = requireAsfCredentials(credentials);
    ensurePipelineDirectories(resolvePipelinePaths(config));
    return { config, asfCredentials };
}

function describeOutcome(outcome: AcquisitionOutcome): string {
    if (outcome.stageReached === 'failed') {
        return `❌ ${outcome.granuleName}: failed at ${outcome.failedStage ?? 'unknown stage'} (${outcome.error ?? 'no details'})`;
    }
    const polarizations = Object.keys(outcome.measurementFiles ?? {}).join(', ') || 'none';
    return `✅ ${outcome.granuleName}: ${outcome.stageReached} → ${outcome.finalPath ?? ''} [${polarizations}]`;
}

export function formatRunSummary(summary: RunSummary): string[] {
    return [
        '',
        '📊 Pipeline Summary',
        '─'.repeat(50),
        `Time range:       ${summary.timeRange.start} → ${summary.timeRange.end}`,
        `ASF found:        ${summary.asfResults.found}${summary.asfResults.searchFailed ? ' (search failed)' : ''}`,
        `ASF selected:     ${summary.asfResults.selected}`,
        `ASF downloaded:   ${summary.asfResults.downloaded}`,
        `Sentinel Hub:     ${summary.sentinelHubResults.found} found, ${summary.sentinelHubResults.processed} processed${
            summary.sentinelHubResults.searchFailed ? ' (search failed)' : ''
        }`,
        `Total files:      ${summary.totalFiles}`,
        ...summary.outcomes.map(describeOutcome),
        '',
    ];
}

async function runCommand(ctx: CommandContext): Promise<number> {
    const daysBack = readNumberOption(ctx.args, 'days-back', DEFAULT_DAYS_BACK, { integer: true, min: 0 });
    const { config, asfCredentials } = loadForDownload(ctx);
    const { session, orchestrator } = createPipeline(config, asfCredentials);

    await session.authenticate(ctx.signal);
    const summary = await orchestrator.runOnce(daysBack, ctx.signal);
    formatRunSummary(summary).forEach(ctx.print);
    return 0;
}

async function scheduleCommand(ctx: CommandContext): Promise<number> {
    const intervalHours = readNumberOption(ctx.args, 'interval', DEFAULT_INTERVAL_HOURS, { min: 0 });
    if (intervalHours === 0) {
        throw new ConfigError('--interval must be greater than 0');
    }
    const { config, asfCredentials } = loadForDownload(ctx);
    const { session, orchestrator } = createPipeline(config, asfCredentials);

    await session.authenticate(ctx.signal);
    ctx.print(`⏰ Running every ${intervalHours} hours, press Ctrl+C to stop`);
    await new PipelineScheduleJob(orchestrator).runForever(intervalHours, ctx.signal);
    ctx.print('⏹️  Pipeline stopped');
    return 0;
}

async function downloadCommand(ctx: CommandContext): Promise<number> {
    const maxScenes = readNumberOption(ctx.args, 'max-scenes', DEFAULT_MAX_SCENES, { integer: true, min: 1 });
    const { config, asfCredentials } = loadForDownload(ctx);
    const metadataDir = path.resolve(readStringOption(ctx.args, 'metadata-dir') ?? config.asf.downloadDirectory);
    const { session, orchestrator } = createPipeline(config, asfCredentials);

    const result = await new MetadataDownloadService(session, orchestrator).download(
        metadataDir,
        maxScenes,
        ctx.signal
    );

    if (result.files.length === 0) {
        ctx.print(`❌ No metadata files found in ${metadataDir}`);
        ctx.print('Run the pipeline first: sar-ingest run --days-back 7');
        return 0;
    }
    for (const { file, error } of result.unreadable) {
        ctx.print(`❌ ${path.basename(file)}: ${error}`);
    }
    result.outcomes.map(describeOutcome).forEach(ctx.print);
    return 0;
}

async function checkAuthCommand(ctx: CommandContext): Promise<number> {
    const credentials = resolveCredentials(ctx.env);
    const asfCredentials = requireAsfCredentials(credentials);
    if (asfCredentials.kind === 'token' && !looksLikeJwt(asfCredentials.token)) {
        ctx.print('⚠️  EDL_TOKEN does not have the three segments of a JWT');
    }

    ctx.print('🔐 Testing ASF authentication...');
    const session = await new EarthdataSession(asfCredentials).authenticate(ctx.signal);
    ctx.print(`✅ ASF authentication successful (${session.method}${session.expiresAt ? `, expires ${session.expiresAt}` : ''})`);
    return 0;
}

function validateConfigCommand(ctx: CommandContext): number {
    const configPath = configPathOf(ctx.args);
    const report = validateConfigFile(configPath);

    ctx.print(`🔍 Validating ${configPath}`);
    for (const error of report.errors) {
        ctx.print(`❌ ${error}`);
    }
    for (const warning of report.warnings) {
        ctx.print(`⚠️  ${warning}`);
    }
    ctx.print(report.valid ? '✅ Configuration is valid' : '❌ Configuration has errors');
    return report.valid ? 0 : 1;
}

function initConfigCommand(ctx: CommandContext): number {
    const configPath = configPathOf(ctx.args);
    writeDefaultConfig(configPath);
    ctx.print(`✅ Wrote default configuration to ${configPath}`);
    ctx.print('Edit the area of interest and Sentinel Hub settings before the first run');
    return 0;
}

function checkEnvCommand(ctx: CommandContext): number {
    ctx.print('🔧 Credential environment');
    for (const entry of describeCredentialEnv(ctx.env)) {
        ctx.print(entry.present ? `✅ ${entry.key}: ${entry.preview ?? ''}` : `❌ ${entry.key}: not set`);
    }

    const credentials = resolveCredentials(ctx.env);
    if (credentials.asf) {
        ctx.print(`ASF authentication method: ${credentials.asf.kind === 'token' ? 'EDL_TOKEN' : 'ASF_USERNAME/ASF_PASSWORD'}`);
    } else {
        ctx.print('⚠️  No ASF credentials: set EDL_TOKEN or ASF_USERNAME/ASF_PASSWORD');
    }
    return 0;
}

export async function executeCommand(command: CommandName, ctx: CommandContext): Promise<number> {
    try {
        switch (command) {
            case 'run':
                return await runCommand(ctx);
            case 'schedule':
                return await scheduleCommand(ctx);
            case 'download':
                return await downloadCommand(ctx);
            case 'check-auth':
                return await checkAuthCommand(ctx);
            case 'validate-config':
                return validateConfigCommand(ctx);
            case 'init-config':
                return initConfigCommand(ctx);
            case 'check-env':
                return checkEnvCommand(ctx);
        }
    } finally {
        closeHttpAgents();
    }
}
