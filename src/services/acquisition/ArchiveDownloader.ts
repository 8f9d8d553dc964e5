/**
 * ArchiveDownloader - stream a product archive to disk
 *
 * The body is written to `<granule>.zip.part` and renamed into place only
 * when the stream completes, so an interrupted transfer never leaves a file
 * that looks complete. Transfers are not retried.
 *
 * ASF archive URLs redirect across hosts (datapool, Earthdata Login). The
 * redirect follower drops Authorization on a host change, so it is put back
 * for Earthdata hosts only.
 */

import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { isAxiosError, type AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { TransferError, getErrorMessage } from '../../types/errors.js';
import { isAbortError } from '../../utils/sleep.js';

const log = createChildLogger({ component: 'ArchiveDownloader' });

/** Supplies request headers for each transfer, e.g. an Earthdata bearer token */
export type AuthorizationProvider = () => Record<string, string>;

/** Hosts (and their subdomains) that receive the credentials after a redirect */
export const AUTH_REDIRECT_DOMAINS = ['asf.alaska.edu', 'earthdata.nasa.gov'] as const;

export function isAuthRedirectHost(hostname: string): boolean {
    const host = hostname.toLowerCase();
    return AUTH_REDIRECT_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Redirect hook restoring the auth headers on a hop to an Earthdata host
 */
export function reapplyAuthorization(headers: Record<string, string>): (options: Record<string, unknown>) => void {
    return (options) => {
        if (typeof options.hostname !== 'string' || !isAuthRedirectHost(options.hostname)) {
            return;
        }
        const current = isRecord(options.headers) ? options.headers : {};
        options.headers = { ...current, ...headers };
    };
}

export interface ArchiveDownloaderOptions {
    client?: AxiosInstance;
}

export interface DownloadedArchive {
    archivePath: string;
    bytes: number;
}

export class ArchiveDownloader {
    private client: AxiosInstance;

    constructor(
        private readonly rawDir: string,
        private readonly authorize: AuthorizationProvider,
        options: ArchiveDownloaderOptions = {}
    ) {
        this.client = options.client ?? createHttpClient({ timeout: HTTP_TIMEOUTS.DOWNLOAD_IDLE });
    }

    archivePathFor(granuleName: string): string {
        return path.join(this.rawDir, `${granuleName}.zip`);
    }

    /**
     * Download `url` to `<raw dir>/<granule>.zip`
     * @throws {TransferError} On HTTP, network or write failures
     */
    async download(granuleName: string, url: string, signal?: AbortSignal): Promise<DownloadedArchive> {
        if (!url) {
            throw new TransferError('scene has no download URL', { granuleName });
        }

        const archivePath = this.archivePathFor(granuleName);
        const partPath = `${archivePath}.part`;
        await fs.mkdir(this.rawDir, { recursive: true });
        // Leftover from an interrupted attempt
        await fs.rm(partPath, { force: true });

        log.info({ granuleName, url }, 'Downloading archive');
        try {
            const headers = this.authorize();
            const response = await this.client.get<Readable>(url, {
                responseType: 'stream',
                headers,
                maxRedirects: 10,
                beforeRedirect: reapplyAuthorization(headers),
                signal,
            });
            await pipeline(response.data, createWriteStream(partPath), { signal });
        } catch (error) {
            if (isAbortError(error)) {
                throw error;
            }
            const status = isAxiosError(error) ? error.response?.status : undefined;
            const message = status
                ? `HTTP ${status} while downloading ${granuleName}`
                : `Download failed for ${granuleName}: ${getErrorMessage(error)}`;
            throw new TransferError(message, { granuleName, url, status });
        }

        await fs.rename(partPath, archivePath);
        const { size } = await fs.stat(archivePath);
        log.info({ granuleName, archivePath, sizeMb: Math.round((size / (1024 * 1024)) * 10) / 10 }, 'Archive downloaded');
        return { archivePath, bytes: size };
    }
}
