/**
 * Sentinel Hub Search Adapter (Copernicus Data Space Ecosystem)
 *
 * Obtains an OAuth2 client-credentials token and queries the Sentinel Hub
 * Catalog API (STAC) for Sentinel-1 GRD items over the area of interest bbox.
 * An instance id is optional: without one the adapter runs in CDSE mode.
 *
 * The catalog is always searched in the Sentinel-1 GRD collection; the query's
 * platform and productType only select ASF products and are not sent here.
 *
 * API Documentation: https://documentation.dataspace.copernicus.eu/APIs/SentinelHub/Catalog.html
 */

import type { AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import type { PipelineConfig } from '../../config/pipelineConfig.js';
import { createChildLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { computeBbox } from '../../geo/bbox.js';
import { bboxToDimensions } from '../../geo/crsTransform.js';
import { AuthenticationError, SearchFailure, getErrorMessage } from '../../types/errors.js';
import type { SceneSearchProvider, SceneSearchQuery, SearchResponse } from '../../types/scene.js';
import { normalizeStacItem } from './stacRecordNormalizer.js';

export const CATALOG_SEARCH_PATH = '/api/v1/catalog/1.0.0/search';
export const SENTINEL1_COLLECTION = 'sentinel-1-grd';

/** The Catalog API caps one page at 100 items */
const MAX_CATALOG_LIMIT = 100;

const log = createChildLogger({ component: 'SentinelHubSearchAdapter' });

export interface SentinelHubSearchAdapterOptions {
    client?: AxiosInstance;
    maxRetries?: number;
}

interface TokenResponse {
    access_token: string;
    expires_in?: number;
}

function isTokenResponse(value: unknown): value is TokenResponse {
    return (
        typeof value === 'object' &&
        value !== null &&
        'access_token' in value &&
        typeof value.access_token === 'string' &&
        value.access_token.length > 0
    );
}

/**
 * Search provider for Sentinel Hub / CDSE Sentinel-1 catalog items
 */
export class SentinelHubSearchAdapter implements SceneSearchProvider {
    readonly name = 'sentinel_hub' as const;
    private client: AxiosInstance;
    private maxRetries: number;

    constructor(
        private readonly settings: PipelineConfig['sentinelHub'],
        private readonly processing: PipelineConfig['processing'],
        options: SentinelHubSearchAdapterOptions = {}
    ) {
        this.client = options.client ?? createHttpClient({ timeout: HTTP_TIMEOUTS.STANDARD });
        this.maxRetries = options.maxRetries ?? 2;
    }

    isConfigured(): boolean {
        return Boolean(this.settings.clientId && this.settings.clientSecret);
    }

    /**
     * Request an access token with the client-credentials grant
     * @throws {AuthenticationError} If the identity service refuses the client
     */
    async fetchAccessToken(signal?: AbortSignal): Promise<string> {
        const body = new URLSearchParams({
            grant_type: 'client_credentials',
            client_id: this.settings.clientId,
            client_secret: this.settings.clientSecret,
        });

        const response = await this.client.post<unknown>(this.settings.tokenUrl, body.toString(), {
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            timeout: HTTP_TIMEOUTS.SHORT,
            signal,
        });

        if (!isTokenResponse(response.data)) {
            throw new AuthenticationError('Sentinel Hub token response has no access_token', {
                tokenUrl: this.settings.tokenUrl,
            });
        }
        return response.data.access_token;
    }

    async search(query: SceneSearchQuery, signal?: AbortSignal): Promise<SearchResponse> {
        if (!this.isConfigured()) {
            log.warn('Sentinel Hub not configured, skipping');
            return { records: [], skipped: 'Sentinel Hub credentials not configured' };
        }

        const bbox = computeBbox(query.areaOfInterest);
        const dimensions = bboxToDimensions(bbox, this.processing.resolution);
        log.info(
            {
                start: query.start.toISOString(),
                end: query.end.toISOString(),
                bbox,
                dimensions,
                mode: this.settings.instanceId ? 'instance' : 'cdse',
            },
            'Searching Sentinel Hub catalog'
        );

        try {
            const token = await retryWithBackoff(
                () => this.fetchAccessToken(signal),
                { maxAttempts: this.maxRetries, signal },
                'sentinel-hub-token'
            );

            const response = await retryWithBackoff(
                () =>
                    this.client.post<unknown>(
                        `${this.settings.baseUrl.replace(/\/+$/, '')}${CATALOG_SEARCH_PATH}`,
                        {
                            bbox,
                            datetime: `${query.start.toISOString()}/${query.end.toISOString()}`,
                            collections: [SENTINEL1_COLLECTION],
                            limit: Math.min(query.maxResults, MAX_CATALOG_LIMIT),
                        },
                        { headers: { Authorization: `Bearer ${token}` }, signal }
                    ),
                { maxAttempts: this.maxRetries, signal },
                'sentinel-hub-catalog'
            );

            const features = extractFeatures(response.data);
            if (features === null) {
                const failure = new SearchFailure('sentinel_hub', 'catalog response has no features array');
                log.error({ err: failure }, 'Error with Sentinel Hub catalog search');
                return { records: [], failure };
            }

            const records = features.map(normalizeStacItem);
            for (const record of records) {
                if (record.parseErrors.length > 0) {
                    log.warn({ granuleName: record.granuleName, parseErrors: record.parseErrors }, 'Error parsing STAC item');
                }
            }

            log.info({ count: records.length }, `Found ${records.length} Sentinel Hub items`);
            return { records };
        } catch (error) {
            const failure = new SearchFailure('sentinel_hub', getErrorMessage(error));
            log.error({ err: failure }, 'Error with Sentinel Hub catalog search');
            return { records: [], failure };
        }
    }
}

function extractFeatures(body: unknown): unknown[] | null {
    if (typeof body !== 'object' || body === null || !('features' in body)) {
        return null;
    }
    return Array.isArray(body.features) ? body.features : null;
}
