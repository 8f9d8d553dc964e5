/**
 * ASF Search Adapter
 *
 * Queries the Alaska Satellite Facility search API for Sentinel-1 products
 * intersecting the area of interest and normalizes the GeoJSON features.
 *
 * API Documentation: https://docs.asf.alaska.edu/api/keywords/
 */

import type { AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { polygonToWkt } from '../../geo/bbox.js';
import { SearchFailure, getErrorMessage } from '../../types/errors.js';
import type { SceneSearchProvider, SceneSearchQuery, SearchResponse } from '../../types/scene.js';
import { normalizeAsfRecord } from './asfRecordNormalizer.js';

export const ASF_SEARCH_URL = 'https://api.daac.asf.alaska.edu/services/search/param';

const log = createChildLogger({ component: 'AsfSearchAdapter' });

export interface AsfSearchAdapterOptions {
    client?: AxiosInstance;
    searchUrl?: string;
    /** Retries after the first attempt for transient search errors (default 2) */
    maxRetries?: number;
}

/**
 * Search provider for ASF Sentinel-1 products
 */
export class AsfSearchAdapter implements SceneSearchProvider {
    readonly name = 'asf' as const;
    private client: AxiosInstance;
    private searchUrl: string;
    private maxRetries: number;

    constructor(options: AsfSearchAdapterOptions = {}) {
        this.client = options.client ?? createHttpClient({ timeout: HTTP_TIMEOUTS.LONG });
        this.searchUrl = options.searchUrl ?? ASF_SEARCH_URL;
        this.maxRetries = options.maxRetries ?? 2;
    }

    /**
     * Run one live query. Never throws: provider errors come back as `failure`.
     */
    async search(query: SceneSearchQuery, signal?: AbortSignal): Promise<SearchResponse> {
        const params = {
            platform: query.platform,
            processingLevel: query.productType,
            intersectsWith: polygonToWkt(query.areaOfInterest),
            start: query.start.toISOString(),
            end: query.end.toISOString(),
            maxResults: query.maxResults,
            output: 'geojson',
        };

        log.info({ start: params.start, end: params.end, maxResults: params.maxResults }, 'Searching ASF');

        try {
            const response = await retryWithBackoff(
                () => this.client.get<unknown>(this.searchUrl, { params, signal }),
                { maxAttempts: this.maxRetries, signal },
                'asf-search'
            );

            const features = extractFeatures(response.data);
            if (features === null) {
                const failure = new SearchFailure('asf', 'response is not a GeoJSON FeatureCollection');
                log.error({ err: failure }, 'Error searching ASF data');
                return { records: [], failure };
            }

            const records = features.map((feature) => {
                const properties = isObject(feature) ? feature.properties : undefined;
                const record = normalizeAsfRecord(properties);
                if (record.parseErrors.length > 0) {
                    log.warn(
                        {
                            granuleName: record.granuleName,
                            parseErrors: record.parseErrors,
                            availableProperties: isObject(properties) ? Object.keys(properties) : [],
                        },
                        'Error parsing result properties'
                    );
                }
                return record;
            });

            log.info({ count: records.length }, `Found ${records.length} ASF results`);
            return { records };
        } catch (error) {
            const failure = new SearchFailure('asf', getErrorMessage(error));
            log.error({ err: failure }, 'Error searching ASF data');
            return { records: [], failure };
        }
    }
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractFeatures(body: unknown): unknown[] | null {
    if (!isObject(body)) {
        return null;
    }
    const features = body.features;
    return Array.isArray(features) ? features : null;
}
