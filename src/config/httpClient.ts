/**
 * Centralized HTTP Client Configuration
 *
 * Shared keep-alive agents and a factory for configured axios instances used by
 * the provider adapters and the archive downloader.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults, type InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - token checks
  STANDARD: 30000,  // 30 seconds - searches
  LONG: 120000,     // 2 minutes - slow catalog queries
  DOWNLOAD_IDLE: 300000, // 5 minutes without data aborts an archive transfer
} as const;

export const USER_AGENT = 'sar-ingest/1.0';

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 5,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 5,
});

type TimedRequestConfig = InternalAxiosRequestConfig & { _startTime?: number };

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration merged over the defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig: TimedRequestConfig) => {
    if (!requestConfig.headers.has('User-Agent')) {
      requestConfig.headers.set('User-Agent', USER_AGENT);
    }
    requestConfig._startTime = Date.now();
    logger.debug({ url: requestConfig.url, method: requestConfig.method }, 'HTTP request');
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const requestConfig: TimedRequestConfig = response.config;
      if (requestConfig._startTime) {
        logger.debug(
          {
            url: requestConfig.url,
            method: requestConfig.method,
            status: response.status,
            duration: Date.now() - requestConfig._startTime,
          },
          'HTTP request completed'
        );
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        const requestConfig: TimedRequestConfig | undefined = error.config;
        const isTimeout = error.code === 'ECONNABORTED' || error.message.includes('timeout');
        logger.debug(
          {
            url: requestConfig?.url,
            method: requestConfig?.method,
            status: error.response?.status,
            code: error.code,
            duration: requestConfig?._startTime ? Date.now() - requestConfig._startTime : undefined,
            timeout: isTimeout,
          },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Close HTTP agents and free up connections during shutdown
 */
export function closeHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
  logger.debug('HTTP agents destroyed');
}
