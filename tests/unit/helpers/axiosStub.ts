import { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createHttpClient } from '../../../src/config/httpClient.js';

export type StubHandler = (config: InternalAxiosRequestConfig) => AxiosResponse | Promise<AxiosResponse>;

export interface StubbedClient {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * A configured client whose transport is replaced by `handler`; no sockets are opened
 */
export function stubClient(handler: StubHandler): StubbedClient {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = createHttpClient({
    adapter: async (config) => {
      requests.push(config);
      return handler(config);
    },
  });
  return { client, requests };
}

/**
 * Build a response; statuses outside 2xx reject the way axios' own adapters do
 */
export function reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
  if (status < 200 || status >= 300) {
    throw new AxiosError(
      `Request failed with status code ${status}`,
      status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response
    );
  }
  return response;
}

export function networkError(config: InternalAxiosRequestConfig, code: string, message: string): AxiosError {
  return new AxiosError(message, code, config, null);
}
