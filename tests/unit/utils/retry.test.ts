import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { calculateExponentialBackoff, isRetryableError, retryWithBackoff } from '../../../src/utils/retry.js';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    status,
    statusText: '',
    headers: {},
    config,
    data: null,
  });
}

describe('isRetryableError', () => {
  it('retries rate limits, server errors and network failures', () => {
    expect(isRetryableError(httpError(429))).toBe(true);
    expect(isRetryableError(httpError(503))).toBe(true);
    expect(isRetryableError(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('timeout'), { code: 'ETIMEDOUT' }))).toBe(true);
  });

  it('does not retry client errors or cancellation', () => {
    expect(isRetryableError(httpError(400))).toBe(false);
    expect(isRetryableError(httpError(401))).toBe(false);
    expect(isRetryableError(new AxiosError('canceled', 'ERR_CANCELED'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('calculateExponentialBackoff', () => {
  it('doubles the delay up to the cap', () => {
    expect(calculateExponentialBackoff(0, 1000, 2, 30000)).toBe(1000);
    expect(calculateExponentialBackoff(2, 1000, 2, 30000)).toBe(4000);
    expect(calculateExponentialBackoff(10, 1000, 2, 30000)).toBe(30000);
  });
});

describe('retryWithBackoff', () => {
  it('returns once the operation succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce('ok');

    await expect(retryWithBackoff(operation, { initialDelay: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops after the configured number of retries', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(502));

    await expect(retryWithBackoff(operation, { maxAttempts: 2, initialDelay: 1 })).rejects.toThrow(
      'Request failed with status code 502'
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('rethrows non-retryable errors immediately', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(404));

    await expect(retryWithBackoff(operation, { initialDelay: 1 })).rejects.toThrow(
      'Request failed with status code 404'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal is aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw httpError(503);
    });

    await expect(
      retryWithBackoff(operation, { initialDelay: 1000, signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
