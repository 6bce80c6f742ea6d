import { describe, it, expect, vi } from 'vitest';
import {
  ProviderAuthError,
  ProviderRateLimitedError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../../shared/errors.js';
import { backoffDelay, withRetry } from './retry.js';

const policy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

describe('backoffDelay', () => {
  const realPolicy = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000 };

  it('should draw below an exponentially growing ceiling', () => {
    expect(backoffDelay(realPolicy, 1, () => 0.5)).toBe(500);
    expect(backoffDelay(realPolicy, 3, () => 0.5)).toBe(2000);
  });

  it('should cap the ceiling at maxDelayMs', () => {
    expect(backoffDelay(realPolicy, 10, () => 0.5)).toBe(15000);
  });

  it('should let a retry-after hint raise the delay, still capped', () => {
    expect(backoffDelay(realPolicy, 1, () => 0, 5000)).toBe(5000);
    expect(backoffDelay(realPolicy, 1, () => 0, 60000)).toBe(30000);
  });
});

describe('withRetry', () => {
  const signal = new AbortController().signal;

  it('should return the first success with its attempt number', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderTimeoutError('slow'))
      .mockRejectedValueOnce(new ProviderRateLimitedError('busy'))
      .mockResolvedValueOnce('done');

    const outcome = await withRetry(fn, { policy, signal });

    expect(outcome).toEqual({ status: 'success', value: 'done', attempts: 3 });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should give up on a non-transient error after one attempt', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new ProviderAuthError('denied'));

    const outcome = await withRetry(fn, { policy, signal });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') expect(outcome.error.code).toBe('PROVIDER_AUTH_ERROR');
  });

  it('should report an exhausted budget as PROVIDER_UNAVAILABLE', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new ProviderTimeoutError('slow'));

    const outcome = await withRetry(fn, { policy, signal, onRetry });

    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.error).toBeInstanceOf(ProviderUnavailableError);
      expect(outcome.error.code).toBe('PROVIDER_UNAVAILABLE');
      expect(outcome.attempts).toBe(3);
    }
  });

  it('should treat unknown errors as non-transient', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('boom'));

    const outcome = await withRetry(fn, { policy, signal });

    expect(fn).toHaveBeenCalledTimes(1);
    if (outcome.status === 'failure') expect(outcome.error.code).toBe('PROVIDER_ERROR');
  });

  it('should stop waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new ProviderTimeoutError('slow'));

    const pending = withRetry(fn, {
      policy: { maxAttempts: 5, baseDelayMs: 60_000, maxDelayMs: 60_000 },
      signal: controller.signal,
      random: () => 0.5,
      onRetry: () => controller.abort(),
    });

    await expect(pending).resolves.toEqual({ status: 'aborted', attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
