import type { RetryPolicy } from '../config/harness-config.js';
import {
  ProviderError,
  ProviderRateLimitedError,
  ProviderUnavailableError,
} from '../../shared/errors.js';

export type RetryOutcome<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'failure'; error: ProviderError; attempts: number }
  | { status: 'aborted'; attempts: number };

export interface RetryOptions {
  policy: RetryPolicy;
  signal: AbortSignal;
  /** Source of jitter in [0, 1) */
  random?: () => number;
  onRetry?: (attempt: number, delayMs: number, error: ProviderError) => void;
}

export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(message, 'PROVIDER_ERROR', false);
}

/**
 * Full-jitter exponential backoff: a uniform draw below
 * min(maxDelayMs, baseDelayMs * 2^(attempt-1)). A Retry-After hint from the
 * provider raises the floor, still capped by maxDelayMs.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
  retryAfterMs?: number,
): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = Math.floor(random() * ceiling);
  if (retryAfterMs === undefined) return jittered;
  return Math.max(jittered, Math.min(retryAfterMs, policy.maxDelayMs));
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, fails non-transiently or the attempt budget is
 * spent. Failures come back as data; an exhausted budget is reported as
 * ProviderUnavailableError wrapping the last transient failure.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { policy, signal } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (signal.aborted) return { status: 'aborted', attempts: attempt - 1 };

    try {
      const value = await fn(attempt);
      return { status: 'success', value, attempts: attempt };
    } catch (err) {
      if (signal.aborted) return { status: 'aborted', attempts: attempt };

      const error = toProviderError(err);
      if (!error.transient) {
        return { status: 'failure', error, attempts: attempt };
      }
      if (attempt >= maxAttempts) {
        return { status: 'failure', error: new ProviderUnavailableError(attempt, error), attempts: attempt };
      }

      const retryAfterMs = error instanceof ProviderRateLimitedError ? error.retryAfterMs : undefined;
      const delayMs = backoffDelay(policy, attempt, options.random, retryAfterMs);
      options.onRetry?.(attempt, delayMs, error);

      const completed = await sleep(delayMs, signal);
      if (!completed) return { status: 'aborted', attempts: attempt };
    }
  }
}
