import type { RetryPolicy } from '../config/harness-config.js';

export interface RunOptions {
  /** Overrides the configured run timeout; null removes the bound */
  timeoutMs?: number | null;
  /** Aborting this signal cancels the run */
  signal?: AbortSignal;
  concurrency?: number;
}

export interface GenerateOptions extends RunOptions {
  /** Supersede existing responses and generate every index again */
  force?: boolean;
}

export interface OrchestratorSettings {
  concurrency: number;
  retry: RetryPolicy;
  runTimeoutMs?: number | null;
  /** Jitter source for backoff, replaceable in tests */
  random?: () => number;
}
