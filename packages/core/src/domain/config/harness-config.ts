export interface RetryPolicy {
  /** Total attempts per index, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface HarnessConfig {
  openRouterApiKey: string;
  openRouterApiUrl: string;
  /** Candidate models a pair may name */
  models: string[];
  judgeModel: string;
  /**
   * Instructions handed to the judge. The criteria behind `ok` and `other` are
   * supplied by the user; empty until configured.
   */
  judgeRubric: string;
  concurrency: number;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  /** Bound on a whole generate/evaluate run; null leaves runs unbounded */
  runTimeoutMs: number | null;
}

export const DEFAULT_MODELS = [
  'openai/gpt-4o-mini',
  'anthropic/claude-3.5-haiku',
  'google/gemini-1.5-flash',
];

export const DEFAULT_JUDGE_MODEL = 'openai/gpt-4o';
export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const OPENROUTER_MODELS_URL = 'https://openrouter.ai/api/v1/models';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};
