// Domain types
export type { Pair } from './domain/pair/pair.js';
export { pairKey, pairIdProblem, samePair, parsePairSpec } from './domain/pair/pair.js';
export type { PairState, PairProgress, PairStatus } from './domain/pair/pair-state.js';
export { derivePairState, derivePairStatus, summarizeProgress, stateFromProgress, isAtLeast } from './domain/pair/pair-state.js';
export type { PromptSet, PromptSetContents } from './domain/prompt-set/prompt-set.js';
export type {
  PromptResponse,
  ResponseOutcome,
  SuccessOutcome,
  ErrorOutcome,
  ResponseError,
  SuccessfulResponse,
} from './domain/results/prompt-response.js';
export { isSuccessfulResponse } from './domain/results/prompt-response.js';
export type { EvaluationResult, JudgeVerdict } from './domain/results/evaluation-result.js';

export type { LatencyStats, EvalCounts, EvalRatios, PairStats } from './domain/stats/statistics.js';
export { computeLatency, computeEvalCounts, evalRatios } from './domain/stats/statistics.js';

export { BoundedFifoQueue } from './domain/comparison/bounded-queue.js';
export type { ComparisonView, ComparisonRow, ComparisonSide, ComparisonInput } from './domain/comparison/comparison-view.js';
export { buildComparisonView } from './domain/comparison/comparison-view.js';

export type { HarnessConfig, RetryPolicy } from './domain/config/harness-config.js';
export {
  DEFAULT_MODELS,
  DEFAULT_JUDGE_MODEL,
  DEFAULT_CONCURRENCY,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  OPENROUTER_API_URL,
  OPENROUTER_MODELS_URL,
} from './domain/config/harness-config.js';

export { RunController } from './domain/run/run-controller.js';
export type { StopReason } from './domain/run/run-controller.js';
export { ActiveRuns } from './domain/run/active-runs.js';
export { withRetry, backoffDelay, sleep, toProviderError } from './domain/run/retry.js';
export type { RetryOutcome, RetryOptions } from './domain/run/retry.js';
export { runTaskGroup } from './domain/run/task-group.js';
export type { TaskResult, TaskGroupResult } from './domain/run/task-group.js';
export type { RunKind, RunSummary, GenerationSummary, EvaluationSummary } from './domain/run/run-summary.js';
export type { RunOptions, GenerateOptions, OrchestratorSettings } from './domain/run/run-options.js';

// Port interfaces
export type { PromptSetCatalog } from './ports/prompt-set-catalog.js';
export type { ModelClient, ModelCompletion, CallOptions } from './ports/model-client.js';
export type { JudgeClient } from './ports/judge-client.js';
export type { ResponseStore, SupersededRun } from './ports/response-store.js';
export type { HarnessEvents, IndexStatus } from './ports/harness-events.js';
export { noopHarnessEvents } from './ports/harness-events.js';
export type { ConfigStore, HarnessConfigPrefs } from './ports/config-store.js';
export type { SecretStore } from './ports/secret-store.js';

// Adapters
export { InMemoryResponseStore } from './adapters/in-memory-response-store.js';
export { JsonResponseStore } from './adapters/json-response-store.js';
export { JsonPromptSetCatalog } from './adapters/json-prompt-set-catalog.js';
export { OpenRouterModelClient } from './adapters/openrouter-model-client.js';
export type { OpenRouterModelClientOptions, RemoteModelInfo } from './adapters/openrouter-model-client.js';
export { OpenRouterJudgeClient, buildJudgeMessages, parseVerdict } from './adapters/openrouter-judge-client.js';
export type { OpenRouterJudgeClientOptions } from './adapters/openrouter-judge-client.js';
export type { FetchFn, OpenRouterConnection } from './adapters/openrouter-chat.js';
export { JsonConfigStore, sanitizePrefs } from './adapters/json-config-store.js';
export { EncodedSecretStore } from './adapters/encoded-secret-store.js';

// Application services
export { GenerationOrchestrator } from './services/generation-orchestrator.js';
export type { GenerationDeps } from './services/generation-orchestrator.js';
export { EvaluationOrchestrator } from './services/evaluation-orchestrator.js';
export type { EvaluationDeps } from './services/evaluation-orchestrator.js';
export { StatsAggregator } from './services/stats-aggregator.js';
export { ComparisonSelector } from './services/comparison-selector.js';
export { HarnessService } from './services/harness-service.js';
export type { HarnessDeps, PairOverview, PairResults } from './services/harness-service.js';
export { ConfigService } from './services/config-service.js';
export type { HarnessConfigUpdate } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel, setLogSink, formatTag } from './shared/logger.js';
export type { Logger, LogLevel, LogSink } from './shared/logger.js';
export {
  PromptBenchError,
  ConfigError,
  InvalidPairError,
  PairNotFoundError,
  AlreadyInProgressError,
  NotGeneratedError,
  IncompleteSelectionError,
  IntegrityError,
  ProviderError,
  ProviderTimeoutError,
  ProviderRateLimitedError,
  ProviderRequestError,
  ProviderQuotaExceededError,
  ProviderAuthError,
  ProviderContextLengthError,
  ProviderUnavailableError,
  JudgeVerdictError,
  errorMessage,
} from './shared/errors.js';
