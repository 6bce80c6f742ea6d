import {
  ConfigError,
  ConfigService,
  HarnessService,
  InMemoryResponseStore,
  JsonConfigStore,
  JsonPromptSetCatalog,
  JsonResponseStore,
  OpenRouterJudgeClient,
  OpenRouterModelClient,
  EncodedSecretStore,
  noopHarnessEvents,
  type HarnessConfig,
  type JudgeClient,
  type ResponseStore,
} from '@promptbench/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { getConfigDir, getDataDir, getPromptSetsDir } from './adapters/xdg-paths.js';

export interface HarnessOptions {
  /** Progress callbacks for generate and evaluate runs */
  onProgress?: EventHandler;
  /** false keeps results in memory only */
  save?: boolean;
  /** Build the judge client; requires a configured rubric */
  withJudge?: boolean;
  /** Fail early when no API key is configured */
  requireApiKey?: boolean;
  apiKey?: string;
  models?: string[];
  judgeModel?: string;
  concurrency?: number;
  dataDir?: string;
  promptSetsDir?: string;
}

export interface Harness {
  service: HarnessService;
  config: HarnessConfig;
  modelClient: OpenRouterModelClient;
}

export function createConfigService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()), new EncodedSecretStore());
}

/**
 * Builds a HarnessService from saved configuration, environment and `options`.
 * Suitable for use as a programmatic API.
 */
export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const config = await createConfigService().resolve();

  if (options.apiKey) config.openRouterApiKey = options.apiKey;
  if (options.models && options.models.length > 0) config.models = options.models;
  if (options.judgeModel) config.judgeModel = options.judgeModel;
  if (options.concurrency) config.concurrency = options.concurrency;

  if (options.requireApiKey && !config.openRouterApiKey) {
    throw new ConfigError('OpenRouter API key not configured. Run: promptbench config set api-key');
  }

  const connection = {
    apiKey: config.openRouterApiKey,
    apiUrl: config.openRouterApiUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  };
  const modelClient = new OpenRouterModelClient(connection);
  const judgeClient: JudgeClient | undefined = options.withJudge
    ? new OpenRouterJudgeClient({ ...connection, rubric: config.judgeRubric })
    : undefined;

  const store: ResponseStore = options.save === false
    ? new InMemoryResponseStore()
    : new JsonResponseStore(options.dataDir ?? getDataDir());

  const service = new HarnessService({
    catalog: new JsonPromptSetCatalog(options.promptSetsDir ?? getPromptSetsDir()),
    store,
    modelClient,
    judgeClient,
    config,
    events: options.onProgress ? createCallbackEventBridge(options.onProgress) : noopHarnessEvents,
  });

  return { service, config, modelClient };
}
