import type { HarnessConfig } from '../domain/config/harness-config.js';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_JUDGE_MODEL,
  DEFAULT_MODELS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  OPENROUTER_API_URL,
} from '../domain/config/harness-config.js';
import type { ConfigStore, HarnessConfigPrefs } from '../ports/config-store.js';
import type { SecretStore } from '../ports/secret-store.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export interface HarnessConfigUpdate {
  apiKey?: string;
  models?: string[];
  judgeModel?: string;
  judgeRubric?: string;
  concurrency?: number;
  maxAttempts?: number;
  runTimeoutMs?: number;
}

function parseModelList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function envPositiveInteger(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function requirePositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private secretStore: SecretStore,
  ) {}

  async resolve(): Promise<HarnessConfig> {
    // Environment first, then saved preferences, then defaults
    const envApiKey = process.env.OPENROUTER_API_KEY ?? '';
    const envApiUrl = process.env.OPENROUTER_API_URL ?? '';
    const envModels = process.env.PROMPTBENCH_MODELS ?? '';
    const envJudgeModel = process.env.PROMPTBENCH_JUDGE_MODEL ?? '';
    const envConcurrency = envPositiveInteger('PROMPTBENCH_CONCURRENCY');
    const envMaxAttempts = envPositiveInteger('PROMPTBENCH_MAX_ATTEMPTS');

    const prefs = await this.configStore.getHarnessConfigPrefs();

    let prefApiKey = '';
    if (prefs.apiKeyEncrypted && !envApiKey) {
      try {
        prefApiKey = this.secretStore.decrypt(prefs.apiKeyEncrypted);
      } catch (err) {
        log.warn(`resolve: saved API key could not be decoded: ${errorMessage(err)}`);
      }
    }

    let models: string[];
    if (envModels) {
      models = parseModelList(envModels);
    } else if (prefs.models && prefs.models.length > 0) {
      models = prefs.models;
    } else {
      models = DEFAULT_MODELS;
    }

    return {
      openRouterApiKey: envApiKey || prefApiKey,
      openRouterApiUrl: envApiUrl || OPENROUTER_API_URL,
      models: models.length > 0 ? [...models] : [...DEFAULT_MODELS],
      judgeModel: envJudgeModel || prefs.judgeModel || DEFAULT_JUDGE_MODEL,
      judgeRubric: prefs.judgeRubric ?? '',
      concurrency: envConcurrency ?? prefs.concurrency ?? DEFAULT_CONCURRENCY,
      retry: {
        ...DEFAULT_RETRY_POLICY,
        maxAttempts: envMaxAttempts ?? prefs.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      },
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      runTimeoutMs: prefs.runTimeoutMs ?? null,
    };
  }

  async saveApiKey(key: string): Promise<void> {
    await this.save({ apiKey: key });
  }

  /** Merges `update` into the saved preferences; fields left undefined keep their value. */
  async save(update: HarnessConfigUpdate): Promise<void> {
    requirePositiveInteger('concurrency', update.concurrency);
    requirePositiveInteger('maxAttempts', update.maxAttempts);
    requirePositiveInteger('runTimeoutMs', update.runTimeoutMs);

    const current = await this.configStore.getHarnessConfigPrefs();
    const next: HarnessConfigPrefs = { ...current };
    if (update.apiKey) next.apiKeyEncrypted = this.secretStore.encrypt(update.apiKey);
    if (update.models) next.models = update.models;
    if (update.judgeModel) next.judgeModel = update.judgeModel;
    if (update.judgeRubric !== undefined) next.judgeRubric = update.judgeRubric;
    if (update.concurrency !== undefined) next.concurrency = update.concurrency;
    if (update.maxAttempts !== undefined) next.maxAttempts = update.maxAttempts;
    if (update.runTimeoutMs !== undefined) next.runTimeoutMs = update.runTimeoutMs;
    await this.configStore.saveHarnessConfigPrefs(next);
  }

  async reset(): Promise<void> {
    await this.configStore.saveHarnessConfigPrefs({});
  }
}
