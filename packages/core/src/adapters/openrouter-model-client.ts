import { OPENROUTER_MODELS_URL } from '../domain/config/harness-config.js';
import type { CallOptions, ModelClient, ModelCompletion } from '../ports/model-client.js';
import { createLogger } from '../shared/logger.js';
import { classifyHttpError, postChatCompletion, type OpenRouterConnection } from './openrouter-chat.js';

const log = createLogger('openrouter-model-client');

export interface RemoteModelInfo {
  id: string;
  name: string;
  contextLength: number;
  /** USD per million tokens */
  pricing: {
    prompt: number;
    completion: number;
  };
}

export interface OpenRouterModelClientOptions extends OpenRouterConnection {
  temperature?: number;
  maxTokens?: number;
  modelsUrl?: string;
}

function toRemoteModel(entry: unknown): RemoteModelInfo | null {
  if (typeof entry !== 'object' || entry === null) return null;
  const m: Record<string, unknown> = { ...entry };
  if (typeof m.id !== 'string' || m.id.length === 0) return null;
  const pricing: Record<string, unknown> = typeof m.pricing === 'object' && m.pricing !== null ? { ...m.pricing } : {};
  return {
    id: m.id,
    name: typeof m.name === 'string' && m.name ? m.name : m.id,
    contextLength: Number(m.context_length) || 4096,
    pricing: {
      // OpenRouter quotes per token
      prompt: (Number(pricing.prompt) || 0) * 1_000_000,
      completion: (Number(pricing.completion) || 0) * 1_000_000,
    },
  };
}

export class OpenRouterModelClient implements ModelClient {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(private readonly options: OpenRouterModelClientOptions) {
    this.temperature = options.temperature ?? 0.25;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async complete(modelId: string, promptText: string, options: CallOptions = {}): Promise<ModelCompletion> {
    const result = await postChatCompletion(this.options, {
      model: modelId,
      messages: [{ role: 'user', content: promptText }],
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      signal: options.signal,
    });

    const truncated = result.finishReason === 'length';
    if (truncated) {
      log.warn(`complete: ${modelId} hit the ${this.maxTokens} token limit`);
    }

    return { text: result.content.trim(), latencyMs: result.latencyMs, truncated };
  }

  /** Models offered by the provider, sorted by display name. */
  async listModels(): Promise<RemoteModelInfo[]> {
    const fetchFn = this.options.fetchFn ?? fetch;
    const response = await fetchFn(this.options.modelsUrl ?? OPENROUTER_MODELS_URL, {
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      signal: AbortSignal.timeout(this.options.requestTimeoutMs),
    });
    if (!response.ok) {
      throw classifyHttpError(response.status, await response.text(), response.headers.get('retry-after'));
    }

    const data: unknown = await response.json();
    const entries = typeof data === 'object' && data !== null && 'data' in data && Array.isArray(data.data) ? data.data : [];
    return entries
      .map(toRemoteModel)
      .filter((m): m is RemoteModelInfo => m !== null)
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
