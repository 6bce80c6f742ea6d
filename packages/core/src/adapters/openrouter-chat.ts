import {
  ProviderAuthError,
  ProviderContextLengthError,
  ProviderError,
  ProviderQuotaExceededError,
  ProviderRateLimitedError,
  ProviderRequestError,
  ProviderTimeoutError,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('openrouter');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OpenRouterConnection {
  apiKey: string;
  apiUrl: string;
  requestTimeoutMs: number;
  fetchFn?: FetchFn;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  jsonResponse?: boolean;
  signal?: AbortSignal;
}

export interface ChatResult {
  content: string;
  finishReason: string | null;
  latencyMs: number;
}

/** Parses a Retry-After header given either in seconds or as an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function classifyHttpError(status: number, body: string, retryAfter: string | null): ProviderError {
  const detail = `HTTP ${status}: ${body.slice(0, 300)}`;
  if (status === 408 || status === 504) return new ProviderTimeoutError(detail);
  if (status === 429) {
    if (/exceeded your current quota/i.test(body)) return new ProviderQuotaExceededError(detail);
    return new ProviderRateLimitedError(detail, parseRetryAfter(retryAfter));
  }
  if (status === 401 || status === 403) return new ProviderAuthError(detail);
  if (status === 400 && /(maximum )?context length/i.test(body)) return new ProviderContextLengthError(detail);
  return new ProviderRequestError(detail, status);
}

function readChoice(data: unknown): { content: string; finishReason: string | null } | null {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return null;
  const { choices } = data;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null) return null;
  const message = 'message' in first ? first.message : undefined;
  const content =
    typeof message === 'object' && message !== null && 'content' in message && typeof message.content === 'string'
      ? message.content
      : '';
  const finishReason = 'finish_reason' in first && typeof first.finish_reason === 'string' ? first.finish_reason : null;
  return { content, finishReason };
}

/**
 * One POST to an OpenAI-compatible chat completions endpoint. The request is
 * bounded by `requestTimeoutMs` and by the caller's signal; only the former is
 * reported as a ProviderTimeoutError; the latter surfaces as an abort.
 */
export async function postChatCompletion(connection: OpenRouterConnection, request: ChatRequest): Promise<ChatResult> {
  const fetchFn = connection.fetchFn ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, connection.requestTimeoutMs);
  const onCallerAbort = () => controller.abort();
  request.signal?.addEventListener('abort', onCallerAbort, { once: true });

  const startedAt = performance.now();
  try {
    log.debug(`postChatCompletion: requesting ${request.model}`);
    const response = await fetchFn(connection.apiUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${connection.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.jsonResponse ? { response_format: { type: 'json_object' } } : {}),
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => 'could not read response body');
      log.warn(`postChatCompletion: HTTP ${response.status} ${response.statusText} for ${request.model}`);
      throw classifyHttpError(response.status, body, response.headers.get('retry-after'));
    }

    const data: unknown = await response.json();
    const choice = readChoice(data);
    if (!choice) {
      throw new ProviderError(`No choices in response from ${request.model}`, 'PROVIDER_BAD_RESPONSE', false);
    }

    const latencyMs = Math.round(performance.now() - startedAt);
    log.debug(`postChatCompletion: ${request.model} answered in ${latencyMs}ms, ${choice.content.length} chars`);
    return { ...choice, latencyMs };
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    if (timedOut) {
      throw new ProviderTimeoutError(`${request.model} did not answer within ${connection.requestTimeoutMs}ms`);
    }
    if (request.signal?.aborted) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ProviderRequestError(`Request to ${request.model} failed: ${message}`, 0);
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener('abort', onCallerAbort);
  }
}
