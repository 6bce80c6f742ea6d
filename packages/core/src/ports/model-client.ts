export interface ModelCompletion {
  text: string;
  latencyMs: number;
  /** The response was cut off at the token limit */
  truncated: boolean;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * One call per generation attempt. Implementations throw a ProviderError;
 * the transient ones (timeouts, rate limits) are retried by the caller.
 */
export interface ModelClient {
  complete(modelId: string, promptText: string, options?: CallOptions): Promise<ModelCompletion>;
}
