import type { Pair } from '../pair/pair.js';

export interface ResponseError {
  code: string;
  message: string;
}

export interface SuccessOutcome {
  status: 'success';
  text: string;
  latencyMs: number;
  attempts: number;
  /** The provider stopped at its token limit */
  truncated: boolean;
}

export interface ErrorOutcome {
  status: 'error';
  error: ResponseError;
  attempts: number;
}

export type ResponseOutcome = SuccessOutcome | ErrorOutcome;

export interface PromptResponse extends Pair {
  promptIndex: number;
  createdAt: string;
  outcome: ResponseOutcome;
}

export type SuccessfulResponse = PromptResponse & { outcome: SuccessOutcome };

export function isSuccessfulResponse(response: PromptResponse): response is SuccessfulResponse {
  return response.outcome.status === 'success';
}
