import type { Pair } from '../domain/pair/pair.js';
import type { EvaluationResult } from '../domain/results/evaluation-result.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';

export interface WriteOptions {
  /**
   * The writing run's signal. Checked when the write is applied; an aborted
   * signal drops the write and the call resolves false.
   */
  signal?: AbortSignal;
}

export interface SupersededRun {
  supersededAt: string;
  responses: PromptResponse[];
  evaluations: EvaluationResult[];
}

/**
 * Rows keyed by (promptSetId, modelId, promptIndex), evaluations additionally
 * carrying their judge model. Writers on different pairs must not block each
 * other; writes to one pair are applied in order.
 */
export interface ResponseStore {
  getResponses(pair: Pair): Promise<PromptResponse[]>;
  getEvaluations(pair: Pair): Promise<EvaluationResult[]>;
  /** Replaces any response already held for the same index. Resolves whether it was written. */
  putResponse(response: PromptResponse, options?: WriteOptions): Promise<boolean>;
  /**
   * Rejects with IntegrityError unless a successful response exists for the
   * index and no evaluation does yet. Resolves whether it was written.
   */
  putEvaluation(result: EvaluationResult, options?: WriteOptions): Promise<boolean>;
  /** Moves the pair's current rows into its history; nothing is deleted */
  supersede(pair: Pair): Promise<void>;
  getHistory(pair: Pair): Promise<SupersededRun[]>;
  listPairs(): Promise<Pair[]>;
}
