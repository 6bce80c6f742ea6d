import type { Pair } from '../domain/pair/pair.js';
import { pairKey } from '../domain/pair/pair.js';
import type { EvaluationResult } from '../domain/results/evaluation-result.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import type { ResponseStore, SupersededRun, WriteOptions } from '../ports/response-store.js';
import {
  applyEvaluation,
  applyResponse,
  emptyPairRecord,
  supersedeRecord,
  type PairRecord,
} from './pair-record.js';

/** Process-local store for tests and runs that should leave nothing on disk. */
export class InMemoryResponseStore implements ResponseStore {
  private readonly records = new Map<string, PairRecord>();

  private record(pair: Pair): PairRecord {
    const key = pairKey(pair);
    let record = this.records.get(key);
    if (!record) {
      record = emptyPairRecord(pair);
      this.records.set(key, record);
    }
    return record;
  }

  async getResponses(pair: Pair): Promise<PromptResponse[]> {
    return [...(this.records.get(pairKey(pair))?.responses ?? [])];
  }

  async getEvaluations(pair: Pair): Promise<EvaluationResult[]> {
    return [...(this.records.get(pairKey(pair))?.evaluations ?? [])];
  }

  async putResponse(response: PromptResponse, options: WriteOptions = {}): Promise<boolean> {
    if (options.signal?.aborted) return false;
    applyResponse(this.record(response), response);
    return true;
  }

  async putEvaluation(result: EvaluationResult, options: WriteOptions = {}): Promise<boolean> {
    if (options.signal?.aborted) return false;
    applyEvaluation(this.record(result), result);
    return true;
  }

  async supersede(pair: Pair): Promise<void> {
    supersedeRecord(this.record(pair), new Date().toISOString());
  }

  async getHistory(pair: Pair): Promise<SupersededRun[]> {
    return [...(this.records.get(pairKey(pair))?.history ?? [])];
  }

  async listPairs(): Promise<Pair[]> {
    return Array.from(this.records.values())
      .filter((r) => r.responses.length > 0 || r.history.length > 0)
      .map((r) => ({ promptSetId: r.promptSetId, modelId: r.modelId }));
  }
}
