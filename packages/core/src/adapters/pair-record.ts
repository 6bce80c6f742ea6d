import type { Pair } from '../domain/pair/pair.js';
import { pairKey } from '../domain/pair/pair.js';
import type { EvaluationResult } from '../domain/results/evaluation-result.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import type { SupersededRun } from '../ports/response-store.js';
import { IntegrityError } from '../shared/errors.js';

/** Everything stored for one pair; the unit both store adapters persist. */
export interface PairRecord extends Pair {
  responses: PromptResponse[];
  evaluations: EvaluationResult[];
  history: SupersededRun[];
}

export function emptyPairRecord(pair: Pair): PairRecord {
  return {
    promptSetId: pair.promptSetId,
    modelId: pair.modelId,
    responses: [],
    evaluations: [],
    history: [],
  };
}

export function isPairRecord(value: unknown): value is PairRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.promptSetId === 'string' &&
    typeof record.modelId === 'string' &&
    Array.isArray(record.responses) &&
    Array.isArray(record.evaluations) &&
    Array.isArray(record.history)
  );
}

function assertIndex(index: number, pair: Pair): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new IntegrityError(`Invalid prompt index ${index} for ${pairKey(pair)}`);
  }
}

export function applyResponse(record: PairRecord, response: PromptResponse): void {
  assertIndex(response.promptIndex, response);
  record.responses = record.responses
    .filter((r) => r.promptIndex !== response.promptIndex)
    .concat(response)
    .sort((a, b) => a.promptIndex - b.promptIndex);
}

export function applyEvaluation(record: PairRecord, result: EvaluationResult): void {
  assertIndex(result.promptIndex, result);
  const key = pairKey(result);
  const response = record.responses.find((r) => r.promptIndex === result.promptIndex);
  if (!response || response.outcome.status !== 'success') {
    throw new IntegrityError(`No successful response at index ${result.promptIndex} for ${key}`);
  }
  if (record.evaluations.some((e) => e.promptIndex === result.promptIndex)) {
    throw new IntegrityError(`Index ${result.promptIndex} of ${key} is already evaluated`);
  }
  record.evaluations = record.evaluations
    .concat(result)
    .sort((a, b) => a.promptIndex - b.promptIndex);
}

export function supersedeRecord(record: PairRecord, supersededAt: string): void {
  if (record.responses.length === 0 && record.evaluations.length === 0) return;
  record.history.push({
    supersededAt,
    responses: record.responses,
    evaluations: record.evaluations,
  });
  record.responses = [];
  record.evaluations = [];
}
