import type { EvaluationResult } from '../results/evaluation-result.js';
import type { PromptResponse } from '../results/prompt-response.js';

export type PairState = 'NOT_GENERATED' | 'GENERATED' | 'EVALUATED';

const STATE_ORDER: Record<PairState, number> = {
  NOT_GENERATED: 0,
  GENERATED: 1,
  EVALUATED: 2,
};

export function isAtLeast(state: PairState, minimum: PairState): boolean {
  return STATE_ORDER[state] >= STATE_ORDER[minimum];
}

export interface PairProgress {
  promptCount: number;
  /** Indices holding a response, successful or not */
  responded: number;
  succeeded: number;
  failed: number;
  /** Successful indices that carry a verdict */
  evaluated: number;
}

export interface PairStatus extends PairProgress {
  state: PairState;
}

export function summarizeProgress(
  promptCount: number,
  responses: readonly PromptResponse[],
  evaluations: readonly EvaluationResult[],
): PairProgress {
  const successIndices = new Set<number>();
  const failedIndices = new Set<number>();
  for (const response of responses) {
    if (response.promptIndex < 0 || response.promptIndex >= promptCount) continue;
    if (response.outcome.status === 'success') {
      successIndices.add(response.promptIndex);
    } else {
      failedIndices.add(response.promptIndex);
    }
  }

  const evaluatedIndices = new Set<number>();
  for (const evaluation of evaluations) {
    if (successIndices.has(evaluation.promptIndex)) evaluatedIndices.add(evaluation.promptIndex);
  }

  return {
    promptCount,
    responded: successIndices.size + failedIndices.size,
    succeeded: successIndices.size,
    failed: failedIndices.size,
    evaluated: evaluatedIndices.size,
  };
}

/**
 * The only place pair state is decided. A partially generated pair (a run that
 * timed out or was cancelled) still reads as NOT_GENERATED. A pair whose every
 * response failed has nothing to judge and so counts as EVALUATED.
 */
export function stateFromProgress(progress: PairProgress): PairState {
  if (progress.promptCount === 0 || progress.responded < progress.promptCount) {
    return 'NOT_GENERATED';
  }
  if (progress.evaluated === progress.succeeded) {
    return 'EVALUATED';
  }
  return 'GENERATED';
}

export function derivePairState(
  promptCount: number,
  responses: readonly PromptResponse[],
  evaluations: readonly EvaluationResult[],
): PairState {
  return stateFromProgress(summarizeProgress(promptCount, responses, evaluations));
}

export function derivePairStatus(
  promptCount: number,
  responses: readonly PromptResponse[],
  evaluations: readonly EvaluationResult[],
): PairStatus {
  const progress = summarizeProgress(promptCount, responses, evaluations);
  return { ...progress, state: stateFromProgress(progress) };
}
