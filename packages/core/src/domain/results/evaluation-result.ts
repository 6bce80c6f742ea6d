import type { Pair } from '../pair/pair.js';

export interface JudgeVerdict {
  ok: boolean;
  other: boolean;
}

export interface EvaluationResult extends Pair, JudgeVerdict {
  promptIndex: number;
  judgeModelId: string;
  createdAt: string;
}
