export type RunKind = 'generation' | 'evaluation';

export interface GenerationSummary {
  kind: 'generation';
  generatedCount: number;
  failedCount: number;
  /** Indices left missing because the run was cancelled or timed out */
  abandonedCount: number;
  elapsedMs: number;
  /** The pair was already generated and no provider call was made */
  alreadyComplete: boolean;
}

export interface EvaluationSummary {
  kind: 'evaluation';
  evaluatedCount: number;
  skippedCount: number;
  abandonedCount: number;
  elapsedMs: number;
}

export type RunSummary = GenerationSummary | EvaluationSummary;
