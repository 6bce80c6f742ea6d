import type { Pair } from '../pair/pair.js';
import type { EvaluationResult } from '../results/evaluation-result.js';
import type { PromptResponse } from '../results/prompt-response.js';

export interface ComparisonSide {
  promptText: string;
  response: PromptResponse | null;
  evaluation: EvaluationResult | null;
}

export interface ComparisonRow {
  promptIndex: number;
  /** null when the index lies outside that pair's prompt set */
  left: ComparisonSide | null;
  right: ComparisonSide | null;
}

export interface ComparisonView {
  left: Pair;
  right: Pair;
  rows: ComparisonRow[];
}

export interface ComparisonInput {
  pair: Pair;
  prompts: readonly string[];
  responses: readonly PromptResponse[];
  evaluations: readonly EvaluationResult[];
}

function sideAt(input: ComparisonInput, index: number): ComparisonSide | null {
  if (index >= input.prompts.length) return null;
  return {
    promptText: input.prompts[index],
    response: input.responses.find((r) => r.promptIndex === index) ?? null,
    evaluation: input.evaluations.find((e) => e.promptIndex === index) ?? null,
  };
}

/** Rows are matched by prompt index, never by prompt content. */
export function buildComparisonView(left: ComparisonInput, right: ComparisonInput): ComparisonView {
  const rowCount = Math.max(left.prompts.length, right.prompts.length);
  const rows: ComparisonRow[] = [];
  for (let index = 0; index < rowCount; index++) {
    rows.push({ promptIndex: index, left: sideAt(left, index), right: sideAt(right, index) });
  }
  return { left: left.pair, right: right.pair, rows };
}
