import type { EvaluationResult } from '../results/evaluation-result.js';
import { isSuccessfulResponse, type PromptResponse } from '../results/prompt-response.js';

export interface LatencyStats {
  minMs: number;
  avgMs: number;
  maxMs: number;
  count: number;
}

export interface EvalCounts {
  okTrue: number;
  okFalse: number;
  otherTrue: number;
  otherFalse: number;
  total: number;
}

export interface EvalRatios {
  okRate?: number;
  otherRate?: number;
}

export interface PairStats {
  /** null when the pair has no successful response */
  latency: LatencyStats | null;
  evalCounts: EvalCounts;
  ratios: EvalRatios;
}

/** Latency over successful responses only; error markers carry no latency. */
export function computeLatency(responses: readonly PromptResponse[]): LatencyStats | null {
  const latencies = responses.filter(isSuccessfulResponse).map((r) => r.outcome.latencyMs);
  if (latencies.length === 0) return null;

  let min = latencies[0];
  let max = latencies[0];
  let sum = 0;
  for (const latency of latencies) {
    if (latency < min) min = latency;
    if (latency > max) max = latency;
    sum += latency;
  }

  return {
    minMs: min,
    avgMs: Math.round((sum / latencies.length) * 100) / 100,
    maxMs: max,
    count: latencies.length,
  };
}

export function computeEvalCounts(evaluations: readonly EvaluationResult[]): EvalCounts {
  const counts: EvalCounts = { okTrue: 0, okFalse: 0, otherTrue: 0, otherFalse: 0, total: 0 };
  for (const evaluation of evaluations) {
    counts.total++;
    if (evaluation.ok) counts.okTrue++;
    else counts.okFalse++;
    if (evaluation.other) counts.otherTrue++;
    else counts.otherFalse++;
  }
  return counts;
}

function ratio(numerator: number, denominator: number): number | undefined {
  return denominator > 0 ? numerator / denominator : undefined;
}

export function evalRatios(counts: EvalCounts): EvalRatios {
  const ratios: EvalRatios = {};
  const okRate = ratio(counts.okTrue, counts.okTrue + counts.okFalse);
  const otherRate = ratio(counts.otherTrue, counts.otherTrue + counts.otherFalse);
  if (okRate !== undefined) ratios.okRate = okRate;
  if (otherRate !== undefined) ratios.otherRate = otherRate;
  return ratios;
}
