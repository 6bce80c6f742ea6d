import type { Pair } from '../domain/pair/pair.js';
import type { EvalCounts, LatencyStats, PairStats } from '../domain/stats/statistics.js';
import { computeEvalCounts, computeLatency, evalRatios } from '../domain/stats/statistics.js';
import type { ResponseStore } from '../ports/response-store.js';

/** Read-only statistics over a pair's current (non-superseded) rows. */
export class StatsAggregator {
  constructor(private readonly store: ResponseStore) {}

  async computeLatency(pair: Pair): Promise<LatencyStats | null> {
    return computeLatency(await this.store.getResponses(pair));
  }

  async computeEvalCounts(pair: Pair): Promise<EvalCounts> {
    return computeEvalCounts(await this.store.getEvaluations(pair));
  }

  async getStats(pair: Pair): Promise<PairStats> {
    const [responses, evaluations] = await Promise.all([
      this.store.getResponses(pair),
      this.store.getEvaluations(pair),
    ]);
    const evalCounts = computeEvalCounts(evaluations);
    return {
      latency: computeLatency(responses),
      evalCounts,
      ratios: evalRatios(evalCounts),
    };
  }
}
