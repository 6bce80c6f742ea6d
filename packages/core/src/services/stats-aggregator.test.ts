import { describe, it, expect } from 'vitest';
import { InMemoryResponseStore } from '../adapters/in-memory-response-store.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import { errorResponse, okResponse, verdict } from '../testing/response-store-contract.js';
import { StatsAggregator } from './stats-aggregator.js';

const pair = { promptSetId: 'trivia', modelId: 'model-x' };

function timed(index: number, latencyMs: number): PromptResponse {
  return {
    ...pair,
    promptIndex: index,
    createdAt: '2024-01-01T00:00:00.000Z',
    outcome: { status: 'success', text: `r${index}`, latencyMs, attempts: 1, truncated: false },
  };
}

describe('StatsAggregator', () => {
  it('should report null latency and zero counts for an empty pair', async () => {
    const stats = await new StatsAggregator(new InMemoryResponseStore()).getStats(pair);

    expect(stats).toEqual({
      latency: null,
      evalCounts: { okTrue: 0, okFalse: 0, otherTrue: 0, otherFalse: 0, total: 0 },
      ratios: {},
    });
  });

  it('should ignore error markers when computing latency', async () => {
    const store = new InMemoryResponseStore();
    await store.putResponse(timed(0, 100));
    await store.putResponse(errorResponse(1, pair));
    await store.putResponse(timed(2, 300));

    expect(await new StatsAggregator(store).computeLatency(pair)).toEqual({ minMs: 100, avgMs: 200, maxMs: 300, count: 2 });
  });

  it('should count verdicts and derive rates', async () => {
    const store = new InMemoryResponseStore();
    for (let index = 0; index < 4; index++) await store.putResponse(okResponse(index, `r${index}`, pair));
    await store.putEvaluation(verdict(0, pair));
    await store.putEvaluation(verdict(1, pair));
    await store.putEvaluation(verdict(2, pair));
    await store.putEvaluation({ ...verdict(3, pair), ok: false, other: true });

    const stats = await new StatsAggregator(store).getStats(pair);

    expect(stats.evalCounts).toEqual({ okTrue: 3, okFalse: 1, otherTrue: 1, otherFalse: 3, total: 4 });
    expect(stats.ratios).toEqual({ okRate: 0.75, otherRate: 0.25 });
    expect(stats.latency).toEqual({ minMs: 10, avgMs: 10, maxMs: 10, count: 4 });
  });

  it('should only see rows that were not superseded', async () => {
    const store = new InMemoryResponseStore();
    await store.putResponse(timed(0, 900));
    await store.supersede(pair);
    await store.putResponse(timed(0, 50));

    expect(await new StatsAggregator(store).computeLatency(pair)).toEqual({ minMs: 50, avgMs: 50, maxMs: 50, count: 1 });
  });
});
