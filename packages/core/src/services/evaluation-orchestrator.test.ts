import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryResponseStore } from '../adapters/in-memory-response-store.js';
import { derivePairState } from '../domain/pair/pair-state.js';
import type { JudgeClient } from '../ports/judge-client.js';
import { AlreadyInProgressError, JudgeVerdictError, NotGeneratedError } from '../shared/errors.js';
import { ScriptedJudgeClient, SlowResponseStore, StaticCatalog, hangUntilAborted, testSettings } from '../testing/fakes.js';
import { errorResponse, okResponse } from '../testing/response-store-contract.js';
import { EvaluationOrchestrator } from './evaluation-orchestrator.js';

const pair = { promptSetId: 'trivia', modelId: 'model-x' };
const catalog = new StaticCatalog({ trivia: ['p0', 'p1', 'p2'] });

describe('EvaluationOrchestrator', () => {
  let store: InMemoryResponseStore;

  beforeEach(() => {
    store = new InMemoryResponseStore();
  });

  function setup(judgeClient = new ScriptedJudgeClient()) {
    const orchestrator = new EvaluationOrchestrator({ catalog, store, judgeClient, settings: testSettings() });
    return { judgeClient, orchestrator };
  }

  async function seed(failedIndex?: number): Promise<void> {
    for (let index = 0; index < 3; index++) {
      await store.putResponse(index === failedIndex ? errorResponse(index, pair) : okResponse(index, `answer ${index}`, pair));
    }
  }

  async function state(): Promise<string> {
    return derivePairState(3, await store.getResponses(pair), await store.getEvaluations(pair));
  }

  it('should refuse to evaluate a pair that is not generated', async () => {
    await store.putResponse(okResponse(0, 'answer 0', pair));
    const { judgeClient, orchestrator } = setup();

    await expect(orchestrator.evaluate(pair, 'judge-1')).rejects.toBeInstanceOf(NotGeneratedError);

    expect(judgeClient.calls).toEqual([]);
    expect(await store.getEvaluations(pair)).toEqual([]);
  });

  it('should judge every successful response', async () => {
    await seed();
    const { judgeClient, orchestrator } = setup(new ScriptedJudgeClient((prompt) => ({ ok: prompt !== 'p1', other: false })));

    const summary = await orchestrator.evaluate(pair, 'judge-1');

    expect(summary).toMatchObject({ kind: 'evaluation', evaluatedCount: 3, skippedCount: 0, abandonedCount: 0 });
    expect(judgeClient.calls[0]).toEqual({ judgeModelId: 'judge-1', promptText: 'p0', responseText: 'answer 0' });
    const evaluations = await store.getEvaluations(pair);
    expect(evaluations.map((e) => [e.promptIndex, e.ok, e.other, e.judgeModelId])).toEqual([
      [0, true, false, 'judge-1'],
      [1, false, false, 'judge-1'],
      [2, true, false, 'judge-1'],
    ]);
    expect(await state()).toBe('EVALUATED');
  });

  it('should skip failed responses and still reach EVALUATED', async () => {
    await seed(1);
    const { judgeClient, orchestrator } = setup();

    const summary = await orchestrator.evaluate(pair, 'judge-1');

    expect(summary.evaluatedCount).toBe(2);
    expect(judgeClient.calls.map((c) => c.promptText)).toEqual(['p0', 'p2']);
    expect((await store.getEvaluations(pair)).map((e) => e.promptIndex)).toEqual([0, 2]);
    expect(await state()).toBe('EVALUATED');
  });

  it('should count a pair whose every response failed as evaluated without judging', async () => {
    for (let index = 0; index < 3; index++) await store.putResponse(errorResponse(index, pair));
    const { judgeClient, orchestrator } = setup();

    const summary = await orchestrator.evaluate(pair, 'judge-1');

    expect(summary).toMatchObject({ evaluatedCount: 0, skippedCount: 0, abandonedCount: 0 });
    expect(judgeClient.calls).toEqual([]);
    expect(await state()).toBe('EVALUATED');
  });

  it('should leave an index unevaluated when the judge fails and fill it on the next run', async () => {
    await seed();
    let broken = true;
    const judge = new ScriptedJudgeClient((prompt) => {
      if (prompt === 'p2' && broken) throw new JudgeVerdictError('no JSON');
      return { ok: true, other: true };
    });
    const { orchestrator } = setup(judge);

    const first = await orchestrator.evaluate(pair, 'judge-1');

    expect(first).toMatchObject({ evaluatedCount: 2, skippedCount: 1 });
    expect(await state()).toBe('GENERATED');

    broken = false;
    const second = await orchestrator.evaluate(pair, 'judge-1');

    expect(second).toMatchObject({ evaluatedCount: 1, skippedCount: 0 });
    expect(judge.calls.filter((c) => c.promptText === 'p0')).toHaveLength(1);
    expect(await state()).toBe('EVALUATED');
  });

  it('should make no judge calls for an evaluated pair', async () => {
    await seed();
    const { judgeClient, orchestrator } = setup();
    await orchestrator.evaluate(pair, 'judge-1');

    const again = await orchestrator.evaluate(pair, 'judge-1');

    expect(again).toMatchObject({ evaluatedCount: 0, skippedCount: 0, abandonedCount: 0 });
    expect(judgeClient.calls).toHaveLength(3);
    expect(await store.getEvaluations(pair)).toHaveLength(3);
  });

  it('should skip an evaluation whose response was superseded mid-run', async () => {
    await seed();
    const judge = new ScriptedJudgeClient(async (prompt) => {
      if (prompt === 'p0') await store.supersede(pair);
      return { ok: true, other: false };
    });
    const orchestrator = new EvaluationOrchestrator({
      catalog,
      store,
      judgeClient: judge,
      settings: testSettings({ concurrency: 1 }),
    });

    const summary = await orchestrator.evaluate(pair, 'judge-1');

    expect(summary).toMatchObject({ evaluatedCount: 0, skippedCount: 3 });
    expect(await store.getEvaluations(pair)).toEqual([]);
  });

  it('should refuse a second concurrent evaluation of the same pair', async () => {
    await seed();
    let calls = 0;
    const judge: JudgeClient = {
      score(_judgeModelId, _promptText, _responseText, options = {}) {
        calls++;
        return hangUntilAborted(options.signal);
      },
    };
    const orchestrator = new EvaluationOrchestrator({ catalog, store, judgeClient: judge, settings: testSettings() });

    const first = orchestrator.evaluate(pair, 'judge-1');
    await vi.waitFor(() => expect(calls).toBe(3));

    await expect(orchestrator.evaluate(pair, 'judge-1')).rejects.toBeInstanceOf(AlreadyInProgressError);

    expect(orchestrator.cancel(pair)).toBe(true);
    await expect(first).resolves.toMatchObject({ evaluatedCount: 0, abandonedCount: 3 });
    expect(await store.getEvaluations(pair)).toEqual([]);
  });

  it('should hold the pair and drop verdicts still landing after a timeout', async () => {
    const slow = new SlowResponseStore();
    store = slow;
    await seed();
    slow.writeDelayMs = 50;
    const { judgeClient, orchestrator } = setup();

    const first = orchestrator.evaluate(pair, 'judge-1', { timeoutMs: 20 });
    await new Promise((resolve) => setTimeout(resolve, 30));

    await expect(orchestrator.evaluate(pair, 'judge-1')).rejects.toBeInstanceOf(AlreadyInProgressError);
    await expect(first).resolves.toMatchObject({ evaluatedCount: 0, abandonedCount: 3 });
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(await store.getEvaluations(pair)).toEqual([]);
    expect(judgeClient.calls).toHaveLength(3);
    expect(await state()).toBe('GENERATED');
  });
});
