import { describe, it, expect } from 'vitest';
import { AlreadyInProgressError } from '../../shared/errors.js';
import { ActiveRuns } from './active-runs.js';

const pair = { promptSetId: 'set-a', modelId: 'model-x' };

describe('ActiveRuns', () => {
  it('should refuse a second run of the same kind on a pair', () => {
    const runs = new ActiveRuns();
    const controller = runs.begin('generation', pair);

    expect(() => runs.begin('generation', pair)).toThrow(AlreadyInProgressError);
    runs.end('generation', pair, controller);
    expect(runs.isActive('generation', pair)).toBe(false);
  });

  it('should track generation and evaluation separately', () => {
    const runs = new ActiveRuns();
    const generation = runs.begin('generation', pair);
    const evaluation = runs.begin('evaluation', pair);

    expect(runs.size).toBe(2);
    expect(runs.cancel(pair, 'evaluation')).toBe(true);
    expect(evaluation.isStopped).toBe(true);
    expect(generation.isStopped).toBe(false);
    runs.end('generation', pair, generation);
    runs.end('evaluation', pair, evaluation);
  });

  it('should cancel every active run', () => {
    const runs = new ActiveRuns();
    const a = runs.begin('generation', pair);
    const b = runs.begin('generation', { promptSetId: 'set-b', modelId: 'model-x' });

    runs.cancelAll();

    expect(a.reason).toBe('cancelled');
    expect(b.reason).toBe('cancelled');
    expect(runs.cancel({ promptSetId: 'none', modelId: 'none' })).toBe(false);
  });

  it('should propagate a parent abort into the run', () => {
    const runs = new ActiveRuns();
    const parent = new AbortController();
    const controller = runs.begin('evaluation', pair, { signal: parent.signal });

    parent.abort();

    expect(controller.signal.aborted).toBe(true);
    runs.end('evaluation', pair, controller);
  });
});
