import { describe, it, expect } from 'vitest';
import type { EvaluationResult } from '../results/evaluation-result.js';
import type { PromptResponse } from '../results/prompt-response.js';
import { derivePairState, derivePairStatus, isAtLeast } from './pair-state.js';

const pair = { promptSetId: 'set-a', modelId: 'model-x' };

function ok(promptIndex: number): PromptResponse {
  return {
    ...pair,
    promptIndex,
    createdAt: '2024-01-01T00:00:00.000Z',
    outcome: { status: 'success', text: `r${promptIndex}`, latencyMs: 10, attempts: 1, truncated: false },
  };
}

function failed(promptIndex: number): PromptResponse {
  return {
    ...pair,
    promptIndex,
    createdAt: '2024-01-01T00:00:00.000Z',
    outcome: { status: 'error', error: { code: 'PROVIDER_UNAVAILABLE', message: 'down' }, attempts: 3 },
  };
}

function verdict(promptIndex: number): EvaluationResult {
  return { ...pair, promptIndex, judgeModelId: 'judge', ok: true, other: false, createdAt: '2024-01-01T00:00:00.000Z' };
}

describe('derivePairState', () => {
  it('should be NOT_GENERATED with no responses', () => {
    expect(derivePairState(3, [], [])).toBe('NOT_GENERATED');
  });

  it('should stay NOT_GENERATED while any index is missing', () => {
    expect(derivePairState(3, [ok(0), ok(1)], [verdict(0), verdict(1)])).toBe('NOT_GENERATED');
  });

  it('should be GENERATED once every index holds a response, failed ones included', () => {
    expect(derivePairState(3, [ok(0), failed(1), ok(2)], [])).toBe('GENERATED');
  });

  it('should be EVALUATED when every successful response carries a verdict', () => {
    expect(derivePairState(3, [ok(0), failed(1), ok(2)], [verdict(0), verdict(2)])).toBe('EVALUATED');
  });

  it('should stay GENERATED while a successful response lacks a verdict', () => {
    expect(derivePairState(3, [ok(0), ok(1), ok(2)], [verdict(0), verdict(2)])).toBe('GENERATED');
  });

  it('should count an all-failed pair as EVALUATED', () => {
    expect(derivePairState(2, [failed(0), failed(1)], [])).toBe('EVALUATED');
  });

  it('should treat an empty prompt set as NOT_GENERATED', () => {
    expect(derivePairState(0, [], [])).toBe('NOT_GENERATED');
  });

  it('should ignore rows outside the prompt range', () => {
    expect(derivePairState(2, [ok(0), ok(5)], [])).toBe('NOT_GENERATED');
  });
});

describe('derivePairStatus', () => {
  it('should count responses, failures and verdicts', () => {
    expect(derivePairStatus(3, [ok(0), failed(1), ok(2)], [verdict(2)])).toEqual({
      promptCount: 3,
      responded: 3,
      succeeded: 2,
      failed: 1,
      evaluated: 1,
      state: 'GENERATED',
    });
  });
});

describe('isAtLeast', () => {
  it('should order states NOT_GENERATED < GENERATED < EVALUATED', () => {
    expect(isAtLeast('EVALUATED', 'GENERATED')).toBe(true);
    expect(isAtLeast('GENERATED', 'GENERATED')).toBe(true);
    expect(isAtLeast('NOT_GENERATED', 'GENERATED')).toBe(false);
  });
});
