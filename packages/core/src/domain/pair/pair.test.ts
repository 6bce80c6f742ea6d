import { describe, it, expect } from 'vitest';
import { pairIdProblem, pairKey, parsePairSpec, samePair } from './pair.js';

describe('parsePairSpec', () => {
  it('should split on the first colon only', () => {
    expect(parsePairSpec('weekly:openai/gpt-4o:free')).toEqual({ promptSetId: 'weekly', modelId: 'openai/gpt-4o:free' });
  });

  it('should reject input without both halves', () => {
    expect(parsePairSpec('weekly')).toBeNull();
    expect(parsePairSpec(':model')).toBeNull();
    expect(parsePairSpec('weekly:')).toBeNull();
  });
});

describe('pairKey', () => {
  it('should join set and model', () => {
    expect(pairKey({ promptSetId: 'weekly', modelId: 'm' })).toBe('weekly::m');
  });
});

describe('samePair', () => {
  it('should compare by value', () => {
    expect(samePair({ promptSetId: 'a', modelId: 'b' }, { promptSetId: 'a', modelId: 'b' })).toBe(true);
    expect(samePair({ promptSetId: 'a', modelId: 'b' }, { promptSetId: 'a', modelId: 'c' })).toBe(false);
  });
});

describe('pairIdProblem', () => {
  it('should accept ordinary ids', () => {
    expect(pairIdProblem('weekly')).toBeNull();
    expect(pairIdProblem('openai/gpt-4o:free')).toBeNull();
  });

  it('should reject ids that make keys or paths ambiguous', () => {
    expect(pairIdProblem('')).toBe('must not be empty');
    expect(pairIdProblem('a::b')).toBe('must not contain "::"');
    expect(pairIdProblem('..')).toBe('must not be ".."');
    expect(pairIdProblem('.')).toBe('must not be "."');
  });
});
