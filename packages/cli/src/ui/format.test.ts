import { describe, it, expect } from 'vitest';
import { formatDuration, formatRate } from './format.js';

describe('formatDuration', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(12_400)).toBe('12.4s');
    expect(formatDuration(185_000)).toBe('3m 05s');
  });
});

describe('formatRate', () => {
  it('should render a percentage with one decimal', () => {
    expect(formatRate(0.5)).toBe('50.0%');
    expect(formatRate(undefined)).toBe('n/a');
  });
});
