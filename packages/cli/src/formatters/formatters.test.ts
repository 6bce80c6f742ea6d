import { describe, it, expect } from 'vitest';
import type { ComparisonView } from '@promptbench/core';
import type { StatsReport } from './formatter.js';
import { isFormatName } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

const report: StatsReport = {
  pair: { promptSetId: 'trivia', modelId: 'model-a' },
  status: { promptCount: 3, responded: 3, succeeded: 2, failed: 1, evaluated: 2, state: 'EVALUATED' },
  stats: {
    latency: { minMs: 100, avgMs: 150, maxMs: 200, count: 2 },
    evalCounts: { okTrue: 1, okFalse: 1, otherTrue: 0, otherFalse: 2, total: 2 },
    ratios: { okRate: 0.5, otherRate: 0 },
  },
};

const createdAt = '2024-01-01T00:00:00.000Z';
const left = { promptSetId: 'trivia', modelId: 'model-a' };
const right = { promptSetId: 'trivia', modelId: 'model-b' };

const view: ComparisonView = {
  left,
  right,
  rows: [
    {
      promptIndex: 0,
      left: {
        promptText: 'Capital of France?',
        response: { ...left, promptIndex: 0, createdAt, outcome: { status: 'success', text: 'Paris', latencyMs: 10, attempts: 1, truncated: false } },
        evaluation: { ...left, promptIndex: 0, judgeModelId: 'judge-1', ok: true, other: false, createdAt },
      },
      right: {
        promptText: 'Capital of France?',
        response: {
          ...right,
          promptIndex: 0,
          createdAt,
          outcome: { status: 'error', error: { code: 'PROVIDER_UNAVAILABLE', message: 'down' }, attempts: 3 },
        },
        evaluation: null,
      },
    },
  ],
};

describe('PlainFormatter', () => {
  it('should format stats as aligned lines', () => {
    expect(new PlainFormatter().formatStats(report)).toBe(
      [
        'Pair:      trivia::model-a',
        'State:     EVALUATED',
        'Responses: 3/3 (2 ok, 1 failed)',
        'Evaluated: 2/2',
        'Latency:   min 100ms, avg 150ms, max 200ms over 2',
        'ok:        1 true, 1 false (50.0%)',
        'other:     0 true, 2 false (0.0%)',
      ].join('\n'),
    );
  });

  it('should print n/a when nothing succeeded', () => {
    const empty: StatsReport = {
      ...report,
      stats: { latency: null, evalCounts: { okTrue: 0, okFalse: 0, otherTrue: 0, otherFalse: 0, total: 0 }, ratios: {} },
    };
    const lines = new PlainFormatter().formatStats(empty).split('\n');
    expect(lines[4]).toBe('Latency:   n/a');
    expect(lines[5]).toBe('ok:        0 true, 0 false (n/a)');
  });

  it('should show both sides of a comparison row', () => {
    expect(new PlainFormatter().formatComparison(view)).toBe(
      [
        '[0] Capital of France?',
        '  trivia::model-a (ok=true other=false):',
        '    Paris',
        '  trivia::model-b (not evaluated):',
        '    (error PROVIDER_UNAVAILABLE: down)',
      ].join('\n'),
    );
  });
});

describe('MarkdownFormatter', () => {
  it('should render stats as a table', () => {
    const lines = new MarkdownFormatter().formatStats(report).split('\n');
    expect(lines[0]).toBe('# trivia::model-a');
    expect(lines[2]).toBe('**State:** EVALUATED');
    expect(lines[8]).toBe('| Latency min / avg / max | 100 / 150 / 200 ms (2) |');
    expect(lines[9]).toBe('| ok | 1 true, 1 false (50.0%) |');
  });

  it('should render one section per side', () => {
    expect(new MarkdownFormatter().formatComparison(view)).toBe(
      [
        '# trivia::model-a vs trivia::model-b',
        '',
        '## Prompt 0',
        '',
        '> Capital of France?',
        '',
        '### trivia::model-a',
        '',
        'Paris',
        '',
        'Verdict: ok=true other=false',
        '',
        '### trivia::model-b',
        '',
        '_(error PROVIDER_UNAVAILABLE: down)_',
        '',
        'Verdict: not evaluated',
      ].join('\n'),
    );
  });
});

describe('JsonFormatter', () => {
  it('should emit the report unchanged', () => {
    expect(JSON.parse(new JsonFormatter().formatStats(report))).toEqual(report);
  });
});

describe('isFormatName', () => {
  it('should accept only known formats', () => {
    expect(isFormatName('md')).toBe(true);
    expect(isFormatName('html')).toBe(false);
  });
});
