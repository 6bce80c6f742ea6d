import { pairKey, type ComparisonSide, type ComparisonView } from '@promptbench/core';
import { formatRate } from '../ui/format.js';
import type { OutputFormatter, StatsReport } from './formatter.js';

export function describeSide(side: ComparisonSide | null): string {
  if (!side) return '(no prompt at this index)';
  if (!side.response) return '(no response)';
  const { outcome } = side.response;
  if (outcome.status === 'error') return `(error ${outcome.error.code}: ${outcome.error.message})`;
  return outcome.truncated ? `${outcome.text} [truncated]` : outcome.text;
}

export function describeVerdict(side: ComparisonSide | null): string {
  if (!side?.evaluation) return 'not evaluated';
  return `ok=${side.evaluation.ok} other=${side.evaluation.other}`;
}

export class PlainFormatter implements OutputFormatter {
  formatStats({ pair, status, stats }: StatsReport): string {
    const lines = [
      `Pair:      ${pairKey(pair)}`,
      `State:     ${status.state}`,
      `Responses: ${status.responded}/${status.promptCount} (${status.succeeded} ok, ${status.failed} failed)`,
      `Evaluated: ${status.evaluated}/${status.succeeded}`,
    ];
    if (stats.latency) {
      const { minMs, avgMs, maxMs, count } = stats.latency;
      lines.push(`Latency:   min ${minMs}ms, avg ${avgMs}ms, max ${maxMs}ms over ${count}`);
    } else {
      lines.push('Latency:   n/a');
    }
    const c = stats.evalCounts;
    lines.push(`ok:        ${c.okTrue} true, ${c.okFalse} false (${formatRate(stats.ratios.okRate)})`);
    lines.push(`other:     ${c.otherTrue} true, ${c.otherFalse} false (${formatRate(stats.ratios.otherRate)})`);
    return lines.join('\n');
  }

  formatComparison(view: ComparisonView): string {
    const leftKey = pairKey(view.left);
    const rightKey = pairKey(view.right);
    const blocks = view.rows.map((row) => {
      const prompt = row.left?.promptText ?? row.right?.promptText ?? '';
      return [
        `[${row.promptIndex}] ${prompt}`,
        `  ${leftKey} (${describeVerdict(row.left)}):`,
        `    ${describeSide(row.left)}`,
        `  ${rightKey} (${describeVerdict(row.right)}):`,
        `    ${describeSide(row.right)}`,
      ].join('\n');
    });
    return blocks.join('\n\n');
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
