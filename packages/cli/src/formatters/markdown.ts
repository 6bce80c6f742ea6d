import { pairKey, type ComparisonSide, type ComparisonView } from '@promptbench/core';
import { formatRate } from '../ui/format.js';
import type { OutputFormatter, StatsReport } from './formatter.js';
import { describeSide, describeVerdict } from './plain.js';

function sideSection(title: string, side: ComparisonSide | null): string[] {
  const lines = [`### ${title}`, ''];
  if (side && side.response?.outcome.status === 'success') {
    lines.push(side.response.outcome.text);
  } else {
    lines.push(`_${describeSide(side)}_`);
  }
  lines.push('', `Verdict: ${describeVerdict(side)}`, '');
  return lines;
}

export class MarkdownFormatter implements OutputFormatter {
  formatStats({ pair, status, stats }: StatsReport): string {
    const latency = stats.latency
      ? `${stats.latency.minMs} / ${stats.latency.avgMs} / ${stats.latency.maxMs} ms (${stats.latency.count})`
      : 'n/a';
    const c = stats.evalCounts;
    return [
      `# ${pairKey(pair)}`,
      '',
      `**State:** ${status.state}`,
      '',
      '| Metric | Value |',
      '| --- | --- |',
      `| Responses | ${status.responded}/${status.promptCount} |`,
      `| Failed | ${status.failed} |`,
      `| Latency min / avg / max | ${latency} |`,
      `| ok | ${c.okTrue} true, ${c.okFalse} false (${formatRate(stats.ratios.okRate)}) |`,
      `| other | ${c.otherTrue} true, ${c.otherFalse} false (${formatRate(stats.ratios.otherRate)}) |`,
    ].join('\n');
  }

  formatComparison(view: ComparisonView): string {
    const lines = [`# ${pairKey(view.left)} vs ${pairKey(view.right)}`, ''];
    for (const row of view.rows) {
      const prompt = row.left?.promptText ?? row.right?.promptText ?? '';
      lines.push(`## Prompt ${row.promptIndex}`, '', `> ${prompt.replace(/\n/g, '\n> ')}`, '');
      lines.push(...sideSection(pairKey(view.left), row.left));
      lines.push(...sideSection(pairKey(view.right), row.right));
    }
    return lines.join('\n').trimEnd();
  }

  renderError(error: string): void {
    console.error(`## Error\n\n${error}`);
  }
}
