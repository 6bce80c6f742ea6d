import type { ComparisonView } from '@promptbench/core';
import type { OutputFormatter, StatsReport } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  formatStats(report: StatsReport): string {
    return JSON.stringify(report, null, 2);
  }

  formatComparison(view: ComparisonView): string {
    return JSON.stringify(view, null, 2);
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
