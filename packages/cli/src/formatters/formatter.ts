import type { ComparisonView, Pair, PairStats, PairStatus } from '@promptbench/core';

export interface StatsReport {
  pair: Pair;
  status: PairStatus;
  stats: PairStats;
}

export interface OutputFormatter {
  formatStats(report: StatsReport): string;
  formatComparison(view: ComparisonView): string;
  renderError(error: string): void;
}

export type FormatName = 'json' | 'plain' | 'md';

export function isFormatName(value: string): value is FormatName {
  return value === 'json' || value === 'plain' || value === 'md';
}
