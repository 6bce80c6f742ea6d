import type { Pair } from '../domain/pair/pair.js';
import type { RunKind, RunSummary } from '../domain/run/run-summary.js';

export type IndexStatus = 'running' | 'retrying' | 'success' | 'error' | 'skipped' | 'abandoned';

export interface HarnessEvents {
  onRunStart(kind: RunKind, pair: Pair, taskCount: number): void;
  onIndexStatus(kind: RunKind, pair: Pair, promptIndex: number, status: IndexStatus, detail?: string): void;
  onRunComplete(kind: RunKind, pair: Pair, summary: RunSummary): void;
  onError(kind: RunKind, pair: Pair, error: string): void;
}

export const noopHarnessEvents: HarnessEvents = {
  onRunStart: () => {},
  onIndexStatus: () => {},
  onRunComplete: () => {},
  onError: () => {},
};
