import type {
  HarnessEvents,
  IndexStatus,
  Pair,
  RunKind,
  RunSummary,
} from '@promptbench/core';

export type EventHandler = {
  onRunStart?: (kind: RunKind, pair: Pair, taskCount: number) => void;
  onIndexStatus?: (kind: RunKind, pair: Pair, promptIndex: number, status: IndexStatus, detail?: string) => void;
  onRunComplete?: (kind: RunKind, pair: Pair, summary: RunSummary) => void;
  onError?: (kind: RunKind, pair: Pair, error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): HarnessEvents {
  return {
    onRunStart: (kind, pair, taskCount) => handlers.onRunStart?.(kind, pair, taskCount),
    onIndexStatus: (kind, pair, promptIndex, status, detail) =>
      handlers.onIndexStatus?.(kind, pair, promptIndex, status, detail),
    onRunComplete: (kind, pair, summary) => handlers.onRunComplete?.(kind, pair, summary),
    onError: (kind, pair, error) => handlers.onError?.(kind, pair, error),
  };
}
