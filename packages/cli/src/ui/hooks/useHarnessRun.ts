import { useReducer } from 'react';
import type { IndexStatus, Pair, RunKind, RunSummary } from '@promptbench/core';
import type { EventHandler } from '../../adapters/callback-event-bridge.js';

export interface IndexState {
  index: number;
  status: IndexStatus;
  /** Attempts started so far */
  attempts: number;
  detail?: string;
  startedAt?: number;
  finishedAt?: number;
}

export interface HarnessRunState {
  kind: RunKind | null;
  pair: Pair | null;
  taskCount: number;
  indices: Map<number, IndexState>;
  summary: RunSummary | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'RUN_START'; kind: RunKind; pair: Pair; taskCount: number }
  | { type: 'INDEX_STATUS'; index: number; status: IndexStatus; detail?: string; now: number }
  | { type: 'COMPLETE'; summary: RunSummary }
  | { type: 'ERROR'; error: string };

const FINAL_STATUSES: ReadonlySet<IndexStatus> = new Set(['success', 'error', 'skipped', 'abandoned']);

export function harnessRunReducer(state: HarnessRunState, action: Action): HarnessRunState {
  switch (action.type) {
    case 'RUN_START':
      return {
        ...initialState,
        indices: new Map(),
        kind: action.kind,
        pair: action.pair,
        taskCount: action.taskCount,
      };

    case 'INDEX_STATUS': {
      const indices = new Map(state.indices);
      const existing = indices.get(action.index);
      const starting = action.status === 'running' || action.status === 'retrying';
      indices.set(action.index, {
        index: action.index,
        status: action.status,
        attempts: (existing?.attempts ?? 0) + (starting ? 1 : 0),
        detail: action.detail ?? existing?.detail,
        startedAt: existing?.startedAt ?? (starting ? action.now : undefined),
        finishedAt: FINAL_STATUSES.has(action.status) ? action.now : existing?.finishedAt,
      });
      return { ...state, indices };
    }

    case 'COMPLETE':
      return { ...state, summary: action.summary, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: HarnessRunState = {
  kind: null,
  pair: null,
  taskCount: 0,
  indices: new Map(),
  summary: null,
  error: null,
  done: false,
};

/** Tally of index states for the progress header. */
export function countStatuses(state: HarnessRunState): Record<IndexStatus, number> {
  const counts: Record<IndexStatus, number> = {
    running: 0,
    retrying: 0,
    success: 0,
    error: 0,
    skipped: 0,
    abandoned: 0,
  };
  for (const entry of state.indices.values()) counts[entry.status]++;
  return counts;
}

export function useHarnessRun(): [HarnessRunState, EventHandler] {
  const [state, dispatch] = useReducer(harnessRunReducer, initialState);

  const handlers: EventHandler = {
    onRunStart: (kind, pair, taskCount) => dispatch({ type: 'RUN_START', kind, pair, taskCount }),
    onIndexStatus: (_kind, _pair, index, status, detail) =>
      dispatch({ type: 'INDEX_STATUS', index, status, detail, now: Date.now() }),
    onRunComplete: (_kind, _pair, summary) => dispatch({ type: 'COMPLETE', summary }),
    onError: (_kind, _pair, error) => dispatch({ type: 'ERROR', error }),
  };

  return [state, handlers];
}
