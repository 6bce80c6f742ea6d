import type { Pair } from '../pair/pair.js';
import { pairKey } from '../pair/pair.js';
import { AlreadyInProgressError } from '../../shared/errors.js';
import { RunController } from './run-controller.js';
import type { RunKind } from './run-summary.js';

/**
 * At most one run of each kind per pair. Generation and evaluation of the same
 * pair are tracked separately; runs on different pairs never interact.
 */
export class ActiveRuns {
  private readonly runs = new Map<string, RunController>();

  private key(kind: RunKind, pair: Pair): string {
    return `${kind}|${pairKey(pair)}`;
  }

  begin(kind: RunKind, pair: Pair, options: { timeoutMs?: number | null; signal?: AbortSignal } = {}): RunController {
    const key = this.key(kind, pair);
    if (this.runs.has(key)) {
      throw new AlreadyInProgressError(pairKey(pair), kind);
    }
    const controller = new RunController({ timeoutMs: options.timeoutMs, parentSignal: options.signal });
    this.runs.set(key, controller);
    return controller;
  }

  end(kind: RunKind, pair: Pair, controller: RunController): void {
    const key = this.key(kind, pair);
    if (this.runs.get(key) === controller) this.runs.delete(key);
    controller.dispose();
  }

  isActive(kind: RunKind, pair: Pair): boolean {
    return this.runs.has(this.key(kind, pair));
  }

  /** Cancels the pair's runs of `kind`, or of both kinds. Returns whether any was running. */
  cancel(pair: Pair, kind?: RunKind): boolean {
    const kinds: RunKind[] = kind ? [kind] : ['generation', 'evaluation'];
    let cancelled = false;
    for (const k of kinds) {
      const controller = this.runs.get(this.key(k, pair));
      if (controller) {
        controller.cancel();
        cancelled = true;
      }
    }
    return cancelled;
  }

  cancelAll(): void {
    for (const [, controller] of this.runs) {
      controller.cancel();
    }
  }

  get size(): number {
    return this.runs.size;
  }
}
