export type StopReason = 'cancelled' | 'timeout';

/**
 * Cancellation scope for one generate or evaluate run. Every provider call in
 * the run shares `signal`; cancelling or hitting the deadline aborts them all.
 */
export class RunController {
  private readonly abortController = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopReason: StopReason | null = null;
  private detachParent: (() => void) | null = null;

  constructor(options: { timeoutMs?: number | null; parentSignal?: AbortSignal } = {}) {
    const { timeoutMs, parentSignal } = options;

    if (timeoutMs != null && timeoutMs > 0) {
      this.timer = setTimeout(() => this.stop('timeout'), timeoutMs);
    }

    if (parentSignal) {
      if (parentSignal.aborted) {
        this.stop('cancelled');
      } else {
        const onAbort = () => this.stop('cancelled');
        parentSignal.addEventListener('abort', onAbort, { once: true });
        this.detachParent = () => parentSignal.removeEventListener('abort', onAbort);
      }
    }
  }

  cancel(): void {
    this.stop('cancelled');
  }

  private stop(reason: StopReason): void {
    if (this.stopReason) return;
    this.stopReason = reason;
    this.abortController.abort(reason);
    this.dispose();
  }

  /** Releases the deadline timer and parent listener; safe to call repeatedly. */
  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detachParent?.();
    this.detachParent = null;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isStopped(): boolean {
    return this.stopReason !== null;
  }

  get reason(): StopReason | null {
    return this.stopReason;
  }
}
