import pLimit from 'p-limit';
import type { RunController } from './run-controller.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('task-group');

export type TaskResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'abandoned' };

export interface TaskGroupResult<K, R> {
  results: Map<K, TaskResult<R>>;
  /** The controller stopped the group before every task settled */
  interrupted: boolean;
  /** Settles once every task that started has finished, late ones included */
  drained: Promise<void>;
}

/**
 * Runs one task per key on a pool of `concurrency` workers and joins on all of
 * them. If the controller stops first the group returns immediately: queued
 * tasks never start and tasks still in flight are reported as abandoned, with
 * whatever they produce afterwards ignored. Callers that guard a resource for
 * the tasks must hold it until `drained` settles.
 */
export async function runTaskGroup<K, R>(options: {
  keys: readonly K[];
  concurrency: number;
  controller: RunController;
  task: (key: K, signal: AbortSignal) => Promise<R>;
}): Promise<TaskGroupResult<K, R>> {
  const { keys, controller, task } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const limit = pLimit(concurrency);
  const signal = controller.signal;

  log.debug(`runTaskGroup: ${keys.length} tasks, concurrency ${concurrency}`);

  const results = new Map<K, TaskResult<R>>();
  let closed = false;
  const record = (key: K, result: TaskResult<R>) => {
    if (!closed && !signal.aborted) results.set(key, result);
  };

  const inFlight = new Set<Promise<void>>();
  const execute = async (key: K): Promise<void> => {
    try {
      record(key, { status: 'fulfilled', value: await task(key, signal) });
    } catch (reason) {
      record(key, { status: 'rejected', reason });
    }
  };

  const settled = Promise.all(
    keys.map((key) =>
      limit(async () => {
        if (signal.aborted) return;
        const running = execute(key);
        inFlight.add(running);
        await running;
        inFlight.delete(running);
      }),
    ),
  );

  const stopped = new Promise<void>((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener('abort', () => resolve(), { once: true });
  });

  await Promise.race([settled, stopped]);
  closed = true;
  const interrupted = results.size < keys.length;
  // Queued tasks cleared below never start, so only the running ones are awaited
  const drained = Promise.all([...inFlight]).then(() => undefined);

  if (interrupted) {
    limit.clearQueue();
    for (const key of keys) {
      if (!results.has(key)) results.set(key, { status: 'abandoned' });
    }
    log.info(`runTaskGroup: stopped (${controller.reason ?? 'cancelled'}) with ${keys.filter((k) => results.get(k)?.status === 'abandoned').length} tasks abandoned`);
  }

  return { results, interrupted, drained };
}
