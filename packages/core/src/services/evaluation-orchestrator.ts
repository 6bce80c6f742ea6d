import type { Pair } from '../domain/pair/pair.js';
import { pairKey } from '../domain/pair/pair.js';
import { derivePairStatus } from '../domain/pair/pair-state.js';
import { isSuccessfulResponse } from '../domain/results/prompt-response.js';
import type { SuccessfulResponse } from '../domain/results/prompt-response.js';
import { ActiveRuns } from '../domain/run/active-runs.js';
import { withRetry } from '../domain/run/retry.js';
import type { OrchestratorSettings, RunOptions } from '../domain/run/run-options.js';
import type { EvaluationSummary } from '../domain/run/run-summary.js';
import { runTaskGroup } from '../domain/run/task-group.js';
import type { HarnessEvents } from '../ports/harness-events.js';
import { noopHarnessEvents } from '../ports/harness-events.js';
import type { JudgeClient } from '../ports/judge-client.js';
import type { PromptSetCatalog } from '../ports/prompt-set-catalog.js';
import type { ResponseStore } from '../ports/response-store.js';
import { IntegrityError, InvalidPairError, NotGeneratedError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('evaluation');

type IndexOutcome = 'evaluated' | 'skipped' | 'abandoned';

export interface EvaluationDeps {
  catalog: PromptSetCatalog;
  store: ResponseStore;
  judgeClient: JudgeClient;
  settings: OrchestratorSettings;
  events?: HarnessEvents;
  activeRuns?: ActiveRuns;
}

export class EvaluationOrchestrator {
  private readonly events: HarnessEvents;
  private readonly activeRuns: ActiveRuns;

  constructor(private readonly deps: EvaluationDeps) {
    this.events = deps.events ?? noopHarnessEvents;
    this.activeRuns = deps.activeRuns ?? new ActiveRuns();
  }

  async evaluate(pair: Pair, judgeModelId: string, options: RunOptions = {}): Promise<EvaluationSummary> {
    const key = pairKey(pair);
    const promptSet = await this.deps.catalog.get(pair.promptSetId);
    if (!promptSet) {
      throw new InvalidPairError(`Unknown prompt set: ${pair.promptSetId}`);
    }

    const timeoutMs = options.timeoutMs !== undefined ? options.timeoutMs : this.deps.settings.runTimeoutMs;
    const controller = this.activeRuns.begin('evaluation', pair, { timeoutMs, signal: options.signal });
    const startedAt = performance.now();
    let drained: Promise<void> = Promise.resolve();

    try {
      const responses = await this.deps.store.getResponses(pair);
      const evaluations = await this.deps.store.getEvaluations(pair);
      const status = derivePairStatus(promptSet.promptCount, responses, evaluations);
      if (status.state === 'NOT_GENERATED') {
        throw new NotGeneratedError(key);
      }

      const judged = new Set(evaluations.map((e) => e.promptIndex));
      const pending = new Map<number, SuccessfulResponse>();
      for (const response of responses) {
        if (isSuccessfulResponse(response) && !judged.has(response.promptIndex)) {
          pending.set(response.promptIndex, response);
        }
      }

      const prompts = await this.deps.catalog.getPrompts(pair.promptSetId);
      const indices = [...pending.keys()].sort((a, b) => a - b);

      log.info(`evaluate: ${key} with ${judgeModelId}, ${indices.length} responses to judge`);
      this.events.onRunStart('evaluation', pair, indices.length);

      const group = await runTaskGroup({
        keys: indices,
        concurrency: options.concurrency ?? this.deps.settings.concurrency,
        controller,
        task: (index, signal) => {
          const response = pending.get(index);
          if (!response) return Promise.resolve<IndexOutcome>('skipped');
          return this.evaluateIndex(response, prompts[index], judgeModelId, signal);
        },
      });

      const summary: EvaluationSummary = {
        kind: 'evaluation',
        evaluatedCount: 0,
        skippedCount: 0,
        abandonedCount: 0,
        elapsedMs: Math.round(performance.now() - startedAt),
      };
      let firstFault: unknown;
      drained = group.drained;
      for (const [index, result] of group.results) {
        if (result.status === 'fulfilled') {
          if (result.value === 'evaluated') summary.evaluatedCount++;
          else if (result.value === 'skipped') summary.skippedCount++;
          else summary.abandonedCount++;
        } else if (result.status === 'abandoned') {
          summary.abandonedCount++;
          this.events.onIndexStatus('evaluation', pair, index, 'abandoned');
        } else {
          summary.abandonedCount++;
          log.error(`evaluate: ${key} index ${index} could not be recorded:`, result.reason);
          firstFault ??= result.reason;
        }
      }

      if (firstFault !== undefined) throw firstFault;

      log.info(
        `evaluate: ${key} done in ${summary.elapsedMs}ms - ${summary.evaluatedCount} evaluated, ` +
          `${summary.skippedCount} skipped, ${summary.abandonedCount} abandoned`,
      );
      this.events.onRunComplete('evaluation', pair, summary);
      return summary;
    } catch (err) {
      this.events.onError('evaluation', pair, errorMessage(err));
      throw err;
    } finally {
      // Stopped tasks may still be writing; the pair stays locked until they finish
      await drained;
      this.activeRuns.end('evaluation', pair, controller);
    }
  }

  cancel(pair: Pair): boolean {
    return this.activeRuns.cancel(pair, 'evaluation');
  }

  private async evaluateIndex(
    response: SuccessfulResponse,
    promptText: string,
    judgeModelId: string,
    signal: AbortSignal,
  ): Promise<IndexOutcome> {
    const pair: Pair = { promptSetId: response.promptSetId, modelId: response.modelId };
    const index = response.promptIndex;
    const key = pairKey(pair);

    const outcome = await withRetry(
      (attempt) => {
        this.events.onIndexStatus('evaluation', pair, index, attempt > 1 ? 'retrying' : 'running');
        return this.deps.judgeClient.score(judgeModelId, promptText, response.outcome.text, { signal });
      },
      {
        policy: this.deps.settings.retry,
        signal,
        random: this.deps.settings.random,
        onRetry: (attempt, delayMs, error) => {
          log.warn(`evaluateIndex: ${key} index ${index} attempt ${attempt} failed (${error.code}), retrying in ${delayMs}ms`);
        },
      },
    );

    if (outcome.status === 'aborted' || signal.aborted) return 'abandoned';

    if (outcome.status === 'failure') {
      log.warn(`evaluateIndex: ${key} index ${index} left unevaluated: ${outcome.error.message}`);
      this.events.onIndexStatus('evaluation', pair, index, 'skipped', outcome.error.message);
      return 'skipped';
    }

    let written: boolean;
    try {
      written = await this.deps.store.putEvaluation(
        {
          ...pair,
          promptIndex: index,
          judgeModelId,
          ok: outcome.value.ok,
          other: outcome.value.other,
          createdAt: new Date().toISOString(),
        },
        { signal },
      );
    } catch (err) {
      // The response was superseded or judged by another writer while the judge ran
      if (err instanceof IntegrityError) {
        log.warn(`evaluateIndex: ${key} index ${index} not recorded: ${err.message}`);
        this.events.onIndexStatus('evaluation', pair, index, 'skipped', err.message);
        return 'skipped';
      }
      throw err;
    }
    if (!written) return 'abandoned';

    this.events.onIndexStatus('evaluation', pair, index, 'success');
    return 'evaluated';
  }
}
