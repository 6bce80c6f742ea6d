import type { Pair } from '../domain/pair/pair.js';
import { pairKey } from '../domain/pair/pair.js';
import { derivePairStatus, isAtLeast } from '../domain/pair/pair-state.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import { ActiveRuns } from '../domain/run/active-runs.js';
import { withRetry } from '../domain/run/retry.js';
import type { GenerateOptions, OrchestratorSettings } from '../domain/run/run-options.js';
import type { GenerationSummary } from '../domain/run/run-summary.js';
import { runTaskGroup } from '../domain/run/task-group.js';
import type { HarnessEvents } from '../ports/harness-events.js';
import { noopHarnessEvents } from '../ports/harness-events.js';
import type { ModelClient } from '../ports/model-client.js';
import type { PromptSetCatalog } from '../ports/prompt-set-catalog.js';
import type { ResponseStore } from '../ports/response-store.js';
import { InvalidPairError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('generation');

type IndexOutcome = 'success' | 'error' | 'abandoned';

export interface GenerationDeps {
  catalog: PromptSetCatalog;
  store: ResponseStore;
  modelClient: ModelClient;
  settings: OrchestratorSettings;
  events?: HarnessEvents;
  activeRuns?: ActiveRuns;
}

export class GenerationOrchestrator {
  private readonly events: HarnessEvents;
  private readonly activeRuns: ActiveRuns;

  constructor(private readonly deps: GenerationDeps) {
    this.events = deps.events ?? noopHarnessEvents;
    this.activeRuns = deps.activeRuns ?? new ActiveRuns();
  }

  async generate(pair: Pair, options: GenerateOptions = {}): Promise<GenerationSummary> {
    const key = pairKey(pair);
    const promptSet = await this.deps.catalog.get(pair.promptSetId);
    if (!promptSet) {
      throw new InvalidPairError(`Unknown prompt set: ${pair.promptSetId}`);
    }

    const timeoutMs = options.timeoutMs !== undefined ? options.timeoutMs : this.deps.settings.runTimeoutMs;
    const controller = this.activeRuns.begin('generation', pair, { timeoutMs, signal: options.signal });
    const startedAt = performance.now();
    let drained: Promise<void> = Promise.resolve();

    try {
      let responses = await this.deps.store.getResponses(pair);
      const evaluations = await this.deps.store.getEvaluations(pair);
      const status = derivePairStatus(promptSet.promptCount, responses, evaluations);

      if (isAtLeast(status.state, 'GENERATED') && !options.force) {
        log.info(`generate: ${key} is already ${status.state}, nothing to do`);
        return {
          kind: 'generation',
          generatedCount: status.succeeded,
          failedCount: status.failed,
          abandonedCount: 0,
          elapsedMs: 0,
          alreadyComplete: true,
        };
      }

      if (options.force && (responses.length > 0 || evaluations.length > 0)) {
        log.info(`generate: superseding ${responses.length} responses of ${key}`);
        await this.deps.store.supersede(pair);
        responses = [];
      }

      const prompts = await this.deps.catalog.getPrompts(pair.promptSetId);
      const recorded = new Set(responses.map((r) => r.promptIndex));
      const pending: number[] = [];
      for (let index = 0; index < promptSet.promptCount; index++) {
        if (!recorded.has(index)) pending.push(index);
      }

      log.info(`generate: ${key} starting ${pending.length}/${promptSet.promptCount} prompts`);
      this.events.onRunStart('generation', pair, pending.length);

      const group = await runTaskGroup({
        keys: pending,
        concurrency: options.concurrency ?? this.deps.settings.concurrency,
        controller,
        task: (index, signal) => this.generateIndex(pair, index, prompts[index], signal),
      });

      const summary: GenerationSummary = {
        kind: 'generation',
        generatedCount: 0,
        failedCount: 0,
        abandonedCount: 0,
        elapsedMs: Math.round(performance.now() - startedAt),
        alreadyComplete: false,
      };
      let firstFault: unknown;
      drained = group.drained;
      for (const [index, result] of group.results) {
        if (result.status === 'fulfilled') {
          if (result.value === 'success') summary.generatedCount++;
          else if (result.value === 'error') summary.failedCount++;
          else summary.abandonedCount++;
        } else if (result.status === 'abandoned') {
          summary.abandonedCount++;
          this.events.onIndexStatus('generation', pair, index, 'abandoned');
        } else {
          summary.abandonedCount++;
          log.error(`generate: ${key} index ${index} could not be recorded:`, result.reason);
          firstFault ??= result.reason;
        }
      }

      if (firstFault !== undefined) throw firstFault;

      log.info(
        `generate: ${key} done in ${summary.elapsedMs}ms - ${summary.generatedCount} generated, ` +
          `${summary.failedCount} failed, ${summary.abandonedCount} abandoned`,
      );
      this.events.onRunComplete('generation', pair, summary);
      return summary;
    } catch (err) {
      this.events.onError('generation', pair, errorMessage(err));
      throw err;
    } finally {
      // Stopped tasks may still be writing; the pair stays locked until they finish
      await drained;
      this.activeRuns.end('generation', pair, controller);
    }
  }

  cancel(pair: Pair): boolean {
    return this.activeRuns.cancel(pair, 'generation');
  }

  private async generateIndex(pair: Pair, index: number, promptText: string, signal: AbortSignal): Promise<IndexOutcome> {
    const key = pairKey(pair);
    const outcome = await withRetry(
      (attempt) => {
        this.events.onIndexStatus('generation', pair, index, attempt > 1 ? 'retrying' : 'running');
        return this.deps.modelClient.complete(pair.modelId, promptText, { signal });
      },
      {
        policy: this.deps.settings.retry,
        signal,
        random: this.deps.settings.random,
        onRetry: (attempt, delayMs, error) => {
          log.warn(`generateIndex: ${key} index ${index} attempt ${attempt} failed (${error.code}), retrying in ${delayMs}ms`);
        },
      },
    );

    // Results arriving after the run stopped are dropped so the slot stays open for a later run
    if (outcome.status === 'aborted' || signal.aborted) return 'abandoned';

    const base = { promptSetId: pair.promptSetId, modelId: pair.modelId, promptIndex: index, createdAt: new Date().toISOString() };
    let response: PromptResponse;
    if (outcome.status === 'success') {
      response = {
        ...base,
        outcome: {
          status: 'success',
          text: outcome.value.text,
          latencyMs: outcome.value.latencyMs,
          attempts: outcome.attempts,
          truncated: outcome.value.truncated,
        },
      };
    } else {
      log.error(`generateIndex: ${key} index ${index} failed after ${outcome.attempts} attempts: ${outcome.error.message}`);
      response = {
        ...base,
        outcome: {
          status: 'error',
          error: { code: outcome.error.code ?? 'PROVIDER_ERROR', message: outcome.error.message },
          attempts: outcome.attempts,
        },
      };
    }

    const written = await this.deps.store.putResponse(response, { signal });
    if (!written) return 'abandoned';
    const status = response.outcome.status;
    this.events.onIndexStatus('generation', pair, index, status);
    return status;
  }
}
