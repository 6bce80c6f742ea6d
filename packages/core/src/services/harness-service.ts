import type { ComparisonView } from '../domain/comparison/comparison-view.js';
import type { HarnessConfig } from '../domain/config/harness-config.js';
import type { Pair } from '../domain/pair/pair.js';
import { pairIdProblem, pairKey, samePair } from '../domain/pair/pair.js';
import type { PairState, PairStatus } from '../domain/pair/pair-state.js';
import { derivePairStatus } from '../domain/pair/pair-state.js';
import type { PromptSet } from '../domain/prompt-set/prompt-set.js';
import type { EvaluationResult } from '../domain/results/evaluation-result.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import { ActiveRuns } from '../domain/run/active-runs.js';
import type { GenerateOptions, OrchestratorSettings, RunOptions } from '../domain/run/run-options.js';
import type { EvaluationSummary, GenerationSummary, RunKind } from '../domain/run/run-summary.js';
import type { PairStats } from '../domain/stats/statistics.js';
import type { HarnessEvents } from '../ports/harness-events.js';
import type { JudgeClient } from '../ports/judge-client.js';
import type { ModelClient } from '../ports/model-client.js';
import type { PromptSetCatalog } from '../ports/prompt-set-catalog.js';
import type { ResponseStore, SupersededRun } from '../ports/response-store.js';
import { ConfigError, InvalidPairError, PairNotFoundError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ComparisonSelector } from './comparison-selector.js';
import { EvaluationOrchestrator } from './evaluation-orchestrator.js';
import { GenerationOrchestrator } from './generation-orchestrator.js';
import { StatsAggregator } from './stats-aggregator.js';

const log = createLogger('harness-service');

export interface HarnessDeps {
  catalog: PromptSetCatalog;
  store: ResponseStore;
  modelClient: ModelClient;
  /** Only evaluate needs one */
  judgeClient?: JudgeClient;
  config: HarnessConfig;
  events?: HarnessEvents;
  random?: () => number;
}

export interface PairOverview {
  pair: Pair;
  promptSet: PromptSet;
  status: PairStatus;
  /** The model is not in the configured list; only stored rows name it */
  unlisted: boolean;
}

export interface PairResults {
  promptSet: PromptSet;
  prompts: string[];
  responses: PromptResponse[];
  evaluations: EvaluationResult[];
  status: PairStatus;
}

/**
 * Entry point for the CLI. Owns the run registry shared by both orchestrators
 * so cancellation reaches every active run.
 */
export class HarnessService {
  private readonly activeRuns = new ActiveRuns();
  private readonly generation: GenerationOrchestrator;
  private readonly evaluation: EvaluationOrchestrator | null;
  private readonly stats: StatsAggregator;
  private readonly selector: ComparisonSelector;

  constructor(private readonly deps: HarnessDeps) {
    const settings: OrchestratorSettings = {
      concurrency: deps.config.concurrency,
      retry: deps.config.retry,
      runTimeoutMs: deps.config.runTimeoutMs,
      random: deps.random,
    };
    this.generation = new GenerationOrchestrator({
      catalog: deps.catalog,
      store: deps.store,
      modelClient: deps.modelClient,
      settings,
      events: deps.events,
      activeRuns: this.activeRuns,
    });
    this.evaluation = deps.judgeClient
      ? new EvaluationOrchestrator({
          catalog: deps.catalog,
          store: deps.store,
          judgeClient: deps.judgeClient,
          settings,
          events: deps.events,
          activeRuns: this.activeRuns,
        })
      : null;
    this.stats = new StatsAggregator(deps.store);
    this.selector = new ComparisonSelector(deps.catalog, deps.store);
  }

  listPromptSets(): Promise<PromptSet[]> {
    return this.deps.catalog.list();
  }

  async generate(promptSetId: string, modelId: string, options: GenerateOptions = {}): Promise<GenerationSummary> {
    const pair = { promptSetId, modelId };
    await this.validate(pair, { forRun: true });
    return this.generation.generate(pair, options);
  }

  async evaluate(
    promptSetId: string,
    modelId: string,
    judgeModelId?: string,
    options: RunOptions = {},
  ): Promise<EvaluationSummary> {
    const pair = { promptSetId, modelId };
    await this.validate(pair, { forRun: true });
    if (!this.evaluation) {
      throw new ConfigError('No judge is configured; set a judge rubric before evaluating');
    }
    return this.evaluation.evaluate(pair, judgeModelId || this.deps.config.judgeModel, options);
  }

  async getPairState(pair: Pair): Promise<PairState> {
    return (await this.getPairStatus(pair)).state;
  }

  async getPairStatus(pair: Pair): Promise<PairStatus> {
    const promptSet = await this.validate(pair, { forRun: false });
    return this.statusOf(pair, promptSet);
  }

  async getStats(pair: Pair): Promise<PairStats> {
    await this.validate(pair, { forRun: false });
    return this.stats.getStats(pair);
  }

  async getPairResults(pair: Pair): Promise<PairResults> {
    const promptSet = await this.validate(pair, { forRun: false });
    const [prompts, responses, evaluations] = await Promise.all([
      this.deps.catalog.getPrompts(pair.promptSetId),
      this.deps.store.getResponses(pair),
      this.deps.store.getEvaluations(pair),
    ]);
    if (responses.length === 0) throw new PairNotFoundError(pairKey(pair));
    return {
      promptSet,
      prompts,
      responses,
      evaluations,
      status: derivePairStatus(promptSet.promptCount, responses, evaluations),
    };
  }

  async getHistory(pair: Pair): Promise<SupersededRun[]> {
    await this.validate(pair, { forRun: false });
    return this.deps.store.getHistory(pair);
  }

  /** Every prompt set crossed with the configured models, plus any other model holding stored rows. */
  async listPairs(): Promise<PairOverview[]> {
    const [promptSets, storedPairs] = await Promise.all([this.deps.catalog.list(), this.deps.store.listPairs()]);
    const overview: PairOverview[] = [];
    for (const promptSet of promptSets) {
      const models = [...this.deps.config.models];
      for (const stored of storedPairs) {
        if (stored.promptSetId === promptSet.id && !models.includes(stored.modelId)) {
          models.push(stored.modelId);
        }
      }
      for (const modelId of models) {
        const pair = { promptSetId: promptSet.id, modelId };
        overview.push({
          pair,
          promptSet,
          status: await this.statusOf(pair, promptSet),
          unlisted: !this.deps.config.models.includes(modelId),
        });
      }
    }
    return overview;
  }

  toggleSelection(pair: Pair, selected: boolean): { evicted: Pair | null } {
    return this.selector.toggle(pair, selected);
  }

  selection(): Pair[] {
    return this.selector.selection();
  }

  clearSelection(): void {
    this.selector.clear();
  }

  compare(): Promise<ComparisonView> {
    return this.selector.compare();
  }

  isRunning(kind: RunKind, pair: Pair): boolean {
    return this.activeRuns.isActive(kind, pair);
  }

  /** Cancels both kinds of run on the pair. Returns whether anything was running. */
  cancel(pair: Pair): boolean {
    const cancelled = this.activeRuns.cancel(pair);
    if (cancelled) log.info(`cancel: ${pairKey(pair)}`);
    return cancelled;
  }

  cancelAll(): void {
    if (this.activeRuns.size > 0) log.info(`cancelAll: stopping ${this.activeRuns.size} runs`);
    this.activeRuns.cancelAll();
  }

  private async statusOf(pair: Pair, promptSet: PromptSet): Promise<PairStatus> {
    const [responses, evaluations] = await Promise.all([
      this.deps.store.getResponses(pair),
      this.deps.store.getEvaluations(pair),
    ]);
    return derivePairStatus(promptSet.promptCount, responses, evaluations);
  }

  /**
   * Runs may only target configured models; reads also accept a model that
   * already has stored rows for the set.
   */
  private async validate(pair: Pair, options: { forRun: boolean }): Promise<PromptSet> {
    if (!pair.promptSetId || !pair.modelId) {
      throw new InvalidPairError('Both a prompt set id and a model id are required');
    }
    for (const [label, id] of [['Prompt set id', pair.promptSetId], ['Model id', pair.modelId]] as const) {
      const problem = pairIdProblem(id);
      if (problem) throw new InvalidPairError(`${label} ${problem}: ${id}`);
    }
    const promptSet = await this.deps.catalog.get(pair.promptSetId);
    if (!promptSet) {
      throw new InvalidPairError(`Unknown prompt set: ${pair.promptSetId}`);
    }
    if (this.deps.config.models.includes(pair.modelId)) return promptSet;

    if (!options.forRun) {
      const stored = await this.deps.store.listPairs();
      if (stored.some((p) => samePair(p, pair))) return promptSet;
    }
    throw new InvalidPairError(`Model ${pair.modelId} is not among the configured models`);
  }
}
