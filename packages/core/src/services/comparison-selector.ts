import { BoundedFifoQueue } from '../domain/comparison/bounded-queue.js';
import type { ComparisonInput, ComparisonView } from '../domain/comparison/comparison-view.js';
import { buildComparisonView } from '../domain/comparison/comparison-view.js';
import type { Pair } from '../domain/pair/pair.js';
import { pairKey, samePair } from '../domain/pair/pair.js';
import { derivePairState, isAtLeast } from '../domain/pair/pair-state.js';
import type { PromptSetCatalog } from '../ports/prompt-set-catalog.js';
import type { ResponseStore } from '../ports/response-store.js';
import { IncompleteSelectionError } from '../shared/errors.js';

const SELECTION_CAPACITY = 2;

export class ComparisonSelector {
  private readonly queue = new BoundedFifoQueue<Pair>(SELECTION_CAPACITY, samePair);

  constructor(
    private readonly catalog: PromptSetCatalog,
    private readonly store: ResponseStore,
  ) {}

  toggle(pair: Pair, selected: boolean): { evicted: Pair | null } {
    if (!selected) {
      this.queue.remove(pair);
      return { evicted: null };
    }
    return { evicted: this.queue.push({ promptSetId: pair.promptSetId, modelId: pair.modelId }) };
  }

  /** Oldest selection first */
  selection(): Pair[] {
    return this.queue.toArray();
  }

  clear(): void {
    this.queue.clear();
  }

  async compare(): Promise<ComparisonView> {
    const selected = this.queue.toArray();
    if (selected.length !== SELECTION_CAPACITY) {
      throw new IncompleteSelectionError(`Select two pairs to compare, ${selected.length} selected`);
    }
    const [left, right] = await Promise.all(selected.map((pair) => this.load(pair)));
    return buildComparisonView(left, right);
  }

  private async load(pair: Pair): Promise<ComparisonInput> {
    const prompts = await this.catalog.getPrompts(pair.promptSetId);
    const [responses, evaluations] = await Promise.all([
      this.store.getResponses(pair),
      this.store.getEvaluations(pair),
    ]);
    if (!isAtLeast(derivePairState(prompts.length, responses, evaluations), 'GENERATED')) {
      throw new IncompleteSelectionError(`${pairKey(pair)} has not been fully generated`);
    }
    return { pair, prompts, responses, evaluations };
  }
}
