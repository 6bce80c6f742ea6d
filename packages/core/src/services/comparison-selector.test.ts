import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryResponseStore } from '../adapters/in-memory-response-store.js';
import { IncompleteSelectionError } from '../shared/errors.js';
import { StaticCatalog } from '../testing/fakes.js';
import { okResponse, verdict } from '../testing/response-store-contract.js';
import { ComparisonSelector } from './comparison-selector.js';

const catalog = new StaticCatalog({ short: ['q0', 'q1'], long: ['q0', 'q1', 'q2'] });
const a = { promptSetId: 'short', modelId: 'model-a' };
const b = { promptSetId: 'short', modelId: 'model-b' };
const c = { promptSetId: 'long', modelId: 'model-a' };

describe('ComparisonSelector', () => {
  let store: InMemoryResponseStore;
  let selector: ComparisonSelector;

  beforeEach(() => {
    store = new InMemoryResponseStore();
    selector = new ComparisonSelector(catalog, store);
  });

  async function generate(pair: { promptSetId: string; modelId: string }, count: number): Promise<void> {
    for (let index = 0; index < count; index++) {
      await store.putResponse(okResponse(index, `${pair.modelId}:${index}`, pair));
    }
  }

  it('should evict the oldest selection when a third pair is selected', () => {
    expect(selector.toggle(a, true)).toEqual({ evicted: null });
    expect(selector.toggle(b, true)).toEqual({ evicted: null });

    expect(selector.toggle(c, true)).toEqual({ evicted: a });
    expect(selector.selection()).toEqual([b, c]);
  });

  it('should not duplicate a pair selected twice', () => {
    selector.toggle(a, true);
    selector.toggle({ ...a }, true);

    expect(selector.selection()).toEqual([a]);
  });

  it('should drop a deselected pair', () => {
    selector.toggle(a, true);
    selector.toggle(b, true);

    selector.toggle(a, false);

    expect(selector.selection()).toEqual([b]);
  });

  it('should require exactly two selected pairs', async () => {
    await generate(a, 2);
    selector.toggle(a, true);

    await expect(selector.compare()).rejects.toBeInstanceOf(IncompleteSelectionError);
  });

  it('should refuse a pair that is not generated', async () => {
    await generate(a, 2);
    await generate(b, 1);
    selector.toggle(a, true);
    selector.toggle(b, true);

    await expect(selector.compare()).rejects.toThrow('short::model-b has not been fully generated');
  });

  it('should align rows by prompt index across prompt sets of different length', async () => {
    await generate(a, 2);
    await generate(c, 3);
    await store.putEvaluation(verdict(1, c));
    selector.toggle(a, true);
    selector.toggle(c, true);

    const view = await selector.compare();

    expect(view.left).toEqual(a);
    expect(view.right).toEqual(c);
    expect(view.rows).toHaveLength(3);
    expect(view.rows[0].left?.response?.outcome).toMatchObject({ text: 'model-a:0' });
    expect(view.rows[1].right?.evaluation).toMatchObject({ ok: true, other: false });
    expect(view.rows[1].left?.evaluation).toBeNull();
    expect(view.rows[2]).toMatchObject({ promptIndex: 2, left: null, right: { promptText: 'q2' } });
  });

  it('should empty the selection on clear', () => {
    selector.toggle(a, true);
    selector.clear();
    expect(selector.selection()).toEqual([]);
  });
});
