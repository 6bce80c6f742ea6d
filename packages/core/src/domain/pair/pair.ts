export interface Pair {
  promptSetId: string;
  modelId: string;
}

const KEY_SEPARATOR = '::';

export function pairKey(pair: Pair): string {
  return `${pair.promptSetId}${KEY_SEPARATOR}${pair.modelId}`;
}

/** Why an id cannot name one half of a pair, or null when it can. */
export function pairIdProblem(id: string): string | null {
  if (id.trim() === '') return 'must not be empty';
  if (id.includes(KEY_SEPARATOR)) return `must not contain "${KEY_SEPARATOR}"`;
  if (id === '.' || id === '..') return `must not be "${id}"`;
  return null;
}

export function samePair(a: Pair, b: Pair): boolean {
  return a.promptSetId === b.promptSetId && a.modelId === b.modelId;
}

/**
 * Parses the `<promptSetId>:<modelId>` form used on the command line. Model ids
 * may contain colons themselves (`openai/gpt-4o:free`), so only the first one splits.
 */
export function parsePairSpec(spec: string): Pair | null {
  const idx = spec.indexOf(':');
  if (idx <= 0 || idx === spec.length - 1) return null;
  return { promptSetId: spec.slice(0, idx), modelId: spec.slice(idx + 1) };
}
