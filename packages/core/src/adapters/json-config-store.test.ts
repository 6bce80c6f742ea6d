import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonConfigStore, sanitizePrefs } from './json-config-store.js';

describe('sanitizePrefs', () => {
  it('should keep recognised, well-typed fields only', () => {
    expect(
      sanitizePrefs({
        models: ['a', 'b'],
        judgeModel: 'judge',
        concurrency: 0,
        maxAttempts: 5,
        runTimeoutMs: 'soon',
        extra: true,
      }),
    ).toEqual({ models: ['a', 'b'], judgeModel: 'judge', maxAttempts: 5 });
  });

  it('should drop a model list with non-string entries', () => {
    expect(sanitizePrefs({ models: ['a', 3] })).toEqual({});
    expect(sanitizePrefs(null)).toEqual({});
  });
});

describe('JsonConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'promptbench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should start empty and round-trip saved prefs', async () => {
    const store = new JsonConfigStore(dir);
    expect(await store.getHarnessConfigPrefs()).toEqual({});

    await store.saveHarnessConfigPrefs({ judgeModel: 'judge', concurrency: 2 });

    expect(await store.getHarnessConfigPrefs()).toEqual({ judgeModel: 'judge', concurrency: 2 });
  });

  it('should leave other sections of the preferences file alone', async () => {
    await writeFile(join(dir, 'preferences.json'), JSON.stringify({ theme: 'dark' }));
    const store = new JsonConfigStore(dir);

    await store.saveHarnessConfigPrefs({ models: ['m'] });

    const saved: unknown = JSON.parse(await readFile(join(dir, 'preferences.json'), 'utf-8'));
    expect(saved).toEqual({ theme: 'dark', harnessConfig: { models: ['m'] } });
  });
});
