import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { IntegrityError } from '../shared/errors.js';
import { describeResponseStore, okResponse } from '../testing/response-store-contract.js';
import { JsonResponseStore } from './json-response-store.js';

const pair = { promptSetId: 'set-a', modelId: 'vendor/model:free' };
const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'promptbench-store-'));
  dirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describeResponseStore('JsonResponseStore', async () => new JsonResponseStore(await tempDir()));

describe('JsonResponseStore', () => {
  it('should write one file per pair with encoded names', async () => {
    const dir = await tempDir();
    const store = new JsonResponseStore(dir);
    await store.putResponse(okResponse(0));

    const raw = await readFile(join(dir, 'pairs', 'set-a', 'vendor%2Fmodel%3Afree.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    expect(parsed).toMatchObject({ promptSetId: 'set-a', modelId: 'vendor/model:free', history: [] });
  });

  it('should see rows written by another instance', async () => {
    const dir = await tempDir();
    await new JsonResponseStore(dir).putResponse(okResponse(3));

    const responses = await new JsonResponseStore(dir).getResponses(pair);
    expect(responses.map((r) => r.promptIndex)).toEqual([3]);
  });

  it('should refuse to read a malformed pair file', async () => {
    const dir = await tempDir();
    await mkdir(join(dir, 'pairs', 'set-a'), { recursive: true });
    await writeFile(join(dir, 'pairs', 'set-a', 'broken.json'), '{"responses": 3}', 'utf-8');
    const store = new JsonResponseStore(dir);

    await expect(store.getResponses({ promptSetId: 'set-a', modelId: 'broken' })).rejects.toBeInstanceOf(IntegrityError);
    expect(await store.listPairs()).toEqual([]);
  });

  it('should drop a queued write whose run stops before it reaches the file', async () => {
    const store = new JsonResponseStore(await tempDir());
    const run = new AbortController();

    const first = store.putResponse(okResponse(0));
    const second = store.putResponse(okResponse(1), { signal: run.signal });
    run.abort();

    expect(await first).toBe(true);
    expect(await second).toBe(false);
    expect((await store.getResponses(pair)).map((r) => r.promptIndex)).toEqual([0]);
  });

  it('should refuse ids that would leave the pairs directory', async () => {
    const store = new JsonResponseStore(await tempDir());

    await expect(store.getResponses({ promptSetId: '..', modelId: 'm' })).rejects.toBeInstanceOf(IntegrityError);
    await expect(store.putResponse(okResponse(0, 'r0', { promptSetId: '.', modelId: 'm' }))).rejects.toBeInstanceOf(
      IntegrityError,
    );
  });
});
