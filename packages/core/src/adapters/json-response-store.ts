import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Pair } from '../domain/pair/pair.js';
import { pairIdProblem, pairKey } from '../domain/pair/pair.js';
import type { EvaluationResult } from '../domain/results/evaluation-result.js';
import type { PromptResponse } from '../domain/results/prompt-response.js';
import type { ResponseStore, SupersededRun, WriteOptions } from '../ports/response-store.js';
import { IntegrityError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import {
  applyEvaluation,
  applyResponse,
  emptyPairRecord,
  isPairRecord,
  supersedeRecord,
  type PairRecord,
} from './pair-record.js';

const log = createLogger('json-response-store');

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per pair under `<dataDir>/pairs/<promptSetId>/<modelId>.json`.
 * Writes to a pair are queued behind each other and land via rename, so a
 * reader never sees half a file; different pairs never wait on each other.
 */
export class JsonResponseStore implements ResponseStore {
  private readonly writeTails = new Map<string, Promise<void>>();

  constructor(private readonly dataDir: string) {}

  private get pairsDir(): string {
    return join(this.dataDir, 'pairs');
  }

  private pairPath(pair: Pair): string {
    for (const id of [pair.promptSetId, pair.modelId]) {
      const problem = pairIdProblem(id);
      if (problem) throw new IntegrityError(`Cannot store pair id "${id}": ${problem}`);
    }
    return join(this.pairsDir, encodeURIComponent(pair.promptSetId), `${encodeURIComponent(pair.modelId)}.json`);
  }

  private async readRecord(pair: Pair): Promise<PairRecord> {
    const filePath = this.pairPath(pair);
    let data: string;
    try {
      data = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return emptyPairRecord(pair);
      throw err;
    }
    const parsed: unknown = JSON.parse(data);
    if (!isPairRecord(parsed)) {
      throw new IntegrityError(`Malformed pair file: ${filePath}`);
    }
    return parsed;
  }

  private async writeRecord(record: PairRecord): Promise<void> {
    const filePath = this.pairPath(record);
    await mkdir(join(this.pairsDir, encodeURIComponent(record.promptSetId)), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
    await rename(tmpPath, filePath);
  }

  /**
   * Serialises read-modify-write cycles per pair. The signal is checked once the
   * cycle reaches the front of the queue; an aborted one skips it.
   */
  private update(pair: Pair, mutate: (record: PairRecord) => void, signal?: AbortSignal): Promise<boolean> {
    const key = pairKey(pair);
    const previous = this.writeTails.get(key) ?? Promise.resolve();
    const next = previous.then(async () => {
      if (signal?.aborted) {
        log.debug(`update: dropped a write to ${key}, its run has stopped`);
        return false;
      }
      const record = await this.readRecord(pair);
      if (signal?.aborted) return false;
      mutate(record);
      await this.writeRecord(record);
      return true;
    });
    const tail: Promise<void> = next.then(
      () => undefined,
      () => undefined,
    ).then(() => {
      if (this.writeTails.get(key) === tail) this.writeTails.delete(key);
    });
    this.writeTails.set(key, tail);
    return next;
  }

  async getResponses(pair: Pair): Promise<PromptResponse[]> {
    return (await this.readRecord(pair)).responses;
  }

  async getEvaluations(pair: Pair): Promise<EvaluationResult[]> {
    return (await this.readRecord(pair)).evaluations;
  }

  putResponse(response: PromptResponse, options: WriteOptions = {}): Promise<boolean> {
    return this.update(response, (record) => applyResponse(record, response), options.signal);
  }

  putEvaluation(result: EvaluationResult, options: WriteOptions = {}): Promise<boolean> {
    return this.update(result, (record) => applyEvaluation(record, result), options.signal);
  }

  async supersede(pair: Pair): Promise<void> {
    const supersededAt = new Date().toISOString();
    await this.update(pair, (record) => supersedeRecord(record, supersededAt));
  }

  async getHistory(pair: Pair): Promise<SupersededRun[]> {
    return (await this.readRecord(pair)).history;
  }

  async listPairs(): Promise<Pair[]> {
    let setDirs: string[];
    try {
      setDirs = (await readdir(this.pairsDir)).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const pairs: Pair[] = [];
    for (const setDir of setDirs) {
      const files = (await readdir(join(this.pairsDir, setDir))).filter((f) => f.endsWith('.json')).sort();
      for (const file of files) {
        try {
          const parsed: unknown = JSON.parse(await readFile(join(this.pairsDir, setDir, file), 'utf-8'));
          if (isPairRecord(parsed)) {
            pairs.push({ promptSetId: parsed.promptSetId, modelId: parsed.modelId });
          } else {
            log.warn(`listPairs: skipping malformed file ${setDir}/${file}`);
          }
        } catch (err) {
          log.warn(`listPairs: skipping unreadable file ${setDir}/${file}:`, err instanceof Error ? err.message : err);
        }
      }
    }
    return pairs;
  }
}
