import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pairIdProblem } from '../domain/pair/pair.js';
import type { PromptSet, PromptSetContents } from '../domain/prompt-set/prompt-set.js';
import type { PromptSetCatalog } from '../ports/prompt-set-catalog.js';
import { InvalidPairError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('prompt-set-catalog');

interface PromptSetFile {
  id: string;
  createdAt: string;
  sourceFileRef: string;
  promptFuncName: string;
  prompts: string[];
}

function isPromptSetFile(obj: unknown): obj is PromptSetFile {
  if (typeof obj !== 'object' || obj === null) return false;
  const file: Record<string, unknown> = { ...obj };
  return (
    typeof file.id === 'string' &&
    file.id.length > 0 &&
    typeof file.createdAt === 'string' &&
    typeof file.sourceFileRef === 'string' &&
    typeof file.promptFuncName === 'string' &&
    Array.isArray(file.prompts) &&
    file.prompts.every((p) => typeof p === 'string')
  );
}

function toContents(file: PromptSetFile): PromptSetContents {
  return {
    id: file.id,
    createdAt: file.createdAt,
    sourceFileRef: file.sourceFileRef,
    promptFuncName: file.promptFuncName,
    promptCount: file.prompts.length,
    prompts: file.prompts,
  };
}

/**
 * Prompt sets exported by the authoring side as `*.json` files in one
 * directory. Sets are immutable, so files are read once and cached.
 */
export class JsonPromptSetCatalog implements PromptSetCatalog {
  private cache: Map<string, PromptSetContents> | null = null;

  constructor(private readonly promptSetsDir: string) {}

  private async load(): Promise<Map<string, PromptSetContents>> {
    if (this.cache) return this.cache;

    let files: string[];
    try {
      files = (await readdir(this.promptSetsDir)).filter((f) => f.endsWith('.json')).sort();
    } catch {
      log.warn(`load: prompt set directory not readable: ${this.promptSetsDir}`);
      files = [];
    }

    const sets = new Map<string, PromptSetContents>();
    for (const file of files) {
      try {
        const parsed: unknown = JSON.parse(await readFile(join(this.promptSetsDir, file), 'utf-8'));
        if (!isPromptSetFile(parsed)) {
          log.warn(`load: skipping ${file}, not a prompt set`);
          continue;
        }
        const problem = pairIdProblem(parsed.id);
        if (problem) {
          log.warn(`load: skipping ${file}, prompt set id ${problem}`);
          continue;
        }
        if (sets.has(parsed.id)) {
          log.warn(`load: duplicate prompt set id ${parsed.id} in ${file}, keeping the first`);
          continue;
        }
        sets.set(parsed.id, toContents(parsed));
      } catch (err) {
        log.warn(`load: skipping ${file}:`, err instanceof Error ? err.message : err);
      }
    }

    this.cache = sets;
    return sets;
  }

  async list(): Promise<PromptSet[]> {
    const sets = await this.load();
    return Array.from(sets.values())
      .map(({ prompts: _prompts, ...set }) => set)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  async get(promptSetId: string): Promise<PromptSet | undefined> {
    const set = (await this.load()).get(promptSetId);
    if (!set) return undefined;
    const { prompts: _prompts, ...rest } = set;
    return rest;
  }

  async getPrompts(promptSetId: string): Promise<string[]> {
    const set = (await this.load()).get(promptSetId);
    if (!set) throw new InvalidPairError(`Unknown prompt set: ${promptSetId}`);
    return [...set.prompts];
  }
}
