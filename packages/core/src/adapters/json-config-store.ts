import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConfigStore, HarnessConfigPrefs } from '../ports/config-store.js';

interface Preferences {
  harnessConfig?: HarnessConfigPrefs;
  [key: string]: unknown;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Keeps only the recognised, well-typed fields of a hand-edited preferences file. */
export function sanitizePrefs(raw: unknown): HarnessConfigPrefs {
  if (typeof raw !== 'object' || raw === null) return {};
  const obj: Record<string, unknown> = { ...raw };
  const prefs: HarnessConfigPrefs = {};
  if (typeof obj.apiKeyEncrypted === 'string') prefs.apiKeyEncrypted = obj.apiKeyEncrypted;
  if (isStringArray(obj.models)) prefs.models = obj.models;
  if (typeof obj.judgeModel === 'string') prefs.judgeModel = obj.judgeModel;
  if (typeof obj.judgeRubric === 'string') prefs.judgeRubric = obj.judgeRubric;
  if (isPositiveInteger(obj.concurrency)) prefs.concurrency = obj.concurrency;
  if (isPositiveInteger(obj.maxAttempts)) prefs.maxAttempts = obj.maxAttempts;
  if (isPositiveInteger(obj.runTimeoutMs)) prefs.runTimeoutMs = obj.runTimeoutMs;
  return prefs;
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  private get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  private async readPrefs(): Promise<Preferences> {
    try {
      const data = await readFile(this.prefsPath, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
    } catch {
      return {};
    }
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  async getHarnessConfigPrefs(): Promise<HarnessConfigPrefs> {
    const prefs = await this.readPrefs();
    return sanitizePrefs(prefs.harnessConfig);
  }

  async saveHarnessConfigPrefs(config: HarnessConfigPrefs): Promise<void> {
    const prefs = await this.readPrefs();
    prefs.harnessConfig = config;
    await this.writePrefs(prefs);
  }
}
