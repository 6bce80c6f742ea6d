export interface HarnessConfigPrefs {
  apiKeyEncrypted?: string;
  models?: string[];
  judgeModel?: string;
  judgeRubric?: string;
  concurrency?: number;
  maxAttempts?: number;
  runTimeoutMs?: number;
}

export interface ConfigStore {
  getHarnessConfigPrefs(): Promise<HarnessConfigPrefs>;
  saveHarnessConfigPrefs(prefs: HarnessConfigPrefs): Promise<void>;
}
