import type { PromptSet } from '../domain/prompt-set/prompt-set.js';

/** Read-only view of the prompt sets authored elsewhere. */
export interface PromptSetCatalog {
  /** Ordered by creation time, oldest first */
  list(): Promise<PromptSet[]>;
  get(promptSetId: string): Promise<PromptSet | undefined>;
  /** Prompt texts in index order; length equals the set's promptCount */
  getPrompts(promptSetId: string): Promise<string[]>;
}
