import type { EvaluationSummary, GenerationSummary } from '@promptbench/core';
import { createHarness, type HarnessOptions } from './harness.js';

export { createHarness, createConfigService } from './harness.js';
export type { Harness, HarnessOptions } from './harness.js';

/**
 * Generates responses for a prompt set against one model, then judges them.
 * Convenience wrapper for scripts and agent skills.
 */
export async function benchmark(
  promptSetId: string,
  modelId: string,
  options: HarnessOptions & { force?: boolean; judgeModel?: string } = {},
): Promise<{ generation: GenerationSummary; evaluation: EvaluationSummary }> {
  const { service } = await createHarness({ ...options, withJudge: true, requireApiKey: true });
  const generation = await service.generate(promptSetId, modelId, { force: options.force });
  const evaluation = await service.evaluate(promptSetId, modelId, options.judgeModel);
  return { generation, evaluation };
}

// Re-export everything from core for advanced usage
export * from '@promptbench/core';
