import type { JudgeVerdict } from '../domain/results/evaluation-result.js';
import type { CallOptions } from './model-client.js';

/** Opaque classification call: the rubric behind each verdict is not ours. */
export interface JudgeClient {
  score(
    judgeModelId: string,
    promptText: string,
    responseText: string,
    options?: CallOptions,
  ): Promise<JudgeVerdict>;
}
