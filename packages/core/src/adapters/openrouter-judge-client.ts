import type { JudgeVerdict } from '../domain/results/evaluation-result.js';
import type { JudgeClient } from '../ports/judge-client.js';
import type { CallOptions } from '../ports/model-client.js';
import { ConfigError, JudgeVerdictError } from '../shared/errors.js';
import { postChatCompletion, type ChatMessage, type OpenRouterConnection } from './openrouter-chat.js';

const VERDICT_FORMAT =
  'Reply with only a JSON object of the form {"ok": true | false, "other": true | false} and nothing else.';

export function buildJudgeMessages(rubric: string, promptText: string, responseText: string): ChatMessage[] {
  return [
    { role: 'system', content: `${rubric.trim()}\n\n${VERDICT_FORMAT}` },
    {
      role: 'user',
      content: `<prompt>\n${promptText}\n</prompt>\n\n<response>\n${responseText}\n</response>`,
    },
  ];
}

/**
 * Pulls the verdict out of the judge's reply. Models occasionally wrap the
 * object in prose or a code fence, so the first {...} span is parsed.
 */
export function parseVerdict(content: string): JudgeVerdict {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new JudgeVerdictError(`Judge reply holds no JSON object: ${content.slice(0, 200)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch {
    throw new JudgeVerdictError(`Judge reply is not valid JSON: ${content.slice(0, 200)}`);
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('ok' in parsed) ||
    !('other' in parsed) ||
    typeof parsed.ok !== 'boolean' ||
    typeof parsed.other !== 'boolean'
  ) {
    throw new JudgeVerdictError(`Judge reply lacks boolean "ok"/"other": ${content.slice(0, 200)}`);
  }
  return { ok: parsed.ok, other: parsed.other };
}

export interface OpenRouterJudgeClientOptions extends OpenRouterConnection {
  rubric: string;
}

export class OpenRouterJudgeClient implements JudgeClient {
  constructor(private readonly options: OpenRouterJudgeClientOptions) {
    if (!options.rubric.trim()) {
      throw new ConfigError('No judge rubric configured. Run: promptbench config set judge-rubric <file>');
    }
  }

  async score(
    judgeModelId: string,
    promptText: string,
    responseText: string,
    options: CallOptions = {},
  ): Promise<JudgeVerdict> {
    const result = await postChatCompletion(this.options, {
      model: judgeModelId,
      messages: buildJudgeMessages(this.options.rubric, promptText, responseText),
      temperature: 0,
      jsonResponse: true,
      signal: options.signal,
    });
    return parseVerdict(result.content);
  }
}
