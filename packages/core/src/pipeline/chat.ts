import { randomUUID } from 'crypto';
import type { ProviderAdapter } from '@evalkit/adapters';
import { EVENT_SCHEMA_VERSION, NoopLogger, errorMessage, type Logger } from '@evalkit/shared';
import type { LLMJudge } from '../judge/judge';
import { resolveRubric } from '../judge/rubrics';
import type { JudgeVerdict } from '../judge/types';
import type { JudgeRequestOptions } from './evaluate';

export const TARGET_SYSTEM_PROMPT = 'You are a helpful assistant.';
export const DEFAULT_TARGET_TEMPERATURE = 0.7;
export const DEFAULT_TARGET_MAX_TOKENS = 150;

export interface ChatAndJudgeOptions extends JudgeRequestOptions {
  prompt: string;
  /** The model whose answer is judged */
  target: ProviderAdapter;
  judge: LLMJudge;
  /** Default: 0.7 */
  temperature?: number;
  /** Default: 150 */
  maxTokens?: number;
  logger?: Logger;
  runId?: string;
}

export interface ChatAndJudgeResult {
  response: string | null;
  verdict: JudgeVerdict | null;
  error?: string;
}

/**
 * Asks the target model the prompt, then judges its answer.
 * A failed target call is reported in `error`; it does not throw.
 */
export async function chatAndJudge(options: ChatAndJudgeOptions): Promise<ChatAndJudgeResult> {
  const { prompt, target, judge, temperature, maxTokens, logger: maybeLogger, runId: maybeRunId, ...settings } =
    options;
  const logger = maybeLogger ?? new NoopLogger();
  const runId = maybeRunId ?? randomUUID();
  resolveRubric(settings.judgeType ?? 'quality', settings.criteria);

  const startTime = Date.now();
  let response: string;
  try {
    const result = await target.generate(
      {
        messages: [
          { role: 'system', content: TARGET_SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: temperature ?? DEFAULT_TARGET_TEMPERATURE,
        maxTokens: maxTokens ?? DEFAULT_TARGET_MAX_TOKENS,
      },
      { runId, logger },
    );
    response = result.text ?? '';
  } catch (error) {
    await logger.error(
      error instanceof Error ? error : new Error(String(error)),
      'Target model call failed',
    );
    return {
      response: null,
      verdict: null,
      error: `Failed to get response from LLM: ${errorMessage(error)}`,
    };
  }

  await logger.log({
    type: 'TargetResponseReceived',
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
    payload: { responseChars: response.length, durationMs: Date.now() - startTime },
  });

  const verdict = await judge.judge({ ...settings, prompt, response });
  return { response, verdict };
}
