import { randomUUID } from 'crypto';
import { EVENT_SCHEMA_VERSION, NoopLogger, type Logger } from '@evalkit/shared';
import type { LLMJudge } from '../judge/judge';
import type { JudgeRequest, JudgeVerdict } from '../judge/types';
import type { ValidatorChain } from '../validation/chain';
import type { ValidationReport } from '../validation/types';

export type JudgeRequestOptions = Omit<JudgeRequest, 'prompt' | 'response'>;

export interface EvaluateOptions {
  prompt: string;
  response: string;
  chain?: ValidatorChain;
  judge?: LLMJudge;
  judgeOptions?: JudgeRequestOptions;
  logger?: Logger;
  runId?: string;
}

export interface EvaluationResult {
  /** Validation passed (or was not configured) AND the verdict passed (when judged) */
  passed: boolean;
  validation: ValidationReport | null;
  verdict: JudgeVerdict | null;
  /** True when validation failed and the judge was therefore not asked */
  skippedJudgment: boolean;
}

/**
 * Validates a response structurally and, only when that passes, asks the judge.
 */
export async function evaluateResponse(options: EvaluateOptions): Promise<EvaluationResult> {
  const logger = options.logger ?? new NoopLogger();
  let validation: ValidationReport | null = null;

  if (options.chain) {
    validation = options.chain.validate(options.response);
    await logger.log({
      type: 'ValidationCompleted',
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: options.runId ?? randomUUID(),
      payload: {
        isValid: validation.isValid,
        ruleCount: options.chain.rules.length,
        errorCount: validation.errors.length,
      },
    });
  }

  const isValid = validation?.isValid ?? true;
  if (!isValid) {
    return { passed: false, validation, verdict: null, skippedJudgment: true };
  }
  if (!options.judge) {
    return { passed: true, validation, verdict: null, skippedJudgment: false };
  }

  const verdict = await options.judge.judge({
    ...options.judgeOptions,
    prompt: options.prompt,
    response: options.response,
  });
  return { passed: verdict.passed, validation, verdict, skippedJudgment: false };
}
