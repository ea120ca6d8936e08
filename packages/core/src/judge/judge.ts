import { randomUUID } from 'crypto';
import type { AdapterContext, ProviderAdapter } from '@evalkit/adapters';
import {
  ConfigError,
  EVENT_SCHEMA_VERSION,
  NoopLogger,
  errorMessage,
  type EvalEvent,
  type Logger,
  type ModelRequest,
} from '@evalkit/shared';
import { buildComparisonPrompt, resolveRubric } from './rubrics';
import { parseJsonObject, parseJudgment } from './parse';
import { pickFields, readComparison, readJudgment, reconcile } from './reconcile';
import type {
  CompareRequest,
  ComparisonVerdict,
  JudgeMultipleRequest,
  JudgeRequest,
  JudgeType,
  JudgeVerdict,
} from './types';

export const JUDGE_SYSTEM_PROMPT = 'You are an expert judge. Always respond with valid JSON only.';
export const DEFAULT_PASSING_SCORE = 70;
export const DEFAULT_JUDGE_TEMPERATURE = 0.3;

export interface LLMJudgeOptions {
  /** Default: a logger that discards everything */
  logger?: Logger;
  /** Sampling temperature for judge calls. Default: 0.3 */
  temperature?: number;
  /** Run identifier stamped on events and adapter calls. Default: a fresh UUID */
  runId?: string;
}

/**
 * Asks a judge model to score responses and turns its answer into a verdict.
 *
 * Model failures and unreadable answers become failing verdicts carrying `error`;
 * only configuration mistakes (unknown judge type, custom judgment without criteria)
 * throw.
 */
export class LLMJudge {
  private readonly logger: Logger;
  private readonly temperature: number;
  private readonly runId: string;

  constructor(
    private readonly llm: ProviderAdapter,
    options: LLMJudgeOptions = {},
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.temperature = options.temperature ?? DEFAULT_JUDGE_TEMPERATURE;
    this.runId = options.runId ?? randomUUID();
  }

  async judge(request: JudgeRequest): Promise<JudgeVerdict> {
    const judgeType: JudgeType = request.judgeType ?? 'quality';
    const passingScore = request.passingScore ?? DEFAULT_PASSING_SCORE;
    const rubric = resolveRubric(judgeType, request.criteria);
    const startTime = Date.now();

    await this.emit({
      type: 'JudgeRequested',
      ...this.eventBase(),
      payload: { judgeType, passingScore, responseChars: request.response.length },
    });

    let rawResponse: string;
    try {
      const content = rubric.buildPrompt({
        prompt: request.prompt,
        response: request.response,
        criteria: request.criteria,
      });
      rawResponse = await this.complete(content);
    } catch (error) {
      const message = errorMessage(error);
      await this.emit({
        type: 'JudgeFailed',
        ...this.eventBase(),
        payload: { judgeType, error: message, durationMs: Date.now() - startTime },
      });
      return {
        score: 0,
        passed: false,
        feedback: '',
        judgeType,
        judgment: {},
        auxiliary: {},
        rawResponse: null,
        parseStage: null,
        error: message,
      };
    }

    const { judgment, stage } = parseJudgment(rawResponse);
    const { score, passed } = reconcile(judgment, passingScore);

    await this.emit({
      type: 'JudgeCompleted',
      ...this.eventBase(),
      payload: { judgeType, score, passed, parseStage: stage, durationMs: Date.now() - startTime },
    });

    return {
      score,
      passed,
      feedback: readJudgment(judgment).feedback,
      judgeType,
      judgment,
      auxiliary: pickFields(judgment, rubric.auxiliaryFields),
      rawResponse,
      parseStage: stage,
    };
  }

  /**
   * Judges each response independently. Results come back in input order whatever
   * the concurrency.
   */
  async judgeMultiple(request: JudgeMultipleRequest): Promise<JudgeVerdict[]> {
    const { responses, concurrency = 1, ...shared } = request;
    resolveRubric(shared.judgeType ?? 'quality', shared.criteria);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const verdicts = new Array<JudgeVerdict>(responses.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < responses.length) {
        const index = next++;
        verdicts[index] = await this.judge({ ...shared, response: responses[index] });
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, responses.length) }, worker));
    return verdicts;
  }

  async compare(request: CompareRequest): Promise<ComparisonVerdict> {
    const startTime = Date.now();
    let rawResponse: string | null = null;

    try {
      rawResponse = await this.complete(
        buildComparisonPrompt(
          request.prompt,
          request.response1,
          request.response2,
          request.criteria || undefined,
        ),
      );
      const { judgment: comparison, stage } = parseJsonObject(rawResponse, 'comparison');

      const fields = readComparison(comparison);

      const verdict: ComparisonVerdict = {
        winner: fields.winner,
        response1Score: fields.response1_score,
        response2Score: fields.response2_score,
        response1Strengths: fields.response1_strengths,
        response1Weaknesses: fields.response1_weaknesses,
        response2Strengths: fields.response2_strengths,
        response2Weaknesses: fields.response2_weaknesses,
        explanation: fields.winner_explanation,
        detailedComparison: fields.detailed_comparison,
        comparison,
        rawResponse,
      };

      await this.emit({
        type: 'ComparisonCompleted',
        ...this.eventBase(),
        payload: {
          winner: verdict.winner,
          response1Score: verdict.response1Score,
          response2Score: verdict.response2Score,
          parseStage: stage,
          durationMs: Date.now() - startTime,
        },
      });

      return verdict;
    } catch (error) {
      const message = errorMessage(error);
      await this.emit({
        type: 'ComparisonFailed',
        ...this.eventBase(),
        payload: { error: message, durationMs: Date.now() - startTime },
      });
      return {
        winner: 'undetermined',
        response1Score: 0,
        response2Score: 0,
        response1Strengths: [],
        response1Weaknesses: [],
        response2Strengths: [],
        response2Weaknesses: [],
        explanation: '',
        detailedComparison: '',
        comparison: {},
        rawResponse,
        error: message,
      };
    }
  }

  private async complete(content: string): Promise<string> {
    const request: ModelRequest = {
      messages: [
        { role: 'system', content: JUDGE_SYSTEM_PROMPT },
        { role: 'user', content },
      ],
      temperature: this.temperature,
      jsonMode: this.llm.capabilities().supportsJsonMode,
    };
    const context: AdapterContext = { runId: this.runId, logger: this.logger };

    const response = await this.llm.generate(request, context);
    return response.text ?? '';
  }

  private eventBase(): { schemaVersion: number; timestamp: string; runId: string } {
    return {
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: this.runId,
    };
  }

  /** A failing event sink is reported on stderr and never changes a verdict. */
  private async emit(event: EvalEvent): Promise<void> {
    try {
      await this.logger.log(event);
    } catch (error) {
      console.error(`Failed to record ${event.type} event`, error);
    }
  }
}
