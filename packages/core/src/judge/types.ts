import type { JsonObject, ParseStage } from '@evalkit/shared';

export type JudgeType = 'quality' | 'correctness' | 'appropriateness' | 'comprehensiveness' | 'custom';

export interface JudgeRequest {
  /** The prompt the judged response answers */
  prompt: string;
  response: string;
  /** Default: 'quality' */
  judgeType?: JudgeType;
  /** Evaluation criteria; required for the 'custom' judge type */
  criteria?: string;
  /** Default: 70 */
  passingScore?: number;
}

export interface JudgeMultipleRequest extends Omit<JudgeRequest, 'response'> {
  responses: readonly string[];
  /** How many judgments may be in flight at once. Default: 1 */
  concurrency?: number;
}

export interface CompareRequest {
  prompt: string;
  response1: string;
  response2: string;
  criteria?: string;
}

export interface JudgeVerdict {
  /** Score as reported by the judge; 0 when absent or non-numeric. Not clamped. */
  score: number;
  /** Judge opinion AND `score >= passingScore` */
  passed: boolean;
  feedback: string;
  judgeType: JudgeType;
  /** The judgment object as parsed (or the default structure when parsing failed) */
  judgment: JsonObject;
  /** Judge-type specific fields (strengths, errors_found, …) copied from the judgment */
  auxiliary: JsonObject;
  /** Raw judge output; null when the model call failed */
  rawResponse: string | null;
  /** Null when the model call failed */
  parseStage: ParseStage | null;
  error?: string;
}

export type ComparisonWinner = 1 | 2 | 'undetermined';

export interface ComparisonVerdict {
  winner: ComparisonWinner;
  response1Score: number;
  response2Score: number;
  response1Strengths: string[];
  response1Weaknesses: string[];
  response2Strengths: string[];
  response2Weaknesses: string[];
  explanation: string;
  detailedComparison: string;
  comparison: JsonObject;
  rawResponse: string | null;
  error?: string;
}
