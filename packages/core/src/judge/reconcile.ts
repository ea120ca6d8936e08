import { z } from 'zod';
import type { JsonObject } from '@evalkit/shared';
import type { ComparisonWinner } from './types';

/** A finite number; anything else (absent, strings, NaN, infinite) reads as 0. No clamping. */
const scoreSchema = z.number().finite().catch(0);

const textSchema = z.string().catch('');

/** String entries of an array field; anything else reads as empty. */
const stringListSchema = z
  .array(z.unknown())
  .transform((items) => items.filter((item): item is string => typeof item === 'string'))
  .catch([]);

/**
 * The judge's own pass/fail opinion. Absent stays undefined; "true"/"false" strings
 * read as booleans and any other present value reads as false.
 */
const opinionSchema = z
  .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
  .catch(false)
  .optional();

const winnerSchema = z
  .union([z.literal(1), z.literal(2), z.enum(['1', '2'])])
  .transform((value): ComparisonWinner => (value === 1 || value === '1' ? 1 : 2))
  .catch('undetermined');

export const judgmentSchema = z.object({
  score: scoreSchema,
  passed: opinionSchema,
  feedback: textSchema,
});

export const comparisonSchema = z.object({
  winner: winnerSchema,
  response1_score: scoreSchema,
  response2_score: scoreSchema,
  response1_strengths: stringListSchema,
  response1_weaknesses: stringListSchema,
  response2_strengths: stringListSchema,
  response2_weaknesses: stringListSchema,
  winner_explanation: textSchema,
  detailed_comparison: textSchema,
});

export type JudgmentCore = z.infer<typeof judgmentSchema>;
export type ComparisonFields = z.infer<typeof comparisonSchema>;

export interface Reconciliation {
  score: number;
  passed: boolean;
}

export function readJudgment(judgment: JsonObject): JudgmentCore {
  return judgmentSchema.parse(judgment);
}

export function readComparison(comparison: JsonObject): ComparisonFields {
  return comparisonSchema.parse(comparison);
}

/**
 * Combines the judge's own opinion with the threshold. The opinion defaults to
 * `score >= passingScore` only when absent; the result passes only when both the
 * opinion and the threshold agree.
 */
export function reconcile(judgment: JsonObject, passingScore: number): Reconciliation {
  const { score, passed } = readJudgment(judgment);
  const meetsThreshold = score >= passingScore;
  return { score, passed: (passed ?? meetsThreshold) && meetsThreshold };
}

/** Copies the named fields that are present in the judgment. */
export function pickFields(judgment: JsonObject, fields: readonly string[]): JsonObject {
  const picked: JsonObject = {};
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(judgment, field)) {
      picked[field] = judgment[field];
    }
  }
  return picked;
}
