import { errorMessage } from '@evalkit/shared';
import type { RuleResult, ValidationContext, ValidationRule } from '../types';

export const JSON_VALUE_TYPES = [
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
  'null',
] as const;

export type JsonValueType = (typeof JSON_VALUE_TYPES)[number];

/** Names the JSON type of a parsed value, reporting whole numbers as `integer`. */
export function jsonTypeOf(value: unknown): JsonValueType | 'unknown' {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'number';
    case 'object':
      return 'object';
    default:
      return 'unknown';
  }
}

export function matchesJsonType(value: unknown, expected: JsonValueType): boolean {
  const actual = jsonTypeOf(value);
  if (expected === 'number') {
    return actual === 'number' || actual === 'integer';
  }
  return actual === expected;
}

/**
 * Parses the text as a single JSON value. Reads the context first so a text is
 * parsed at most once per run, and stores the value there for later rules.
 */
export function readJson(
  text: string,
  context: ValidationContext,
): { ok: true; value: unknown } | { ok: false; error: string } {
  if (context.parsedJson) {
    return { ok: true, value: context.parsedJson.value };
  }
  try {
    const value: unknown = JSON.parse(text);
    context.parsedJson = { value };
    return { ok: true, value };
  } catch (e) {
    return { ok: false, error: `Response is not valid JSON: ${errorMessage(e)}` };
  }
}

/** Fails when the text does not parse as one JSON value. */
export class JsonRule implements ValidationRule {
  readonly name = 'json';

  validate(text: string, context: ValidationContext): RuleResult {
    const parsed = readJson(text, context);
    if (!parsed.ok) {
      return { valid: false, error: parsed.error };
    }
    return { valid: true, metadata: { type: jsonTypeOf(parsed.value) } };
  }
}
