import {
  JudgeParseError,
  extractJsonObject,
  isJsonObject,
  parseJsonText,
  type JsonObject,
  type ParseStage,
} from '@evalkit/shared';

export interface ParsedJudgment {
  judgment: JsonObject;
  stage: ParseStage;
}

export const PARSE_FAILURE_FEEDBACK = 'Failed to parse judge response';

function requireObject(value: unknown, context: string): JsonObject {
  if (!isJsonObject(value)) {
    const kind = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
    throw new JudgeParseError(`Expected a JSON object in ${context} response, got ${kind}`);
  }
  return value;
}

/**
 * Parses the whole text as one JSON object.
 * @throws JudgeParseError when the text is not JSON or not an object
 */
export function parseStrictJson(text: string, context = 'judge'): JsonObject {
  return requireObject(parseJsonText(text, context), context);
}

/**
 * Parses the span from the first `{` to the last `}`, for judges that wrap their
 * JSON in prose or code fences.
 * @throws JudgeParseError when there is no such span or it is not a JSON object
 */
export function extractEmbeddedJson(text: string, context = 'judge'): JsonObject {
  return requireObject(extractJsonObject(text, context), context);
}

/**
 * Strict parse, then embedded extraction.
 * @throws JudgeParseError from the extraction stage when both fail
 */
export function parseJsonObject(
  text: string,
  context = 'judge',
): { judgment: JsonObject; stage: 'strict' | 'fallback' } {
  try {
    return { judgment: parseStrictJson(text, context), stage: 'strict' };
  } catch (error) {
    if (!(error instanceof JudgeParseError)) throw error;
  }
  return { judgment: extractEmbeddedJson(text, context), stage: 'fallback' };
}

/** The judgment used when nothing could be parsed; it always fails. */
export function defaultJudgment(rawText: string): JsonObject {
  return {
    score: 0,
    passed: false,
    feedback: PARSE_FAILURE_FEEDBACK,
    raw_text: rawText,
  };
}

/** Never throws: unparsable text yields the default judgment at stage `failed`. */
export function parseJudgment(text: string): ParsedJudgment {
  try {
    return parseJsonObject(text, 'judge');
  } catch (error) {
    if (!(error instanceof JudgeParseError)) throw error;
    return { judgment: defaultJudgment(text), stage: 'failed' };
  }
}
