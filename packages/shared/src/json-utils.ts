import { JudgeParseError } from './errors';

/** A parsed JSON object. */
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the whole text as a single JSON value.
 *
 * @param context - Optional context for error messages (e.g., 'judge', 'comparison')
 * @throws JudgeParseError if the text is not valid JSON
 */
export function parseJsonText(text: string, context?: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new JudgeParseError(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }
}

/**
 * Extracts a JSON object from text that may contain other content.
 * Finds the first '{' and last '}' and parses the content between them.
 *
 * @param text - The text to extract JSON from
 * @param context - Optional context for error messages (e.g., 'judge', 'comparison')
 * @returns The parsed JSON value
 * @throws JudgeParseError if no valid JSON object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new JudgeParseError(`No JSON object found${contextStr}.`);
  }

  return parseJsonText(text.slice(firstBrace, lastBrace + 1), context);
}
