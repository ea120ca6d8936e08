import { describe, it, expect } from 'vitest';
import { JudgeParseError } from '@evalkit/shared';
import {
  PARSE_FAILURE_FEEDBACK,
  defaultJudgment,
  extractEmbeddedJson,
  parseJsonObject,
  parseJudgment,
  parseStrictJson,
} from './parse';

describe('parseStrictJson', () => {
  it('parses a whole-text JSON object', () => {
    expect(parseStrictJson('{"score": 85, "passed": true}')).toEqual({ score: 85, passed: true });
  });

  it('rejects text around the object', () => {
    expect(() => parseStrictJson('Sure! {"score": 85}')).toThrow(JudgeParseError);
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseStrictJson('42')).toThrow('Expected a JSON object in judge response, got number');
    expect(() => parseStrictJson('[1]', 'comparison')).toThrow(
      'Expected a JSON object in comparison response, got array',
    );
  });
});

describe('extractEmbeddedJson', () => {
  it('reads the object between the outermost braces', () => {
    expect(extractEmbeddedJson('Here is my answer: {"score": 90, "passed": true} Thanks!')).toEqual({
      score: 90,
      passed: true,
    });
  });

  it('reads objects inside code fences', () => {
    expect(extractEmbeddedJson('```json\n{"score": 10, "details": {"a": 1}}\n```')).toEqual({
      score: 10,
      details: { a: 1 },
    });
  });

  it('fails without braces', () => {
    expect(() => extractEmbeddedJson('I refuse to answer.')).toThrow(
      'No JSON object found in judge response.',
    );
  });
});

describe('parseJsonObject', () => {
  it('reports the stage that succeeded', () => {
    expect(parseJsonObject('{"a": 1}').stage).toBe('strict');
    expect(parseJsonObject('x {"a": 1} y').stage).toBe('fallback');
  });

  it('falls back when strict parsing yields a non-object', () => {
    expect(() => parseJsonObject('"just a string"')).toThrow('No JSON object found in judge response.');
  });
});

describe('parseJudgment', () => {
  it('returns the default structure when nothing parses', () => {
    expect(parseJudgment('no braces at all')).toEqual({
      judgment: {
        score: 0,
        passed: false,
        feedback: PARSE_FAILURE_FEEDBACK,
        raw_text: 'no braces at all',
      },
      stage: 'failed',
    });
  });

  it('returns the default structure when the braces hold invalid JSON', () => {
    const result = parseJudgment('{score: ninety}');
    expect(result.stage).toBe('failed');
    expect(result.judgment).toEqual(defaultJudgment('{score: ninety}'));
  });

  it('keeps every field of a parsed judgment', () => {
    const result = parseJudgment('{"score": 70, "strengths": ["clear"], "extra": null}');
    expect(result).toEqual({
      judgment: { score: 70, strengths: ['clear'], extra: null },
      stage: 'strict',
    });
  });
});
