import { describe, it, expect, vi } from 'vitest';
import { FakeAdapter } from '@evalkit/adapters';
import { ConfigError, ExternalCallError, type EvalEvent, type Logger } from '@evalkit/shared';
import { JUDGE_SYSTEM_PROMPT, LLMJudge } from './judge';

function createRecordingLogger(): { logger: Logger; events: EvalEvent[] } {
  const events: EvalEvent[] = [];
  const logger: Logger = {
    log: (event) => {
      events.push(event);
    },
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return { logger, events };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('LLMJudge', () => {
  describe('judge', () => {
    it('returns a verdict built from the judgment', async () => {
      const raw = JSON.stringify({
        score: 85,
        passed: true,
        feedback: 'Clear and accurate.',
        strengths: ['clear'],
        weaknesses: [],
      });
      const judge = new LLMJudge(new FakeAdapter({ responses: [raw] }));

      const verdict = await judge.judge({ prompt: 'What is AI?', response: 'AI is ...' });

      expect(verdict).toEqual({
        score: 85,
        passed: true,
        feedback: 'Clear and accurate.',
        judgeType: 'quality',
        judgment: {
          score: 85,
          passed: true,
          feedback: 'Clear and accurate.',
          strengths: ['clear'],
          weaknesses: [],
        },
        auxiliary: { strengths: ['clear'], weaknesses: [] },
        rawResponse: raw,
        parseStage: 'strict',
      });
    });

    it('sends the rubric prompt in JSON mode', async () => {
      const adapter = new FakeAdapter();
      const judge = new LLMJudge(adapter, { temperature: 0.1 });

      await judge.judge({ prompt: 'What is AI?', response: 'A field of study.', judgeType: 'correctness' });

      expect(adapter.requests).toHaveLength(1);
      const [request] = adapter.requests;
      expect(request.jsonMode).toBe(true);
      expect(request.temperature).toBe(0.1);
      expect(request.messages[0]).toEqual({ role: 'system', content: JUDGE_SYSTEM_PROMPT });
      expect(request.messages[1].role).toBe('user');
      expect(request.messages[1].content).toContain('Original User Prompt: "What is AI?"');
      expect(request.messages[1].content).toContain('"errors_found":');
    });

    it('defaults the temperature to 0.3', async () => {
      const adapter = new FakeAdapter();
      await new LLMJudge(adapter).judge({ prompt: 'Q', response: 'A' });
      expect(adapter.requests[0].temperature).toBe(0.3);
    });

    it('fails a high score the judge rejected', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 85, "passed": false}'] }));
      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });
      expect(verdict.score).toBe(85);
      expect(verdict.passed).toBe(false);
    });

    it('fails a score below the passing score', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 50}'] }));
      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });
      expect(verdict.passed).toBe(false);
      expect(verdict.feedback).toBe('');
    });

    it('applies a caller-supplied passing score', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 50}'] }));
      const verdict = await judge.judge({ prompt: 'Q', response: 'A', passingScore: 40 });
      expect(verdict.passed).toBe(true);
    });

    it('reads a judgment wrapped in prose', async () => {
      const judge = new LLMJudge(
        new FakeAdapter({ responses: ['Here is my answer: {"score": 90, "passed": true} Thanks!'] }),
      );
      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });
      expect(verdict.score).toBe(90);
      expect(verdict.passed).toBe(true);
      expect(verdict.parseStage).toBe('fallback');
    });

    it('fails an unreadable judgment without an error', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['The response looks fine to me.'] }));
      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });
      expect(verdict.score).toBe(0);
      expect(verdict.passed).toBe(false);
      expect(verdict.feedback).toBe('Failed to parse judge response');
      expect(verdict.parseStage).toBe('failed');
      expect(verdict.judgment.raw_text).toBe('The response looks fine to me.');
      expect(verdict.error).toBeUndefined();
    });

    it('turns a failed model call into an error verdict', async () => {
      const judge = new LLMJudge(
        new FakeAdapter({ responses: [new ExternalCallError('openai request failed: socket hang up')] }),
      );

      const verdict = await judge.judge({ prompt: 'Q', response: 'A', judgeType: 'appropriateness' });

      expect(verdict).toEqual({
        score: 0,
        passed: false,
        feedback: '',
        judgeType: 'appropriateness',
        judgment: {},
        auxiliary: {},
        rawResponse: null,
        parseStage: null,
        error: 'openai request failed: socket hang up',
      });
    });

    it('rejects a custom judgment without criteria before calling the model', async () => {
      const adapter = new FakeAdapter();
      const judge = new LLMJudge(adapter);

      await expect(judge.judge({ prompt: 'Q', response: 'A', judgeType: 'custom' })).rejects.toThrow(
        ConfigError,
      );
      expect(adapter.requests).toHaveLength(0);
    });

    it('passes custom criteria through and keeps the details field', async () => {
      const adapter = new FakeAdapter({
        responses: ['{"score": 80, "passed": true, "details": {"tone": "polite"}}'],
      });
      const judge = new LLMJudge(adapter);

      const verdict = await judge.judge({
        prompt: 'Q',
        response: 'A',
        judgeType: 'custom',
        criteria: 'The answer must be polite.',
      });

      expect(adapter.requests[0].messages[1].content).toContain('The answer must be polite.');
      expect(verdict.auxiliary).toEqual({ details: { tone: 'polite' } });
    });

    it('logs request and completion events', async () => {
      const { logger, events } = createRecordingLogger();
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 72}'] }), {
        logger,
        runId: 'run-1',
      });

      await judge.judge({ prompt: 'Q', response: 'Answer', judgeType: 'comprehensiveness' });

      expect(events.map((e) => e.type)).toEqual(['JudgeRequested', 'JudgeCompleted']);
      expect(events[0]).toMatchObject({
        schemaVersion: 1,
        runId: 'run-1',
        payload: { judgeType: 'comprehensiveness', passingScore: 70, responseChars: 6 },
      });
      expect(events[1]).toMatchObject({
        payload: { judgeType: 'comprehensiveness', score: 72, passed: true, parseStage: 'strict' },
      });
    });

    it('logs a failure event when the model call fails', async () => {
      const { logger, events } = createRecordingLogger();
      const judge = new LLMJudge(new FakeAdapter({ responses: [new Error('quota exceeded')] }), { logger });

      await judge.judge({ prompt: 'Q', response: 'A' });

      expect(events.map((e) => e.type)).toEqual(['JudgeRequested', 'JudgeFailed']);
      expect(events[1]).toMatchObject({ payload: { judgeType: 'quality', error: 'quota exceeded' } });
    });

    it('keeps the verdict when the event sink throws', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger: Logger = {
        log: () => {
          throw new Error('sink down');
        },
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 85, "passed": true}'] }), { logger });

      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });

      expect(verdict.score).toBe(85);
      expect(verdict.passed).toBe(true);
      expect(errorSpy).toHaveBeenCalledWith('Failed to record JudgeRequested event', expect.any(Error));
      expect(errorSpy).toHaveBeenCalledWith('Failed to record JudgeCompleted event', expect.any(Error));
      errorSpy.mockRestore();
    });

    it('fails a high score whose opinion is null', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"score": 85, "passed": null}'] }));

      const verdict = await judge.judge({ prompt: 'Q', response: 'A' });

      expect(verdict.score).toBe(85);
      expect(verdict.passed).toBe(false);
    });

    it('leaves JSON mode off for providers without it', async () => {
      const adapter = new FakeAdapter({ supportsJsonMode: false });

      await new LLMJudge(adapter).judge({ prompt: 'Q', response: 'A' });

      expect(adapter.requests[0].jsonMode).toBe(false);
    });
  });

  describe('judgeMultiple', () => {
    function scoringAdapter(tracker: { inFlight: number; maxInFlight: number }): FakeAdapter {
      return new FakeAdapter({
        responder: async (request) => {
          const match = /LLM Response: "answer (\d)"/.exec(request.messages[1].content);
          const n = Number(match?.[1] ?? 0);
          tracker.inFlight += 1;
          tracker.maxInFlight = Math.max(tracker.maxInFlight, tracker.inFlight);
          await delay((4 - n) * 5);
          tracker.inFlight -= 1;
          return JSON.stringify({ score: n * 30, feedback: `answer ${n}` });
        },
      });
    }

    it('returns one verdict per response in input order', async () => {
      const tracker = { inFlight: 0, maxInFlight: 0 };
      const judge = new LLMJudge(scoringAdapter(tracker));

      const verdicts = await judge.judgeMultiple({
        prompt: 'Q',
        responses: ['answer 1', 'answer 2', 'answer 3'],
      });

      expect(verdicts.map((v) => v.score)).toEqual([30, 60, 90]);
      expect(verdicts.map((v) => v.passed)).toEqual([false, false, true]);
      expect(tracker.maxInFlight).toBe(1);
    });

    it('keeps input order when judging concurrently', async () => {
      const tracker = { inFlight: 0, maxInFlight: 0 };
      const judge = new LLMJudge(scoringAdapter(tracker));

      const verdicts = await judge.judgeMultiple({
        prompt: 'Q',
        responses: ['answer 1', 'answer 2', 'answer 3'],
        concurrency: 2,
      });

      expect(verdicts.map((v) => v.feedback)).toEqual(['answer 1', 'answer 2', 'answer 3']);
      expect(tracker.maxInFlight).toBe(2);
    });

    it('returns an empty list for no responses', async () => {
      expect(await new LLMJudge(new FakeAdapter()).judgeMultiple({ prompt: 'Q', responses: [] })).toEqual([]);
    });

    it('checks configuration before any call', async () => {
      const adapter = new FakeAdapter();
      const judge = new LLMJudge(adapter);

      await expect(
        judge.judgeMultiple({ prompt: 'Q', responses: ['a', 'b'], judgeType: 'custom' }),
      ).rejects.toThrow(ConfigError);
      await expect(judge.judgeMultiple({ prompt: 'Q', responses: ['a'], concurrency: 0 })).rejects.toThrow(
        'concurrency must be a positive integer, got 0',
      );
      expect(adapter.requests).toHaveLength(0);
    });

    it('isolates a failure to its own verdict', async () => {
      const judge = new LLMJudge(
        new FakeAdapter({ responses: ['{"score": 95}', new Error('timeout'), '{"score": 20}'] }),
      );

      const verdicts = await judge.judgeMultiple({ prompt: 'Q', responses: ['a', 'b', 'c'] });

      expect(verdicts.map((v) => v.error)).toEqual([undefined, 'timeout', undefined]);
      expect(verdicts.map((v) => v.passed)).toEqual([true, false, false]);
    });
  });

  describe('compare', () => {
    const comparison = {
      winner: 1,
      winner_explanation: 'More precise.',
      response1_score: 88,
      response2_score: 64,
      response1_strengths: ['precise'],
      response2_strengths: ['short'],
      response1_weaknesses: [],
      response2_weaknesses: ['vague'],
      detailed_comparison: 'Response 1 names the mechanism.',
    };

    it('reads the comparison fields', async () => {
      const raw = JSON.stringify(comparison);
      const judge = new LLMJudge(new FakeAdapter({ responses: [raw] }));

      const verdict = await judge.compare({ prompt: 'Q', response1: 'one', response2: 'two' });

      expect(verdict).toEqual({
        winner: 1,
        response1Score: 88,
        response2Score: 64,
        response1Strengths: ['precise'],
        response1Weaknesses: [],
        response2Strengths: ['short'],
        response2Weaknesses: ['vague'],
        explanation: 'More precise.',
        detailedComparison: 'Response 1 names the mechanism.',
        comparison,
        rawResponse: raw,
      });
    });

    it('accepts a winner given as a string', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"winner": "2"}'] }));
      const verdict = await judge.compare({ prompt: 'Q', response1: 'one', response2: 'two' });
      expect(verdict.winner).toBe(2);
      expect(verdict.response1Score).toBe(0);
    });

    it('leaves an out-of-range winner undetermined', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: ['{"winner": 3}'] }));
      const verdict = await judge.compare({ prompt: 'Q', response1: 'one', response2: 'two' });
      expect(verdict.winner).toBe('undetermined');
      expect(verdict.error).toBeUndefined();
    });

    it('reports malformed output without throwing', async () => {
      const { logger, events } = createRecordingLogger();
      const judge = new LLMJudge(new FakeAdapter({ responses: ['Response 1 is better.'] }), { logger });

      const verdict = await judge.compare({ prompt: 'Q', response1: 'one', response2: 'two' });

      expect(verdict.winner).toBe('undetermined');
      expect(verdict.error).toBe('No JSON object found in comparison response.');
      expect(verdict.rawResponse).toBe('Response 1 is better.');
      expect(events.map((e) => e.type)).toEqual(['ComparisonFailed']);
    });

    it('reports a failed model call without throwing', async () => {
      const judge = new LLMJudge(new FakeAdapter({ responses: [new Error('connection reset')] }));
      const verdict = await judge.compare({ prompt: 'Q', response1: 'one', response2: 'two' });
      expect(verdict.winner).toBe('undetermined');
      expect(verdict.error).toBe('connection reset');
      expect(verdict.rawResponse).toBeNull();
    });

    it('sends custom criteria in place of the defaults', async () => {
      const adapter = new FakeAdapter({ responses: [JSON.stringify(comparison)] });
      const { logger, events } = createRecordingLogger();

      await new LLMJudge(adapter, { logger }).compare({
        prompt: 'Q',
        response1: 'one',
        response2: 'two',
        criteria: 'Prefer the answer with an example.',
      });

      expect(adapter.requests[0].messages[1].content).toContain('Prefer the answer with an example.');
      expect(events[0]).toMatchObject({
        type: 'ComparisonCompleted',
        payload: { winner: 1, response1Score: 88, response2Score: 64, parseStage: 'strict' },
      });
    });
  });
});
