import { describe, it, expect } from 'vitest';
import { ExternalCallError, NoopLogger } from '@evalkit/shared';
import { FakeAdapter } from './adapter';
import type { AdapterContext } from '../types';

describe('FakeAdapter', () => {
  const ctx: AdapterContext = {
    runId: 'test-run',
    logger: new NoopLogger(),
  };

  it('returns scripted replies in order and records requests', async () => {
    const adapter = new FakeAdapter({ responses: ['first', 'second'] });

    const a = await adapter.generate({ messages: [{ role: 'user', content: 'one' }] }, ctx);
    const b = await adapter.generate({ messages: [{ role: 'user', content: 'two' }] }, ctx);

    expect([a.text, b.text]).toEqual(['first', 'second']);
    expect(adapter.requests.map((r) => r.messages[0].content)).toEqual(['one', 'two']);
  });

  it('rejects with scripted errors', async () => {
    const adapter = new FakeAdapter({ responses: [new ExternalCallError('quota exceeded')] });

    await expect(adapter.generate({ messages: [] }, ctx)).rejects.toThrow('quota exceeded');
  });

  it('falls back to the responder once the script runs out', async () => {
    const adapter = new FakeAdapter({
      responses: ['scripted'],
      responder: (req) => `echo: ${req.messages.map((m) => m.content).join('|')}`,
    });

    await adapter.generate({ messages: [] }, ctx);
    const res = await adapter.generate({ messages: [{ role: 'user', content: 'hi' }] }, ctx);

    expect(res.text).toBe('echo: hi');
  });

  it('returns a default judgment in JSON mode and plain text otherwise', async () => {
    const adapter = new FakeAdapter();

    const json = await adapter.generate({ messages: [], jsonMode: true }, ctx);
    const text = await adapter.generate({ messages: [] }, ctx);

    expect(JSON.parse(json.text ?? '')).toEqual({
      score: 75,
      passed: true,
      feedback: 'Fake judgment.',
    });
    expect(text.text).toBe('This is a fake response.');
  });

  it('builds from provider config', async () => {
    const adapter = FakeAdapter.fromConfig({ type: 'fake', model: 'fake', responses: ['canned'] });

    expect(adapter.id()).toBe('fake');
    expect(adapter.capabilities()).toEqual({ supportsJsonMode: true });
    expect((await adapter.generate({ messages: [] }, ctx)).text).toBe('canned');
  });

  it('can report that it has no JSON mode', () => {
    expect(new FakeAdapter({ supportsJsonMode: false }).capabilities()).toEqual({
      supportsJsonMode: false,
    });
  });
});
