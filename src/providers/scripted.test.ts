import { describe, it, expect } from 'vitest';
import { createScriptedRoundTrip } from './scripted.js';
import { textResponse } from './base.js';
import type { ProviderRequest } from '../types/index.js';

const request: ProviderRequest = {
  messages: [{ role: 'user', contents: [{ type: 'text', text: 'hi' }] }],
  tools: [],
  toolChoice: null,
  responseSchema: null,
  systemPrompt: null,
};

describe('createScriptedRoundTrip', () => {
  it('should answer in script order and record requests', async () => {
    const roundTrip = createScriptedRoundTrip([textResponse('one'), textResponse('two')]);

    const first = await roundTrip.execute(request);

    expect(first.content).toEqual([{ type: 'text', text: 'one' }]);
    expect(roundTrip.requests).toEqual([request]);
    expect(roundTrip.remaining()).toBe(1);
  });

  it('should throw scripted errors', async () => {
    const failure = new Error('connection reset');
    const roundTrip = createScriptedRoundTrip([{ error: failure }]);

    await expect(roundTrip.execute(request)).rejects.toBe(failure);
  });

  it('should compute responses from the request', async () => {
    const roundTrip = createScriptedRoundTrip([req => textResponse(`${req.messages.length} message(s)`)]);

    const response = await roundTrip.execute(request);

    expect(response.content).toEqual([{ type: 'text', text: '1 message(s)' }]);
  });

  it('should replay responses, errors and functions in order', async () => {
    const failure = new Error('scripted failure');
    const roundTrip = createScriptedRoundTrip([
      textResponse('one'),
      { error: failure },
      req => textResponse(`saw ${req.messages.length} messages`),
    ]);

    expect((await roundTrip.execute(request)).content).toEqual([{ type: 'text', text: 'one' }]);
    await expect(roundTrip.execute(request)).rejects.toBe(failure);
    expect((await roundTrip.execute(request)).content).toEqual([{ type: 'text', text: 'saw 1 messages' }]);
    expect(roundTrip.remaining()).toBe(0);
    expect(roundTrip.requests).toHaveLength(3);
  });

  it('should fail once the script is exhausted', async () => {
    const roundTrip = createScriptedRoundTrip([], 'demo');

    await expect(roundTrip.execute(request)).rejects.toThrow("Scripted round trip 'demo' has no response left for request #1");
  });
});
