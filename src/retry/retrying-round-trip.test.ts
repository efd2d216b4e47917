/**
 * @fileoverview Unit tests for RetryingRoundTrip
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryingRoundTrip, RetryExhaustedError, rootFailure } from './retrying-round-trip.js';
import { DEFAULT_RETRY_CONFIGURATION, RETRY_PRESETS, customRetryPolicy, type RetryEvent } from './retry-policy.js';
import { openAIRateLimitExtractor } from './rate-limit.js';
import { ProviderError } from '../providers/errors.js';
import { createScriptedRoundTrip, textResponse } from '../providers/index.js';
import type { ProviderRequest } from '../types/index.js';

const request: ProviderRequest = {
  messages: [{ role: 'user', contents: [{ type: 'text', text: 'hi' }] }],
  tools: [],
  toolChoice: null,
  responseSchema: null,
  systemPrompt: null,
};

const rateLimited = () => ({ error: ProviderError.fromStatus(429, 'Too Many Requests') });

describe('RetryingRoundTrip', () => {
  it('should retry rate-limited requests with increasing delays', async () => {
    const inner = createScriptedRoundTrip([rateLimited(), rateLimited(), textResponse('done')]);
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const events: RetryEvent[] = [];
    const roundTrip = new RetryingRoundTrip(inner, {
      retry: { policy: 'default', onRetry: event => events.push(event) },
      sleep,
      random: () => 0.5,
    });

    const response = await roundTrip.execute(request);

    expect(response.content).toEqual([{ type: 'text', text: 'done' }]);
    expect(events).toEqual([
      { attempt: 1, maxRetries: 5, delayMs: 1000, reason: 'Rate limit exceeded', remainingRetries: 4 },
      { attempt: 2, maxRetries: 5, delayMs: 2000, reason: 'Rate limit exceeded', remainingRetries: 3 },
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(inner.requests).toHaveLength(3);
  });

  it('should emit retry before sleeping and attempt after', async () => {
    const order: string[] = [];
    const inner = createScriptedRoundTrip([{ error: ProviderError.fromStatus(503, 'Unavailable') }, textResponse('ok')]);
    const roundTrip = new RetryingRoundTrip(inner, {
      sleep: () => {
        order.push('sleep');
        return Promise.resolve();
      },
      random: () => 0.5,
    });
    roundTrip.on('retry', event => order.push(`retry:${event.reason}`));
    roundTrip.on('attempt', attempt => order.push(`attempt:${attempt}`));

    await roundTrip.execute(request);

    expect(order).toEqual(['retry:Server error (503)', 'sleep', 'attempt:1']);
  });

  it('should use the default configuration when none is given', () => {
    const roundTrip = new RetryingRoundTrip(createScriptedRoundTrip([]));

    expect(DEFAULT_RETRY_CONFIGURATION).toEqual({ policy: 'default' });
    expect(roundTrip.policy).toEqual(RETRY_PRESETS.default);
  });

  it('should make exactly one attempt when retries are disabled', async () => {
    const inner = createScriptedRoundTrip([rateLimited(), textResponse('never')]);
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const roundTrip = new RetryingRoundTrip(inner, { retry: { policy: 'disabled' }, sleep });

    const error = await roundTrip.execute(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 1 });
    expect(inner.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry fatal errors', async () => {
    const fatal = ProviderError.fromStatus(401, 'Unauthorized');
    const inner = createScriptedRoundTrip([{ error: fatal }, textResponse('never')]);
    const roundTrip = new RetryingRoundTrip(inner, { sleep: () => Promise.resolve() });

    await expect(roundTrip.execute(request)).rejects.toBe(fatal);
    expect(inner.requests).toHaveLength(1);
  });

  it('should wrap the last failure once retries run out', async () => {
    const last = ProviderError.fromStatus(500, 'Internal Server Error');
    const inner = createScriptedRoundTrip([
      { error: ProviderError.fromStatus(500, 'first') },
      { error: ProviderError.fromStatus(500, 'second') },
      { error: last },
    ]);
    const roundTrip = new RetryingRoundTrip(inner, {
      retry: { policy: customRetryPolicy({ maxRetries: 2, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 }) },
      sleep: () => Promise.resolve(),
    });

    const error = await roundTrip.execute(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, lastFailure: { kind: 'serverError', status: 500 } });
    expect(rootFailure(error)).toBe(last);
  });

  it('should treat transport failures as transient', async () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    const inner = createScriptedRoundTrip([{ error: new TypeError('fetch failed', { cause: reset }) }, textResponse('ok')]);
    const events: RetryEvent[] = [];
    const roundTrip = new RetryingRoundTrip(inner, {
      retry: { policy: 'default', onRetry: event => events.push(event) },
      sleep: () => Promise.resolve(),
      random: () => 0.5,
    });

    await roundTrip.execute(request);

    expect(events.map(e => e.reason)).toEqual(['Network error']);
  });

  it('should honour a larger retry-after on the error', async () => {
    const inner = createScriptedRoundTrip([
      { error: ProviderError.fromStatus(429, 'slow down', { retryAfterMs: 7000 }) },
      textResponse('ok'),
    ]);
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const roundTrip = new RetryingRoundTrip(inner, { sleep, random: () => 0.5 });

    await roundTrip.execute(request);

    expect(sleep).toHaveBeenCalledWith(7000);
  });

  it('should read hints from response headers through the extractor', async () => {
    const inner = createScriptedRoundTrip([
      { error: ProviderError.fromStatus(429, 'slow down', { headers: { 'X-RateLimit-Reset-Requests': '4s' } }) },
      textResponse('ok'),
    ]);
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const roundTrip = new RetryingRoundTrip(inner, {
      sleep,
      random: () => 0.5,
      rateLimitExtractor: openAIRateLimitExtractor,
    });

    await roundTrip.execute(request);

    expect(sleep).toHaveBeenCalledWith(4000);
  });
});
