/**
 * @fileoverview Unit tests for rate-limit header extraction
 */

import { describe, it, expect } from 'vitest';
import {
  anthropicRateLimitExtractor,
  geminiRateLimitExtractor,
  openAIRateLimitExtractor,
  parseResetDuration,
} from './rate-limit.js';

describe('parseResetDuration()', () => {
  it.each([
    ['120ms', 120],
    ['1.5s', 1500],
    ['2m', 120_000],
    ['1h', 3_600_000],
    ['30', 30_000],
    ['6m0s', 360_000],
  ])('should parse %s', (value, expected) => {
    expect(parseResetDuration(value)).toBe(expected);
  });

  it('should reject malformed values', () => {
    expect(parseResetDuration('soon')).toBeNull();
    expect(parseResetDuration('5x')).toBeNull();
    expect(parseResetDuration('')).toBeNull();
  });
});

describe('openAIRateLimitExtractor', () => {
  it('should read every header', () => {
    const info = openAIRateLimitExtractor.extract({
      'x-ratelimit-remaining-requests': '0',
      'x-ratelimit-reset-requests': '120ms',
      'x-ratelimit-remaining-tokens': '1500',
      'x-ratelimit-reset-tokens': '2m',
    });

    expect(info).toEqual({
      retryAfterMs: null,
      remainingRequests: 0,
      requestsResetMs: 120,
      remainingTokens: 1500,
      tokensResetMs: 120_000,
      suggestedWaitMs: 120,
    });
  });

  it('should prefer retry-after over reset windows', () => {
    const info = openAIRateLimitExtractor.extract({
      'retry-after': '3',
      'x-ratelimit-reset-requests': '1s',
    });

    expect(info.suggestedWaitMs).toBe(3000);
  });

  it('should fall back to the token window', () => {
    expect(openAIRateLimitExtractor.extract({ 'x-ratelimit-reset-tokens': '1.5s' }).suggestedWaitMs).toBe(1500);
  });
});

describe('anthropicRateLimitExtractor', () => {
  const now = Date.parse('2026-01-15T10:30:00Z');

  it('should measure reset instants from now', () => {
    const info = anthropicRateLimitExtractor.extract({
      'anthropic-ratelimit-requests-remaining': '0',
      'anthropic-ratelimit-requests-reset': '2026-01-15T10:30:05Z',
      'anthropic-ratelimit-tokens-reset': '2026-01-15T10:30:01.500Z',
    }, now);

    expect(info.remainingRequests).toBe(0);
    expect(info.requestsResetMs).toBe(5000);
    expect(info.tokensResetMs).toBe(1500);
    expect(info.suggestedWaitMs).toBe(5000);
  });

  it('should floor instants in the past at zero', () => {
    const info = anthropicRateLimitExtractor.extract({
      'anthropic-ratelimit-requests-reset': '2026-01-15T10:29:00Z',
    }, now);

    expect(info.requestsResetMs).toBe(0);
  });

  it('should ignore unparseable instants', () => {
    const info = anthropicRateLimitExtractor.extract({
      'anthropic-ratelimit-requests-reset': 'tomorrow',
    }, now);

    expect(info.requestsResetMs).toBeNull();
    expect(info.suggestedWaitMs).toBeNull();
  });
});

describe('geminiRateLimitExtractor', () => {
  it('should only read retry-after', () => {
    const info = geminiRateLimitExtractor.extract({
      'retry-after': '2',
      'x-ratelimit-reset-requests': '1s',
    });

    expect(info.retryAfterMs).toBe(2000);
    expect(info.requestsResetMs).toBeNull();
    expect(info.suggestedWaitMs).toBe(2000);
  });
});
