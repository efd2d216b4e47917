/**
 * @fileoverview Rate-limit hints read from vendor response headers.
 *
 * Each vendor reports rate-limit state in its own headers. An extractor
 * turns them into a {@link RateLimitInfo}; the retry loop only looks at
 * {@link RateLimitInfo.suggestedWaitMs}.
 *
 * @module agent-loop-engine/retry/rate-limit
 * @version 0.1.0
 */

import type { ResponseHeaders } from '../providers/errors.js';

export interface RateLimitInfo {
  /** Explicit `retry-after` wait */
  readonly retryAfterMs: number | null;
  readonly remainingRequests: number | null;
  readonly requestsResetMs: number | null;
  readonly remainingTokens: number | null;
  readonly tokensResetMs: number | null;

  /** retryAfter, else the request window reset, else the token window reset */
  readonly suggestedWaitMs: number | null;
}

export interface RateLimitHintExtractor {
  readonly name: string;
  extract(headers: ResponseHeaders, now?: number): RateLimitInfo;
}

export const EMPTY_RATE_LIMIT_INFO: RateLimitInfo = {
  retryAfterMs: null,
  remainingRequests: null,
  requestsResetMs: null,
  remainingTokens: null,
  tokensResetMs: null,
  suggestedWaitMs: null,
};

function buildInfo(parts: Omit<RateLimitInfo, 'suggestedWaitMs'>): RateLimitInfo {
  return {
    ...parts,
    suggestedWaitMs: parts.retryAfterMs ?? parts.requestsResetMs ?? parts.tokensResetMs,
  };
}

function header(headers: ResponseHeaders, name: string): string | null {
  const value = headers[name] ?? headers[name.toLowerCase()];
  return value === undefined ? null : value.trim();
}

function parseNumber(value: string | null): number | null {
  if (value === null || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseInteger(value: string | null): number | null {
  const parsed = parseNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * `retry-after` in seconds, as milliseconds.
 */
export function parseRetryAfterSeconds(value: string | null): number | null {
  const seconds = parseNumber(value);
  return seconds === null || seconds < 0 ? null : seconds * 1000;
}

const DURATION_UNITS_MS: Readonly<Record<string, number>> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parses a reset duration such as `120ms`, `1.5s`, `2m`, `1h`, `6m0s` or a
 * bare number of seconds, into milliseconds.
 */
export function parseResetDuration(value: string | null): number | null {
  if (value === null || value === '') return null;

  const bare = parseNumber(value);
  if (bare !== null) {
    return bare < 0 ? null : bare * 1000;
  }

  let total = 0;
  let consumed = 0;
  for (const match of value.matchAll(DURATION_PART)) {
    total += Number(match[1]) * DURATION_UNITS_MS[match[2]];
    consumed += match[0].length;
  }
  return consumed === value.length && consumed > 0 ? total : null;
}

/**
 * Milliseconds from `now` until an RFC 3339 instant, floored at 0.
 */
export function parseResetInstant(value: string | null, now: number): number | null {
  if (value === null || !/^\d{4}-\d{2}-\d{2}T/.test(value)) return null;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

/**
 * `retry-after`, `x-ratelimit-(remaining|reset)-(requests|tokens)`.
 */
export const openAIRateLimitExtractor: RateLimitHintExtractor = {
  name: 'openai',
  extract(headers) {
    return buildInfo({
      retryAfterMs: parseRetryAfterSeconds(header(headers, 'retry-after')),
      remainingRequests: parseInteger(header(headers, 'x-ratelimit-remaining-requests')),
      requestsResetMs: parseResetDuration(header(headers, 'x-ratelimit-reset-requests')),
      remainingTokens: parseInteger(header(headers, 'x-ratelimit-remaining-tokens')),
      tokensResetMs: parseResetDuration(header(headers, 'x-ratelimit-reset-tokens')),
    });
  },
};

/**
 * `retry-after`, `anthropic-ratelimit-(requests|tokens)-(remaining|reset)`.
 * Reset headers are absolute RFC 3339 instants.
 */
export const anthropicRateLimitExtractor: RateLimitHintExtractor = {
  name: 'anthropic',
  extract(headers, now = Date.now()) {
    return buildInfo({
      retryAfterMs: parseRetryAfterSeconds(header(headers, 'retry-after')),
      remainingRequests: parseInteger(header(headers, 'anthropic-ratelimit-requests-remaining')),
      requestsResetMs: parseResetInstant(header(headers, 'anthropic-ratelimit-requests-reset'), now),
      remainingTokens: parseInteger(header(headers, 'anthropic-ratelimit-tokens-remaining')),
      tokensResetMs: parseResetInstant(header(headers, 'anthropic-ratelimit-tokens-reset'), now),
    });
  },
};

/**
 * Gemini only reports `retry-after`.
 */
export const geminiRateLimitExtractor: RateLimitHintExtractor = {
  name: 'gemini',
  extract(headers) {
    return buildInfo({
      ...EMPTY_RATE_LIMIT_INFO,
      retryAfterMs: parseRetryAfterSeconds(header(headers, 'retry-after')),
    });
  },
};
