/**
 * @fileoverview Retry policies and exponential backoff.
 *
 * A policy decides how many times a transient provider failure is retried
 * and how long to wait before each retry:
 *
 * ```
 * delay(attempt) = min(maxDelayMs, baseDelayMs * 2^attempt)
 * ```
 *
 * scaled by a uniform jitter factor in `[1 - jitter, 1 + jitter]` and
 * clamped to `maxDelayMs` again.
 *
 * @module agent-loop-engine/retry/policy
 * @version 0.1.0
 */

import { z } from 'zod';

export interface RetryPolicy {
  /** Preset name, or `custom` */
  readonly name: RetryPresetName | 'custom';

  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  readonly maxRetries: number;

  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  /** Fraction of the delay randomized in both directions, 0..1 */
  readonly jitter: number;
}

export type RetryPresetName = 'default' | 'disabled' | 'aggressive' | 'conservative';

export const RETRY_PRESETS: Readonly<Record<RetryPresetName, RetryPolicy>> = {
  default: { name: 'default', maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 60_000, jitter: 0.1 },
  disabled: { name: 'disabled', maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 },
  aggressive: { name: 'aggressive', maxRetries: 10, baseDelayMs: 500, maxDelayMs: 120_000, jitter: 0.2 },
  conservative: { name: 'conservative', maxRetries: 3, baseDelayMs: 2000, maxDelayMs: 30_000, jitter: 0.1 },
};

export const RetryPresetNameSchema = z.enum(['default', 'disabled', 'aggressive', 'conservative']);

/**
 * Emitted before each backoff sleep.
 */
export interface RetryEvent {
  /** 1-based number of the retry about to happen */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly delayMs: number;
  readonly reason: string;
  readonly remainingRetries: number;
}

/**
 * Retry settings for a run.
 */
export interface RetryConfiguration {
  readonly policy: RetryPresetName | RetryPolicy;
  readonly onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_RETRY_CONFIGURATION: RetryConfiguration = { policy: 'default' };

/**
 * Builds a custom policy. Out-of-range values are clamped rather than
 * rejected: negatives become 0, `maxDelayMs` is raised to `baseDelayMs`,
 * and jitter is kept within [0, 1].
 */
export function customRetryPolicy(params: {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter?: number;
}): RetryPolicy {
  const maxRetries = Math.max(0, Math.floor(params.maxRetries));
  const baseDelayMs = Math.max(0, params.baseDelayMs);
  const maxDelayMs = Math.max(baseDelayMs, params.maxDelayMs);
  const jitter = Math.min(1, Math.max(0, params.jitter ?? 0.1));
  return { name: 'custom', maxRetries, baseDelayMs, maxDelayMs, jitter };
}

export function resolveRetryPolicy(policy: RetryPresetName | RetryPolicy): RetryPolicy {
  return typeof policy === 'string' ? RETRY_PRESETS[policy] : policy;
}

export function maxAttempts(policy: RetryPolicy): number {
  return policy.maxRetries + 1;
}

/**
 * Backoff before retrying after the failure of 0-based `attempt`.
 *
 * @param random - Uniform source in [0, 1), injectable for tests
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt));
  const capped = Math.min(policy.maxDelayMs, exponential);
  if (policy.jitter === 0) {
    return Math.round(capped);
  }
  const factor = 1 - policy.jitter + random() * 2 * policy.jitter;
  return Math.round(Math.min(policy.maxDelayMs, Math.max(0, capped * factor)));
}

/**
 * Combines the computed backoff with a server hint; the hint wins when larger.
 */
export function applyRetryAfterHint(delayMs: number, hintMs: number | null): number {
  if (hintMs === null || !Number.isFinite(hintMs) || hintMs <= delayMs) {
    return delayMs;
  }
  return Math.ceil(hintMs);
}
