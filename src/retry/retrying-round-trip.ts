/**
 * @fileoverview Round trip decorator that retries transient failures.
 *
 * Wraps any {@link ProviderRoundTrip}. Rate-limit and server errors are
 * retried with exponential backoff; everything else propagates on the
 * first failure.
 *
 * Emits:
 * - `retry` before each backoff sleep
 * - `attempt` when the next attempt starts
 *
 * @module agent-loop-engine/retry/round-trip
 * @version 0.1.0
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { EventEmitter } from 'eventemitter3';
import type {
  ProviderRequest,
  ProviderResponse,
  ProviderRoundTrip,
} from '../types/provider.types.js';
import {
  ProviderError,
  classifyFailure,
  describeFailure,
  type ClassifiedFailure,
} from '../providers/errors.js';
import type { RateLimitHintExtractor } from './rate-limit.js';
import {
  DEFAULT_RETRY_CONFIGURATION,
  applyRetryAfterHint,
  computeBackoffDelay,
  resolveRetryPolicy,
  type RetryConfiguration,
  type RetryEvent,
  type RetryPolicy,
} from './retry-policy.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';

/**
 * Thrown when every allowed attempt failed transiently.
 */
export class RetryExhaustedError extends Error {
  override readonly name = 'RetryExhaustedError';
  readonly attempts: number;
  readonly lastFailure: ClassifiedFailure;

  constructor(attempts: number, lastFailure: ClassifiedFailure) {
    super(`${describeFailure(lastFailure)}: gave up after ${attempts} attempt(s)`, {
      cause: lastFailure.error,
    });
    this.attempts = attempts;
    this.lastFailure = lastFailure;
  }
}

export interface RetryingRoundTripEvents {
  'retry': (event: RetryEvent) => void;
  'attempt': (attempt: number) => void;
}

export interface RetryingRoundTripOptions {
  readonly retry?: RetryConfiguration;

  /** Reads hints from the headers of a failed response */
  readonly rateLimitExtractor?: RateLimitHintExtractor;

  readonly logger?: Logger;

  /** Backoff sleep; defaults to a timer */
  readonly sleep?: (ms: number) => Promise<void>;

  /** Jitter source in [0, 1) */
  readonly random?: () => number;
}

export class RetryingRoundTrip
  extends EventEmitter<RetryingRoundTripEvents>
  implements ProviderRoundTrip
{
  readonly name: string;
  readonly policy: RetryPolicy;

  private readonly inner: ProviderRoundTrip;
  private readonly onRetry: ((event: RetryEvent) => void) | undefined;
  private readonly rateLimitExtractor: RateLimitHintExtractor | undefined;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(inner: ProviderRoundTrip, options: RetryingRoundTripOptions = {}) {
    super();
    this.inner = inner;
    this.name = inner.name;
    const retry = options.retry ?? DEFAULT_RETRY_CONFIGURATION;
    this.policy = resolveRetryPolicy(retry.policy);
    this.onRetry = retry.onRetry;
    this.rateLimitExtractor = options.rateLimitExtractor;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? (ms => sleepFor(ms));
    this.random = options.random ?? Math.random;
  }

  async execute(request: ProviderRequest): Promise<ProviderResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.execute(request);
      } catch (error) {
        const failure = classifyFailure(error);

        if (failure.kind === 'fatal') {
          throw error;
        }
        if (attempt >= this.policy.maxRetries) {
          throw new RetryExhaustedError(attempt + 1, failure);
        }

        const delayMs = applyRetryAfterHint(
          computeBackoffDelay(attempt, this.policy, this.random),
          this.hintFor(failure),
        );
        const event: RetryEvent = {
          attempt: attempt + 1,
          maxRetries: this.policy.maxRetries,
          delayMs,
          reason: describeFailure(failure),
          remainingRetries: this.policy.maxRetries - attempt - 1,
        };

        this.logger.warn('Retrying provider request', {
          provider: this.name,
          attempt: event.attempt,
          maxRetries: event.maxRetries,
          delayMs,
          reason: event.reason,
        });
        this.onRetry?.(event);
        this.emit('retry', event);

        await this.sleep(delayMs);
        this.emit('attempt', attempt + 1);
      }
    }
  }

  // ============ Private Methods ============

  private hintFor(failure: ClassifiedFailure): number | null {
    if (failure.kind === 'rateLimited' && failure.retryAfterMs !== null) {
      return failure.retryAfterMs;
    }
    if (this.rateLimitExtractor && failure.error instanceof ProviderError) {
      return this.rateLimitExtractor.extract(failure.error.headers).suggestedWaitMs;
    }
    return null;
  }
}

/**
 * Unwraps a {@link RetryExhaustedError} to the failure it gave up on.
 */
export function rootFailure(error: unknown): unknown {
  return error instanceof RetryExhaustedError ? error.lastFailure.error : error;
}
