/**
 * @fileoverview Unit tests for provider failure classification
 */

import { describe, it, expect } from 'vitest';
import { ProviderError, classifyFailure, describeFailure, kindForStatus } from './errors.js';

describe('kindForStatus()', () => {
  it('should map HTTP statuses to failure kinds', () => {
    expect(kindForStatus(429)).toBe('rateLimited');
    expect(kindForStatus(500)).toBe('serverError');
    expect(kindForStatus(503)).toBe('serverError');
    expect(kindForStatus(408)).toBe('serverError');
    expect(kindForStatus(400)).toBe('fatal');
    expect(kindForStatus(401)).toBe('fatal');
  });
});

describe('ProviderError', () => {
  it('should lower-case header names', () => {
    const error = ProviderError.fromStatus(429, 'limited', { headers: { 'Retry-After': '2' } });

    expect(error.headers).toEqual({ 'retry-after': '2' });
    expect(error.status).toBe(429);
    expect(error.kind).toBe('rateLimited');
  });
});

describe('classifyFailure()', () => {
  it('should carry the retry-after hint of rate-limit errors', () => {
    const error = new ProviderError('rateLimited', 'limited', { retryAfterMs: 1500 });

    expect(classifyFailure(error)).toEqual({ kind: 'rateLimited', retryAfterMs: 1500, error });
  });

  it('should treat timeouts and connection errors as server errors', () => {
    const timeout = new Error('timed out');
    timeout.name = 'TimeoutError';
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });

    expect(classifyFailure(timeout)).toEqual({ kind: 'serverError', status: null, error: timeout });
    expect(classifyFailure(refused).kind).toBe('serverError');
  });

  it('should treat anything unrecognized as fatal', () => {
    expect(classifyFailure(new SyntaxError('Unexpected token')).kind).toBe('fatal');
    expect(classifyFailure('boom').kind).toBe('fatal');
  });
});

describe('describeFailure()', () => {
  it('should label each kind', () => {
    expect(describeFailure({ kind: 'serverError', status: 502, error: null })).toBe('Server error (502)');
    expect(describeFailure({ kind: 'serverError', status: null, error: null })).toBe('Network error');
    expect(describeFailure({ kind: 'fatal', error: null })).toBe('Non-retryable error');
  });
});
