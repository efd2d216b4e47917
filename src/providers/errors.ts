/**
 * @fileoverview Provider failures and their classification.
 *
 * Every failure of a round trip falls into one of three classes:
 * - rateLimited: HTTP 429, optionally with a retry-after hint
 * - serverError: 5xx, 408, or a transport failure
 * - fatal: everything else (auth, malformed request, decode failure)
 *
 * Only the first two are ever retried.
 *
 * @module agent-loop-engine/providers/errors
 * @version 0.1.0
 */

export type ProviderErrorKind = 'rateLimited' | 'serverError' | 'fatal';

/**
 * Response headers as received from the vendor, keys lower-cased.
 */
export type ResponseHeaders = Readonly<Record<string, string>>;

export interface ProviderErrorOptions {
  readonly status?: number | null;
  readonly headers?: ResponseHeaders;
  readonly retryAfterMs?: number | null;
  readonly cause?: unknown;
}

/**
 * A failure reported by a {@link ProviderRoundTrip}.
 */
export class ProviderError extends Error {
  override readonly name = 'ProviderError';
  readonly kind: ProviderErrorKind;
  readonly status: number | null;
  readonly headers: ResponseHeaders;
  readonly retryAfterMs: number | null;

  constructor(kind: ProviderErrorKind, message: string, options: ProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.status = options.status ?? null;
    this.headers = normalizeHeaders(options.headers ?? {});
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  /**
   * Builds an error from an HTTP status, picking the kind from the code.
   */
  static fromStatus(
    status: number,
    message: string,
    options: Omit<ProviderErrorOptions, 'status'> = {},
  ): ProviderError {
    return new ProviderError(kindForStatus(status), message, { ...options, status });
  }
}

/**
 * A failure after classification.
 */
export type ClassifiedFailure =
  | { readonly kind: 'rateLimited'; readonly retryAfterMs: number | null; readonly error: unknown }
  | { readonly kind: 'serverError'; readonly status: number | null; readonly error: unknown }
  | { readonly kind: 'fatal'; readonly error: unknown };

const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const TRANSIENT_ERROR_NAMES: ReadonlySet<string> = new Set(['AbortError', 'TimeoutError']);

/**
 * Maps an HTTP status to a failure kind.
 */
export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 429) return 'rateLimited';
  if (status === 408 || (status >= 500 && status <= 599)) return 'serverError';
  return 'fatal';
}

/**
 * Classifies any thrown value.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  if (error instanceof ProviderError) {
    switch (error.kind) {
      case 'rateLimited':
        return { kind: 'rateLimited', retryAfterMs: error.retryAfterMs, error };
      case 'serverError':
        return { kind: 'serverError', status: error.status, error };
      case 'fatal':
        return { kind: 'fatal', error };
    }
  }

  if (isTransientTransportError(error)) {
    return { kind: 'serverError', status: null, error };
  }

  return { kind: 'fatal', error };
}

function isTransientTransportError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
  if (code !== null && TRANSIENT_NETWORK_CODES.has(code)) {
    return true;
  }
  // fetch wraps socket failures in a TypeError whose cause carries the code
  return error.cause !== undefined && error.cause !== error && isTransientTransportError(error.cause);
}

function normalizeHeaders(headers: ResponseHeaders): ResponseHeaders {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    normalized[key.toLowerCase()] = value;
  }
  return normalized;
}

/**
 * Human-readable label for a classified failure, used in retry events.
 */
export function describeFailure(failure: ClassifiedFailure): string {
  switch (failure.kind) {
    case 'rateLimited':
      return 'Rate limit exceeded';
    case 'serverError':
      return failure.status === null ? 'Network error' : `Server error (${failure.status})`;
    case 'fatal':
      return 'Non-retryable error';
  }
}
