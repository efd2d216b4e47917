/**
 * @fileoverview Error taxonomy for agent runs.
 *
 * Every way a run can end other than with a final response is an
 * {@link AgentError}. The code says what went wrong; the reason says which
 * `terminated` phase the run ended in.
 *
 * @module agent-loop-engine/agent/errors
 * @version 0.1.0
 */

import type { LoopPhase, TerminationReason } from '../types/core.types.js';

export enum AgentErrorCode {
  MAX_STEPS_EXCEEDED = 'MAX_STEPS_EXCEEDED',
  DUPLICATE_CALLS_DETECTED = 'DUPLICATE_CALLS_DETECTED',
  TOOL_CALL_LIMIT_REACHED = 'TOOL_CALL_LIMIT_REACHED',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_EXECUTION_FAILED = 'TOOL_EXECUTION_FAILED',
  OUTPUT_DECODING_FAILED = 'OUTPUT_DECODING_FAILED',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  CANCELLED = 'CANCELLED',
  INVALID_STATE = 'INVALID_STATE',
}

/**
 * Termination reason each code ends a run with.
 * INVALID_STATE is a misuse of the API and ends no run.
 */
const REASON_BY_CODE: Readonly<Record<AgentErrorCode, TerminationReason | null>> = {
  [AgentErrorCode.MAX_STEPS_EXCEEDED]: 'maxStepsExceeded',
  [AgentErrorCode.DUPLICATE_CALLS_DETECTED]: 'duplicateCallsDetected',
  [AgentErrorCode.TOOL_CALL_LIMIT_REACHED]: 'duplicateCallsDetected',
  [AgentErrorCode.TOOL_NOT_FOUND]: 'toolError',
  [AgentErrorCode.TOOL_EXECUTION_FAILED]: 'toolError',
  [AgentErrorCode.OUTPUT_DECODING_FAILED]: 'providerError',
  [AgentErrorCode.PROVIDER_ERROR]: 'providerError',
  [AgentErrorCode.CANCELLED]: 'cancelled',
  [AgentErrorCode.INVALID_STATE]: null,
};

/** A caller may start a new run from the same conversation after these */
const RESUMABLE_CODES: ReadonlySet<AgentErrorCode> = new Set([
  AgentErrorCode.DUPLICATE_CALLS_DETECTED,
  AgentErrorCode.TOOL_CALL_LIMIT_REACHED,
  AgentErrorCode.MAX_STEPS_EXCEEDED,
  AgentErrorCode.CANCELLED,
]);

export interface AgentErrorOptions {
  readonly lastPhase?: LoopPhase | null;
  readonly details?: Readonly<Record<string, unknown>>;
  readonly cause?: unknown;
}

export class AgentError extends Error {
  override readonly name = 'AgentError';
  readonly code: AgentErrorCode;
  readonly reason: TerminationReason | null;

  /** Phase the run was in when it failed */
  readonly lastPhase: LoopPhase | null;

  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: AgentErrorCode, message: string, options: AgentErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.code = code;
    this.reason = REASON_BY_CODE[code];
    this.lastPhase = options.lastPhase ?? null;
    this.details = options.details ?? {};
  }

  isResumable(): boolean {
    return RESUMABLE_CODES.has(this.code);
  }

  /**
   * Copy of this error that records the phase it escaped from.
   */
  withLastPhase(phase: LoopPhase): AgentError {
    return new AgentError(this.code, this.message, { lastPhase: phase, details: this.details, cause: this.cause });
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}
