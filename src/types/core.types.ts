/**
 * @fileoverview Core type definitions for the agent execution engine.
 *
 * These types form the vocabulary shared by the engine, the termination
 * policies, the controller and every consumer of the step stream.
 *
 * @module agent-loop-engine/types
 * @version 0.1.0
 */

import { z } from 'zod';

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Why a run reached the absorbing `terminated` phase.
 */
export type TerminationReason =
  | 'completed'
  | 'maxStepsExceeded'
  | 'duplicateCallsDetected'
  | 'toolError'
  | 'providerError'
  | 'cancelled';

/**
 * A tool invocation requested by the model.
 */
export interface ToolCallInfo {
  /** Provider-assigned call ID, echoed back in the matching result */
  readonly id: string;

  /** Registry name of the requested tool */
  readonly name: string;

  /** Raw JSON arguments as produced by the model */
  readonly arguments: string;
}

/**
 * Outcome of one tool invocation.
 */
export interface ToolResultInfo {
  readonly id: string;
  readonly name: string;
  readonly output: string;
  readonly isError: boolean;
}

/**
 * The phase of a running agent loop.
 *
 * Exactly one phase is active at a time:
 * ```
 *   awaitingModel ──► executingTools ──► awaitingModel ...
 *        │  ▲                │
 *        ▼  │                ▼
 *      retrying ────────► terminated(reason)
 * ```
 */
export type LoopPhase =
  | { readonly kind: 'awaitingModel' }
  | { readonly kind: 'executingTools'; readonly pendingCalls: ReadonlyArray<ToolCallInfo> }
  | { readonly kind: 'retrying'; readonly attempt: number; readonly nextDelayMs: number }
  | { readonly kind: 'terminated'; readonly reason: TerminationReason };

export type LoopPhaseKind = LoopPhase['kind'];

/**
 * Constructors for {@link LoopPhase} values.
 */
export const LoopPhase = {
  awaitingModel: (): LoopPhase => ({ kind: 'awaitingModel' }),
  executingTools: (pendingCalls: ReadonlyArray<ToolCallInfo>): LoopPhase => ({
    kind: 'executingTools',
    pendingCalls: [...pendingCalls],
  }),
  retrying: (attempt: number, nextDelayMs: number): LoopPhase => ({
    kind: 'retrying',
    attempt,
    nextDelayMs,
  }),
  terminated: (reason: TerminationReason): LoopPhase => ({ kind: 'terminated', reason }),
} as const;

/**
 * One externally observable unit of a run.
 *
 * @remarks
 * A run yields any number of `thinking`, `toolCall` and `toolResult`
 * steps and ends with exactly one `finalResponse`, or with an error.
 */
export type AgentStep<TOutput = unknown> =
  | { readonly type: 'thinking'; readonly text: string }
  | ({ readonly type: 'toolCall' } & ToolCallInfo)
  | ({ readonly type: 'toolResult' } & ToolResultInfo)
  | { readonly type: 'finalResponse'; readonly output: TOutput };

/**
 * Configuration options for a single run. Immutable once the run starts.
 */
export interface AgentConfiguration {
  /** Maximum number of model round trips */
  readonly maxSteps: number;

  /** When false the engine pauses after `toolCall` steps until the caller supplies results */
  readonly autoExecuteTools: boolean;

  /** Repeats of an identical name+arguments pair allowed before the run counts as stuck */
  readonly maxDuplicateToolCalls: number;

  /** Ceiling on total invocations of any single tool; null disables the check */
  readonly maxToolCallsPerTool: number | null;
}

export const AgentConfigurationSchema = z.object({
  maxSteps: z.number().int().positive(),
  autoExecuteTools: z.boolean(),
  maxDuplicateToolCalls: z.number().int().min(1),
  maxToolCallsPerTool: z.number().int().positive().nullable(),
});

/**
 * Default configuration for a run.
 */
export const DEFAULT_AGENT_CONFIGURATION: Readonly<AgentConfiguration> = {
  maxSteps: 10,
  autoExecuteTools: true,
  maxDuplicateToolCalls: 2,
  maxToolCallsPerTool: 5,
} as const;

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws ZodError if a value is out of range
 */
export function createAgentConfiguration(
  overrides: Partial<AgentConfiguration> = {},
): AgentConfiguration {
  return Object.freeze(
    AgentConfigurationSchema.parse({ ...DEFAULT_AGENT_CONFIGURATION, ...overrides }),
  );
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}
