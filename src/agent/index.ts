/**
 * @fileoverview Agent module public exports.
 *
 * @module agent-loop-engine/agent
 * @version 0.1.0
 */

export {
  AgentExecutionEngine,
  AgentRun,
  FINAL_OUTPUT_REQUEST,
  MAX_DECODE_RETRIES,
  decodeFinalOutput,
  type AgentRunOptions,
  type DecodeResult,
  type ExecutionEngineEvents,
  type ExecutionEngineOptions,
  type RunResult,
  type RunSummary,
  type SuppliedToolResult,
} from './execution-engine.js';

export {
  AgentExecutionController,
  type ControllerRunOptions,
  type ExecutionControllerEvents,
  type ExecutionState,
} from './execution-controller.js';

export {
  PhaseLifecycle,
  type LifecycleEvents,
  type LifecycleState,
  type PhaseHistoryEntry,
  type PhaseMetadata,
} from './lifecycle.js';

export {
  CompositeTerminationPolicy,
  DuplicateDetectionPolicy,
  StandardTerminationPolicy,
  createDefaultTerminationPolicy,
  type TerminationDecision,
  type TerminationPolicy,
} from './termination-policy.js';

export { AgentContext, type DuplicateCount, type TerminationContext } from './agent-context.js';
export { AgentError, AgentErrorCode, isAgentError, type AgentErrorOptions } from './errors.js';
export { canonicalizeArguments, toolCallKey } from './canonical-arguments.js';
