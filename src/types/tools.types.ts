/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the mechanism by which the model acts on the world. Every tool
 * carries a zod input schema, which doubles as the JSON Schema advertised
 * to the model and as the runtime validator for the arguments it sends.
 *
 * @module agent-loop-engine/types/tools
 * @version 0.1.0
 */

import type { z } from 'zod';
import type { Timestamp } from './core.types.js';
import type { JsonSchema } from './provider.types.js';

/**
 * Complete definition of a tool available to the agent.
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Name the model uses to call this tool */
  readonly name: string;

  /** Detailed description of what this tool does */
  readonly description: string;

  /** Input parameter schema */
  readonly inputSchema: TSchema;

  /** The actual execution function */
  readonly execute: ToolHandler<z.infer<TSchema>>;
}

/**
 * Function signature for tool execution.
 *
 * Returning a plain string reports success. Returning a {@link ToolOutput}
 * with `isError: true` reports a tool-level failure the model can react to.
 * Throwing aborts the whole run.
 */
export type ToolHandler<TInput> = (
  input: TInput,
  context: ToolExecutionContext,
) => Promise<string | ToolOutput>;

/**
 * Result of running a tool, as fed back to the model.
 */
export interface ToolOutput {
  readonly output: string;
  readonly isError: boolean;
}

/**
 * Context provided to tool execution.
 */
export interface ToolExecutionContext {
  /** ID of the tool call being served */
  readonly callId: string;

  /** Logger for this execution */
  readonly logger: ExecutionLogger;
}

/**
 * Logger interface for tool execution.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Runs one tool from raw model arguments.
 */
export interface ToolExecutor {
  readonly name: string;
  run(argumentsJson: string, callId?: string): Promise<ToolOutput>;
}

/**
 * Registry entry for a registered tool.
 */
export interface ToolRegistryEntry {
  readonly name: string;
  readonly description: string;
  readonly jsonSchema: JsonSchema;
  readonly executor: ToolExecutor;
  readonly registeredAt: Timestamp;
  readonly invocationCount: number;
  readonly lastInvokedAt: Timestamp | null;
}

/**
 * Lookup surface the engine needs from a tool registry.
 */
export interface ToolLookup {
  lookup(name: string): ToolExecutor | null;
}
