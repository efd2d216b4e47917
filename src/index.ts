/**
 * @fileoverview Agent Loop Engine - bounded tool-calling loop for LLM agents.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { AgentExecutionEngine, ToolRegistry, calculatorTool } from 'agent-loop-engine';
 *
 * const engine = new AgentExecutionEngine(provider);
 * const { output } = await engine.run({
 *   prompt: 'What is 17 * 23?',
 *   tools: new ToolRegistry().register(calculatorTool),
 *   outputSchema: z.object({ answer: z.number() }),
 * }).collect();
 * ```
 *
 * @module agent-loop-engine
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './providers/index.js';
export * from './retry/index.js';
export * from './tools/index.js';
export * from './observability/index.js';
export * from './config/index.js';
