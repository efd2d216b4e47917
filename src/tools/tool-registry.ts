/**
 * @fileoverview Tool Registry - Central registry for tool management.
 *
 * The Tool Registry maintains all available tools, handles registration,
 * argument validation, and provides the executors the engine runs. It
 * advertises each tool's zod input schema to the model as JSON Schema and
 * tracks usage metrics.
 *
 * @module agent-loop-engine/tools/tool-registry
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createTimestamp } from '../types/core.types.js';
import type { JsonSchema, ToolSchema } from '../types/provider.types.js';
import type {
  ToolDefinition,
  ToolExecutionContext,
  ToolExecutor,
  ToolLookup,
  ToolOutput,
  ToolRegistryEntry,
} from '../types/tools.types.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (entry: ToolRegistryEntry) => void;
  'tool:unregistered': (name: string) => void;
  'tool:invoked': (name: string, callId: string) => void;
  'tool:completed': (name: string, callId: string, output: ToolOutput) => void;
  'tool:failed': (name: string, callId: string, error: unknown) => void;
}

/**
 * Configuration for the Tool Registry.
 */
export interface ToolRegistryConfig {
  /** Timeout for a single tool execution; null disables it */
  readonly timeoutMs: number | null;

  readonly logger: Logger;
}

/**
 * Default registry configuration.
 */
export const DEFAULT_REGISTRY_CONFIG: ToolRegistryConfig = {
  timeoutMs: 30_000,
  logger: silentLogger,
};

/**
 * Converts a zod schema to the JSON Schema document sent to the model.
 */
export function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const { $schema: _dialect, ...document } = zodToJsonSchema(schema, {
    target: 'jsonSchema7',
    $refStrategy: 'none',
  });
  return document;
}

/**
 * Central registry for tool management.
 *
 * Arguments the model sends that are not valid JSON, or that fail the
 * tool's input schema, produce an `isError` output the model can correct.
 * An exception thrown by the tool itself propagates to the caller.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register(calculatorTool);
 * const output = await registry.lookup('calculator')?.run('{"expression":"2+2"}');
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> implements ToolLookup {
  private readonly tools: Map<string, ToolRegistryEntry>;
  private readonly config: ToolRegistryConfig;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.tools = new Map();
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
  }

  /**
   * Registers a new tool with the registry.
   *
   * @throws Error if the name is already registered
   */
  register<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const entry: ToolRegistryEntry = {
      name: definition.name,
      description: definition.description,
      jsonSchema: toJsonSchema(definition.inputSchema),
      executor: this.createExecutor(definition),
      registeredAt: createTimestamp(),
      invocationCount: 0,
      lastInvokedAt: null,
    };

    this.tools.set(definition.name, entry);
    this.emit('tool:registered', entry);
    return this;
  }

  /**
   * Unregisters a tool.
   *
   * @returns true if the tool was unregistered, false if not found
   */
  unregister(name: string): boolean {
    const existed = this.tools.delete(name);
    if (existed) {
      this.emit('tool:unregistered', name);
    }
    return existed;
  }

  lookup(name: string): ToolExecutor | null {
    return this.tools.get(name)?.executor ?? null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Lists all registered tools in registration order.
   */
  list(): ReadonlyArray<ToolRegistryEntry> {
    return [...this.tools.values()];
  }

  /**
   * Tool descriptions in the provider-agnostic request format.
   */
  schemas(): ToolSchema[] {
    return this.list().map(entry => ({
      name: entry.name,
      description: entry.description,
      inputSchema: entry.jsonSchema,
    }));
  }

  /**
   * Gets usage metrics for a tool.
   */
  getMetrics(name: string): ToolRegistryEntry | null {
    return this.tools.get(name) ?? null;
  }

  // ============ Private Methods ============

  private createExecutor<TSchema extends z.ZodTypeAny>(
    definition: ToolDefinition<TSchema>,
  ): ToolExecutor {
    return {
      name: definition.name,
      run: async (argumentsJson: string, callId: string = definition.name): Promise<ToolOutput> => {
        let raw: unknown;
        try {
          raw = argumentsJson.trim() === '' ? {} : JSON.parse(argumentsJson);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          return { output: `Invalid JSON arguments for '${definition.name}': ${reason}`, isError: true };
        }

        const parsed = definition.inputSchema.safeParse(raw);
        if (!parsed.success) {
          return {
            output: `Invalid arguments for '${definition.name}': ${formatIssues(parsed.error)}`,
            isError: true,
          };
        }

        this.emit('tool:invoked', definition.name, callId);

        try {
          const result = await this.executeWithTimeout(
            definition,
            parsed.data,
            this.createExecutionContext(definition.name, callId),
          );
          const output: ToolOutput = typeof result === 'string' ? { output: result, isError: false } : result;

          this.updateMetrics(definition.name);
          this.emit('tool:completed', definition.name, callId, output);
          return output;
        } catch (error) {
          this.updateMetrics(definition.name);
          this.emit('tool:failed', definition.name, callId, error);
          throw error;
        }
      },
    };
  }

  private createExecutionContext(name: string, callId: string): ToolExecutionContext {
    return {
      callId,
      logger: this.config.logger.child({ module: `tool:${name}` }),
    };
  }

  private async executeWithTimeout<TSchema extends z.ZodTypeAny>(
    definition: ToolDefinition<TSchema>,
    input: z.infer<TSchema>,
    context: ToolExecutionContext,
  ): Promise<string | ToolOutput> {
    const timeoutMs = this.config.timeoutMs;
    if (timeoutMs === null) {
      return definition.execute(input, context);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Tool '${definition.name}' timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      definition.execute(input, context)
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private updateMetrics(name: string): void {
    const entry = this.tools.get(name);
    if (entry) {
      this.tools.set(name, {
        ...entry,
        invocationCount: entry.invocationCount + 1,
        lastInvokedAt: createTimestamp(),
      });
    }
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
