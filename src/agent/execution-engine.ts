/**
 * @fileoverview Agent Execution Engine - drives the tool-calling loop.
 *
 * The engine orchestrates the Request → Tool calls → Observe → Repeat
 * cycle against a provider round trip, coordinating the phase lifecycle,
 * the tool registry, the retry layer and the termination policies.
 *
 * Design Principles:
 * 1. Bounded - every run ends within `maxSteps` model round trips
 * 2. Observable - every step, phase change and retry is emitted and logged
 * 3. Interruptible - a run can be cancelled between round trips
 * 4. Lazy - nothing is sent until the caller starts iterating
 *
 * @module agent-loop-engine/agent/execution-engine
 * @version 0.1.0
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import type {
  AgentConfiguration,
  AgentStep,
  ToolCallInfo,
  ToolResultInfo,
  UniqueId,
} from '../types/core.types.js';
import { LoopPhase, createAgentConfiguration, createUniqueId } from '../types/core.types.js';
import type {
  LLMMessage,
  ProviderRequest,
  ProviderResponse,
  ProviderRoundTrip,
  TokenUsage,
} from '../types/provider.types.js';
import type { ToolExecutor } from '../types/tools.types.js';
import {
  assistantMessage,
  extractText,
  extractToolCalls,
  messageFromResponse,
  toolResultsMessage,
  userMessage,
} from '../providers/base.js';
import { classifyFailure } from '../providers/errors.js';
import type { RateLimitHintExtractor } from '../retry/rate-limit.js';
import type { RetryConfiguration, RetryEvent } from '../retry/retry-policy.js';
import { RetryExhaustedError, RetryingRoundTrip } from '../retry/retrying-round-trip.js';
import { ToolRegistry, toJsonSchema } from '../tools/tool-registry.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';
import { AgentContext } from './agent-context.js';
import { AgentError, AgentErrorCode, isAgentError } from './errors.js';
import { createDefaultTerminationPolicy, type TerminationPolicy } from './termination-policy.js';

/**
 * Appended when the model answers with text that does not match the
 * output schema.
 */
export const FINAL_OUTPUT_REQUEST = 'Please provide your final response in the required JSON format.';

/** Consecutive non-conforming final answers tolerated */
export const MAX_DECODE_RETRIES = 2;

/**
 * Events emitted by the engine.
 */
export interface ExecutionEngineEvents {
  'run:start': (runId: UniqueId, configuration: AgentConfiguration) => void;
  'step': (runId: UniqueId, step: AgentStep) => void;
  'phase': (runId: UniqueId, phase: LoopPhase) => void;
  'retry': (runId: UniqueId, event: RetryEvent) => void;
  'run:complete': (runId: UniqueId, summary: RunSummary) => void;
  'run:failed': (runId: UniqueId, error: AgentError, summary: RunSummary) => void;
}

/**
 * Totals reported when a run ends.
 */
export interface RunSummary {
  readonly runId: UniqueId;
  readonly stepCount: number;
  readonly tokenUsage: TokenUsage;
  readonly durationMs: number;
  readonly phase: LoopPhase;
}

/**
 * Options shared by every run of an engine.
 */
export interface ExecutionEngineOptions {
  readonly logger?: Logger;

  /** Reads rate-limit hints from failed responses */
  readonly rateLimitExtractor?: RateLimitHintExtractor;

  /** Defaults to duplicate detection followed by the step bound */
  readonly terminationPolicy?: TerminationPolicy;

  /** Backoff sleep; rejects when the signal aborts */
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;

  /** Jitter source in [0, 1) */
  readonly random?: () => number;
}

/**
 * Input of a single run.
 */
export interface AgentRunOptions<TSchema extends z.ZodTypeAny> {
  /** Opening user message; appended after `messages` */
  readonly prompt?: string;

  /** Earlier conversation to continue from */
  readonly messages?: ReadonlyArray<LLMMessage>;

  readonly systemPrompt?: string | null;
  readonly tools?: ToolRegistry;

  /** Schema the final answer must satisfy */
  readonly outputSchema: TSchema;

  readonly configuration?: Partial<AgentConfiguration>;
  readonly retry?: RetryConfiguration;
}

/**
 * A caller-supplied result for a pending tool call.
 */
export interface SuppliedToolResult {
  readonly id: string;
  readonly output: string;
  readonly isError?: boolean;
}

/**
 * The outcome of draining a run.
 */
export interface RunResult<TOutput> {
  readonly output: TOutput;
  readonly steps: ReadonlyArray<AgentStep<TOutput>>;
  readonly summary: RunSummary;
}

/**
 * Drives agents against one provider.
 *
 * @example
 * ```typescript
 * const engine = new AgentExecutionEngine(provider, { logger });
 * const run = engine.run({
 *   prompt: 'What is 17 * 23?',
 *   tools: new ToolRegistry().register(calculatorTool),
 *   outputSchema: z.object({ answer: z.number() }),
 * });
 *
 * for await (const step of run) {
 *   console.log(step.type);
 * }
 * ```
 */
export class AgentExecutionEngine extends EventEmitter<ExecutionEngineEvents> {
  private readonly provider: ProviderRoundTrip;
  private readonly options: ExecutionEngineOptions;

  constructor(provider: ProviderRoundTrip, options: ExecutionEngineOptions = {}) {
    super();
    this.provider = provider;
    this.options = options;
  }

  /**
   * Prepares a run. The first round trip happens when iteration starts.
   *
   * @throws ZodError if the configuration is out of range
   */
  run<TSchema extends z.ZodTypeAny>(options: AgentRunOptions<TSchema>): AgentRun<z.infer<TSchema>> {
    const runId = createUniqueId(uuidv4());
    const messages = [...(options.messages ?? [])];
    if (options.prompt !== undefined) {
      messages.push(userMessage(options.prompt));
    }

    const context = new AgentContext({
      runId,
      configuration: createAgentConfiguration(options.configuration),
      messages,
      systemPrompt: options.systemPrompt,
    });

    return new AgentRun<z.infer<TSchema>>({
      context,
      provider: this.provider,
      tools: options.tools ?? new ToolRegistry(),
      decode: text => decodeFinalOutput(text, options.outputSchema),
      responseSchema: toJsonSchema(options.outputSchema),
      retry: options.retry,
      engine: this,
      engineOptions: this.options,
    });
  }
}

interface AgentRunParams<TOutput> {
  readonly context: AgentContext;
  readonly provider: ProviderRoundTrip;
  readonly tools: ToolRegistry;
  readonly decode: (text: string) => DecodeResult<TOutput>;
  readonly responseSchema: Readonly<Record<string, unknown>>;
  readonly retry: RetryConfiguration | undefined;
  readonly engine: EventEmitter<ExecutionEngineEvents>;
  readonly engineOptions: ExecutionEngineOptions;
}

interface PendingToolRound {
  readonly calls: ReadonlyArray<ToolCallInfo>;
  readonly received: Map<string, ToolResultInfo>;
  resolve: (() => void) | null;
}

/**
 * One run of the loop, iterable once.
 */
export class AgentRun<TOutput> implements AsyncIterable<AgentStep<TOutput>> {
  readonly runId: UniqueId;

  private readonly params: AgentRunParams<TOutput>;
  private readonly context: AgentContext;
  private readonly logger: Logger;
  private readonly roundTrip: RetryingRoundTrip;
  private readonly terminationPolicy: TerminationPolicy;
  private readonly abortController = new AbortController();
  private pendingRound: PendingToolRound | null = null;
  private started = false;
  private startedAt = 0;

  constructor(params: AgentRunParams<TOutput>) {
    this.params = params;
    this.context = params.context;
    this.runId = params.context.runId;

    const { engineOptions } = params;
    this.logger = (engineOptions.logger ?? silentLogger).child({ module: 'engine', runId: this.runId });
    this.terminationPolicy = engineOptions.terminationPolicy ?? createDefaultTerminationPolicy();
    this.roundTrip = new RetryingRoundTrip(params.provider, {
      retry: params.retry,
      rateLimitExtractor: engineOptions.rateLimitExtractor,
      logger: this.logger,
      sleep: ms => this.backoff(ms),
      random: engineOptions.random,
    });

    this.setupPhaseEvents();
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  currentPhase(): LoopPhase {
    return this.context.phase;
  }

  get stepCount(): number {
    return this.context.stepCount;
  }

  get tokenUsage(): TokenUsage {
    return this.context.tokenUsage;
  }

  /**
   * Conversation so far, including the assistant turns and tool results.
   */
  get messages(): ReadonlyArray<LLMMessage> {
    return this.context.messages;
  }

  /**
   * Requests cancellation. Takes effect before the next round trip or tool
   * round; tools already running finish first.
   */
  cancel(): void {
    if (this.isCancelled || this.context.lifecycle.isTerminal()) {
      return;
    }
    this.logger.info('Cancellation requested', { phase: this.context.phase.kind });
    this.abortController.abort();
    this.pendingRound?.resolve?.();
  }

  /**
   * Supplies results for the pending tool calls when `autoExecuteTools` is
   * false. May be called once with every result, or several times with some.
   *
   * @throws AgentError INVALID_STATE when no calls are pending or an ID does not match
   */
  supplyToolResults(results: ReadonlyArray<SuppliedToolResult>): void {
    const round = this.pendingRound;
    if (round === null) {
      throw new AgentError(AgentErrorCode.INVALID_STATE, 'No tool calls are awaiting results', {
        lastPhase: this.context.phase,
      });
    }

    for (const result of results) {
      const call = round.calls.find(candidate => candidate.id === result.id);
      if (call === undefined) {
        throw new AgentError(AgentErrorCode.INVALID_STATE, `No pending tool call has ID '${result.id}'`, {
          lastPhase: this.context.phase,
          details: { pendingIds: round.calls.map(pending => pending.id) },
        });
      }
      if (round.received.has(result.id)) {
        throw new AgentError(AgentErrorCode.INVALID_STATE, `Result for tool call '${result.id}' was already supplied`, {
          lastPhase: this.context.phase,
        });
      }
    }

    for (const result of results) {
      const call = round.calls.find(candidate => candidate.id === result.id);
      round.received.set(result.id, {
        id: result.id,
        name: call?.name ?? '',
        output: result.output,
        isError: result.isError ?? false,
      });
    }

    if (round.received.size === round.calls.length) {
      round.resolve?.();
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<AgentStep<TOutput>, void, undefined> {
    if (this.started) {
      throw new AgentError(AgentErrorCode.INVALID_STATE, 'A run can only be iterated once', {
        lastPhase: this.context.phase,
      });
    }
    this.started = true;
    return this.execute();
  }

  /**
   * Drains the run and returns its final output.
   *
   * @throws AgentError when the run ends without a final response
   */
  async collect(): Promise<RunResult<TOutput>> {
    const steps: AgentStep<TOutput>[] = [];
    for await (const step of this) {
      steps.push(step);
      if (step.type === 'finalResponse') {
        return { output: step.output, steps, summary: this.summary() };
      }
    }
    throw new AgentError(AgentErrorCode.INVALID_STATE, 'Run ended without a final response', {
      lastPhase: this.context.phase,
    });
  }

  summary(): RunSummary {
    return {
      runId: this.runId,
      stepCount: this.context.stepCount,
      tokenUsage: this.context.tokenUsage,
      durationMs: this.startedAt === 0 ? 0 : Date.now() - this.startedAt,
      phase: this.context.phase,
    };
  }

  // ============ Loop ============

  private async *execute(): AsyncGenerator<AgentStep<TOutput>, void, undefined> {
    const { context, params } = this;
    const { engine } = params;
    this.startedAt = Date.now();

    engine.emit('run:start', this.runId, context.configuration);
    this.logger.info('Run started', {
      provider: params.provider.name,
      tools: params.tools.list().map(entry => entry.name),
      ...context.configuration,
    });

    try {
      for (;;) {
        this.throwIfCancelled();
        if (!context.hasStepsRemaining()) {
          throw this.maxStepsError();
        }

        const response = await this.requestModel();
        context.completeStep(response.usage);

        const calls = context.awaitingFinalOutput ? [] : extractToolCalls(response);
        const text = extractText(response);

        if (calls.length === 0 && text === null) {
          throw new AgentError(AgentErrorCode.PROVIDER_ERROR, 'Provider returned an empty response', {
            details: { model: response.model, stopReason: response.stopReason },
          });
        }

        if (calls.length > 0) {
          this.appendAssistantTurn(response);
          yield* this.runToolRound(calls, text);

          const decision = this.terminationPolicy.decide(context);
          if (decision.action === 'stop') {
            this.logger.warn('Termination policy stopped the run', {
              policy: this.terminationPolicy.name,
              code: decision.code,
              detail: decision.detail,
            });
            throw new AgentError(decision.code, decision.detail, {
              details: { stepCount: context.stepCount },
            });
          }

          this.throwIfCancelled();
          context.lifecycle.transition(LoopPhase.awaitingModel(), 'Tool results recorded');
          continue;
        }

        const answer = text ?? '';
        context.append(assistantMessage(answer));
        const decoded = params.decode(answer);

        if (decoded.success) {
          const finalStep = this.observe({ type: 'finalResponse', output: decoded.value });
          context.lifecycle.terminate('completed', 'Final response decoded');
          this.logger.info('Run completed', { stepCount: context.stepCount, ...context.tokenUsage });
          engine.emit('run:complete', this.runId, this.summary());
          yield finalStep;
          return;
        }

        if (context.awaitingFinalOutput) {
          context.decodeFailures++;
          if (context.decodeFailures >= MAX_DECODE_RETRIES) {
            throw new AgentError(
              AgentErrorCode.OUTPUT_DECODING_FAILED,
              `Final response did not match the output schema after ${context.decodeFailures} attempts: ${decoded.error}`,
              { details: { lastText: answer } },
            );
          }
        }

        this.logger.debug('Final response did not match the output schema', {
          error: decoded.error,
          attempt: context.decodeFailures,
        });
        yield this.observe({ type: 'thinking', text: answer });
        context.awaitingFinalOutput = true;
        context.append(userMessage(FINAL_OUTPUT_REQUEST));

        if (!context.hasStepsRemaining()) {
          throw this.maxStepsError();
        }
        context.lifecycle.transition(LoopPhase.awaitingModel(), 'Requested final output');
      }
    } catch (error) {
      throw this.fail(error);
    } finally {
      this.pendingRound = null;
      if (!context.lifecycle.isTerminal()) {
        // the consumer stopped iterating early
        this.abortController.abort();
        context.lifecycle.terminate('cancelled', 'Iteration stopped by consumer');
      }
    }
  }

  /**
   * Emits thinking and tool calls, runs (or waits for) the tools, and
   * records the results.
   */
  private async *runToolRound(
    calls: ReadonlyArray<ToolCallInfo>,
    prose: string | null,
  ): AsyncGenerator<AgentStep<TOutput>, void, undefined> {
    const { context, params } = this;
    const autoExecute = context.configuration.autoExecuteTools;

    if (!autoExecute) {
      this.pendingRound = { calls, received: new Map(), resolve: null };
    }

    if (prose !== null) {
      yield this.observe({ type: 'thinking', text: prose });
    }

    const executors: ToolExecutor[] = [];
    for (const call of calls) {
      yield this.observe({ type: 'toolCall', ...call });
      const executor = params.tools.lookup(call.name);
      if (executor === null) {
        throw new AgentError(AgentErrorCode.TOOL_NOT_FOUND, `Tool '${call.name}' is not registered`, {
          details: { toolName: call.name, callId: call.id },
        });
      }
      executors.push(executor);
    }

    context.lifecycle.transition(LoopPhase.executingTools(calls), 'Model requested tools');
    this.throwIfCancelled();

    let results: ToolResultInfo[];
    if (autoExecute) {
      results = yield* this.executeTools(calls, executors);
    } else {
      results = await this.awaitSuppliedResults();
      this.throwIfCancelled();
      for (const result of results) {
        yield this.observe({ type: 'toolResult', ...result });
      }
    }

    context.append(toolResultsMessage(results));
    context.recordToolCalls(calls);
    this.throwIfCancelled();
  }

  private async *executeTools(
    calls: ReadonlyArray<ToolCallInfo>,
    executors: ReadonlyArray<ToolExecutor>,
  ): AsyncGenerator<AgentStep<TOutput>, ToolResultInfo[], undefined> {
    this.logger.debug('Executing tools', { tools: calls.map(call => call.name) });

    const settled = await Promise.allSettled(
      calls.map((call, index) => executors[index].run(call.arguments, call.id)),
    );

    const results: ToolResultInfo[] = [];
    let failure: { call: ToolCallInfo; error: unknown } | null = null;

    for (const [index, outcome] of settled.entries()) {
      const call = calls[index];
      if (outcome.status === 'fulfilled') {
        const result: ToolResultInfo = { id: call.id, name: call.name, ...outcome.value };
        results.push(result);
        yield this.observe({ type: 'toolResult', ...result });
      } else if (failure === null) {
        failure = { call, error: outcome.reason };
      }
    }

    if (failure !== null) {
      const reason = failure.error instanceof Error ? failure.error.message : String(failure.error);
      throw new AgentError(
        AgentErrorCode.TOOL_EXECUTION_FAILED,
        `Tool '${failure.call.name}' failed: ${reason}`,
        { cause: failure.error, details: { toolName: failure.call.name, callId: failure.call.id } },
      );
    }

    return results;
  }

  private async awaitSuppliedResults(): Promise<ToolResultInfo[]> {
    const round = this.pendingRound;
    if (round === null) {
      return [];
    }

    if (round.received.size < round.calls.length && !this.isCancelled) {
      this.logger.debug('Waiting for tool results', { pending: round.calls.map(call => call.id) });
      await new Promise<void>(resolve => {
        round.resolve = resolve;
      });
    }

    this.pendingRound = null;
    const results: ToolResultInfo[] = [];
    for (const call of round.calls) {
      const result = round.received.get(call.id);
      if (result !== undefined) {
        results.push(result);
      }
    }
    return results;
  }

  private async requestModel(): Promise<ProviderResponse> {
    const { context, params } = this;
    const finalOutput = context.awaitingFinalOutput;
    const hasTools = params.tools.size > 0;

    const request: ProviderRequest = {
      messages: context.messages,
      tools: finalOutput ? [] : params.tools.schemas(),
      toolChoice: hasTools && !finalOutput ? { type: 'auto' } : null,
      responseSchema: !hasTools || finalOutput ? params.responseSchema : null,
      systemPrompt: context.systemPrompt,
    };

    try {
      return await this.logger.time(
        `Round trip ${context.stepCount + 1}`,
        () => this.roundTrip.execute(request),
      );
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      const failure = error instanceof RetryExhaustedError ? error.lastFailure : classifyFailure(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new AgentError(AgentErrorCode.PROVIDER_ERROR, `Provider request failed: ${message}`, {
        cause: error,
        details: {
          failure: failure.kind,
          attempts: error instanceof RetryExhaustedError ? error.attempts : 1,
        },
      });
    }
  }

  // ============ Private Methods ============

  private observe(step: AgentStep<TOutput>): AgentStep<TOutput> {
    this.params.engine.emit('step', this.runId, step);
    return step;
  }

  private appendAssistantTurn(response: ProviderResponse): void {
    const message = messageFromResponse(response);
    if (message !== null) {
      this.context.append(message);
    }
  }

  private throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new AgentError(AgentErrorCode.CANCELLED, 'Run was cancelled');
    }
  }

  private maxStepsError(): AgentError {
    const { maxSteps } = this.context.configuration;
    return new AgentError(
      AgentErrorCode.MAX_STEPS_EXCEEDED,
      `Reached the limit of ${maxSteps} model round trips`,
      { details: { stepCount: this.context.stepCount } },
    );
  }

  private async backoff(ms: number): Promise<void> {
    const signal = this.abortController.signal;
    const sleep = this.params.engineOptions.sleep ?? ((delay: number, abort: AbortSignal) =>
      sleepFor(delay, undefined, { signal: abort }));

    this.throwIfCancelled();
    try {
      await sleep(ms, signal);
    } catch (error) {
      this.throwIfCancelled();
      throw error;
    }
    this.throwIfCancelled();
  }

  /**
   * Terminates the lifecycle for a failure and returns the error to throw.
   */
  private fail(error: unknown): AgentError {
    const { context } = this;
    const lastPhase = context.phase;
    const agentError = isAgentError(error)
      ? error.withLastPhase(lastPhase)
      : new AgentError(AgentErrorCode.PROVIDER_ERROR, error instanceof Error ? error.message : String(error), {
          cause: error,
          lastPhase,
        });

    context.lifecycle.terminate(agentError.reason ?? 'providerError', agentError.message);

    if (agentError.code === AgentErrorCode.CANCELLED) {
      this.logger.info('Run cancelled', { stepCount: context.stepCount });
    } else {
      this.logger.error('Run failed', {
        code: agentError.code,
        phase: lastPhase.kind,
        stepCount: context.stepCount,
      }, agentError.cause ?? agentError);
    }

    this.params.engine.emit('run:failed', this.runId, agentError, this.summary());
    return agentError;
  }

  private setupPhaseEvents(): void {
    const { lifecycle } = this.context;
    lifecycle.on('transition', (_from, to) => {
      this.params.engine.emit('phase', this.runId, to);
    });
    lifecycle.on('phase:enter', (phase, metadata) => {
      this.logger.debug(`Entered ${phase.kind}`, { reason: metadata.reason });
    });

    this.roundTrip.on('retry', event => {
      this.context.lifecycle.transition(LoopPhase.retrying(event.attempt, event.delayMs), event.reason);
      this.params.engine.emit('retry', this.runId, event);
    });
    this.roundTrip.on('attempt', attempt => {
      this.context.lifecycle.transition(LoopPhase.awaitingModel(), `Retry attempt ${attempt}`);
    });
  }
}

// ============ Output decoding ============

export type DecodeResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: string };

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Parses model text as JSON and validates it against `schema`. A single
 * surrounding Markdown code fence is ignored.
 */
export function decodeFinalOutput<TSchema extends z.ZodTypeAny>(
  text: string,
  schema: TSchema,
): DecodeResult<z.infer<TSchema>> {
  const trimmed = text.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  const source = fenced === null ? trimmed : fenced[1];

  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; '),
    };
  }
  return { success: true, value: parsed.data };
}
