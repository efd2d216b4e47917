/**
 * @fileoverview Mutable state of one engine run.
 *
 * Owned by a single run and written only by its engine. Holds the
 * conversation, the step counter, the duplicate-call tracker, token usage
 * and the phase lifecycle.
 *
 * @module agent-loop-engine/agent/context
 * @version 0.1.0
 */

import type { AgentConfiguration, LoopPhase, ToolCallInfo, UniqueId } from '../types/core.types.js';
import type { LLMMessage, TokenUsage } from '../types/provider.types.js';
import { toolCallKey, canonicalizeArguments } from './canonical-arguments.js';
import { PhaseLifecycle } from './lifecycle.js';

/**
 * Read-only view the termination policies decide on.
 */
export interface TerminationContext {
  readonly stepCount: number;
  readonly configuration: AgentConfiguration;

  /** Calls recorded so far, keyed by tool name and canonical arguments */
  duplicateCounts(): ReadonlyArray<DuplicateCount>;

  /** Total calls recorded per tool name */
  toolTotals(): ReadonlyMap<string, number>;
}

export interface DuplicateCount {
  readonly name: string;
  readonly canonicalArguments: string;
  readonly count: number;
}

export class AgentContext implements TerminationContext {
  readonly runId: UniqueId;
  readonly configuration: AgentConfiguration;
  readonly systemPrompt: string | null;
  readonly lifecycle: PhaseLifecycle;

  private readonly history: LLMMessage[];
  private steps = 0;
  private readonly callCounts = new Map<string, DuplicateCount>();
  private readonly totals = new Map<string, number>();
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  /** Set once the model has been asked for a schema-conforming answer */
  awaitingFinalOutput = false;

  /** Consecutive final answers that failed to decode */
  decodeFailures = 0;

  constructor(params: {
    runId: UniqueId;
    configuration: AgentConfiguration;
    messages: ReadonlyArray<LLMMessage>;
    systemPrompt?: string | null;
  }) {
    this.runId = params.runId;
    this.configuration = params.configuration;
    this.systemPrompt = params.systemPrompt ?? null;
    this.history = [...params.messages];
    this.lifecycle = new PhaseLifecycle(params.runId);
  }

  get messages(): ReadonlyArray<LLMMessage> {
    return [...this.history];
  }

  get stepCount(): number {
    return this.steps;
  }

  get phase(): LoopPhase {
    return this.lifecycle.getCurrentPhase();
  }

  get tokenUsage(): TokenUsage {
    return this.usage;
  }

  hasStepsRemaining(): boolean {
    return this.steps < this.configuration.maxSteps;
  }

  append(message: LLMMessage): void {
    this.history.push(message);
  }

  /**
   * Records a completed model round trip.
   */
  completeStep(usage: TokenUsage): void {
    this.steps++;
    this.usage = {
      inputTokens: this.usage.inputTokens + usage.inputTokens,
      outputTokens: this.usage.outputTokens + usage.outputTokens,
    };
  }

  recordToolCalls(calls: ReadonlyArray<ToolCallInfo>): void {
    for (const call of calls) {
      const key = toolCallKey(call.name, call.arguments);
      const existing = this.callCounts.get(key);
      this.callCounts.set(key, {
        name: call.name,
        canonicalArguments: existing?.canonicalArguments ?? canonicalizeArguments(call.arguments),
        count: (existing?.count ?? 0) + 1,
      });
      this.totals.set(call.name, (this.totals.get(call.name) ?? 0) + 1);
    }
  }

  duplicateCounts(): ReadonlyArray<DuplicateCount> {
    return [...this.callCounts.values()];
  }

  toolTotals(): ReadonlyMap<string, number> {
    return new Map(this.totals);
  }
}
