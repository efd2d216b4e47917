/**
 * @fileoverview Execution Controller - one active run at a time.
 *
 * The controller starts a run eagerly and buffers its steps, so observers
 * can subscribe to events while any number of iterators replay the steps
 * from the beginning. It is the surface a UI or CLI holds on to: it knows
 * whether a run is active, what phase it is in, and how to cancel it.
 *
 * @module agent-loop-engine/agent/execution-controller
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import type { z } from 'zod';
import type { AgentStep, LoopPhase } from '../types/core.types.js';
import type { ProviderRoundTrip } from '../types/provider.types.js';
import {
  AgentExecutionEngine,
  type AgentRun,
  type AgentRunOptions,
  type ExecutionEngineOptions,
  type RunSummary,
  type SuppliedToolResult,
} from './execution-engine.js';
import { AgentError, AgentErrorCode, isAgentError } from './errors.js';

export type ExecutionState = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Events emitted by the controller.
 */
export interface ExecutionControllerEvents {
  'step': (step: AgentStep) => void;
  'phase': (phase: LoopPhase) => void;
  'error': (error: AgentError) => void;
  'complete': (output: unknown, summary: RunSummary) => void;
}

/**
 * Run options without the prompt, which `start` takes separately.
 */
export type ControllerRunOptions<TSchema extends z.ZodTypeAny> = Omit<AgentRunOptions<TSchema>, 'prompt'>;

/**
 * Append-only step log that any number of iterators can replay.
 */
class StepBuffer<T> implements AsyncIterable<AgentStep<T>> {
  private readonly steps: AgentStep<T>[] = [];
  private readonly waiters: Array<() => void> = [];
  private closed = false;
  private error: AgentError | null = null;

  get snapshot(): ReadonlyArray<AgentStep<T>> {
    return [...this.steps];
  }

  push(step: AgentStep<T>): void {
    this.steps.push(step);
    this.wake();
  }

  close(error: AgentError | null = null): void {
    this.closed = true;
    this.error = error;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<AgentStep<T>, void, undefined> {
    let index = 0;
    for (;;) {
      if (index < this.steps.length) {
        yield this.steps[index++];
        continue;
      }
      if (this.closed) {
        if (this.error !== null) {
          throw this.error;
        }
        return;
      }
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
  }

  private wake(): void {
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }
}

/**
 * Controls a single active agent run.
 *
 * @example
 * ```typescript
 * const controller = new AgentExecutionController(provider);
 * controller.on('phase', phase => render(phase));
 *
 * for await (const step of controller.start('What is 2 + 2?', { tools, outputSchema })) {
 *   console.log(step);
 * }
 * ```
 */
export class AgentExecutionController extends EventEmitter<ExecutionControllerEvents> {
  private readonly engine: AgentExecutionEngine;
  private activeRun: AgentRun<unknown> | null = null;
  private buffer: StepBuffer<unknown> = new StepBuffer();
  private runState: ExecutionState = 'idle';
  private pump: Promise<void> | null = null;
  private lastError: AgentError | null = null;

  constructor(provider: ProviderRoundTrip, options: ExecutionEngineOptions = {}) {
    super();
    this.engine = new AgentExecutionEngine(provider, options);
  }

  get isRunning(): boolean {
    return this.runState === 'running';
  }

  get state(): ExecutionState {
    return this.runState;
  }

  /**
   * Steps observed so far in the current or last run.
   */
  get steps(): ReadonlyArray<AgentStep> {
    return this.buffer.snapshot;
  }

  get error(): AgentError | null {
    return this.lastError;
  }

  /**
   * Starts a run and returns its steps.
   *
   * @throws AgentError INVALID_STATE while another run is active
   */
  start<TSchema extends z.ZodTypeAny>(
    prompt: string,
    options: ControllerRunOptions<TSchema>,
  ): AsyncIterable<AgentStep<z.infer<TSchema>>> {
    if (this.isRunning) {
      throw new AgentError(AgentErrorCode.INVALID_STATE, 'A run is already in progress', {
        lastPhase: this.currentPhase(),
      });
    }

    const run = this.engine.run({ ...options, prompt });
    const buffer = new StepBuffer<z.infer<TSchema>>();

    this.activeRun = run;
    this.buffer = buffer;
    this.runState = 'running';
    this.lastError = null;
    this.pump = this.drive(run, buffer);

    return buffer;
  }

  /**
   * Cancels the active run. The run ends with a CANCELLED error once its
   * in-flight work finishes.
   */
  cancel(): void {
    this.activeRun?.cancel();
  }

  currentPhase(): LoopPhase | null {
    return this.activeRun?.currentPhase() ?? null;
  }

  supplyToolResults(results: ReadonlyArray<SuppliedToolResult>): void {
    if (this.activeRun === null) {
      throw new AgentError(AgentErrorCode.INVALID_STATE, 'No run is active');
    }
    this.activeRun.supplyToolResults(results);
  }

  /**
   * Resolves once the active run has finished, whatever the outcome.
   */
  async settled(): Promise<void> {
    await this.pump;
  }

  /**
   * Cancels any active run and forgets the last one.
   */
  reset(): void {
    this.cancel();
    this.activeRun = null;
    this.buffer = new StepBuffer();
    this.runState = 'idle';
    this.lastError = null;
  }

  // ============ Private Methods ============

  private async drive<TOutput>(run: AgentRun<TOutput>, buffer: StepBuffer<TOutput>): Promise<void> {
    const onPhase = (runId: string, phase: LoopPhase): void => {
      if (runId === run.runId) {
        this.emit('phase', phase);
      }
    };
    this.engine.on('phase', onPhase);

    try {
      for await (const step of run) {
        buffer.push(step);
        if (this.activeRun === run) {
          this.emit('step', step);
        }
        if (step.type === 'finalResponse') {
          this.finish(run, 'completed');
          buffer.close();
          this.emit('complete', step.output, run.summary());
        }
      }
      buffer.close();
    } catch (error) {
      const agentError = isAgentError(error)
        ? error
        : new AgentError(AgentErrorCode.PROVIDER_ERROR, String(error), { cause: error });
      this.finish(run, agentError.code === AgentErrorCode.CANCELLED ? 'cancelled' : 'failed');
      if (this.activeRun === run) {
        this.lastError = agentError;
      }
      buffer.close(agentError);
      this.emit('error', agentError);
    } finally {
      this.engine.off('phase', onPhase);
    }
  }

  private finish(run: AgentRun<unknown>, state: ExecutionState): void {
    if (this.activeRun === run) {
      this.runState = state;
    }
  }
}
