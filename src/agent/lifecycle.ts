/**
 * @fileoverview Phase Lifecycle - Manages loop phase transitions.
 *
 * The lifecycle enforces the loop state machine, ensuring valid
 * transitions and providing hooks for observability. It is the
 * authoritative source for "what phase is the run in?"
 *
 * State Machine:
 * ```
 *        ┌──────────────┐
 *        ▼              │
 *   awaitingModel ──► executingTools
 *     │    ▲   │             │
 *     ▼    │   └─────────┐   │
 *    retrying ───────► terminated(reason)
 * ```
 *
 * `awaitingModel` may re-enter itself (a thinking round), as may
 * `retrying` (consecutive failures). `terminated` is absorbing.
 *
 * @module agent-loop-engine/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type {
  LoopPhaseKind,
  TerminationReason,
  Timestamp,
  UniqueId,
} from '../types/core.types.js';
import { LoopPhase, createTimestamp, createUniqueId } from '../types/core.types.js';
import { AgentError, AgentErrorCode } from './errors.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'transition': (from: LoopPhase, to: LoopPhase, reason: string) => void;
  'error': (error: AgentError) => void;
}

/**
 * Metadata associated with a phase.
 */
export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly transitionCount: number;
  readonly reason: string;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly runId: UniqueId;
  readonly currentPhase: LoopPhase;
  readonly previousPhase: LoopPhase | null;
  readonly transitionCount: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

/**
 * Entry in the phase history.
 */
export interface PhaseHistoryEntry {
  readonly phase: LoopPhase;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

/**
 * Valid transitions from each phase.
 * This is the authoritative definition of the state machine.
 */
const VALID_TRANSITIONS: ReadonlyMap<LoopPhaseKind, ReadonlyArray<LoopPhaseKind>> = new Map<
  LoopPhaseKind,
  ReadonlyArray<LoopPhaseKind>
>([
  ['awaitingModel', ['awaitingModel', 'executingTools', 'retrying', 'terminated']],
  ['retrying', ['retrying', 'awaitingModel', 'terminated']],
  ['executingTools', ['awaitingModel', 'terminated']],
  ['terminated', []],
]);

/**
 * Manages the phase of one run.
 *
 * @example
 * ```typescript
 * const lifecycle = new PhaseLifecycle(runId);
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`${from.kind} → ${to.kind} (${reason})`);
 * });
 *
 * lifecycle.transition(LoopPhase.executingTools(calls), 'Model requested tools');
 * lifecycle.transition(LoopPhase.awaitingModel(), 'Tool results recorded');
 * ```
 */
export class PhaseLifecycle extends EventEmitter<LifecycleEvents> {
  private readonly runId: UniqueId;
  private currentPhase: LoopPhase;
  private previousPhase: LoopPhase | null;
  private transitionCount: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry;

  constructor(runId?: UniqueId) {
    super();
    this.runId = runId ?? createUniqueId(uuidv4());
    this.currentPhase = LoopPhase.awaitingModel();
    this.previousPhase = null;
    this.transitionCount = 0;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = {
      phase: this.currentPhase,
      enteredAt: this.startedAt,
      exitedAt: null,
      reason: 'Run started',
    };
  }

  getState(): LifecycleState {
    return {
      runId: this.runId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      transitionCount: this.transitionCount,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentPhase(): LoopPhase {
    return this.currentPhase;
  }

  isTerminal(): boolean {
    return this.currentPhase.kind === 'terminated';
  }

  /**
   * Termination reason once terminal, otherwise null.
   */
  terminationReason(): TerminationReason | null {
    return this.currentPhase.kind === 'terminated' ? this.currentPhase.reason : null;
  }

  canTransition(target: LoopPhaseKind): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase.kind);
    return validTargets !== undefined && validTargets.includes(target);
  }

  /**
   * Transitions to a new phase.
   *
   * @throws AgentError with code INVALID_STATE if the transition is invalid
   */
  transition(target: LoopPhase, reason: string): void {
    if (!this.canTransition(target.kind)) {
      const message = this.isTerminal()
        ? `Cannot transition from terminal phase '${this.describe(this.currentPhase)}'`
        : `Invalid transition: '${this.currentPhase.kind}' → '${target.kind}'`;
      const error = new AgentError(AgentErrorCode.INVALID_STATE, message, {
        lastPhase: this.currentPhase,
        details: { attemptedTransition: target.kind },
      });
      this.emit('error', error);
      throw error;
    }

    this.exitPhase();

    const from = this.currentPhase;
    this.previousPhase = from;
    this.currentPhase = target;
    this.transitionCount++;
    this.lastTransitionAt = createTimestamp();

    this.emit('transition', from, target, reason);
    this.enterPhase(target, reason);
  }

  /**
   * Moves to `terminated(reason)`. Does nothing once terminal.
   */
  terminate(reason: TerminationReason, description: string): void {
    if (this.isTerminal()) {
      return;
    }
    this.transition(LoopPhase.terminated(reason), description);
  }

  // ============ Private Methods ============

  private enterPhase(phase: LoopPhase, reason: string): void {
    this.currentPhaseEntry = {
      phase,
      enteredAt: this.lastTransitionAt,
      exitedAt: null,
      reason,
    };

    this.emit('phase:enter', phase, {
      enteredAt: this.lastTransitionAt,
      transitionCount: this.transitionCount,
      reason,
    });
  }

  private exitPhase(): void {
    const now = createTimestamp();
    const entry = this.currentPhaseEntry;
    this.phaseHistory.push({ ...entry, exitedAt: now });

    this.emit('phase:exit', entry.phase, {
      enteredAt: entry.enteredAt,
      transitionCount: this.transitionCount,
      reason: entry.reason,
    });
  }

  private describe(phase: LoopPhase): string {
    return phase.kind === 'terminated' ? `terminated(${phase.reason})` : phase.kind;
  }
}
