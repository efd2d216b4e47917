/**
 * @fileoverview Termination policies consulted after every tool round.
 *
 * A policy looks at the run so far and either lets it continue or stops it
 * with a termination reason and error code. Policies compose: the first
 * one that stops wins.
 *
 * @module agent-loop-engine/agent/termination-policy
 * @version 0.1.0
 */

import type { TerminationReason } from '../types/core.types.js';
import type { TerminationContext } from './agent-context.js';
import { AgentErrorCode } from './errors.js';

export type TerminationDecision =
  | { readonly action: 'continue' }
  | {
      readonly action: 'stop';
      readonly reason: TerminationReason;
      readonly code: AgentErrorCode;
      readonly detail: string;
    };

export interface TerminationPolicy {
  readonly name: string;
  decide(context: TerminationContext): TerminationDecision;
}

const CONTINUE: TerminationDecision = { action: 'continue' };

/**
 * Stops once the step budget is spent.
 */
export class StandardTerminationPolicy implements TerminationPolicy {
  readonly name = 'standard';

  decide(context: TerminationContext): TerminationDecision {
    const { maxSteps } = context.configuration;
    if (context.stepCount >= maxSteps) {
      return {
        action: 'stop',
        reason: 'maxStepsExceeded',
        code: AgentErrorCode.MAX_STEPS_EXCEEDED,
        detail: `Reached the limit of ${maxSteps} model round trips`,
      };
    }
    return CONTINUE;
  }
}

/**
 * Stops a run that keeps calling the same tool.
 *
 * - the same tool with the same canonical arguments more than
 *   `maxDuplicateToolCalls` times
 * - any one tool more than `maxToolCallsPerTool` times, when set
 */
export class DuplicateDetectionPolicy implements TerminationPolicy {
  readonly name = 'duplicateDetection';

  decide(context: TerminationContext): TerminationDecision {
    const { maxDuplicateToolCalls, maxToolCallsPerTool } = context.configuration;

    for (const entry of context.duplicateCounts()) {
      if (entry.count > maxDuplicateToolCalls) {
        return {
          action: 'stop',
          reason: 'duplicateCallsDetected',
          code: AgentErrorCode.DUPLICATE_CALLS_DETECTED,
          detail: `Tool '${entry.name}' was called ${entry.count} times with arguments ${entry.canonicalArguments}`,
        };
      }
    }

    if (maxToolCallsPerTool !== null) {
      for (const [name, total] of context.toolTotals()) {
        if (total > maxToolCallsPerTool) {
          return {
            action: 'stop',
            reason: 'duplicateCallsDetected',
            code: AgentErrorCode.TOOL_CALL_LIMIT_REACHED,
            detail: `Tool '${name}' was called ${total} times (limit ${maxToolCallsPerTool})`,
          };
        }
      }
    }

    return CONTINUE;
  }
}

/**
 * Evaluates policies in order and returns the first stop.
 */
export class CompositeTerminationPolicy implements TerminationPolicy {
  readonly name: string;
  private readonly policies: ReadonlyArray<TerminationPolicy>;

  constructor(policies: ReadonlyArray<TerminationPolicy>) {
    this.policies = policies;
    this.name = `composite(${policies.map(policy => policy.name).join(',')})`;
  }

  decide(context: TerminationContext): TerminationDecision {
    for (const policy of this.policies) {
      const decision = policy.decide(context);
      if (decision.action === 'stop') {
        return decision;
      }
    }
    return CONTINUE;
  }
}

export function createDefaultTerminationPolicy(): TerminationPolicy {
  return new CompositeTerminationPolicy([
    new DuplicateDetectionPolicy(),
    new StandardTerminationPolicy(),
  ]);
}
