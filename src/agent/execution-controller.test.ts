/**
 * @fileoverview Unit tests for AgentExecutionController
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { AgentExecutionController } from './execution-controller.js';
import { AgentError, AgentErrorCode } from './errors.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { calculatorTool } from '../tools/calculator.js';
import { createScriptedRoundTrip, textResponse, toolUseResponse } from '../providers/index.js';
import type { AgentStep, LoopPhase } from '../types/index.js';

const AnswerSchema = z.object({ answer: z.number() });

function calculatorScript() {
  return createScriptedRoundTrip([
    toolUseResponse([{ id: 'c1', name: 'calculator', arguments: { expression: '6 * 7' } }]),
    textResponse('{"answer":42}'),
  ]);
}

async function collectSteps(iterable: AsyncIterable<AgentStep>): Promise<AgentStep[]> {
  const steps: AgentStep[] = [];
  for await (const step of iterable) {
    steps.push(step);
  }
  return steps;
}

describe('AgentExecutionController', () => {
  it('should start idle', () => {
    const controller = new AgentExecutionController(calculatorScript());

    expect(controller.state).toBe('idle');
    expect(controller.isRunning).toBe(false);
    expect(controller.currentPhase()).toBeNull();
    expect(controller.steps).toEqual([]);
  });

  it('should run to completion and report the output', async () => {
    const controller = new AgentExecutionController(calculatorScript());
    const complete = vi.fn();
    controller.on('complete', complete);

    const steps = await collectSteps(controller.start('What is 6 * 7?', {
      tools: new ToolRegistry().register(calculatorTool),
      outputSchema: AnswerSchema,
    }));

    expect(steps.map(step => step.type)).toEqual(['toolCall', 'toolResult', 'finalResponse']);
    expect(steps[2]).toEqual({ type: 'finalResponse', output: { answer: 42 } });
    expect(controller.state).toBe('completed');
    expect(controller.isRunning).toBe(false);
    expect(controller.currentPhase()).toEqual({ kind: 'terminated', reason: 'completed' });
    expect(complete).toHaveBeenCalledWith({ answer: 42 }, expect.objectContaining({ stepCount: 2 }));
  });

  it('should replay every step to each iterator', async () => {
    const controller = new AgentExecutionController(calculatorScript());
    const iterable = controller.start('What is 6 * 7?', {
      tools: new ToolRegistry().register(calculatorTool),
      outputSchema: AnswerSchema,
    });

    const [first, second] = await Promise.all([collectSteps(iterable), collectSteps(iterable)]);

    expect(first).toHaveLength(3);
    expect(second).toEqual(first);
    expect(controller.steps).toEqual(first);
  });

  it('should forward steps and phases as events', async () => {
    const controller = new AgentExecutionController(calculatorScript());
    const stepTypes: string[] = [];
    const phases: LoopPhase['kind'][] = [];
    controller.on('step', step => stepTypes.push(step.type));
    controller.on('phase', phase => phases.push(phase.kind));

    controller.start('What is 6 * 7?', {
      tools: new ToolRegistry().register(calculatorTool),
      outputSchema: AnswerSchema,
    });
    await controller.settled();

    expect(stepTypes).toEqual(['toolCall', 'toolResult', 'finalResponse']);
    expect(phases).toEqual(['executingTools', 'awaitingModel', 'terminated']);
  });

  it('should refuse a second run while one is active', async () => {
    const controller = new AgentExecutionController(calculatorScript());
    controller.start('First', { tools: new ToolRegistry().register(calculatorTool), outputSchema: AnswerSchema });

    expect(() => controller.start('Second', { outputSchema: AnswerSchema })).toThrow(AgentError);
    expect(() => controller.start('Second', { outputSchema: AnswerSchema })).toThrow('A run is already in progress');

    await controller.settled();
  });

  it('should allow a new run after the previous one finished', async () => {
    const provider = createScriptedRoundTrip([textResponse('{"answer":1}'), textResponse('{"answer":2}')]);
    const controller = new AgentExecutionController(provider);

    await collectSteps(controller.start('One', { outputSchema: AnswerSchema }));
    const steps = await collectSteps(controller.start('Two', { outputSchema: AnswerSchema }));

    expect(steps).toEqual([{ type: 'finalResponse', output: { answer: 2 } }]);
    expect(controller.steps).toEqual(steps);
  });

  it('should surface failures to iterators and listeners', async () => {
    const controller = new AgentExecutionController(createScriptedRoundTrip([textResponse('')]));
    const onError = vi.fn();
    controller.on('error', onError);

    const iterable = controller.start('Hello', { outputSchema: AnswerSchema });
    const error = await collectSteps(iterable).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: AgentErrorCode.PROVIDER_ERROR, message: 'Provider returned an empty response' });
    expect(onError).toHaveBeenCalledWith(error);
    expect(controller.state).toBe('failed');
    expect(controller.error).toBe(error);
  });

  it('should cancel the active run', async () => {
    const provider = createScriptedRoundTrip([
      toolUseResponse([{ id: 'c1', name: 'calculator', arguments: { expression: '1 + 1' } }]),
      textResponse('{"answer":2}'),
    ]);
    const controller = new AgentExecutionController(provider);
    controller.on('step', step => {
      if (step.type === 'toolCall') {
        controller.cancel();
      }
    });

    controller.start('Add', {
      tools: new ToolRegistry().register(calculatorTool),
      outputSchema: AnswerSchema,
      configuration: { autoExecuteTools: false },
    });
    await controller.settled();

    expect(controller.state).toBe('cancelled');
    expect(controller.error).toMatchObject({ code: AgentErrorCode.CANCELLED });
    expect(controller.currentPhase()).toEqual({ kind: 'terminated', reason: 'cancelled' });
    expect(provider.requests).toHaveLength(1);
  });

  it('should pass supplied tool results to the run', async () => {
    const provider = createScriptedRoundTrip([
      toolUseResponse([{ id: 'c1', name: 'calculator', arguments: { expression: '1 + 1' } }]),
      textResponse('{"answer":2}'),
    ]);
    const controller = new AgentExecutionController(provider);
    controller.on('step', step => {
      if (step.type === 'toolCall') {
        controller.supplyToolResults([{ id: step.id, output: '1 + 1 = 2' }]);
      }
    });

    const steps = await collectSteps(controller.start('Add', {
      tools: new ToolRegistry().register(calculatorTool),
      outputSchema: AnswerSchema,
      configuration: { autoExecuteTools: false },
    }));

    expect(steps[1]).toEqual({ type: 'toolResult', id: 'c1', name: 'calculator', output: '1 + 1 = 2', isError: false });
    expect(controller.state).toBe('completed');
  });

  it('should reject tool results without an active run', () => {
    const controller = new AgentExecutionController(calculatorScript());

    expect(() => controller.supplyToolResults([{ id: 'c1', output: 'x' }])).toThrow('No run is active');
  });

  it('should forget the last run on reset', async () => {
    const controller = new AgentExecutionController(createScriptedRoundTrip([textResponse('{"answer":1}')]));
    await collectSteps(controller.start('One', { outputSchema: AnswerSchema }));

    controller.reset();

    expect(controller.state).toBe('idle');
    expect(controller.steps).toEqual([]);
    expect(controller.currentPhase()).toBeNull();
    expect(controller.error).toBeNull();
  });
});
