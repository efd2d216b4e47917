/**
 * @fileoverview Basic usage example for the agent loop engine.
 *
 * Drives a calculator-equipped agent against a scripted provider, so it
 * runs offline. Swap `createScriptedRoundTrip` for a real provider round
 * trip to talk to a model.
 *
 * Run this example:
 *   npx tsx examples/basic-usage.ts
 */

import { z } from 'zod';
import {
  AgentExecutionController,
  AgentExecutionEngine,
  ConsoleTransport,
  ProviderError,
  ToolRegistry,
  calculatorTool,
  createLogger,
  createScriptedRoundTrip,
  isAgentError,
  loadEngineConfig,
  textResponse,
  toolUseResponse,
} from '../src/index.js';

// ============ Configuration ============

const config = loadEngineConfig();

const logger = createLogger('example', {
  minLevel: config.logLevel,
  transports: [new ConsoleTransport()],
});

const AnswerSchema = z.object({
  answer: z.number(),
  explanation: z.string(),
});

// ============ Scripted model ============

function createDemoProvider() {
  return createScriptedRoundTrip([
    toolUseResponse(
      [{ id: 'call_1', name: 'calculator', arguments: { expression: '17 * 23' } }],
      'I will use the calculator for this.',
      { inputTokens: 120, outputTokens: 24 },
    ),
    { error: ProviderError.fromStatus(429, 'Too Many Requests', { retryAfterMs: 250 }) },
    textResponse(
      JSON.stringify({ answer: 391, explanation: '17 multiplied by 23 is 391.' }),
      { inputTokens: 160, outputTokens: 18 },
    ),
  ]);
}

// ============ Main Function ============

async function runWithEngine(): Promise<void> {
  const engine = new AgentExecutionEngine(createDemoProvider(), { logger });
  engine.on('retry', (_runId, event) => {
    logger.warn(`Retry ${event.attempt}/${event.maxRetries} in ${event.delayMs}ms`, { reason: event.reason });
  });

  const run = engine.run({
    prompt: 'What is 17 * 23?',
    systemPrompt: 'You are a careful assistant. Use tools for arithmetic.',
    tools: new ToolRegistry({ logger }).register(calculatorTool),
    outputSchema: AnswerSchema,
    configuration: config.configuration,
    retry: config.retry,
  });

  for await (const step of run) {
    switch (step.type) {
      case 'thinking':
        console.log(`thinking: ${step.text}`);
        break;
      case 'toolCall':
        console.log(`tool call: ${step.name}(${step.arguments})`);
        break;
      case 'toolResult':
        console.log(`tool result: ${step.output}${step.isError ? ' (error)' : ''}`);
        break;
      case 'finalResponse':
        console.log(`answer: ${step.output.answer} - ${step.output.explanation}`);
        break;
    }
  }

  const summary = run.summary();
  console.log(`${summary.stepCount} round trips, ${summary.tokenUsage.inputTokens} input tokens`);
}

async function runWithController(): Promise<void> {
  const controller = new AgentExecutionController(createDemoProvider(), { logger });
  controller.on('phase', phase => logger.debug(`phase: ${phase.kind}`));

  for await (const step of controller.start('What is 17 * 23?', {
    tools: new ToolRegistry({ logger }).register(calculatorTool),
    outputSchema: AnswerSchema,
    configuration: { ...config.configuration, autoExecuteTools: false },
  })) {
    if (step.type === 'toolCall') {
      // stand-in for a user approving the call and running it elsewhere
      controller.supplyToolResults([{ id: step.id, output: '17 * 23 = 391' }]);
    }
  }

  console.log(`controller finished: ${controller.state}`);
}

async function main(): Promise<void> {
  logger.info('=== Agent Loop Engine Basic Usage Example ===');
  try {
    await runWithEngine();
    await runWithController();
  } catch (error) {
    if (isAgentError(error)) {
      logger.error('Run failed', { code: error.code, reason: error.reason }, error);
    } else {
      logger.error('Execution error', {}, error);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
