/**
 * @fileoverview Built-in calculator tool.
 *
 * @module agent-loop-engine/tools/calculator
 */

import { z } from 'zod';
import type { ToolDefinition } from '../types/tools.types.js';
import { ExpressionError, evaluateExpression } from './expression.js';

export const CalculatorInputSchema = z.object({
  expression: z.string().min(1)
    .describe('Arithmetic expression, e.g. "2 + 3 * 4", "(10 + 5) / 3" or "sqrt(16) ** 2"'),
  precision: z.number().int().min(0).max(15).default(6)
    .describe('Maximum number of decimal places in the result'),
});

export type CalculatorInput = z.infer<typeof CalculatorInputSchema>;

/**
 * Rounds to `precision` decimals and drops trailing zeros.
 */
export function formatResult(value: number, precision: number): string {
  return String(Number(value.toFixed(precision)));
}

export const calculatorTool: ToolDefinition<typeof CalculatorInputSchema> = {
  name: 'calculator',
  description:
    'Evaluates an arithmetic expression and returns the result. Supports + - * / % **, ' +
    'parentheses, sqrt, sin, cos, tan, log, abs, floor, ceil, round and the constants pi and e.',
  inputSchema: CalculatorInputSchema,
  execute: async ({ expression, precision }, context) => {
    let value: number;
    try {
      value = evaluateExpression(expression);
    } catch (error) {
      if (error instanceof ExpressionError) {
        context.logger.debug('Expression rejected', { expression, reason: error.message });
        return { output: `Cannot evaluate '${expression}': ${error.message}`, isError: true };
      }
      throw error;
    }

    if (!Number.isFinite(value)) {
      return { output: `Cannot evaluate '${expression}': result is not a finite number`, isError: true };
    }

    return `${expression} = ${formatResult(value, precision)}`;
  },
};
