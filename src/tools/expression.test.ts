/**
 * @fileoverview Unit tests for the expression evaluator
 */

import { describe, it, expect } from 'vitest';
import { ExpressionError, evaluateExpression } from './expression.js';

describe('evaluateExpression()', () => {
  it.each([
    ['2 + 3 * 4', 14],
    ['(10 + 5) / 3', 5],
    ['25 * 9 / 5 + 32', 77],
    ['10 % 4', 2],
    ['2 ** 3 ** 2', 512],
    ['-2 ** 2', -4],
    ['2 ** -1', 0.5],
    ['--3', 3],
    ['sqrt(16) + abs(-2)', 6],
    ['floor(2.7) + ceil(2.2) + round(2.5)', 8],
    ['1.5e3 / .5', 3000],
  ])('should evaluate %s', (source, expected) => {
    expect(evaluateExpression(source)).toBe(expected);
  });

  it('should know the constants', () => {
    expect(evaluateExpression('pi')).toBe(Math.PI);
    expect(evaluateExpression('log(e)')).toBe(1);
    expect(evaluateExpression('cos(0) + sin(0) + tan(0)')).toBe(1);
  });

  it('should reject division by zero', () => {
    expect(() => evaluateExpression('1 / (2 - 2)')).toThrow(new ExpressionError('Division by zero', 2));
    expect(() => evaluateExpression('5 % 0')).toThrow('Division by zero');
  });

  it('should reject malformed input', () => {
    expect(() => evaluateExpression('2 +')).toThrow('Unexpected end of expression');
    expect(() => evaluateExpression('(1 + 2')).toThrow("Expected ')' at position 6");
    expect(() => evaluateExpression('2 $ 3')).toThrow("Unexpected character '$' at position 2");
    expect(() => evaluateExpression('foo(1)')).toThrow("Unknown identifier 'foo'");
    expect(() => evaluateExpression('hasOwnProperty(1)')).toThrow("Unknown identifier 'hasownproperty'");
    expect(() => evaluateExpression('1 2')).toThrow('Unexpected token at position 2');
  });
});
