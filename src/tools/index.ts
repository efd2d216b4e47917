/**
 * @fileoverview Tools module public exports.
 */

export * from './tool-registry.js';
export * from './calculator.js';
export { ExpressionError, evaluateExpression } from './expression.js';
