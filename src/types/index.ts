/**
 * @fileoverview Type exports.
 *
 * @module agent-loop-engine/types
 * @version 0.1.0
 */

export * from './core.types.js';
export * from './provider.types.js';
export * from './tools.types.js';
