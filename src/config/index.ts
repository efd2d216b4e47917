/**
 * @fileoverview Config module public exports.
 */

export * from './engine-config.js';
