/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './errors.js';
export * from './scripted.js';
