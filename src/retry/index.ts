/**
 * @fileoverview Retry module public exports.
 */

export * from './retry-policy.js';
export * from './rate-limit.js';
export * from './retrying-round-trip.js';
