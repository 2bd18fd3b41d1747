/**
 * Backlog type exports.
 */

export * from './exit-codes.js';
export * from './task.js';
export * from './session.js';
export * from './config.js';
export * from './learning.js';
