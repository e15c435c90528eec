/**
 * Shared utilities module - exports utility functions
 */

export * from './background.js';
export * from './debug.js';
export * from './error.js';
export * from './text.js';
