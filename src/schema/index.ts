/**
 * Schema module.
 * Zod schemas and inferred types for every shape that crosses a boundary.
 */

export * from './message.js';
export * from './completion.js';
export * from './evaluation.js';
export * from './config.js';
