/**
 * CSP Engine - Library Entry Point
 *
 * Exports the data model, solvers and problem helpers. Nothing here writes
 * to the console.
 */

// Data model
export * from './csp/index.js';

// Solvers, strategies and listeners
export * from './solvers/index.js';

// Example problems and problem files
export * from './problems/index.js';

// Types, errors and defaults
export * from './types/index.js';

// Utilities
export { createSeededRandom, resolveRandom, pickRandom } from './utils/random.js';
export type { RandomSource } from './utils/random.js';
export { describeStep, describeOutcome, describeError } from './utils/formatting.js';
