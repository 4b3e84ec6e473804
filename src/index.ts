/**
 * polyinfer - Hindley-Milner type inference with let-polymorphism
 */

// Re-export type model
export * from './types/index.js';

// Re-export substitutions and unification
export * from './constraint/index.js';

// Re-export expression language
export * from './ast/index.js';

// Re-export inference driver
export * from './inference/index.js';

// Re-export parser
export * from './parser/index.js';

// Re-export output
export * from './output/index.js';
