/**
 * Hindley-Milner Type Inference
 *
 * Key components:
 * - Generalization / instantiation of type schemes
 * - Per-session inference context (fresh variables, limits, tracing)
 * - Algorithm W driver over the expression language
 * - Prelude of operator bindings
 */

export type { InstantiationResult } from './scheme.js';
export { generalize, instantiate, instantiateType } from './scheme.js';

export type { InferOptions, TraceEvent, TraceSink } from './context.js';
export { InferenceContext, DEFAULT_INFER_OPTIONS } from './context.js';

export type { Inferred, InferredBinding, ProgramInference } from './infer.js';
export { inferExpression, inferProgram, typeOf } from './infer.js';

export { createPrelude, PRELUDE, NEGATE } from './builtins.js';
