/**
 * Type Inference Context
 *
 * One context per inference session. The context maintains:
 * - The fresh type variable supply
 * - Traversal depth and step counters, checked against the configured limits
 * - The optional trace sink
 *
 * The typing environment is not stored here; the driver passes it down
 * explicitly so every subexpression sees its own persistent copy.
 */

import type { Type, TypeVar, PolyType, TypeEnv } from '../types/index.js';
import type { InferenceError, Substitution, UnifyResult } from '../constraint/index.js';
import { TypeVarSupply, unify, inferenceTooComplex } from '../constraint/index.js';
import { generalize, instantiateType } from './scheme.js';

// ============================================================================
// Options
// ============================================================================

/**
 * Diagnostic events emitted while inferring
 */
export type TraceEvent =
  | { readonly kind: 'unify'; readonly left: Type; readonly right: Type; readonly substitution: Substitution }
  | { readonly kind: 'unify-failed'; readonly left: Type; readonly right: Type; readonly error: InferenceError }
  | { readonly kind: 'instantiate'; readonly name: string; readonly scheme: PolyType; readonly type: Type }
  | { readonly kind: 'generalize'; readonly name: string; readonly scheme: PolyType }
  ;

export type TraceSink = (event: TraceEvent) => void;

export interface InferOptions {
  /** Maximum nesting depth of the expression traversal */
  maxDepth?: number;
  /** Maximum number of expression nodes visited in one session */
  maxSteps?: number;
  /** Receives diagnostic events (silent when absent) */
  trace?: TraceSink;
}

export const DEFAULT_INFER_OPTIONS: Readonly<Required<Omit<InferOptions, 'trace'>>> = Object.freeze({
  maxDepth: 1000,
  maxSteps: 100_000,
});

// ============================================================================
// Inference Context
// ============================================================================

export class InferenceContext {
  /** Fresh type variables for this session only */
  readonly supply: TypeVarSupply;

  private readonly maxDepth: number;
  private readonly maxSteps: number;
  private readonly trace: TraceSink | undefined;

  private depth = 0;
  private steps = 0;

  /**
   * Fresh IDs start past every ID already used by the initial environment
   */
  constructor(env: TypeEnv, options: InferOptions = {}) {
    this.supply = new TypeVarSupply(env.maxTypeVarId() + 1);
    this.maxDepth = options.maxDepth ?? DEFAULT_INFER_OPTIONS.maxDepth;
    this.maxSteps = options.maxSteps ?? DEFAULT_INFER_OPTIONS.maxSteps;
    this.trace = options.trace;
  }

  /**
   * Enter an expression node. Returns the limit error when a ceiling is
   * exceeded; the caller must still call `leave()`.
   */
  enter(): InferenceError | null {
    this.depth++;
    this.steps++;
    if (this.depth > this.maxDepth) {
      return inferenceTooComplex('depth', this.maxDepth);
    }
    if (this.steps > this.maxSteps) {
      return inferenceTooComplex('steps', this.maxSteps);
    }
    return null;
  }

  leave(): void {
    this.depth--;
  }

  fresh(): TypeVar {
    return this.supply.fresh();
  }

  /**
   * Unify, reporting the outcome to the trace sink
   */
  unify(left: Type, right: Type): UnifyResult {
    const result = unify(left, right);
    if (this.trace) {
      this.trace(result.ok
        ? { kind: 'unify', left, right, substitution: result.value }
        : { kind: 'unify-failed', left, right, error: result.error });
    }
    return result;
  }

  instantiate(name: string, scheme: PolyType): Type {
    const type = instantiateType(scheme, this.supply);
    this.trace?.({ kind: 'instantiate', name, scheme, type });
    return type;
  }

  generalize(name: string, type: Type, env: TypeEnv): PolyType {
    const scheme = generalize(type, env);
    this.trace?.({ kind: 'generalize', name, scheme });
    return scheme;
  }
}
