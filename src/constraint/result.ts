/**
 * Error taxonomy and result values
 *
 * Every operation that can fail returns a Result. The first error aborts
 * the enclosing inference call and reaches the caller unchanged.
 */

import type { Type, TypeVarId } from '../types/index.js';

// ============================================================================
// Source Location
// ============================================================================

/**
 * Source location for error reporting
 */
export interface SourceLocation {
  /** Line number (1-indexed) */
  readonly line: number;
  /** Column number (0-indexed) */
  readonly column: number;
}

// ============================================================================
// Inference Errors
// ============================================================================

/**
 * A variable node references a name absent from the environment
 */
export interface UndefinedVariableError {
  readonly kind: 'undefined-variable';
  readonly name: string;
  readonly loc?: SourceLocation;
}

/**
 * Unification reached incompatible base types or mismatched shapes
 */
export interface TypeMismatchError {
  readonly kind: 'type-mismatch';
  readonly expected: Type;
  readonly actual: Type;
  readonly loc?: SourceLocation;
}

/**
 * Unification would require an infinite type
 */
export interface OccursCheckError {
  readonly kind: 'occurs-check-failure';
  readonly variable: TypeVarId;
  readonly type: Type;
  readonly loc?: SourceLocation;
}

/**
 * A caller-imposed resource ceiling was exceeded
 */
export interface InferenceTooComplexError {
  readonly kind: 'inference-too-complex';
  readonly limit: 'depth' | 'steps';
  readonly max: number;
  readonly loc?: SourceLocation;
}

export type InferenceError =
  | UndefinedVariableError
  | TypeMismatchError
  | OccursCheckError
  | InferenceTooComplexError
  ;

export type InferenceErrorKind = InferenceError['kind'];

// ============================================================================
// Results
// ============================================================================

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: InferenceError }
  ;

/**
 * Create a successful result
 */
export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Create a failed result
 */
export function failure<T>(error: InferenceError): Result<T> {
  return { ok: false, error };
}

// ============================================================================
// Error Constructors
// ============================================================================

export function undefinedVariable(name: string): UndefinedVariableError {
  return { kind: 'undefined-variable', name };
}

export function typeMismatch(expected: Type, actual: Type): TypeMismatchError {
  return { kind: 'type-mismatch', expected, actual };
}

export function occursCheckFailure(variable: TypeVarId, type: Type): OccursCheckError {
  return { kind: 'occurs-check-failure', variable, type };
}

export function inferenceTooComplex(limit: 'depth' | 'steps', max: number): InferenceTooComplexError {
  return { kind: 'inference-too-complex', limit, max };
}

/**
 * Attach a location to an error that does not carry one yet
 */
export function withLocation(error: InferenceError, loc: SourceLocation | undefined): InferenceError {
  if (!loc || error.loc) {
    return error;
  }
  return { ...error, loc };
}
