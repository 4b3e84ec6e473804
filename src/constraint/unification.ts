/**
 * Unification Algorithm - Most general unifier of two monotypes
 *
 * Unification finds a substitution that makes two types equal.
 * This is the heart of Hindley-Milner type inference.
 *
 * The algorithm handles:
 * - Type variables (binds them to other types)
 * - Function types (recursively unifies components)
 * - Occurs check (prevents infinite types)
 */

import type { Type, FunctionType } from '../types/index.js';
import { typeEquals } from '../types/index.js';
import type { Result } from './result.js';
import { success, failure, typeMismatch } from './result.js';
import { Substitution, bind } from './substitution.js';

/**
 * Result of a unification attempt
 */
export type UnifyResult = Result<Substitution>;

/**
 * Unify two types, returning their most general unifier.
 *
 * When both sides are variables the left one is bound, so identical input
 * always yields the identical substitution. On failure `t1` is reported as
 * the expected type and `t2` as the actual one.
 */
export function unify(t1: Type, t2: Type): UnifyResult {
  // Same type - trivially unified
  if (typeEquals(t1, t2)) {
    return success(Substitution.empty());
  }

  // Type variable on left
  if (t1.kind === 'typevar') {
    return bind(t1.id, t2);
  }

  // Type variable on right
  if (t2.kind === 'typevar') {
    return bind(t2.id, t1);
  }

  if (t1.kind === 'function' && t2.kind === 'function') {
    return unifyFunctions(t1, t2);
  }

  // Base types - must be the same variant
  if (t1.kind === t2.kind) {
    return success(Substitution.empty());
  }

  return failure(typeMismatch(t1, t2));
}

/**
 * Unify function types: parameters first, then results under the
 * parameter unifier
 */
function unifyFunctions(f1: FunctionType, f2: FunctionType): UnifyResult {
  const params = unify(f1.param, f2.param);
  if (!params.ok) {
    return params;
  }

  const s1 = params.value;
  const results = unify(s1.apply(f1.result), s1.apply(f2.result));
  if (!results.ok) {
    return results;
  }

  return success(s1.compose(results.value));
}

/**
 * Try to unify two types, returning the substitution or null on failure
 */
export function tryUnify(t1: Type, t2: Type): Substitution | null {
  const result = unify(t1, t2);
  return result.ok ? result.value : null;
}

/**
 * Check if two types are unifiable (without producing substitution)
 */
export function areUnifiable(t1: Type, t2: Type): boolean {
  return unify(t1, t2).ok;
}
