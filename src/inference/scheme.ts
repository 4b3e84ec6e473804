/**
 * Type schemes for let-polymorphism
 *
 * A let-bound definition is generalized over the variables its type does
 * not share with the enclosing environment; each use of the name then
 * instantiates those variables afresh.
 */

import type { Type, TypeVar, TypeVarId, PolyType, TypeEnv } from '../types/index.js';
import { freeVars, freeVarsInEnv } from '../types/index.js';
import type { TypeVarSupply } from '../constraint/index.js';
import { Substitution } from '../constraint/index.js';

// ============================================================================
// Generalization
// ============================================================================

/**
 * Generalize a type to a polymorphic scheme
 *
 * Quantifies all type variables that are:
 * 1. Free in the type
 * 2. NOT free in the environment
 *
 * A variable still pinned by an enclosing λ-binder stays monomorphic.
 */
export function generalize(type: Type, env: TypeEnv): PolyType {
  const envFree = freeVarsInEnv(env);
  const quantified = new Set<TypeVarId>();

  for (const id of freeVars(type)) {
    if (!envFree.has(id)) {
      quantified.add(id);
    }
  }

  return { kind: 'forall', vars: quantified, body: type };
}

// ============================================================================
// Instantiation
// ============================================================================

/**
 * Result of instantiating a scheme
 */
export interface InstantiationResult {
  /** The instantiated type */
  readonly type: Type;
  /** Mapping from quantified variable IDs to their fresh replacements */
  readonly renaming: ReadonlyMap<TypeVarId, TypeVar>;
}

/**
 * Instantiate a polymorphic scheme with fresh type variables.
 *
 * All quantified variables are replaced simultaneously, so fresh IDs that
 * happen to equal another quantified ID are not renamed twice.
 */
export function instantiate(scheme: PolyType, supply: TypeVarSupply): InstantiationResult {
  if (scheme.vars.size === 0) {
    return { type: scheme.body, renaming: new Map() };
  }

  const renaming = new Map<TypeVarId, TypeVar>();
  for (const id of scheme.vars) {
    renaming.set(id, supply.fresh());
  }

  const type = Substitution.from(renaming).apply(scheme.body);
  return { type, renaming };
}

/**
 * Instantiate a scheme, returning only the type
 */
export function instantiateType(scheme: PolyType, supply: TypeVarSupply): Type {
  return instantiate(scheme, supply).type;
}
