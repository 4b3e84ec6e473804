/**
 * Type factory functions and structural queries
 */

import type {
  Type,
  TypeVar,
  TypeVarId,
  BoolType,
  IntType,
  UnitType,
  FunctionType,
  PolyType,
} from './types.js';

// Singleton base types (only need one instance)
const boolSingleton: BoolType = { kind: 'bool' };
const intSingleton: IntType = { kind: 'int' };
const unitSingleton: UnitType = { kind: 'unit' };

/**
 * Type factory
 */
export const Types = {
  bool: boolSingleton,
  int: intSingleton,
  unit: unitSingleton,

  fn(param: Type, result: Type): FunctionType {
    return { kind: 'function', param, result };
  },

  /**
   * Curried function type: fnN([a, b], c) = a → b → c
   */
  fnN(params: readonly Type[], result: Type): Type {
    return params.reduceRight<Type>((acc, param) => Types.fn(param, acc), result);
  },

  typeVar(id: TypeVarId): TypeVar {
    return { kind: 'typevar', id };
  },
} as const;

// ============================================================================
// Schemes
// ============================================================================

/**
 * Create a type scheme ∀vars.body
 *
 * Variables that do not occur free in the body are dropped.
 */
export function forall(vars: Iterable<TypeVarId>, body: Type): PolyType {
  const bodyFree = freeVars(body);
  const quantified = new Set<TypeVarId>();
  for (const id of vars) {
    if (bodyFree.has(id)) {
      quantified.add(id);
    }
  }
  return { kind: 'forall', vars: quantified, body };
}

/**
 * Create a monomorphic scheme (no quantified variables).
 * Used for λ-bound variables.
 */
export function monoScheme(type: Type): PolyType {
  return { kind: 'forall', vars: new Set(), body: type };
}

// ============================================================================
// Free Variables
// ============================================================================

/**
 * Free type variables of a monotype
 */
export function freeVars(type: Type): Set<TypeVarId> {
  const result = new Set<TypeVarId>();
  collectFreeVars(type, result);
  return result;
}

function collectFreeVars(type: Type, into: Set<TypeVarId>): void {
  switch (type.kind) {
    case 'typevar':
      into.add(type.id);
      return;
    case 'function':
      collectFreeVars(type.param, into);
      collectFreeVars(type.result, into);
      return;
    case 'bool':
    case 'int':
    case 'unit':
      return;
  }
}

/**
 * Free type variables of a scheme: freeVars(body) \ vars
 */
export function freeVarsInScheme(scheme: PolyType): Set<TypeVarId> {
  const result = freeVars(scheme.body);
  for (const id of scheme.vars) {
    result.delete(id);
  }
  return result;
}

/**
 * Does the type variable occur anywhere in the type?
 */
export function occursIn(id: TypeVarId, type: Type): boolean {
  switch (type.kind) {
    case 'typevar':
      return type.id === id;
    case 'function':
      return occursIn(id, type.param) || occursIn(id, type.result);
    case 'bool':
    case 'int':
    case 'unit':
      return false;
  }
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality of monotypes
 */
export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'typevar':
      return b.kind === 'typevar' && a.id === b.id;
    case 'function':
      return b.kind === 'function' && typeEquals(a.param, b.param) && typeEquals(a.result, b.result);
    case 'bool':
    case 'int':
    case 'unit':
      return a.kind === b.kind;
  }
}
