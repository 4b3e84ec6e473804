/**
 * Core type definitions for Hindley-Milner inference.
 *
 * Monotypes are a closed tagged union over the base types, function types
 * and type variables. Polytypes (type schemes) quantify over a set of
 * type variable IDs.
 */

/** Unique ID of a type variable within one inference session */
export type TypeVarId = number;

// ============================================================================
// Monotypes
// ============================================================================

export interface BoolType {
  readonly kind: 'bool';
}

export interface IntType {
  readonly kind: 'int';
}

export interface UnitType {
  readonly kind: 'unit';
}

/**
 * Function type: param → result
 */
export interface FunctionType {
  readonly kind: 'function';
  readonly param: Type;
  readonly result: Type;
}

/**
 * Placeholder for an unknown type, solved by unification
 */
export interface TypeVar {
  readonly kind: 'typevar';
  readonly id: TypeVarId;
}

/** Nullary base types */
export type BaseType = BoolType | IntType | UnitType;

/**
 * Monotype: contains no quantified variables
 */
export type Type = BaseType | FunctionType | TypeVar;

export type TypeKind = Type['kind'];

// ============================================================================
// Polytypes
// ============================================================================

/**
 * Type scheme ∀vars.body
 *
 * `vars` is always a subset of the free variables of `body`.
 */
export interface PolyType {
  readonly kind: 'forall';
  readonly vars: ReadonlySet<TypeVarId>;
  readonly body: Type;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isTypeVar(type: Type): type is TypeVar {
  return type.kind === 'typevar';
}

export function isFunction(type: Type): type is FunctionType {
  return type.kind === 'function';
}

export function isBaseType(type: Type): type is BaseType {
  return type.kind === 'bool' || type.kind === 'int' || type.kind === 'unit';
}
