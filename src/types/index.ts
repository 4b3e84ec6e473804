/**
 * Type model exports
 */

export type {
  TypeVarId,
  BoolType,
  IntType,
  UnitType,
  FunctionType,
  TypeVar,
  BaseType,
  Type,
  TypeKind,
  PolyType,
} from './types.js';

export { isTypeVar, isFunction, isBaseType } from './types.js';

export {
  Types,
  forall,
  monoScheme,
  freeVars,
  freeVarsInScheme,
  occursIn,
  typeEquals,
} from './factory.js';

export { TypeEnv, freeVarsInEnv } from './environment.js';
