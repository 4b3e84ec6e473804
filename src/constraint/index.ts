/**
 * Constraint solving exports: substitutions, unification, fresh variables
 */

export type {
  SourceLocation,
  UndefinedVariableError,
  TypeMismatchError,
  OccursCheckError,
  InferenceTooComplexError,
  InferenceError,
  InferenceErrorKind,
  Result,
} from './result.js';

export {
  success,
  failure,
  undefinedVariable,
  typeMismatch,
  occursCheckFailure,
  inferenceTooComplex,
  withLocation,
} from './result.js';

export {
  Substitution,
  composeAll,
  bind,
} from './substitution.js';

export type { UnifyResult } from './unification.js';
export { unify, tryUnify, areUnifiable } from './unification.js';

export { TypeVarSupply, typeVarName } from './type-variable.js';
