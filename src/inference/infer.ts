/**
 * Inference Driver - algorithm W
 *
 * Syntax-directed traversal of the expression tree. Each rule returns the
 * node's type together with the substitution it discovered; the driver
 * applies the accumulated substitution to the environment before visiting
 * a sibling, so earlier unification decisions are visible downstream.
 *
 * The first error aborts the traversal and is returned unchanged.
 */

import type { Type, PolyType } from '../types/index.js';
import { Types, TypeEnv, monoScheme } from '../types/index.js';
import type { Result } from '../constraint/index.js';
import {
  Substitution,
  composeAll,
  success,
  failure,
  undefinedVariable,
  withLocation,
} from '../constraint/index.js';
import type {
  Expression,
  LiteralValue,
  LambdaExpr,
  AppExpr,
  LetExpr,
  LetRecExpr,
  IfExpr,
  Declaration,
  Program,
} from '../ast/index.js';
import type { InferOptions } from './context.js';
import { InferenceContext } from './context.js';

// ============================================================================
// Results
// ============================================================================

/**
 * Type of an expression plus the substitution discovered while inferring it
 */
export interface Inferred {
  readonly type: Type;
  readonly substitution: Substitution;
}

/**
 * Type scheme assigned to a top-level declaration
 */
export interface InferredBinding {
  readonly name: string;
  readonly scheme: PolyType;
}

export interface ProgramInference {
  /** Schemes of the top-level declarations, in source order */
  readonly bindings: readonly InferredBinding[];
  /** The input environment extended with every declaration */
  readonly env: TypeEnv;
  /** Type of the final expression, when the program has one */
  readonly type?: Type;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Infer the principal type of an expression
 */
export function inferExpression(
  expr: Expression,
  env: TypeEnv = TypeEnv.empty(),
  options: InferOptions = {}
): Result<Inferred> {
  const ctx = new InferenceContext(env, options);
  return infer(ctx, env, expr);
}

/**
 * Infer the principal type of an expression, discarding the substitution
 */
export function typeOf(
  expr: Expression,
  env: TypeEnv = TypeEnv.empty(),
  options: InferOptions = {}
): Result<Type> {
  const result = inferExpression(expr, env, options);
  return result.ok ? success(result.value.type) : result;
}

/**
 * Infer a program: each declaration is generalized and added to the
 * environment seen by the following declarations and the final expression.
 * All of them share one session, so type variable IDs never collide.
 */
export function inferProgram(
  program: Program,
  env: TypeEnv = TypeEnv.empty(),
  options: InferOptions = {}
): Result<ProgramInference> {
  const ctx = new InferenceContext(env, options);
  const bindings: InferredBinding[] = [];
  let current = env;

  for (const decl of program.declarations) {
    const bound = inferDeclaration(ctx, current, decl);
    if (!bound.ok) {
      return failure(withLocation(bound.error, decl.loc));
    }
    current = bound.value.env.extend(decl.name, bound.value.scheme);
    bindings.push({ name: decl.name, scheme: bound.value.scheme });
  }

  if (!program.body) {
    return success({ bindings, env: current });
  }

  const body = infer(ctx, current, program.body);
  if (!body.ok) {
    return body;
  }
  return success({ bindings, env: current, type: body.value.type });
}

// ============================================================================
// Traversal
// ============================================================================

function infer(ctx: InferenceContext, env: TypeEnv, expr: Expression): Result<Inferred> {
  try {
    const limit = ctx.enter();
    if (limit) {
      return failure(withLocation(limit, expr.loc));
    }

    const result = inferNode(ctx, env, expr);
    return result.ok ? result : failure(withLocation(result.error, expr.loc));
  } finally {
    ctx.leave();
  }
}

function inferNode(ctx: InferenceContext, env: TypeEnv, expr: Expression): Result<Inferred> {
  switch (expr.kind) {
    case 'literal':
      return success({ type: literalType(expr.value), substitution: Substitution.empty() });

    case 'var': {
      const scheme = env.lookup(expr.name);
      if (!scheme) {
        return failure(undefinedVariable(expr.name));
      }
      return success({ type: ctx.instantiate(expr.name, scheme), substitution: Substitution.empty() });
    }

    case 'lambda':
      return inferLambda(ctx, env, expr);

    case 'app':
      return inferApp(ctx, env, expr);

    case 'let':
    case 'letrec':
      return inferLet(ctx, env, expr);

    case 'if':
      return inferIf(ctx, env, expr);
  }
}

function literalType(literal: LiteralValue): Type {
  switch (literal.type) {
    case 'bool':
      return Types.bool;
    case 'int':
      return Types.int;
    case 'unit':
      return Types.unit;
  }
}

/**
 * λx.e : the parameter is bound monomorphically to its fixed type or to a
 * fresh variable
 */
function inferLambda(ctx: InferenceContext, env: TypeEnv, expr: LambdaExpr): Result<Inferred> {
  const paramType: Type = expr.paramType ?? ctx.fresh();
  const body = infer(ctx, env.extend(expr.param, monoScheme(paramType)), expr.body);
  if (!body.ok) {
    return body;
  }

  const { type: bodyType, substitution } = body.value;
  return success({
    type: Types.fn(substitution.apply(paramType), bodyType),
    substitution,
  });
}

/**
 * f a : unify the callee with (argument type → fresh result)
 */
function inferApp(ctx: InferenceContext, env: TypeEnv, expr: AppExpr): Result<Inferred> {
  const fn = infer(ctx, env, expr.fn);
  if (!fn.ok) {
    return fn;
  }
  const s1 = fn.value.substitution;

  const arg = infer(ctx, s1.applyToEnv(env), expr.arg);
  if (!arg.ok) {
    return arg;
  }
  const s2 = arg.value.substitution;

  const resultType = ctx.fresh();
  const unified = ctx.unify(s2.apply(fn.value.type), Types.fn(arg.value.type, resultType));
  if (!unified.ok) {
    return unified;
  }
  const s3 = unified.value;

  return success({
    type: s3.apply(resultType),
    substitution: composeAll(s1, s2, s3),
  });
}

/**
 * let / letrec: generalize the bound value, then infer the body with it
 */
function inferLet(ctx: InferenceContext, env: TypeEnv, expr: LetExpr | LetRecExpr): Result<Inferred> {
  const bound = inferBinding(ctx, env, expr.kind, expr.name, expr.value);
  if (!bound.ok) {
    return bound;
  }

  const { scheme, env: outer, substitution: s1 } = bound.value;
  const body = infer(ctx, outer.extend(expr.name, scheme), expr.body);
  if (!body.ok) {
    return body;
  }

  return success({
    type: body.value.type,
    substitution: s1.compose(body.value.substitution),
  });
}

/**
 * if c then a else b : c must be Bool, both branches must agree
 */
function inferIf(ctx: InferenceContext, env: TypeEnv, expr: IfExpr): Result<Inferred> {
  const test = infer(ctx, env, expr.test);
  if (!test.ok) {
    return test;
  }
  const s1 = test.value.substitution;

  const isBool = ctx.unify(Types.bool, test.value.type);
  if (!isBool.ok) {
    return failure(withLocation(isBool.error, expr.test.loc));
  }
  const s2 = isBool.value;
  const afterTest = s1.compose(s2).applyToEnv(env);

  const consequent = infer(ctx, afterTest, expr.consequent);
  if (!consequent.ok) {
    return consequent;
  }
  const s3 = consequent.value.substitution;

  const alternate = infer(ctx, s3.applyToEnv(afterTest), expr.alternate);
  if (!alternate.ok) {
    return alternate;
  }
  const s4 = alternate.value.substitution;

  const branches = ctx.unify(s4.apply(consequent.value.type), alternate.value.type);
  if (!branches.ok) {
    return branches;
  }
  const s5 = branches.value;

  return success({
    type: s5.apply(alternate.value.type),
    substitution: composeAll(s1, s2, s3, s4, s5),
  });
}

// ============================================================================
// Bindings
// ============================================================================

interface BoundValue {
  readonly scheme: PolyType;
  /** The outer environment with the binding's substitution applied */
  readonly env: TypeEnv;
  readonly substitution: Substitution;
}

/**
 * Infer and generalize the value of a binding.
 *
 * For `letrec` the name is in scope inside its own value, bound
 * monomorphically to a fresh variable that is unified with the value's
 * type before generalizing.
 */
function inferBinding(
  ctx: InferenceContext,
  env: TypeEnv,
  kind: 'let' | 'letrec',
  name: string,
  valueExpr: Expression
): Result<BoundValue> {
  if (kind === 'let') {
    const value = infer(ctx, env, valueExpr);
    if (!value.ok) {
      return value;
    }
    const { type, substitution } = value.value;
    const outer = substitution.applyToEnv(env);
    return success({
      scheme: ctx.generalize(name, substitution.apply(type), outer),
      env: outer,
      substitution,
    });
  }

  const self = ctx.fresh();
  const value = infer(ctx, env.extend(name, monoScheme(self)), valueExpr);
  if (!value.ok) {
    return value;
  }
  const s1 = value.value.substitution;

  const unified = ctx.unify(s1.apply(self), value.value.type);
  if (!unified.ok) {
    return failure(withLocation(unified.error, valueExpr.loc));
  }

  const substitution = s1.compose(unified.value);
  const outer = substitution.applyToEnv(env);
  return success({
    scheme: ctx.generalize(name, substitution.apply(value.value.type), outer),
    env: outer,
    substitution,
  });
}

function inferDeclaration(ctx: InferenceContext, env: TypeEnv, decl: Declaration): Result<BoundValue> {
  return inferBinding(ctx, env, decl.kind, decl.name, decl.value);
}
