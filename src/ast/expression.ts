/**
 * Expression language
 *
 * A small functional language: variables, single-parameter lambdas,
 * application, let / letrec bindings, conditionals and base-type literals.
 * Nodes may carry the source location they were lowered from.
 */

import type { SourceLocation } from '../constraint/index.js';
import type { BaseType } from '../types/index.js';

export type LiteralValue =
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'int'; readonly value: number }
  | { readonly type: 'unit' }
  ;

interface NodeBase {
  readonly loc?: SourceLocation;
}

export interface VarExpr extends NodeBase {
  readonly kind: 'var';
  readonly name: string;
}

export interface LambdaExpr extends NodeBase {
  readonly kind: 'lambda';
  readonly param: string;
  readonly body: Expression;
  /** Fixed parameter type; a fresh variable when absent */
  readonly paramType?: BaseType;
}

export interface AppExpr extends NodeBase {
  readonly kind: 'app';
  readonly fn: Expression;
  readonly arg: Expression;
}

/**
 * Non-recursive let: `name` is not in scope inside `value`
 */
export interface LetExpr extends NodeBase {
  readonly kind: 'let';
  readonly name: string;
  readonly value: Expression;
  readonly body: Expression;
}

/**
 * Recursive let: `name` is bound monomorphically inside `value`
 */
export interface LetRecExpr extends NodeBase {
  readonly kind: 'letrec';
  readonly name: string;
  readonly value: Expression;
  readonly body: Expression;
}

export interface IfExpr extends NodeBase {
  readonly kind: 'if';
  readonly test: Expression;
  readonly consequent: Expression;
  readonly alternate: Expression;
}

export interface LiteralExpr extends NodeBase {
  readonly kind: 'literal';
  readonly value: LiteralValue;
}

export type Expression =
  | VarExpr
  | LambdaExpr
  | AppExpr
  | LetExpr
  | LetRecExpr
  | IfExpr
  | LiteralExpr
  ;

export type ExpressionKind = Expression['kind'];

// ============================================================================
// Programs
// ============================================================================

/**
 * Top-level binding of a program
 */
export interface Declaration extends NodeBase {
  readonly kind: 'let' | 'letrec';
  readonly name: string;
  readonly value: Expression;
}

/**
 * A sequence of top-level declarations, optionally followed by an
 * expression whose type is the program's type
 */
export interface Program {
  readonly declarations: readonly Declaration[];
  readonly body?: Expression;
}

// ============================================================================
// Constructors
// ============================================================================

export const Expr = {
  var(name: string): VarExpr {
    return { kind: 'var', name };
  },

  lambda(param: string, body: Expression, paramType?: BaseType): LambdaExpr {
    return paramType ? { kind: 'lambda', param, body, paramType } : { kind: 'lambda', param, body };
  },

  /**
   * Curried lambda: lambdaN(['a', 'b'], e) = λa. λb. e
   */
  lambdaN(params: readonly string[], body: Expression): Expression {
    return params.reduceRight<Expression>((acc, param) => Expr.lambda(param, acc), body);
  },

  app(fn: Expression, arg: Expression): AppExpr {
    return { kind: 'app', fn, arg };
  },

  /**
   * Curried application: appN(f, [a, b]) = (f a) b
   */
  appN(fn: Expression, args: readonly Expression[]): Expression {
    return args.reduce<Expression>((acc, arg) => Expr.app(acc, arg), fn);
  },

  let(name: string, value: Expression, body: Expression): LetExpr {
    return { kind: 'let', name, value, body };
  },

  letrec(name: string, value: Expression, body: Expression): LetRecExpr {
    return { kind: 'letrec', name, value, body };
  },

  if(test: Expression, consequent: Expression, alternate: Expression): IfExpr {
    return { kind: 'if', test, consequent, alternate };
  },

  bool(value: boolean): LiteralExpr {
    return { kind: 'literal', value: { type: 'bool', value } };
  },

  int(value: number): LiteralExpr {
    return { kind: 'literal', value: { type: 'int', value } };
  },

  unit(): LiteralExpr {
    return { kind: 'literal', value: { type: 'unit' } };
  },
} as const;

/**
 * Attach a source location to a node
 */
export function located<T extends Expression | Declaration>(node: T, loc: SourceLocation | undefined): T {
  return loc ? { ...node, loc } : node;
}
