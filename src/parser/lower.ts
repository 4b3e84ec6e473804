/**
 * Lowering - Babel AST to the expression language
 *
 * Accepts a small functional subset of JavaScript:
 *
 *   const id = x => x;                 let id = λx. x
 *   function fact(n) { ... }           letrec fact = λn. ...
 *   (a, b) => e                        λa. λb. e
 *   f(a, b)                            (f a) b
 *   c ? a : b                          if c then a else b
 *   a + b, !a, -a                      prelude operator applications
 *
 * Anything outside the subset raises UnsupportedSyntaxError.
 */

import * as t from '@babel/types';
import type { Expression, Declaration, Program } from '../ast/index.js';
import { Expr, located } from '../ast/index.js';
import type { SourceLocation } from '../constraint/index.js';
import { Types } from '../types/index.js';
import { NEGATE } from '../inference/index.js';

/** Parameter name of a zero-argument function; no identifier can refer to it */
const UNIT_PARAM = '';

const BINARY_OPERATORS: ReadonlyMap<string, string> = new Map([
  ['+', '+'],
  ['-', '-'],
  ['*', '*'],
  ['/', '/'],
  ['%', '%'],
  ['<', '<'],
  ['<=', '<='],
  ['>', '>'],
  ['>=', '>='],
  ['===', '==='],
  ['!==', '!=='],
  ['==', '==='],
  ['!=', '!=='],
]);

const LOGICAL_OPERATORS: ReadonlySet<string> = new Set(['&&', '||']);

export class UnsupportedSyntaxError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, node: t.Node) {
    const start = node.loc?.start;
    super(message);
    this.name = 'UnsupportedSyntaxError';
    this.line = start?.line ?? 0;
    this.column = start?.column ?? 0;
  }
}

function locationOf(node: t.Node): SourceLocation | undefined {
  const start = node.loc?.start;
  return start ? { line: start.line, column: start.column } : undefined;
}

// ============================================================================
// Programs
// ============================================================================

/**
 * Lower a parsed file: declarations first, then an optional final
 * expression statement
 */
export function lowerProgram(file: t.File | t.Program): Program {
  const statements = file.type === 'File' ? file.program.body : file.body;
  const declarations: Declaration[] = [];
  let body: Expression | undefined;

  for (const [index, stmt] of statements.entries()) {
    const isLast = index === statements.length - 1;

    switch (stmt.type) {
      case 'VariableDeclaration':
        for (const { name, value } of variableDeclarators(stmt)) {
          const decl: Declaration = { kind: 'let', name, value };
          declarations.push(located(decl, locationOf(stmt)));
        }
        break;

      case 'FunctionDeclaration': {
        const { name, value } = lowerFunctionDeclaration(stmt);
        const decl: Declaration = { kind: 'letrec', name, value };
        declarations.push(located(decl, locationOf(stmt)));
        break;
      }

      case 'ExpressionStatement':
        if (!isLast) {
          throw new UnsupportedSyntaxError('Only the last statement of a program may be an expression', stmt);
        }
        body = lowerExpression(stmt.expression);
        break;

      case 'EmptyStatement':
        break;

      default:
        throw new UnsupportedSyntaxError(`Unsupported statement: ${stmt.type}`, stmt);
    }
  }

  return body ? { declarations, body } : { declarations };
}

/**
 * `const a = x, b = y;` → one binding per declarator, in order
 */
function variableDeclarators(decl: t.VariableDeclaration): Array<{ name: string; value: Expression }> {
  if (decl.kind !== 'const' && decl.kind !== 'let') {
    throw new UnsupportedSyntaxError(`Unsupported declaration kind: ${decl.kind}`, decl);
  }

  return decl.declarations.map(declarator => {
    if (declarator.id.type !== 'Identifier') {
      throw new UnsupportedSyntaxError('Destructuring is not supported', declarator.id);
    }
    if (!declarator.init) {
      throw new UnsupportedSyntaxError(`'${declarator.id.name}' must be initialized`, declarator);
    }
    return { name: declarator.id.name, value: lowerExpression(declarator.init) };
  });
}

function lowerFunctionDeclaration(decl: t.FunctionDeclaration): { name: string; value: Expression } {
  if (!decl.id) {
    throw new UnsupportedSyntaxError('Function declarations must be named', decl);
  }
  return { name: decl.id.name, value: lowerFunction(decl) };
}

// ============================================================================
// Functions
// ============================================================================

type FunctionNode = t.FunctionDeclaration | t.FunctionExpression | t.ArrowFunctionExpression;

/**
 * Curried lambda over the parameters; `() => e` takes Unit
 */
function lowerFunction(fn: FunctionNode): Expression {
  if (fn.async || fn.generator) {
    throw new UnsupportedSyntaxError('Async and generator functions are not supported', fn);
  }

  const params = fn.params.map(param => {
    if (param.type !== 'Identifier') {
      throw new UnsupportedSyntaxError('Only identifier parameters are supported', param);
    }
    return param.name;
  });

  const body = fn.body.type === 'BlockStatement'
    ? lowerBlock(fn.body.body, fn.body)
    : lowerExpression(fn.body);

  const lambda = params.length > 0
    ? Expr.lambdaN(params, body)
    : Expr.lambda(UNIT_PARAM, body, Types.unit);
  return located(lambda, locationOf(fn));
}

/**
 * Lower a function body: local declarations, then `return e;` or an
 * if/else whose branches follow the same rule
 */
function lowerBlock(statements: readonly t.Statement[], owner: t.Node): Expression {
  const [first, ...rest] = statements;
  if (!first) {
    throw new UnsupportedSyntaxError('Function body must end with a return statement', owner);
  }

  switch (first.type) {
    case 'VariableDeclaration': {
      const bindings = variableDeclarators(first);
      const loc = locationOf(first);
      return bindings.reduceRight<Expression>(
        (body, { name, value }) => located(Expr.let(name, value, body), loc),
        lowerBlock(rest, owner)
      );
    }

    case 'FunctionDeclaration': {
      const { name, value } = lowerFunctionDeclaration(first);
      return located(Expr.letrec(name, value, lowerBlock(rest, owner)), locationOf(first));
    }

    case 'ReturnStatement': {
      const next = rest[0];
      if (next) {
        throw new UnsupportedSyntaxError('Unreachable code after return', next);
      }
      return first.argument ? lowerExpression(first.argument) : located(Expr.unit(), locationOf(first));
    }

    case 'IfStatement': {
      const next = rest[0];
      if (next) {
        throw new UnsupportedSyntaxError('Unreachable code after if/else', next);
      }
      if (!first.alternate) {
        throw new UnsupportedSyntaxError('if without else must not end a function body', first);
      }
      return located(
        Expr.if(
          lowerExpression(first.test),
          lowerBranch(first.consequent),
          lowerBranch(first.alternate)
        ),
        locationOf(first)
      );
    }

    case 'EmptyStatement':
      return lowerBlock(rest, owner);

    default:
      throw new UnsupportedSyntaxError(`Unsupported statement: ${first.type}`, first);
  }
}

function lowerBranch(stmt: t.Statement): Expression {
  return stmt.type === 'BlockStatement' ? lowerBlock(stmt.body, stmt) : lowerBlock([stmt], stmt);
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Lower a single Babel expression
 */
export function lowerExpression(node: t.Expression): Expression {
  return located(lowerExpressionNode(node), locationOf(node));
}

function lowerExpressionNode(node: t.Expression): Expression {
  switch (node.type) {
    case 'Identifier':
      return node.name === 'undefined' ? Expr.unit() : Expr.var(node.name);

    case 'NullLiteral':
      return Expr.unit();

    case 'BooleanLiteral':
      return Expr.bool(node.value);

    case 'NumericLiteral':
      if (!Number.isSafeInteger(node.value)) {
        throw new UnsupportedSyntaxError(`Only integer literals are supported: ${node.value}`, node);
      }
      return Expr.int(node.value);

    case 'ArrowFunctionExpression':
      return lowerFunction(node);

    case 'FunctionExpression': {
      const lambda = lowerFunction(node);
      // A named function expression can call itself
      return node.id ? Expr.letrec(node.id.name, lambda, Expr.var(node.id.name)) : lambda;
    }

    case 'CallExpression':
      return lowerCall(node);

    case 'ConditionalExpression':
      return Expr.if(
        lowerExpression(node.test),
        lowerExpression(node.consequent),
        lowerExpression(node.alternate)
      );

    case 'BinaryExpression': {
      const operator = BINARY_OPERATORS.get(node.operator);
      if (!operator || !t.isExpression(node.left)) {
        throw new UnsupportedSyntaxError(`Unsupported operator: ${node.operator}`, node);
      }
      return Expr.appN(Expr.var(operator), [lowerExpression(node.left), lowerExpression(node.right)]);
    }

    case 'LogicalExpression':
      if (!LOGICAL_OPERATORS.has(node.operator)) {
        throw new UnsupportedSyntaxError(`Unsupported operator: ${node.operator}`, node);
      }
      return Expr.appN(Expr.var(node.operator), [lowerExpression(node.left), lowerExpression(node.right)]);

    case 'UnaryExpression':
      return lowerUnary(node);

    default:
      throw new UnsupportedSyntaxError(`Unsupported expression: ${node.type}`, node);
  }
}

/**
 * f(a, b) → (f a) b; f() → f Unit
 */
function lowerCall(node: t.CallExpression): Expression {
  if (!t.isExpression(node.callee)) {
    throw new UnsupportedSyntaxError(`Unsupported callee: ${node.callee.type}`, node.callee);
  }

  const args = node.arguments.map(arg => {
    if (!t.isExpression(arg)) {
      throw new UnsupportedSyntaxError(`Unsupported argument: ${arg.type}`, arg);
    }
    return lowerExpression(arg);
  });

  const callee = lowerExpression(node.callee);
  return Expr.appN(callee, args.length > 0 ? args : [Expr.unit()]);
}

function lowerUnary(node: t.UnaryExpression): Expression {
  const argument = lowerExpression(node.argument);

  switch (node.operator) {
    case '!':
      return Expr.app(Expr.var('!'), argument);
    case '-':
      return Expr.app(Expr.var(NEGATE), argument);
    case 'void':
      // Evaluate for its type, yield undefined
      return Expr.let(UNIT_PARAM, argument, Expr.unit());
    default:
      throw new UnsupportedSyntaxError(`Unsupported operator: ${node.operator}`, node);
  }
}
