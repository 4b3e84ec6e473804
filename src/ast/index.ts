/**
 * AST module exports
 */

export type {
  LiteralValue,
  VarExpr,
  LambdaExpr,
  AppExpr,
  LetExpr,
  LetRecExpr,
  IfExpr,
  LiteralExpr,
  Expression,
  ExpressionKind,
  Declaration,
  Program,
} from './expression.js';

export { Expr, located } from './expression.js';
