/**
 * Parser module exports
 *
 * `parseProgram` and `parseExpression` combine the Babel parse with the
 * lowering pass.
 */

import type { Expression, Program } from '../ast/index.js';
import type { ParseOptions, ParseError } from './parser.js';
import { parse } from './parser.js';
import { lowerProgram, lowerExpression, UnsupportedSyntaxError } from './lower.js';

export { parse } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
export { lowerProgram, lowerExpression, UnsupportedSyntaxError } from './lower.js';

export interface ParseProgramResult {
  /** The lowered program, or null when parsing or lowering failed */
  program: Program | null;
  /** Syntax errors and unsupported constructs */
  errors: ParseError[];
}

/**
 * Parse and lower a source file
 */
export function parseProgram(source: string, options: ParseOptions = {}): ParseProgramResult {
  const { ast, errors } = parse(source, options);
  if (!ast) {
    return { program: null, errors };
  }

  try {
    return { program: lowerProgram(ast), errors: [] };
  } catch (error) {
    if (error instanceof UnsupportedSyntaxError) {
      return {
        program: null,
        errors: [{ message: error.message, line: error.line, column: error.column }],
      };
    }
    throw error;
  }
}

/**
 * Parse and lower a single expression
 */
export function parseExpression(source: string): Expression {
  const { program, errors } = parseProgram(`(${source})`);
  const first = errors[0];
  if (first) {
    throw new Error(`Failed to parse expression: ${first.message}`);
  }
  if (!program?.body || program.declarations.length > 0) {
    throw new Error('Failed to parse expression');
  }
  return program.body;
}
