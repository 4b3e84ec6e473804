/**
 * JavaScript Parser wrapper
 *
 * Uses @babel/parser to parse source code into a Babel AST. Only plain
 * ECMAScript is accepted; the lowering pass decides which constructs the
 * expression language supports.
 */

import { parse as babelParse, type ParserOptions } from '@babel/parser';
import type * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Source type */
  sourceType?: 'script' | 'module';
}

export interface ParseResult {
  /** The parsed AST, or null when the source has a syntax error */
  ast: t.File | null;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

/**
 * Parse JavaScript source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'module',
    sourceFilename: options.filename,
  };

  try {
    const ast = babelParse(source, parserOptions);
    return { ast, errors: [] };
  } catch (error) {
    if (error instanceof SyntaxError) {
      const loc = errorPosition(error);
      return {
        ast: null,
        errors: [
          {
            message: error.message,
            line: loc?.line ?? 0,
            column: loc?.column ?? 0,
          },
        ],
      };
    }
    throw error;
  }
}

/**
 * Babel attaches the position of a syntax error as `loc`
 */
function errorPosition(error: SyntaxError): { line: number; column: number } | null {
  if (!('loc' in error)) {
    return null;
  }
  const loc: unknown = error.loc;
  if (
    typeof loc === 'object' &&
    loc !== null &&
    'line' in loc &&
    'column' in loc &&
    typeof loc.line === 'number' &&
    typeof loc.column === 'number'
  ) {
    return { line: loc.line, column: loc.column };
  }
  return null;
}
