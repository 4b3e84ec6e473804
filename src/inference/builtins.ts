/**
 * Prelude - operator bindings available to lowered source programs
 *
 * Operator names are the source symbols themselves, so a program cannot
 * shadow them with an ordinary identifier.
 */

import type { PolyType, Type } from '../types/index.js';
import { Types, TypeEnv, forall, monoScheme } from '../types/index.js';

const { int, bool } = Types;

/** Only quantified variable used by the prelude; bound, never free */
const A = Types.typeVar(0);

const intBinary: Type = Types.fnN([int, int], int);
const intCompare: Type = Types.fnN([int, int], bool);
const boolBinary: Type = Types.fnN([bool, bool], bool);
const equality: PolyType = forall([A.id], Types.fnN([A, A], bool));

/** Name of the unary minus operator in the prelude; not a valid identifier */
export const NEGATE = 'unary -';

export const PRELUDE: ReadonlyArray<readonly [string, PolyType]> = [
  ['+', monoScheme(intBinary)],
  ['-', monoScheme(intBinary)],
  ['*', monoScheme(intBinary)],
  ['/', monoScheme(intBinary)],
  ['%', monoScheme(intBinary)],
  ['<', monoScheme(intCompare)],
  ['<=', monoScheme(intCompare)],
  ['>', monoScheme(intCompare)],
  ['>=', monoScheme(intCompare)],
  ['===', equality],
  ['!==', equality],
  ['&&', monoScheme(boolBinary)],
  ['||', monoScheme(boolBinary)],
  ['!', monoScheme(Types.fn(bool, bool))],
  [NEGATE, monoScheme(Types.fn(int, int))],
];

/**
 * Create an environment holding the prelude operators
 */
export function createPrelude(): TypeEnv {
  return TypeEnv.from(PRELUDE);
}
