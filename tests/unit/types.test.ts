/**
 * Tests for the type model: constructors, free variables, environments
 */

import { describe, it, expect } from 'vitest';
import {
  Types,
  TypeEnv,
  forall,
  monoScheme,
  freeVars,
  freeVarsInScheme,
  freeVarsInEnv,
  occursIn,
  typeEquals,
  isTypeVar,
  isFunction,
  isBaseType,
} from '../../src/types/index.js';

const a = Types.typeVar(0);
const b = Types.typeVar(1);
const c = Types.typeVar(2);

describe('Type Factory', () => {
  it('should share singleton base types', () => {
    expect(Types.bool.kind).toBe('bool');
    expect(Types.int.kind).toBe('int');
    expect(Types.unit.kind).toBe('unit');
    expect(Types.int).toBe(Types.int);
  });

  it('should create function types', () => {
    const fn = Types.fn(Types.int, Types.bool);
    expect(fn).toEqual({ kind: 'function', param: Types.int, result: Types.bool });
  });

  it('should curry multi-parameter function types to the right', () => {
    expect(Types.fnN([Types.int, Types.bool], Types.unit)).toEqual(
      Types.fn(Types.int, Types.fn(Types.bool, Types.unit))
    );
    expect(Types.fnN([], Types.int)).toBe(Types.int);
  });

  it('should narrow with type guards', () => {
    expect(isTypeVar(a)).toBe(true);
    expect(isFunction(Types.fn(a, a))).toBe(true);
    expect(isBaseType(Types.unit)).toBe(true);
    expect(isBaseType(a)).toBe(false);
  });
});

describe('Free Variables', () => {
  it('should be empty for base types', () => {
    expect(freeVars(Types.int).size).toBe(0);
    expect(freeVars(Types.bool).size).toBe(0);
    expect(freeVars(Types.unit).size).toBe(0);
  });

  it('should be a singleton for a type variable', () => {
    expect(freeVars(b)).toEqual(new Set([1]));
  });

  it('should union both sides of a function type', () => {
    expect(freeVars(Types.fn(a, Types.fn(b, a)))).toEqual(new Set([0, 1]));
  });

  it('should exclude quantified variables of a scheme', () => {
    const scheme = forall([0], Types.fn(a, b));
    expect(freeVarsInScheme(scheme)).toEqual(new Set([1]));
  });

  it('should collect free variables of every scheme in an environment', () => {
    const env = TypeEnv.from([
      ['f', forall([0], Types.fn(a, b))],
      ['x', monoScheme(c)],
      ['n', monoScheme(Types.int)],
    ]);
    expect(freeVarsInEnv(env)).toEqual(new Set([1, 2]));
  });
});

describe('Schemes', () => {
  it('should only quantify variables free in the body', () => {
    const scheme = forall([0, 7], Types.fn(a, a));
    expect(scheme.vars).toEqual(new Set([0]));
  });

  it('should create monomorphic schemes', () => {
    const scheme = monoScheme(a);
    expect(scheme.vars.size).toBe(0);
    expect(scheme.body).toBe(a);
  });
});

describe('occursIn', () => {
  it('should find a variable nested in a function type', () => {
    expect(occursIn(1, Types.fn(Types.int, Types.fn(b, Types.bool)))).toBe(true);
  });

  it('should not find an absent variable', () => {
    expect(occursIn(2, Types.fn(a, b))).toBe(false);
  });
});

describe('typeEquals', () => {
  it('should compare structurally', () => {
    expect(typeEquals(Types.fn(a, Types.int), Types.fn(Types.typeVar(0), Types.int))).toBe(true);
  });

  it('should distinguish variables by ID', () => {
    expect(typeEquals(a, b)).toBe(false);
  });

  it('should distinguish base types', () => {
    expect(typeEquals(Types.int, Types.bool)).toBe(false);
    expect(typeEquals(Types.fn(Types.int, Types.int), Types.int)).toBe(false);
  });
});

describe('TypeEnv', () => {
  it('should shadow without mutating the outer environment', () => {
    const outer = TypeEnv.empty().extend('x', monoScheme(Types.int));
    const inner = outer.extend('x', monoScheme(Types.bool));

    expect(inner.lookup('x')?.body).toBe(Types.bool);
    expect(outer.lookup('x')?.body).toBe(Types.int);
  });

  it('should return undefined for unbound names', () => {
    expect(TypeEnv.empty().lookup('y')).toBeUndefined();
    expect(TypeEnv.empty().has('y')).toBe(false);
  });

  it('should extend with several bindings, later ones winning', () => {
    const env = TypeEnv.empty().extendAll([
      ['x', monoScheme(Types.int)],
      ['x', monoScheme(Types.unit)],
      ['y', monoScheme(Types.bool)],
    ]);
    expect(env.size).toBe(2);
    expect(env.lookup('x')?.body).toBe(Types.unit);
    expect(env.names()).toEqual(['x', 'y']);
  });

  it('should report the highest type variable ID, quantified or free', () => {
    expect(TypeEnv.empty().maxTypeVarId()).toBe(-1);
    const env = TypeEnv.from([
      ['f', forall([5], Types.fn(Types.typeVar(5), b))],
      ['x', monoScheme(c)],
    ]);
    expect(env.maxTypeVarId()).toBe(5);
  });

  it('should map every scheme into a new environment', () => {
    const env = TypeEnv.from([['x', monoScheme(a)]]);
    const mapped = env.map(() => monoScheme(Types.int));
    expect(mapped.lookup('x')?.body).toBe(Types.int);
    expect(env.lookup('x')?.body).toBe(a);
  });
});
