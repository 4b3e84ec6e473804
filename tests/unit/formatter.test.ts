/**
 * Tests for type, error and report formatting
 */

import { describe, it, expect } from 'vitest';
import { Types, forall, monoScheme } from '../../src/types/index.js';
import {
  Substitution,
  failure,
  typeMismatch,
  undefinedVariable,
  occursCheckFailure,
  inferenceTooComplex,
  withLocation,
} from '../../src/constraint/index.js';
import {
  TypeNamer,
  typeToString,
  schemeToString,
  formatError,
  formatTraceEvent,
  formatReport,
  formatJSON,
} from '../../src/output/index.js';
import { inferProgram, createPrelude } from '../../src/inference/index.js';
import { parseProgram } from '../../src/parser/index.js';

const t0 = Types.typeVar(0);
const t1 = Types.typeVar(1);
const t3 = Types.typeVar(3);

describe('typeToString', () => {
  it('should name variables in order of appearance', () => {
    expect(typeToString(Types.fn(t3, Types.fn(t1, t3)))).toBe('α → β → α');
  });

  it('should show raw variable IDs when not normalizing', () => {
    expect(typeToString(Types.fn(t3, Types.fn(t1, t3)), { normalize: false })).toBe('τ3 → τ1 → τ3');
  });

  it('should use a custom arrow', () => {
    expect(typeToString(Types.fn(Types.int, Types.bool), { arrow: '->' })).toBe('Int -> Bool');
  });

  it('should parenthesize function parameters only', () => {
    const type = Types.fn(Types.fn(Types.int, Types.bool), Types.fn(Types.unit, Types.int));
    expect(typeToString(type)).toBe('(Int → Bool) → Unit → Int');
  });

  it('should keep names consistent across a shared namer', () => {
    const namer = new TypeNamer();
    expect(typeToString(Types.typeVar(5), {}, namer)).toBe('α');
    expect(typeToString(Types.typeVar(2), {}, namer)).toBe('β');
    expect(typeToString(Types.typeVar(5), {}, namer)).toBe('α');
  });
});

describe('schemeToString', () => {
  it('should list quantified variables in order of appearance', () => {
    expect(schemeToString(forall([1, 0], Types.fn(t0, Types.fn(t1, t0))))).toBe('∀α β. α → β → α');
  });

  it('should leave free variables out of the quantifier', () => {
    expect(schemeToString(forall([0], Types.fn(t0, t1)))).toBe('∀α. α → β');
  });

  it('should print a monomorphic scheme as its body', () => {
    expect(schemeToString(monoScheme(Types.int))).toBe('Int');
  });
});

describe('formatError', () => {
  it('should describe each error kind', () => {
    expect(formatError(undefinedVariable('y'))).toBe("Undefined variable 'y'");
    expect(formatError(typeMismatch(Types.int, Types.bool))).toBe('Type mismatch: expected Int, got Bool');
    expect(formatError(occursCheckFailure(0, Types.fn(t0, t1)))).toBe('Infinite type: α occurs in α → β');
    expect(formatError(inferenceTooComplex('depth', 10))).toBe('Inference too complex: nesting deeper than 10');
    expect(formatError(inferenceTooComplex('steps', 5))).toBe('Inference too complex: more than 5 steps');
  });

  it('should name variables consistently across both sides of a mismatch', () => {
    expect(formatError(typeMismatch(Types.fn(t3, t3), Types.fn(t1, t3)))).toBe(
      'Type mismatch: expected α → α, got β → α'
    );
  });

  it('should append the source location', () => {
    expect(formatError(withLocation(undefinedVariable('y'), { line: 2, column: 4 }))).toBe("Undefined variable 'y' (at 2:4)");
  });
});

describe('formatTraceEvent', () => {
  it('should format unification with raw variables', () => {
    const line = formatTraceEvent({
      kind: 'unify',
      left: t0,
      right: Types.int,
      substitution: Substitution.singleton(0, Types.int),
    });
    expect(line).toBe('unify τ0 ~ Int => { τ0 ↦ Int }');
  });

  it('should format failed unification', () => {
    const line = formatTraceEvent({
      kind: 'unify-failed',
      left: Types.bool,
      right: Types.int,
      error: typeMismatch(Types.bool, Types.int),
    });
    expect(line).toBe('unify Bool ~ Int failed: Type mismatch: expected Bool, got Int');
  });

  it('should format instantiation and generalization', () => {
    const scheme = forall([0], Types.fn(t0, t0));
    expect(formatTraceEvent({ kind: 'instantiate', name: 'id', scheme, type: Types.fn(t3, t3) })).toBe(
      'instantiate id : ∀τ0. τ0 → τ0 => τ3 → τ3'
    );
    expect(formatTraceEvent({ kind: 'generalize', name: 'id', scheme })).toBe('generalize id : ∀τ0. τ0 → τ0');
  });
});

describe('Program Output', () => {
  const source = [
    'const id = x => x;',
    'const compose = (f, g) => x => f(g(x));',
    'function fact(n) { return n === 0 ? 1 : n * fact(n - 1); }',
    'compose(id, fact)(5)',
  ].join('\n');

  function run(text: string) {
    const { program, errors } = parseProgram(text);
    if (!program) {
      throw new Error(`parse failed: ${errors.map(e => e.message).join(', ')}`);
    }
    return inferProgram(program, createPrelude());
  }

  it('should report every binding and the final type', () => {
    expect(formatReport(run(source))).toBe([
      'id : ∀α. α → α',
      'compose : ∀α β γ. (α → β) → (γ → α) → γ → β',
      'fact : Int → Int',
      '- : Int',
    ].join('\n'));
  });

  it('should report an error with its location', () => {
    expect(formatReport(run('1 + true'))).toBe('error: Type mismatch: expected Int, got Bool (at 1:0)');
  });

  it('should locate an undefined variable', () => {
    expect(formatReport(run('const a = 1;\nb'))).toBe("error: Undefined variable 'b' (at 2:0)");
  });

  it('should keep unary minus apart from a program binding named neg', () => {
    expect(formatReport(run('const neg = true;\n-1'))).toBe('neg : Bool\n- : Int');
  });

  it('should give a zero-argument function a Unit parameter', () => {
    expect(formatReport(run('const f = () => 1;\nf()'))).toBe('f : Unit → Int\n- : Int');
  });

  it('should reject an argument passed to a zero-argument function', () => {
    expect(formatReport(run('const f = () => 1;\nf(5)'))).toBe(
      'error: Type mismatch: expected Unit, got Int (at 2:0)'
    );
  });

  it('should produce JSON for a successful program', () => {
    expect(JSON.parse(formatJSON(run('const id = x => x;\nid(true)')))).toEqual({
      ok: true,
      bindings: [{ name: 'id', type: '∀α. α → α' }],
      type: 'Bool',
    });
  });

  it('should produce JSON for a program without a final expression', () => {
    expect(JSON.parse(formatJSON(run('const one = 1;')))).toEqual({
      ok: true,
      bindings: [{ name: 'one', type: 'Int' }],
      type: null,
    });
  });

  it('should produce JSON for an error', () => {
    expect(JSON.parse(formatJSON(failure(withLocation(undefinedVariable('y'), { line: 1, column: 0 }))))).toEqual({
      ok: false,
      error: {
        kind: 'undefined-variable',
        message: "Undefined variable 'y' (at 1:0)",
        loc: { line: 1, column: 0 },
      },
    });
  });

  it('should use null for a missing error location', () => {
    const parsed: unknown = JSON.parse(formatJSON(failure(inferenceTooComplex('steps', 3))));
    expect(parsed).toEqual({
      ok: false,
      error: {
        kind: 'inference-too-complex',
        message: 'Inference too complex: more than 3 steps',
        loc: null,
      },
    });
  });
});
