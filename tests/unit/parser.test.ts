/**
 * Tests for the JavaScript front end
 */

import { describe, it, expect } from 'vitest';
import { Types } from '../../src/types/index.js';
import { Expr } from '../../src/ast/index.js';
import type { Expression } from '../../src/ast/index.js';
import { parse, parseProgram, parseExpression } from '../../src/parser/index.js';

const { var: v, lambda, app, appN, int, bool, unit } = Expr;

/** Drop source locations so lowered trees compare against constructed ones */
function stripLoc(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value, (key, inner: unknown) => (key === 'loc' ? undefined : inner)));
}

function lowered(source: string): unknown {
  return stripLoc(parseExpression(source));
}

function expected(expr: Expression): unknown {
  return stripLoc(expr);
}

describe('parse', () => {
  it('should parse valid source', () => {
    const result = parse('const x = 1;');
    expect(result.errors).toEqual([]);
    expect(result.ast?.program.body).toHaveLength(1);
  });

  it('should report syntax errors with a position', () => {
    const result = parse('const = 1;');
    expect(result.ast).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.line).toBe(1);
  });
});

describe('Lowering', () => {
  describe('expressions', () => {
    it('should lower literals', () => {
      expect(lowered('42')).toEqual(expected(int(42)));
      expect(lowered('true')).toEqual(expected(bool(true)));
      expect(lowered('null')).toEqual(expected(unit()));
      expect(lowered('undefined')).toEqual(expected(unit()));
    });

    it('should lower identifiers to variables', () => {
      expect(lowered('x')).toEqual(expected(v('x')));
    });

    it('should curry arrow function parameters', () => {
      expect(lowered('(a, b) => a')).toEqual(expected(lambda('a', lambda('b', v('a')))));
    });

    it('should give zero-parameter functions a Unit parameter', () => {
      expect(lowered('() => 1')).toEqual(expected(lambda('', int(1), Types.unit)));
    });

    it('should curry calls', () => {
      expect(lowered('f(1, true)')).toEqual(expected(app(app(v('f'), int(1)), bool(true))));
    });

    it('should pass Unit to a call without arguments', () => {
      expect(lowered('f()')).toEqual(expected(app(v('f'), unit())));
    });

    it('should lower the conditional operator', () => {
      expect(lowered('c ? 1 : 2')).toEqual(expected(Expr.if(v('c'), int(1), int(2))));
    });

    it('should lower binary operators to prelude applications', () => {
      expect(lowered('a + b')).toEqual(expected(appN(v('+'), [v('a'), v('b')])));
      expect(lowered('a == b')).toEqual(expected(appN(v('==='), [v('a'), v('b')])));
      expect(lowered('a != b')).toEqual(expected(appN(v('!=='), [v('a'), v('b')])));
      expect(lowered('a && b')).toEqual(expected(appN(v('&&'), [v('a'), v('b')])));
    });

    it('should lower unary operators', () => {
      expect(lowered('!a')).toEqual(expected(app(v('!'), v('a'))));
      expect(lowered('-1')).toEqual(expected(app(v('unary -'), int(1))));
      expect(lowered('void 0')).toEqual(expected(Expr.let('', int(0), unit())));
    });

    it('should make a named function expression recursive', () => {
      expect(lowered('function h(n) { return h(n); }')).toEqual(
        expected(Expr.letrec('h', lambda('n', app(v('h'), v('n'))), v('h')))
      );
    });

    it('should lower function bodies with local declarations', () => {
      expect(lowered('function (x) { const y = x; return y; }')).toEqual(
        expected(lambda('x', Expr.let('y', v('x'), v('y'))))
      );
    });

    it('should lower if/else in a function body', () => {
      expect(lowered('n => { if (n) { return 1; } else return 2; }')).toEqual(
        expected(lambda('n', Expr.if(v('n'), int(1), int(2))))
      );
    });

    it('should return Unit from a bare return', () => {
      expect(lowered('() => { return; }')).toEqual(expected(lambda('', unit(), Types.unit)));
    });

    it('should throw on invalid expressions', () => {
      expect(() => parseExpression('x y')).toThrow(/^Failed to parse expression/);
    });
  });

  describe('programs', () => {
    it('should lower declarations and the final expression', () => {
      const { program, errors } = parseProgram('const id = x => x;\nfunction f(n) { return f(n); }\nid(1)');
      expect(errors).toEqual([]);
      expect(stripLoc(program)).toEqual(stripLoc({
        declarations: [
          { kind: 'let', name: 'id', value: lambda('x', v('x')) },
          { kind: 'letrec', name: 'f', value: lambda('n', app(v('f'), v('n'))) },
        ],
        body: app(v('id'), int(1)),
      }));
    });

    it('should lower each declarator of a declaration', () => {
      const { program } = parseProgram('const a = 1, b = a;');
      expect(program?.declarations.map(d => d.name)).toEqual(['a', 'b']);
      expect(program?.body).toBeUndefined();
    });

    it('should attach source locations', () => {
      const { program } = parseProgram('const id = x => x;\n  id(1)');
      expect(program?.declarations[0]?.loc).toEqual({ line: 1, column: 0 });
      expect(program?.body?.loc).toEqual({ line: 2, column: 2 });
    });
  });

  describe('unsupported syntax', () => {
    const cases: Array<[string, string, number, number]> = [
      ['class A {}', 'Unsupported statement: ClassDeclaration', 1, 0],
      ['var x = 1;', 'Unsupported declaration kind: var', 1, 0],
      ['1;\n2', 'Only the last statement of a program may be an expression', 1, 0],
      ['1.5', 'Only integer literals are supported: 1.5', 1, 0],
      ['const f = async x => x;', 'Async and generator functions are not supported', 1, 10],
      ['const { a } = b;', 'Destructuring is not supported', 1, 6],
      ['let x;', "'x' must be initialized", 1, 4],
      ['function f(x) { if (x) { return 1; } }', 'if without else must not end a function body', 1, 16],
      ['function f() { return 1; return 2; }', 'Unreachable code after return', 1, 25],
      ['function f() {}', 'Function body must end with a return statement', 1, 13],
      ['x => x.y', 'Unsupported expression: MemberExpression', 1, 5],
    ];

    for (const [source, message, line, column] of cases) {
      it(`should reject ${JSON.stringify(source)}`, () => {
        expect(parseProgram(source)).toEqual({
          program: null,
          errors: [{ message, line, column }],
        });
      });
    }
  });
});
