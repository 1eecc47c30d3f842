import { describe, expect, it } from 'vitest';

import {
  ConflictingLinkageError,
  ConflictingTypeError,
  DuplicateDefinitionError,
  InvalidCallError,
  InvalidInitializerError,
} from '../src/diagnostics/errors.js';
import type { ExprNode } from '../src/frontend/ast.js';
import { emptySymbolTable } from '../src/semantics/symbols.js';
import { typecheckProgram, convertTo } from '../src/semantics/typecheck.js';
import { firstReturn, showExpr, thrown, validateSource } from './helpers/pipeline.js';

const checkedReturn = (source: string): ExprNode => firstReturn(validateSource(source).program);

describe('typecheck', () => {
  describe('implicit conversions', () => {
    it('converts both operands to their common type and the result to the return type', () => {
      const ret = checkedReturn('int main(void) { long l = 5; return l + 1; }');
      expect(showExpr(ret)).toBe('(Int)(l.0 Add (Long)1)');
      expect(ret.type).toEqual({ kind: 'Int' });
    });

    it('inserts no cast when the types already agree', () => {
      const ret = checkedReturn('int main(void) { int a = 1; return a + 2; }');
      expect(ret.kind).toBe('Binary');
      expect(showExpr(ret)).toBe('(a.0 Add 2)');
    });

    it('prefers the unsigned type when sizes match and types comparisons as int', () => {
      const ret = checkedReturn('int main(void) { unsigned u = 1; return u < 2; }');
      expect(showExpr(ret)).toBe('(u.0 LessThan (UInt)2)');
      expect(ret.type).toEqual({ kind: 'Int' });
    });

    it('types a shift by its left operand only', () => {
      const ret = checkedReturn('int main(void) { long l = 1; return l << 2; }');
      expect(showExpr(ret)).toBe('(Int)(l.0 ShiftLeft 2)');
    });

    it('converts call arguments to the parameter types', () => {
      const ret = checkedReturn('long f(long x);\nint main(void) { return f(3); }');
      expect(showExpr(ret)).toBe('(Int)f((Long)3)');
    });

    it('converts both branches of a conditional to their common type', () => {
      const ret = checkedReturn('int main(void) { return 1 ? 2 : 3l; }');
      expect(showExpr(ret)).toBe('(Int)(1 ? (Long)2 : 3)');
    });

    it('converts an assigned value to the type of the target', () => {
      const { program } = validateSource('int main(void) { long l; l = 5; return 0; }');
      const main = program.declarations[0];
      const stmt = main?.kind === 'FunctionDecl' ? main.body?.items[1] : undefined;
      expect(stmt?.kind === 'ExprStmt' && showExpr(stmt.expr)).toBe('(l.0 = (Long)5)');
    });

    it('leaves an already typed expression alone in convertTo', () => {
      const ret = checkedReturn('int main(void) { return 7; }');
      expect(convertTo(ret, { kind: 'Int' })).toBe(ret);
      expect(convertTo(ret, { kind: 'ULong' })).toMatchObject({
        kind: 'Cast',
        target: { kind: 'ULong' },
        type: { kind: 'ULong' },
        expr: ret,
      });
    });
  });

  describe('symbol table', () => {
    it('records storage and initial values for every identifier', () => {
      const { symbols } = validateSource(
        'int a;\nint a = 3;\nstatic int b;\nextern int c;\nint main(void) { static long s; int x; return 0; }',
      );
      expect(symbols.get('a')).toEqual({
        type: { kind: 'Int' },
        attrs: { kind: 'Static', init: { kind: 'Initial', value: { type: { kind: 'Int' }, value: 3n } }, global: true },
      });
      expect(symbols.get('b')?.attrs).toEqual({ kind: 'Static', init: { kind: 'Tentative' }, global: false });
      expect(symbols.get('c')?.attrs).toEqual({ kind: 'Static', init: { kind: 'NoInitializer' }, global: true });
      expect(symbols.get('main')).toEqual({
        type: { kind: 'FunType', params: [], ret: { kind: 'Int' } },
        attrs: { kind: 'Fun', defined: true, global: true },
      });
      expect(symbols.get('s.0')?.attrs).toEqual({
        kind: 'Static',
        init: { kind: 'Initial', value: { type: { kind: 'Long' }, value: 0n } },
        global: false,
      });
      expect(symbols.get('x.1')).toEqual({ type: { kind: 'Int' }, attrs: { kind: 'Local' } });
    });

    it('folds static initializers and converts them to the declared type', () => {
      const { symbols } = validateSource('unsigned u = -1;\nint w = 4294967297;\nlong k = 2 * 3 + 1;');
      const initOf = (name: string) => {
        const attrs = symbols.get(name)?.attrs;
        return attrs?.kind === 'Static' && attrs.init.kind === 'Initial' ? attrs.init.value : undefined;
      };
      expect(initOf('u')).toEqual({ type: { kind: 'UInt' }, value: 4294967295n });
      expect(initOf('w')).toEqual({ type: { kind: 'Int' }, value: 1n });
      expect(initOf('k')).toEqual({ type: { kind: 'Long' }, value: 7n });
    });

    it('keeps internal linkage when a static is redeclared extern', () => {
      const { symbols } = validateSource('static int y;\nextern int y;');
      expect(symbols.get('y')?.attrs).toEqual({ kind: 'Static', init: { kind: 'Tentative' }, global: false });
    });

    it('returns a new table and leaves its input untouched', () => {
      const input = new Map(emptySymbolTable);
      const { program } = validateSource('int main(void) { return 0; }');
      const result = typecheckProgram(program, input);
      expect(input.size).toBe(0);
      expect(result.symbols).not.toBe(input);
    });
  });

  describe('errors', () => {
    it('rejects an initializer on a local extern declaration', () => {
      const err = thrown(() => validateSource('int main(void) { extern int x = 1; return x; }'));
      expect(err).toBeInstanceOf(InvalidInitializerError);
      expect(err).toMatchObject({ message: 'Initializer on local extern variable declaration "x"' });
    });

    it('rejects a second definition of a function', () => {
      const err = thrown(() => validateSource('int foo(void) { return 1; }\nint foo(void) { return 2; }'));
      expect(err).toBeInstanceOf(DuplicateDefinitionError);
      expect(err).toMatchObject({ message: 'Redefinition of "foo"', span: { start: { line: 2, column: 1 } } });
    });

    it('rejects two initialized definitions of one variable', () => {
      expect(thrown(() => validateSource('int x = 1;\nint x = 2;'))).toBeInstanceOf(DuplicateDefinitionError);
    });

    it('rejects conflicting types', () => {
      expect(thrown(() => validateSource('int f(int a);\nint f(long a);'))).toMatchObject({
        message: 'Conflicting types for "f": previously declared as "int (int)"',
      });
      expect(thrown(() => validateSource('int x;\nlong x;'))).toMatchObject({
        message: 'Conflicting types for "x": previously declared as "int"',
      });
      expect(thrown(() => validateSource('int x;\nint x(void);'))).toBeInstanceOf(ConflictingTypeError);
    });

    it('rejects conflicting linkage', () => {
      const err = thrown(() => validateSource('static int x;\nint x;'));
      expect(err).toBeInstanceOf(ConflictingLinkageError);
      expect(err).toMatchObject({ message: 'Conflicting linkage for "x"' });
      expect(thrown(() => validateSource('int f(void);\nstatic int f(void);'))).toBeInstanceOf(
        ConflictingLinkageError,
      );
    });

    it('rejects static initializers that are not constant', () => {
      expect(thrown(() => validateSource('int a;\nint b = a;'))).toMatchObject({
        message: 'Initializer of static variable "b" is not a constant expression',
      });
    });

    it('rejects invalid calls', () => {
      const cases: Array<[string, string]> = [
        ['int x;\nint main(void) { return x(); }', '"x" is not a function'],
        ['int f(int a);\nint main(void) { return f(); }', 'Function "f" expects 1 argument(s) but got 0'],
        ['int f(void);\nint main(void) { return f + 1; }', 'Function "f" used as a variable'],
      ];
      for (const [source, message] of cases) {
        const err = thrown(() => validateSource(source));
        expect(err).toBeInstanceOf(InvalidCallError);
        expect(err).toMatchObject({ message });
      }
    });
  });
});
