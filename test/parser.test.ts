import { describe, expect, it } from 'vitest';

import { InvalidSpecifierError, ParseError } from '../src/diagnostics/errors.js';
import type { ExprNode, IfStmtNode, VarDeclNode } from '../src/frontend/ast.js';
import { firstReturn, functionNamed, parseSource, showExpr, thrown } from './helpers/pipeline.js';

const expr = (text: string): string => showExpr(firstReturn(parseSource(`int main(void) { return ${text}; }`)));

const constantOf = (text: string): ExprNode => firstReturn(parseSource(`int main(void) { return ${text}; }`));

function fileVar(source: string): VarDeclNode {
  const decl = parseSource(source).declarations[0];
  if (decl?.kind !== 'VarDecl') throw new Error('expected a variable declaration');
  return decl;
}

function mainStatement(source: string, index = 0) {
  const item = functionNamed(parseSource(source), 'main').body?.items[index];
  if (!item) throw new Error(`no block item ${index}`);
  return item;
}

describe('parser', () => {
  it('parses a minimal function definition', () => {
    const program = parseSource('int main(void) { return 42; }');
    expect(program.declarations).toHaveLength(1);
    expect(program.declarations[0]).toMatchObject({
      kind: 'FunctionDecl',
      name: 'main',
      params: [],
      storage: undefined,
      funType: { kind: 'FunType', params: [], ret: { kind: 'Int' } },
      body: {
        kind: 'Block',
        items: [{ kind: 'Return', expr: { kind: 'Constant', value: { type: { kind: 'Int' }, value: 42n } } }],
      },
    });
  });

  describe('expressions', () => {
    it('binds multiplicative operators tighter than additive ones', () => {
      expect(expr('1 + 2 * 3 - 4')).toBe('((1 Add (2 Multiply 3)) Subtract 4)');
    });

    it('associates binary operators to the left', () => {
      expect(expr('a - b - c')).toBe('((a Subtract b) Subtract c)');
      expect(expr('a / b % c')).toBe('((a Divide b) Remainder c)');
    });

    it('orders the bitwise operators', () => {
      expect(expr('a | b ^ c & d')).toBe('(a BitOr (b BitXor (c BitAnd d)))');
      expect(expr('a << 1 < b == c')).toBe('(((a ShiftLeft 1) LessThan b) Equal c)');
      expect(expr('a && b || c')).toBe('((a And b) Or c)');
    });

    it('associates assignment to the right', () => {
      expect(expr('a = b = 3')).toBe('(a = (b = 3))');
    });

    it('associates the conditional operator to the right', () => {
      expect(expr('a ? b : c ? d : e')).toBe('(a ? b : (c ? d : e))');
      expect(expr('a = b ? 1 : 2')).toBe('(a = (b ? 1 : 2))');
      expect(expr('a || b ? 1 : 2')).toBe('((a Or b) ? 1 : 2)');
    });

    it('binds unary operators and casts tighter than binary ones', () => {
      expect(expr('-a * ~b')).toBe('((Negate a) Multiply (Complement b))');
      expect(expr('!a == b')).toBe('((Not a) Equal b)');
      expect(expr('(long) a + 1')).toBe('((Long)a Add 1)');
      expect(expr('(unsigned long) -1')).toBe('(ULong)(Negate 1)');
    });

    it('parses parenthesized expressions and calls', () => {
      expect(expr('(a + 1) * 2')).toBe('((a Add 1) Multiply 2)');
      expect(expr('f(1, g(2), a = 3)')).toBe('f(1, g(2), (a = 3))');
      expect(expr('f()')).toBe('f()');
    });

    it('types constants by suffix and magnitude', () => {
      const typeOf = (text: string) => {
        const c = constantOf(text);
        return c.kind === 'Constant' ? c.value.type.kind : c.kind;
      };
      expect(typeOf('2147483647')).toBe('Int');
      expect(typeOf('2147483648')).toBe('Long');
      expect(typeOf('5l')).toBe('Long');
      expect(typeOf('4294967295u')).toBe('UInt');
      expect(typeOf('4294967296u')).toBe('ULong');
      expect(typeOf('5ul')).toBe('ULong');
      expect(typeOf('9223372036854775807')).toBe('Long');
      expect(typeOf('18446744073709551615u')).toBe('ULong');
    });

    it('rejects constants that fit no integer type', () => {
      expect(thrown(() => parseSource('int main(void) { return 9223372036854775808; }'))).toMatchObject({
        message: 'Constant 9223372036854775808 is too large to represent in any integer type',
      });
      expect(thrown(() => parseSource('int main(void) { return 18446744073709551616u; }'))).toBeInstanceOf(
        ParseError,
      );
    });
  });

  describe('declarations', () => {
    it('accepts type specifiers in any order', () => {
      expect(fileVar('unsigned long int x;').varType).toEqual({ kind: 'ULong' });
      expect(fileVar('long unsigned x;').varType).toEqual({ kind: 'ULong' });
      expect(fileVar('int long signed x;').varType).toEqual({ kind: 'Long' });
      expect(fileVar('unsigned x;').varType).toEqual({ kind: 'UInt' });
      expect(fileVar('signed x;').varType).toEqual({ kind: 'Int' });
    });

    it('records the storage class wherever it appears among the specifiers', () => {
      expect(fileVar('static int x;')).toMatchObject({ storage: 'static', varType: { kind: 'Int' } });
      expect(fileVar('long extern x = 3;')).toMatchObject({
        storage: 'extern',
        varType: { kind: 'Long' },
        init: { kind: 'Constant', value: { value: 3n } },
      });
    });

    it('rejects invalid specifier lists', () => {
      const cases: Array<[string, string]> = [
        ['int int x;', 'Invalid type specifier "int int"'],
        ['signed unsigned x;', 'Type cannot be both signed and unsigned'],
        ['static x;', 'Missing type specifier'],
        ['static extern int x;', 'At most one storage class is allowed'],
        ['int f(static int a);', 'Storage class not allowed on a parameter'],
      ];
      for (const [source, message] of cases) {
        const err = thrown(() => parseSource(source));
        expect(err).toBeInstanceOf(InvalidSpecifierError);
        expect(err).toMatchObject({ message });
      }
    });

    it('parses parameter lists', () => {
      const fn = functionNamed(parseSource('long f(int a, unsigned long b);'), 'f');
      expect(fn.funType).toEqual({
        kind: 'FunType',
        params: [{ kind: 'Int' }, { kind: 'ULong' }],
        ret: { kind: 'Long' },
      });
      expect(fn.params.map((p) => p.name)).toEqual(['a', 'b']);
      expect(fn.body).toBeUndefined();
    });

    it('requires "void" for an empty parameter list', () => {
      expect(thrown(() => parseSource('int f();'))).toMatchObject({
        message: 'Expected "void" or a parameter but found ")"',
      });
    });

    it('rejects multi-declarator declarations', () => {
      const err = thrown(() => parseSource('int x, y;'));
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({
        message: 'Expected ";" but found ","',
        expected: '";"',
        actual: '","',
        span: { start: { line: 1, column: 6 } },
      });
    });
  });

  describe('statements', () => {
    it('parses a for loop with every clause omitted', () => {
      const stmt = mainStatement('int main(void) { for (;;) break; }');
      expect(stmt).toMatchObject({
        kind: 'For',
        init: undefined,
        condition: undefined,
        post: undefined,
        body: { kind: 'Break' },
      });
    });

    it('parses a declaration in a for loop header', () => {
      const stmt = mainStatement('int main(void) { for (long i = 0; i < 10; i = i + 1) ; }');
      expect(stmt).toMatchObject({
        kind: 'For',
        init: { kind: 'VarDecl', name: 'i', varType: { kind: 'Long' } },
        body: { kind: 'Null' },
      });
    });

    it('rejects a function declaration in a for loop header', () => {
      expect(thrown(() => parseSource('int main(void) { for (int f(void); ;) ; }'))).toMatchObject({
        message: 'Function declaration is not allowed in a "for" loop header',
      });
    });

    it('attaches a dangling else to the nearest if', () => {
      const stmt = mainStatement('int main(void) { if (a) if (b) return 1; else return 2; }');
      if (stmt.kind !== 'If') throw new Error('expected an if statement');
      const outer: IfStmtNode = stmt;
      expect(outer.else).toBeUndefined();
      expect(outer.then).toMatchObject({ kind: 'If', else: { kind: 'Return' } });
    });

    it('parses do-while and while loops', () => {
      expect(mainStatement('int main(void) { do ; while (1); }')).toMatchObject({
        kind: 'DoWhile',
        body: { kind: 'Null' },
        condition: { kind: 'Constant' },
        label: undefined,
      });
      expect(mainStatement('int main(void) { while (x) { continue; } }')).toMatchObject({
        kind: 'While',
        condition: { kind: 'Var', name: 'x' },
        body: { kind: 'Compound', block: { items: [{ kind: 'Continue' }] } },
      });
    });

    it('reports the first token that does not fit the grammar', () => {
      const cases: Array<[string, string]> = [
        ['int main(void) { return 1 }', 'Expected ";" but found "}"'],
        ['int main(void) { return ; }', 'Expected an expression but found ";"'],
        ['int main(void) { return 1;', 'Expected "}" but found end of input'],
        ['int main(void) { return a++; }', 'Expected ";" but found "++"'],
        ['int 3;', 'Expected an identifier but found constant 3'],
      ];
      for (const [source, message] of cases) {
        const err = thrown(() => parseSource(source));
        expect(err).toBeInstanceOf(ParseError);
        expect(err).toMatchObject({ message });
      }
    });
  });
});
