import { describe, expect, it } from 'vitest';

import { writeTacky } from '../src/formats/writeTacky.js';
import { tackyFunction, tackySource } from './helpers/pipeline.js';

const listing = (source: string): string[] => writeTacky(tackySource(source).program).text.split('\n');

describe('tacky generation', () => {
  it('copies an initializer into the renamed variable and appends an implicit return', () => {
    const { program } = tackySource('int main(void) { int y = 10; return y; }');
    expect(tackyFunction(program, 'main')).toEqual({
      kind: 'Function',
      name: 'main',
      global: true,
      params: [],
      body: [
        {
          kind: 'Copy',
          src: { kind: 'Constant', value: { type: { kind: 'Int' }, value: 10n } },
          dst: { kind: 'Var', name: 'y.0' },
        },
        { kind: 'Return', value: { kind: 'Var', name: 'y.0' } },
        { kind: 'Return', value: { kind: 'Constant', value: { type: { kind: 'Int' }, value: 0n } } },
      ],
    });
  });

  it('short-circuits logical and', () => {
    expect(listing('int main(void) { return 1 && 2; }')).toEqual([
      'global function main():',
      '    jump_if_zero 1, and_false.0',
      '    jump_if_zero 2, and_false.0',
      '    tmp.0 = 1',
      '    jump and_end.1',
      '  and_false.0:',
      '    tmp.0 = 0',
      '  and_end.1:',
      '    return tmp.0',
      '    return 0',
      '',
    ]);
  });

  it('short-circuits logical or', () => {
    expect(listing('int main(void) { return 0 || 3; }').slice(1, 8)).toEqual([
      '    jump_if_not_zero 0, or_true.0',
      '    jump_if_not_zero 3, or_true.0',
      '    tmp.0 = 0',
      '    jump or_end.1',
      '  or_true.0:',
      '    tmp.0 = 1',
      '  or_end.1:',
    ]);
  });

  it('lowers while loops with continue and break labels', () => {
    expect(
      listing('int main(void) { int i = 0; while (i < 3) { i = i + 1; if (i == 2) continue; } return i; }'),
    ).toEqual([
      'global function main():',
      '    i.0 = 0',
      '  continue_while.0:',
      '    tmp.0 = i.0 < 3',
      '    jump_if_zero tmp.0, break_while.0',
      '    tmp.1 = i.0 + 1',
      '    i.0 = tmp.1',
      '    tmp.2 = i.0 == 2',
      '    jump_if_zero tmp.2, if_end.0',
      '    jump continue_while.0',
      '  if_end.0:',
      '    jump continue_while.0',
      '  break_while.0:',
      '    return i.0',
      '    return 0',
      '',
    ]);
  });

  it('lowers for loops with the post expression after the continue label', () => {
    expect(
      listing('int main(void) { int s = 0; for (int i = 0; i < 4; i = i + 1) s = s + i; return s; }'),
    ).toEqual([
      'global function main():',
      '    s.0 = 0',
      '    i.1 = 0',
      '  start_for.0:',
      '    tmp.0 = i.1 < 4',
      '    jump_if_zero tmp.0, break_for.0',
      '    tmp.1 = s.0 + i.1',
      '    s.0 = tmp.1',
      '  continue_for.0:',
      '    tmp.2 = i.1 + 1',
      '    i.1 = tmp.2',
      '    jump start_for.0',
      '  break_for.0:',
      '    return s.0',
      '    return 0',
      '',
    ]);
  });

  it('lowers do-while loops with the test at the bottom', () => {
    expect(listing('int main(void) { int n = 3; do n = n - 1; while (n); return n; }').slice(1, 7)).toEqual([
      '    n.0 = 3',
      '  start_do.0:',
      '    tmp.0 = n.0 - 1',
      '    n.0 = tmp.0',
      '  continue_do.0:',
      '    jump_if_not_zero n.0, start_do.0',
    ]);
  });

  it('lowers if-else and conditional expressions', () => {
    expect(listing('int main(void) { int a = 1; if (a) a = 2; else a = 3; return a ? 4 : 5; }')).toEqual([
      'global function main():',
      '    a.0 = 1',
      '    jump_if_zero a.0, if_else.1',
      '    a.0 = 2',
      '    jump if_end.0',
      '  if_else.1:',
      '    a.0 = 3',
      '  if_end.0:',
      '    jump_if_zero a.0, cond_else.2',
      '    tmp.0 = 4',
      '    jump cond_end.3',
      '  cond_else.2:',
      '    tmp.0 = 5',
      '  cond_end.3:',
      '    return tmp.0',
      '    return 0',
      '',
    ]);
  });

  it('chooses the conversion instruction by size and signedness', () => {
    const { program, symbols } = tackySource(
      'long widen(int i, unsigned u) { return i + u; }\nint narrow(long l) { return l; }\nlong sext(int i) { return i; }',
    );
    expect(writeTacky(program).text).toBe(
      [
        'global function widen(i.0, u.1):',
        '    tmp.0 = i.0',
        '    tmp.1 = tmp.0 + u.1',
        '    tmp.2 = zero_extend tmp.1',
        '    return tmp.2',
        '    return 0',
        '',
        'global function narrow(l.2):',
        '    tmp.3 = truncate l.2',
        '    return tmp.3',
        '    return 0',
        '',
        'global function sext(i.3):',
        '    tmp.4 = sign_extend i.3',
        '    return tmp.4',
        '    return 0',
        '',
      ].join('\n'),
    );
    expect(symbols.get('tmp.1')).toEqual({ type: { kind: 'UInt' }, attrs: { kind: 'Local' } });
    expect(symbols.get('tmp.2')).toEqual({ type: { kind: 'Long' }, attrs: { kind: 'Local' } });
  });

  it('evaluates call arguments before the call', () => {
    expect(
      listing('int add(int a, int b) { return a + b; }\nint main(void) { return add(1, 2) * -3; }').slice(5, 10),
    ).toEqual([
      'global function main():',
      '    tmp.1 = add(1, 2)',
      '    tmp.2 = -3',
      '    tmp.3 = tmp.1 * tmp.2',
      '    return tmp.3',
    ]);
  });

  it('emits static storage after the functions and skips extern declarations', () => {
    const source =
      'static int hidden = 5;\nint shared;\nextern int ext;\nint main(void) { static long counter; return hidden; }';
    expect(listing(source)).toEqual([
      'global function main():',
      '    return hidden',
      '    return 0',
      '',
      'static int hidden = 5',
      'global static int shared = 0',
      'static long counter.0 = 0L',
      '',
    ]);
  });

  it('uses the requested line ending', () => {
    const { program } = tackySource('int main(void) { return 0; }');
    expect(writeTacky(program, { lineEnding: '\r\n' }).text).toBe(
      'global function main():\r\n    return 0\r\n    return 0\r\n',
    );
  });
});
