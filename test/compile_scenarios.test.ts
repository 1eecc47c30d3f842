import { describe, expect, it } from 'vitest';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile, compileSource } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { writeAssembly } from '../src/formats/writeAssembly.js';
import type { FormatWriters } from '../src/formats/types.js';
import type { CompilerOptions } from '../src/pipeline.js';
import { FILE } from './helpers/pipeline.js';

const fixtures = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');
const deps = { formats: defaultFormatWriters };
const run = (source: string, options: CompilerOptions = {}) => compileSource(FILE, source, options, deps);

describe('compileSource', () => {
  it('compiles a function returning a constant to a Linux assembly artifact', () => {
    const res = run('int main(void) { return 42; }');
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([
      {
        kind: 'asm',
        text: [
          '\t.globl\tmain',
          '\t.text',
          'main:',
          '\tpushq\t%rbp',
          '\tmovq\t%rsp, %rbp',
          '\tmovl\t$42, %eax',
          '\tmovq\t%rbp, %rsp',
          '\tpopq\t%rbp',
          '\tret',
          '\tmovl\t$0, %eax',
          '\tmovq\t%rbp, %rsp',
          '\tpopq\t%rbp',
          '\tret',
          '',
          '\t.section\t.note.GNU-stack,"",@progbits',
          '',
        ].join('\n'),
      },
    ]);
  });

  it('reports a multi-declarator declaration as a parse error', () => {
    expect(run('int x, y;')).toEqual({
      diagnostics: [
        {
          id: 'CND200',
          severity: 'error',
          message: 'Expected ";" but found ","',
          file: FILE,
          line: 1,
          column: 6,
        },
      ],
      artifacts: [],
    });
  });

  it('writes a TAC listing next to the assembly when asked', () => {
    const res = run('int main(void){ int y = 10; return y; }', { emitTacky: true });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm', 'tac']);
    expect(res.artifacts[1]?.text).toBe('global function main():\n    y.0 = 10\n    return y.0\n    return 0\n');
  });

  it('reports an initializer on a local extern declaration', () => {
    expect(run('int main(void) { extern int x = 1; return x; }').diagnostics).toEqual([
      {
        id: 'CND403',
        severity: 'error',
        message: 'Initializer on local extern variable declaration "x"',
        file: FILE,
        line: 1,
        column: 33,
      },
    ]);
  });

  it('reports a second definition of a function', () => {
    const res = run('int foo(void);\nint foo(void) { return 0; }\nint foo(void) { return 1; }');
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      { id: 'CND401', severity: 'error', message: 'Redefinition of "foo"', file: FILE, line: 3, column: 1 },
    ]);
  });

  it('stops after the requested stage without producing artifacts', () => {
    expect(run('int x, y;', { stopAfter: 'lex' })).toEqual({ diagnostics: [], artifacts: [] });
    expect(run('int main(void) { return x; }', { stopAfter: 'parse' })).toEqual({
      diagnostics: [],
      artifacts: [],
    });
    expect(run('int main(void) { return x; }', { stopAfter: 'validate' }).diagnostics).toMatchObject([
      { id: 'CND301', message: 'Use of undeclared variable "x"' },
    ]);
    expect(run('int main(void) { return 1; }', { stopAfter: 'tacky' })).toEqual({ diagnostics: [], artifacts: [] });
    expect(run('int main(void) { return 1; }', { stopAfter: 'codegen' })).toEqual({
      diagnostics: [],
      artifacts: [],
    });
  });

  it('runs every stage and emits when no stop stage is given', () => {
    const source = 'int main(void) { return 7; }';
    expect(run(source, { stopAfter: 'codegen' }).artifacts).toEqual([]);
    const full = run(source);
    expect(full.diagnostics).toEqual([]);
    expect(full.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(full.artifacts[0]?.text.split('\n')).toContain('\tmovl\t$7, %eax');
  });

  it('honors the platform and the assembly switch', () => {
    const mac = run('int main(void) { return 0; }', { platform: 'macos' });
    expect(mac.artifacts[0]?.text.split('\n')).toContain('_main:');
    expect(run('int main(void) { return 0; }', { emitAssembly: false }).artifacts).toEqual([]);
  });

  it('warns when a TAC listing is requested without a writer', () => {
    const formats: FormatWriters = { writeAssembly };
    const res = compileSource(FILE, 'int main(void) { return 0; }', { emitTacky: true }, { formats });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(res.diagnostics).toEqual([
      {
        id: 'CND000',
        severity: 'warning',
        message: 'emitTacky=true but no TAC writer is configured; skipping .tac artifact.',
        file: FILE,
      },
    ]);
  });

  it('turns an unexpected exception into an internal error diagnostic', () => {
    const formats: FormatWriters = {
      writeAssembly: () => {
        throw new Error('writer exploded');
      },
    };
    expect(compileSource(FILE, 'int main(void) { return 0; }', {}, { formats })).toEqual({
      diagnostics: [{ id: 'CND001', severity: 'error', message: 'Internal error: writer exploded', file: FILE }],
      artifacts: [],
    });
  });
});

describe('compile', () => {
  it('reads and compiles a source file', async () => {
    const res = await compile(join(fixtures, 'return_42.c'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts[0]?.text.split('\n')).toContain('\tmovl\t$42, %eax');
  });

  it('compiles loops, calls and statics together', async () => {
    const res = await compile(join(fixtures, 'sum_loop.c'), { emitTacky: true }, deps);
    expect(res.diagnostics).toEqual([]);
    const asm = res.artifacts[0]?.text.split('\n') ?? [];
    expect(asm.slice(0, 4)).toEqual(['\t.bss', '\t.balign\t8', 'total:', '\t.zero\t8']);
    expect(asm).toContain('\tcall\tadd');
    const tac = res.artifacts[1]?.text.split('\n') ?? [];
    expect(tac).toContain('  continue_for.0:');
    expect(tac).toContain('static long total = 0L');
  });

  it('reports lexer errors with the resolved path', async () => {
    const path = join(fixtures, 'bad_token.c');
    const res = await compile(path, {}, deps);
    expect(res.diagnostics).toEqual([
      { id: 'CND100', severity: 'error', message: 'Unexpected character "@"', file: resolve(path), line: 2, column: 12 },
    ]);
  });

  it('reports a file that cannot be read', async () => {
    const path = join(fixtures, 'missing.c');
    const res = await compile(path, {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({ id: 'CND002', severity: 'error', file: resolve(path) });
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file: ')).toBe(true);
  });
});
