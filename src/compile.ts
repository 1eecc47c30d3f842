import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { CompileError } from './diagnostics/errors.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps, Stage } from './pipeline.js';

import { lex } from './frontend/lexer.js';
import { parse } from './frontend/parser.js';
import { resolveProgram } from './semantics/resolve.js';
import { labelLoops } from './semantics/loopLabels.js';
import { emptySymbolTable } from './semantics/symbols.js';
import { typecheckProgram } from './semantics/typecheck.js';
import { generateTacky } from './tacky/generate.js';
import { generateAssembly } from './lowering/index.js';
import type { Artifact } from './formats/types.js';

const STAGES: readonly Stage[] = ['lex', 'parse', 'validate', 'tacky', 'codegen'];

function withDefaults(
  options: CompilerOptions,
): Required<Pick<CompilerOptions, 'emitAssembly' | 'emitTacky' | 'platform'>> {
  return {
    emitAssembly: options.emitAssembly ?? true,
    emitTacky: options.emitTacky ?? false,
    platform: options.platform ?? 'linux',
  };
}

function internalError(file: string, err: unknown): Diagnostic {
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error: ${err instanceof Error ? err.message : String(err)}`,
    file,
  };
}

/**
 * Compile one translation unit held in memory.
 *
 * Runs every pass in order; the first failure becomes the only diagnostic and no artifacts are
 * produced. With `stopAfter`, the passes up to and including that stage run and nothing is
 * emitted.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const stopAfter = options.stopAfter;
  const reached = (stage: Stage): boolean =>
    stopAfter !== undefined && STAGES.indexOf(stage) >= STAGES.indexOf(stopAfter);
  const done: CompileResult = { diagnostics: [], artifacts: [] };

  try {
    const tokens = lex(path, text);
    if (reached('lex')) return done;

    const ast = parse(path, tokens);
    if (reached('parse')) return done;

    const resolved = labelLoops(resolveProgram(ast));
    const checked = typecheckProgram(resolved, emptySymbolTable);
    if (reached('validate')) return done;

    const tacky = generateTacky(checked.program, checked.symbols);
    if (reached('tacky')) return done;

    const asm = generateAssembly(tacky.program, tacky.symbols);
    if (reached('codegen')) return done;

    const emit = withDefaults(options);
    const diagnostics: Diagnostic[] = [];
    const artifacts: Artifact[] = [];
    if (emit.emitAssembly) {
      artifacts.push(deps.formats.writeAssembly(asm.program, asm.symbols, { platform: emit.platform }));
    }
    if (emit.emitTacky) {
      if (deps.formats.writeTacky) {
        artifacts.push(deps.formats.writeTacky(tacky.program));
      } else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'emitTacky=true but no TAC writer is configured; skipping .tac artifact.',
          file: path,
        });
      }
    }
    return { diagnostics, artifacts };
  } catch (err) {
    const diagnostic = err instanceof CompileError ? err.toDiagnostic(path) : internalError(path, err);
    return { diagnostics: [diagnostic], artifacts: [] };
  }
}

/**
 * Compile a C source file.
 *
 * Reads the entry file and hands its text to {@link compileSource}. Artifacts are produced
 * in-memory via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }
  return compileSource(entryPath, text, options, deps);
};
