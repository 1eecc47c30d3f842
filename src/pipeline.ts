import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, Platform } from './formats/types.js';

/**
 * Pipeline stages a compilation can stop after. `validate` covers resolve, loop labeling and
 * typecheck; `codegen` covers assembly lowering.
 */
export type Stage = 'lex' | 'parse' | 'validate' | 'tacky' | 'codegen';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Target platform for the emitted assembly (default `linux`). */
  platform?: Platform;
  /** Run the pipeline up to and including this stage, then stop without producing artifacts. */
  stopAfter?: Stage;
  /** Emit assembly (`.s`). Defaults to true. */
  emitAssembly?: boolean;
  /** Emit the TAC listing (`.tac`). Defaults to false. */
  emitTacky?: boolean;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
