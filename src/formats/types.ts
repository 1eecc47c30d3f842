import type { TackyProgram } from '../tacky/ir.js';
import type { AsmProgram, BackendSymbolTable } from '../x64/asm.js';

/**
 * Target platform. Selects label and symbol prefixes and the trailing note section.
 */
export type Platform = 'linux' | 'macos';

/**
 * Options for `.s` emission.
 */
export interface WriteAssemblyOptions {
  /** Defaults to `linux`. */
  platform?: Platform;
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for the `.tac` listing.
 */
export interface WriteTackyOptions {
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory `.s` artifact (AT&T syntax).
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory TAC listing artifact.
 */
export interface TacArtifact {
  kind: 'tac';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | TacArtifact;

/**
 * Format writers used by the pipeline to turn lowered programs into artifacts.
 */
export interface FormatWriters {
  writeAssembly(
    program: AsmProgram,
    symbols: BackendSymbolTable,
    opts?: WriteAssemblyOptions,
  ): AsmArtifact;
  writeTacky?(program: TackyProgram, opts?: WriteTackyOptions): TacArtifact;
}
