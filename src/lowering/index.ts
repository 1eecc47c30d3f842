import type { SymbolTable } from '../semantics/symbols.js';
import type { TackyProgram } from '../tacky/ir.js';
import type { AsmProgram, BackendSymbolTable } from '../x64/asm.js';
import { buildBackendSymbols, replacePseudos } from './frame.js';
import { legalize } from './legalize.js';
import { selectInstructions } from './select.js';

export interface AssemblyResult {
  program: AsmProgram;
  symbols: BackendSymbolTable;
}

/**
 * Lower a TAC program to x86-64: instruction selection, frame layout, then legalization.
 */
export function generateAssembly(program: TackyProgram, symbols: SymbolTable): AssemblyResult {
  const backendSymbols = buildBackendSymbols(symbols);
  const selected = selectInstructions(program, symbols);
  const placed = replacePseudos(selected, backendSymbols);
  return { program: legalize(placed), symbols: backendSymbols };
}

export { buildBackendSymbols, layoutFunction, replacePseudos } from './frame.js';
export { LEGALIZE_RULES, isLargeImmediate, legalize, legalizeInstruction } from './legalize.js';
export type { LegalizeRule } from './legalize.js';
export { asmTypeOf, selectInstructions } from './select.js';
