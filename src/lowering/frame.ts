import { InternalLoweringError } from '../diagnostics/errors.js';
import type { SymbolTable } from '../semantics/symbols.js';
import { isIntegerType } from '../semantics/types.js';
import type {
  AsmFunction,
  AsmInstruction,
  AsmProgram,
  BackendSymbolEntry,
  BackendSymbolTable,
  Operand,
} from '../x64/asm.js';
import { sizeOfAsmType } from '../x64/asm.js';
import { asmTypeOf } from './select.js';

const alignTo = (n: number, a: number) => (a <= 0 ? n : Math.ceil(n / a) * a);

/**
 * Project the frontend symbol table onto what the backend needs: operand width and storage for
 * objects, definedness for functions.
 */
export function buildBackendSymbols(symbols: SymbolTable): BackendSymbolTable {
  const out = new Map<string, BackendSymbolEntry>();
  for (const [name, entry] of symbols) {
    if (entry.attrs.kind === 'Fun') {
      out.set(name, { kind: 'Fun', defined: entry.attrs.defined });
    } else if (isIntegerType(entry.type)) {
      out.set(name, {
        kind: 'Obj',
        type: asmTypeOf(entry.type),
        isStatic: entry.attrs.kind === 'Static',
      });
    }
  }
  return out;
}

/**
 * Replace every `Pseudo` operand in one function.
 *
 * Static objects become `Data` operands; everything else gets a slot below `%rbp`, aligned to its
 * own width, in order of first appearance. Returns the frame size (a multiple of 16) with
 * `AllocateStack` prepended when it is non-zero.
 */
export function layoutFunction(
  fn: AsmFunction,
  symbols: BackendSymbolTable,
): { fn: AsmFunction; frameSize: number } {
  const slots = new Map<string, number>();
  let used = 0;

  const place = (op: Operand): Operand => {
    if (op.kind !== 'Pseudo') return op;
    const entry = symbols.get(op.name);
    if (entry?.kind !== 'Obj') {
      throw new InternalLoweringError(`pseudo register "${op.name}" has no object entry`);
    }
    if (entry.isStatic) return { kind: 'Data', name: op.name };
    let offset = slots.get(op.name);
    if (offset === undefined) {
      const size = sizeOfAsmType(entry.type);
      used = alignTo(used + size, size);
      offset = -used;
      slots.set(op.name, offset);
    }
    return { kind: 'Stack', offset };
  };

  const rewrite = (instr: AsmInstruction): AsmInstruction => {
    switch (instr.kind) {
      case 'Mov':
      case 'Movsx':
      case 'MovZeroExtend':
      case 'Binary':
      case 'Cmp':
        return { ...instr, src: place(instr.src), dst: place(instr.dst) };
      case 'Unary':
      case 'Idiv':
      case 'Div':
      case 'SetCC':
      case 'Push':
        return { ...instr, operand: place(instr.operand) };
      default:
        return instr;
    }
  };

  const instructions = fn.instructions.map(rewrite);
  const frameSize = alignTo(used, 16);
  const prologue: AsmInstruction[] = frameSize > 0 ? [{ kind: 'AllocateStack', bytes: frameSize }] : [];
  return { fn: { ...fn, instructions: [...prologue, ...instructions] }, frameSize };
}

export function replacePseudos(program: AsmProgram, symbols: BackendSymbolTable): AsmProgram {
  return {
    topLevels: program.topLevels.map((tl) =>
      tl.kind === 'Function' ? layoutFunction(tl, symbols).fn : tl,
    ),
  };
}
