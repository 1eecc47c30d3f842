import { InternalLoweringError } from '../diagnostics/errors.js';
import type {
  AsmBinaryOp,
  AsmFunction,
  AsmInstruction,
  AsmProgram,
  AsmStaticVariable,
  AsmType,
  BackendSymbolTable,
  Operand,
  Reg,
} from '../x64/asm.js';
import { sizeOfAsmType } from '../x64/asm.js';
import type { AsmArtifact, Platform, WriteAssemblyOptions } from './types.js';

type Width = 1 | 4 | 8;

const REGISTER_NAMES: Record<Reg, Record<Width, string>> = {
  AX: { 1: '%al', 4: '%eax', 8: '%rax' },
  CX: { 1: '%cl', 4: '%ecx', 8: '%rcx' },
  DX: { 1: '%dl', 4: '%edx', 8: '%rdx' },
  DI: { 1: '%dil', 4: '%edi', 8: '%rdi' },
  SI: { 1: '%sil', 4: '%esi', 8: '%rsi' },
  R8: { 1: '%r8b', 4: '%r8d', 8: '%r8' },
  R9: { 1: '%r9b', 4: '%r9d', 8: '%r9' },
  R10: { 1: '%r10b', 4: '%r10d', 8: '%r10' },
  R11: { 1: '%r11b', 4: '%r11d', 8: '%r11' },
  SP: { 1: '%spl', 4: '%esp', 8: '%rsp' },
};

const BINARY_MNEMONICS: Record<AsmBinaryOp, string> = {
  Add: 'add',
  Sub: 'sub',
  Mult: 'imul',
  And: 'and',
  Or: 'or',
  Xor: 'xor',
  Sal: 'sal',
  Sar: 'sar',
  Shr: 'shr',
};

const suffix = (t: AsmType): string => (t === 'Longword' ? 'l' : 'q');

const ins = (mnemonic: string, ...operands: string[]): string =>
  operands.length === 0 ? `\t${mnemonic}` : `\t${mnemonic}\t${operands.join(', ')}`;

/**
 * Render an x86-64 program as AT&T-syntax assembly text.
 *
 * Static variables come first (`.data`, or `.bss` when zero-initialized), then functions under
 * `.text`. On Linux, calls to functions not defined in this unit go through the PLT and the file
 * ends with a non-executable-stack note.
 */
export function writeAssembly(
  program: AsmProgram,
  symbols: BackendSymbolTable,
  opts?: WriteAssemblyOptions,
): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const platform: Platform = opts?.platform ?? 'linux';

  const symbolName = (name: string): string => (platform === 'macos' ? `_${name}` : name);
  const localLabel = (name: string): string => (platform === 'macos' ? `L${name}` : `.L${name}`);
  const callTarget = (name: string): string => {
    const entry = symbols.get(name);
    const defined = entry?.kind === 'Fun' && entry.defined;
    return platform === 'linux' && !defined ? `${name}@PLT` : symbolName(name);
  };

  const operand = (op: Operand, width: Width): string => {
    switch (op.kind) {
      case 'Imm':
        return `$${op.value}`;
      case 'Reg':
        return REGISTER_NAMES[op.reg][width];
      case 'Stack':
        return `${op.offset}(%rbp)`;
      case 'Data':
        return `${symbolName(op.name)}(%rip)`;
      case 'Pseudo':
        throw new InternalLoweringError(`pseudo register "${op.name}" reached the emitter`);
    }
  };

  const instruction = (i: AsmInstruction): string[] => {
    switch (i.kind) {
      case 'Mov': {
        const w = sizeOfAsmType(i.type);
        return [ins(`mov${suffix(i.type)}`, operand(i.src, w), operand(i.dst, w))];
      }
      case 'Movsx':
        return [ins('movslq', operand(i.src, 4), operand(i.dst, 8))];
      case 'MovZeroExtend':
        throw new InternalLoweringError('zero extension reached the emitter without legalization');
      case 'Unary': {
        const mnemonic = i.op === 'Neg' ? 'neg' : 'not';
        return [ins(`${mnemonic}${suffix(i.type)}`, operand(i.operand, sizeOfAsmType(i.type)))];
      }
      case 'Binary': {
        const w = sizeOfAsmType(i.type);
        const isShift = i.op === 'Sal' || i.op === 'Sar' || i.op === 'Shr';
        // Shift counts are a byte: %cl, or an 8-bit immediate.
        const srcWidth: Width = isShift ? 1 : w;
        return [ins(`${BINARY_MNEMONICS[i.op]}${suffix(i.type)}`, operand(i.src, srcWidth), operand(i.dst, w))];
      }
      case 'Cmp': {
        const w = sizeOfAsmType(i.type);
        return [ins(`cmp${suffix(i.type)}`, operand(i.src, w), operand(i.dst, w))];
      }
      case 'Idiv':
        return [ins(`idiv${suffix(i.type)}`, operand(i.operand, sizeOfAsmType(i.type)))];
      case 'Div':
        return [ins(`div${suffix(i.type)}`, operand(i.operand, sizeOfAsmType(i.type)))];
      case 'Cdq':
        return [ins(i.type === 'Longword' ? 'cdq' : 'cqo')];
      case 'Jmp':
        return [ins('jmp', localLabel(i.target))];
      case 'JmpCC':
        return [ins(`j${i.cond.toLowerCase()}`, localLabel(i.target))];
      case 'SetCC':
        return [ins(`set${i.cond.toLowerCase()}`, operand(i.operand, 1))];
      case 'Label':
        return [`${localLabel(i.name)}:`];
      case 'AllocateStack':
        return [ins('subq', `$${i.bytes}`, '%rsp')];
      case 'DeallocateStack':
        return [ins('addq', `$${i.bytes}`, '%rsp')];
      case 'Push':
        return [ins('pushq', operand(i.operand, 8))];
      case 'Call':
        return [ins('call', callTarget(i.name))];
      case 'Ret':
        return [ins('movq', '%rbp', '%rsp'), ins('popq', '%rbp'), ins('ret')];
    }
  };

  const staticVariable = (v: AsmStaticVariable): string[] => {
    const lines: string[] = [];
    const name = symbolName(v.name);
    if (v.global) lines.push(ins('.globl', name));
    if (v.init === 0n) {
      lines.push(ins('.bss'), ins('.balign', String(v.alignment)), `${name}:`);
      lines.push(ins('.zero', String(sizeOfAsmType(v.type))));
    } else {
      lines.push(ins('.data'), ins('.balign', String(v.alignment)), `${name}:`);
      lines.push(ins(v.type === 'Longword' ? '.long' : '.quad', String(v.init)));
    }
    return lines;
  };

  const fn = (f: AsmFunction): string[] => {
    const name = symbolName(f.name);
    const lines: string[] = [];
    if (f.global) lines.push(ins('.globl', name));
    lines.push(ins('.text'), `${name}:`, ins('pushq', '%rbp'), ins('movq', '%rsp', '%rbp'));
    for (const i of f.instructions) lines.push(...instruction(i));
    return lines;
  };

  const blocks: string[][] = [];
  for (const tl of program.topLevels) if (tl.kind === 'StaticVariable') blocks.push(staticVariable(tl));
  for (const tl of program.topLevels) if (tl.kind === 'Function') blocks.push(fn(tl));
  if (platform === 'linux') blocks.push([ins('.section', '.note.GNU-stack,"",@progbits')]);

  const lines = blocks.flatMap((b, idx) => (idx === 0 ? b : ['', ...b]));
  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
