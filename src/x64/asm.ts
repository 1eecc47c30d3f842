/**
 * x86-64 assembly contracts produced by lowering and consumed by the text emitter.
 */

/** Operand width: 32-bit (`l` suffix) or 64-bit (`q` suffix). */
export type AsmType = 'Longword' | 'Quadword';

export type Reg = 'AX' | 'CX' | 'DX' | 'DI' | 'SI' | 'R8' | 'R9' | 'R10' | 'R11' | 'SP';

/** Registers that carry the first six integer arguments, in order. */
export const ARG_REGISTERS: readonly Reg[] = ['DI', 'SI', 'DX', 'CX', 'R8', 'R9'];

/** Scratch register for rewriting source operands; used by nothing but legalization. */
export const SRC_SCRATCH: Reg = 'R10';
/** Scratch register for rewriting destination operands; used by nothing but legalization. */
export const DST_SCRATCH: Reg = 'R11';

export type Operand =
  | { kind: 'Imm'; value: bigint }
  | { kind: 'Reg'; reg: Reg }
  /** Not-yet-placed variable; replaced by `Stack` or `Data` during frame layout. */
  | { kind: 'Pseudo'; name: string }
  /** `offset(%rbp)` */
  | { kind: 'Stack'; offset: number }
  /** `name(%rip)` */
  | { kind: 'Data'; name: string };

export type CondCode = 'E' | 'NE' | 'G' | 'GE' | 'L' | 'LE' | 'A' | 'AE' | 'B' | 'BE';

export type AsmUnaryOp = 'Neg' | 'Not';

export type AsmBinaryOp = 'Add' | 'Sub' | 'Mult' | 'And' | 'Or' | 'Xor' | 'Sal' | 'Sar' | 'Shr';

export type AsmInstruction =
  | { kind: 'Mov'; type: AsmType; src: Operand; dst: Operand }
  /** Sign-extend a longword into a quadword (`movslq`). */
  | { kind: 'Movsx'; src: Operand; dst: Operand }
  /** Zero-extend a longword into a quadword; legalization turns this into plain moves. */
  | { kind: 'MovZeroExtend'; src: Operand; dst: Operand }
  | { kind: 'Unary'; op: AsmUnaryOp; type: AsmType; operand: Operand }
  | { kind: 'Binary'; op: AsmBinaryOp; type: AsmType; src: Operand; dst: Operand }
  /** `cmp src, dst` sets flags from `dst - src`. */
  | { kind: 'Cmp'; type: AsmType; src: Operand; dst: Operand }
  | { kind: 'Idiv'; type: AsmType; operand: Operand }
  | { kind: 'Div'; type: AsmType; operand: Operand }
  /** `cdq` / `cqo` */
  | { kind: 'Cdq'; type: AsmType }
  | { kind: 'Jmp'; target: string }
  | { kind: 'JmpCC'; cond: CondCode; target: string }
  | { kind: 'SetCC'; cond: CondCode; operand: Operand }
  | { kind: 'Label'; name: string }
  | { kind: 'AllocateStack'; bytes: number }
  | { kind: 'DeallocateStack'; bytes: number }
  | { kind: 'Push'; operand: Operand }
  | { kind: 'Call'; name: string }
  | { kind: 'Ret' };

export interface AsmFunction {
  kind: 'Function';
  name: string;
  global: boolean;
  instructions: AsmInstruction[];
}

export interface AsmStaticVariable {
  kind: 'StaticVariable';
  name: string;
  global: boolean;
  alignment: 4 | 8;
  /** Initial value, already wrapped to the variable's width. */
  init: bigint;
  type: AsmType;
}

export type AsmTopLevel = AsmFunction | AsmStaticVariable;

export interface AsmProgram {
  topLevels: AsmTopLevel[];
}

export type BackendSymbolEntry =
  | { kind: 'Obj'; type: AsmType; isStatic: boolean }
  | { kind: 'Fun'; defined: boolean };

/**
 * Backend symbol table: what the emitter and frame layout need to know per identifier.
 */
export type BackendSymbolTable = ReadonlyMap<string, BackendSymbolEntry>;

export function isMemory(op: Operand): boolean {
  return op.kind === 'Stack' || op.kind === 'Data';
}

export function sizeOfAsmType(t: AsmType): 4 | 8 {
  return t === 'Longword' ? 4 : 8;
}

export const reg = (r: Reg): Operand => ({ kind: 'Reg', reg: r });
export const imm = (value: bigint): Operand => ({ kind: 'Imm', value });
