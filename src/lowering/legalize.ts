import type { AsmInstruction, AsmProgram, AsmType, Operand } from '../x64/asm.js';
import { DST_SCRATCH, SRC_SCRATCH, imm, isMemory, reg } from '../x64/asm.js';

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

/** Immediate that does not fit the sign-extended 32-bit field of an x86-64 instruction. */
export function isLargeImmediate(op: Operand): boolean {
  return op.kind === 'Imm' && (op.value < INT32_MIN || op.value > INT32_MAX);
}

const src = reg(SRC_SCRATCH);
const dst = reg(DST_SCRATCH);

const mov = (type: AsmType, from: Operand, to: Operand): AsmInstruction => ({
  kind: 'Mov',
  type,
  src: from,
  dst: to,
});

/** A 32-bit immediate as the assembler reads it: the low 32 bits, sign-extended. */
const asLongword = (op: Operand): Operand =>
  op.kind === 'Imm' && isLargeImmediate(op) ? imm(BigInt.asIntN(32, op.value)) : op;

/**
 * One guarded rewrite. Returns the replacement sequence, or undefined when the rule does not
 * apply to this instruction.
 */
export interface LegalizeRule {
  name: string;
  rewrite(instr: AsmInstruction): AsmInstruction[] | undefined;
}

/**
 * Rewrite rules, in priority order. The first rule that matches wins, and its output is legalized
 * again, so a rule only has to fix one violation.
 */
export const LEGALIZE_RULES: readonly LegalizeRule[] = [
  {
    name: 'longword-immediate',
    rewrite(i) {
      if ((i.kind === 'Mov' || i.kind === 'Binary' || i.kind === 'Cmp') && i.type === 'Longword') {
        if (!isLargeImmediate(i.src) && !isLargeImmediate(i.dst)) return undefined;
        return [{ ...i, src: asLongword(i.src), dst: asLongword(i.dst) }];
      }
      return undefined;
    },
  },
  {
    name: 'mov-memory-to-memory',
    rewrite(i) {
      if (i.kind !== 'Mov' || !isMemory(i.src) || !isMemory(i.dst)) return undefined;
      return [mov(i.type, i.src, src), mov(i.type, src, i.dst)];
    },
  },
  {
    name: 'mov-large-immediate-to-memory',
    rewrite(i) {
      if (i.kind !== 'Mov' || !isLargeImmediate(i.src) || !isMemory(i.dst)) return undefined;
      return [mov('Quadword', i.src, src), mov('Quadword', src, i.dst)];
    },
  },
  {
    name: 'movsx-immediate-source',
    rewrite(i) {
      if (i.kind !== 'Movsx' || i.src.kind !== 'Imm') return undefined;
      return [mov('Longword', i.src, src), { ...i, src }];
    },
  },
  {
    name: 'movsx-memory-destination',
    rewrite(i) {
      if (i.kind !== 'Movsx' || !isMemory(i.dst)) return undefined;
      return [{ ...i, dst }, mov('Quadword', dst, i.dst)];
    },
  },
  {
    // A 32-bit move into a register clears the upper half.
    name: 'zero-extend-to-register',
    rewrite(i) {
      if (i.kind !== 'MovZeroExtend' || i.dst.kind !== 'Reg') return undefined;
      return [mov('Longword', i.src, i.dst)];
    },
  },
  {
    name: 'zero-extend-to-memory',
    rewrite(i) {
      if (i.kind !== 'MovZeroExtend') return undefined;
      return [mov('Longword', i.src, dst), mov('Quadword', dst, i.dst)];
    },
  },
  {
    name: 'divide-by-immediate',
    rewrite(i) {
      if ((i.kind !== 'Idiv' && i.kind !== 'Div') || i.operand.kind !== 'Imm') return undefined;
      return [mov(i.type, i.operand, src), { ...i, operand: src }];
    },
  },
  {
    name: 'binary-large-immediate',
    rewrite(i) {
      if (i.kind !== 'Binary' || !isLargeImmediate(i.src)) return undefined;
      return [mov('Quadword', i.src, src), { ...i, src }];
    },
  },
  {
    name: 'binary-memory-to-memory',
    rewrite(i) {
      if (i.kind !== 'Binary' || !isMemory(i.src) || !isMemory(i.dst)) return undefined;
      return [mov(i.type, i.src, src), { ...i, src }];
    },
  },
  {
    // imul cannot write to memory.
    name: 'multiply-into-memory',
    rewrite(i) {
      if (i.kind !== 'Binary' || i.op !== 'Mult' || !isMemory(i.dst)) return undefined;
      return [mov(i.type, i.dst, dst), { ...i, dst }, mov(i.type, dst, i.dst)];
    },
  },
  {
    name: 'cmp-large-immediate',
    rewrite(i) {
      if (i.kind !== 'Cmp' || !isLargeImmediate(i.src)) return undefined;
      return [mov('Quadword', i.src, src), { ...i, src }];
    },
  },
  {
    name: 'cmp-memory-to-memory',
    rewrite(i) {
      if (i.kind !== 'Cmp' || !isMemory(i.src) || !isMemory(i.dst)) return undefined;
      return [mov(i.type, i.src, src), { ...i, src }];
    },
  },
  {
    name: 'cmp-immediate-destination',
    rewrite(i) {
      if (i.kind !== 'Cmp' || i.dst.kind !== 'Imm') return undefined;
      return [mov(i.type, i.dst, dst), { ...i, dst }];
    },
  },
  {
    name: 'push-large-immediate',
    rewrite(i) {
      if (i.kind !== 'Push' || !isLargeImmediate(i.operand)) return undefined;
      return [mov('Quadword', i.operand, src), { ...i, operand: src }];
    },
  },
];

export function legalizeInstruction(
  instr: AsmInstruction,
  rules: readonly LegalizeRule[] = LEGALIZE_RULES,
): AsmInstruction[] {
  for (const rule of rules) {
    const out = rule.rewrite(instr);
    if (out) return out.flatMap((i) => legalizeInstruction(i, rules));
  }
  return [instr];
}

/**
 * Fix operand combinations the hardware does not encode, using `%r10` and `%r11` as scratch.
 */
export function legalize(program: AsmProgram): AsmProgram {
  return {
    topLevels: program.topLevels.map((tl) =>
      tl.kind === 'Function'
        ? { ...tl, instructions: tl.instructions.flatMap((i) => legalizeInstruction(i)) }
        : tl,
    ),
  };
}
