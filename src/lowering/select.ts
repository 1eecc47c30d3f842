import type { IntegerType } from '../frontend/ast.js';
import { InternalLoweringError } from '../diagnostics/errors.js';
import type { SymbolTable } from '../semantics/symbols.js';
import { isIntegerType, isSigned, sizeOf } from '../semantics/types.js';
import type {
  TackyBinaryOp,
  TackyFunction,
  TackyInstruction,
  TackyProgram,
  TackyStaticVariable,
  TackyValue,
} from '../tacky/ir.js';
import type {
  AsmBinaryOp,
  AsmFunction,
  AsmInstruction,
  AsmProgram,
  AsmStaticVariable,
  AsmType,
  CondCode,
  Operand,
} from '../x64/asm.js';
import { ARG_REGISTERS, imm, reg } from '../x64/asm.js';

export function asmTypeOf(t: IntegerType): AsmType {
  return sizeOf(t) === 4 ? 'Longword' : 'Quadword';
}

function condCode(op: TackyBinaryOp, signed: boolean): CondCode | undefined {
  switch (op) {
    case 'Equal':
      return 'E';
    case 'NotEqual':
      return 'NE';
    case 'LessThan':
      return signed ? 'L' : 'B';
    case 'LessOrEqual':
      return signed ? 'LE' : 'BE';
    case 'GreaterThan':
      return signed ? 'G' : 'A';
    case 'GreaterOrEqual':
      return signed ? 'GE' : 'AE';
    default:
      return undefined;
  }
}

function arithmeticOp(op: TackyBinaryOp, signed: boolean): AsmBinaryOp | undefined {
  switch (op) {
    case 'Add':
      return 'Add';
    case 'Subtract':
      return 'Sub';
    case 'Multiply':
      return 'Mult';
    case 'BitAnd':
      return 'And';
    case 'BitOr':
      return 'Or';
    case 'BitXor':
      return 'Xor';
    case 'ShiftLeft':
      return 'Sal';
    case 'ShiftRight':
      return signed ? 'Sar' : 'Shr';
    default:
      return undefined;
  }
}

/**
 * Naive instruction selection: one or more x86-64 instructions per TAC instruction, with every
 * variable still a `Pseudo` operand.
 */
export function selectInstructions(program: TackyProgram, symbols: SymbolTable): AsmProgram {
  const typeOf = (v: TackyValue): IntegerType => {
    if (v.kind === 'Constant') return v.value.type;
    const entry = symbols.get(v.name);
    if (!entry || !isIntegerType(entry.type)) {
      throw new InternalLoweringError(`variable "${v.name}" has no object entry in the symbol table`);
    }
    return entry.type;
  };
  const asmType = (v: TackyValue): AsmType => asmTypeOf(typeOf(v));
  const operand = (v: TackyValue): Operand =>
    v.kind === 'Constant' ? imm(v.value.value) : { kind: 'Pseudo', name: v.name };

  const selectCall = (name: string, args: TackyValue[], dst: TackyValue): AsmInstruction[] => {
    const out: AsmInstruction[] = [];
    const registerArgs = args.slice(0, ARG_REGISTERS.length);
    const stackArgs = args.slice(ARG_REGISTERS.length);
    // Keep %rsp 16-byte aligned at the call: pushes are 8 bytes each.
    const padding = stackArgs.length % 2 === 1 ? 8 : 0;
    if (padding > 0) out.push({ kind: 'AllocateStack', bytes: padding });

    registerArgs.forEach((arg, i) => {
      const r = ARG_REGISTERS[i];
      if (r === undefined) return;
      out.push({ kind: 'Mov', type: asmType(arg), src: operand(arg), dst: reg(r) });
    });

    for (const arg of [...stackArgs].reverse()) {
      const op = operand(arg);
      if (op.kind === 'Imm' || asmType(arg) === 'Quadword') {
        out.push({ kind: 'Push', operand: op });
      } else {
        // pushq would read 8 bytes from a 4-byte slot; go through %eax.
        out.push({ kind: 'Mov', type: 'Longword', src: op, dst: reg('AX') });
        out.push({ kind: 'Push', operand: reg('AX') });
      }
    }

    out.push({ kind: 'Call', name });
    const bytesToRemove = 8 * stackArgs.length + padding;
    if (bytesToRemove > 0) out.push({ kind: 'DeallocateStack', bytes: bytesToRemove });
    out.push({ kind: 'Mov', type: asmType(dst), src: reg('AX'), dst: operand(dst) });
    return out;
  };

  const selectInstruction = (instr: TackyInstruction): AsmInstruction[] => {
    switch (instr.kind) {
      case 'Return':
        return [
          { kind: 'Mov', type: asmType(instr.value), src: operand(instr.value), dst: reg('AX') },
          { kind: 'Ret' },
        ];
      case 'Copy':
        return [{ kind: 'Mov', type: asmType(instr.src), src: operand(instr.src), dst: operand(instr.dst) }];
      case 'SignExtend':
        return [{ kind: 'Movsx', src: operand(instr.src), dst: operand(instr.dst) }];
      case 'ZeroExtend':
        return [{ kind: 'MovZeroExtend', src: operand(instr.src), dst: operand(instr.dst) }];
      case 'Truncate':
        return [{ kind: 'Mov', type: 'Longword', src: operand(instr.src), dst: operand(instr.dst) }];
      case 'Unary': {
        const src = operand(instr.src);
        const dst = operand(instr.dst);
        if (instr.op === 'Not') {
          return [
            { kind: 'Cmp', type: asmType(instr.src), src: imm(0n), dst: src },
            { kind: 'Mov', type: asmType(instr.dst), src: imm(0n), dst },
            { kind: 'SetCC', cond: 'E', operand: dst },
          ];
        }
        const t = asmType(instr.src);
        return [
          { kind: 'Mov', type: t, src, dst },
          { kind: 'Unary', op: instr.op === 'Negate' ? 'Neg' : 'Not', type: t, operand: dst },
        ];
      }
      case 'Binary': {
        const leftType = typeOf(instr.left);
        const signed = isSigned(leftType);
        const t = asmTypeOf(leftType);
        const left = operand(instr.left);
        const right = operand(instr.right);
        const dst = operand(instr.dst);

        const cc = condCode(instr.op, signed);
        if (cc) {
          return [
            { kind: 'Cmp', type: t, src: right, dst: left },
            { kind: 'Mov', type: asmType(instr.dst), src: imm(0n), dst },
            { kind: 'SetCC', cond: cc, operand: dst },
          ];
        }

        if (instr.op === 'Divide' || instr.op === 'Remainder') {
          const result = reg(instr.op === 'Divide' ? 'AX' : 'DX');
          const divide: AsmInstruction[] = signed
            ? [
                { kind: 'Cdq', type: t },
                { kind: 'Idiv', type: t, operand: right },
              ]
            : [
                { kind: 'Mov', type: t, src: imm(0n), dst: reg('DX') },
                { kind: 'Div', type: t, operand: right },
              ];
          return [
            { kind: 'Mov', type: t, src: left, dst: reg('AX') },
            ...divide,
            { kind: 'Mov', type: t, src: result, dst },
          ];
        }

        const op = arithmeticOp(instr.op, signed);
        if (!op) throw new InternalLoweringError(`unsupported binary operator "${instr.op}"`);

        if (op === 'Sal' || op === 'Sar' || op === 'Shr') {
          if (right.kind === 'Imm') {
            const count = imm(BigInt.asUintN(8, right.value));
            return [
              { kind: 'Mov', type: t, src: left, dst },
              { kind: 'Binary', op, type: t, src: count, dst },
            ];
          }
          // Variable shift counts must be in %cl.
          return [
            { kind: 'Mov', type: t, src: left, dst },
            { kind: 'Mov', type: asmType(instr.right), src: right, dst: reg('CX') },
            { kind: 'Binary', op, type: t, src: reg('CX'), dst },
          ];
        }

        return [
          { kind: 'Mov', type: t, src: left, dst },
          { kind: 'Binary', op, type: t, src: right, dst },
        ];
      }
      case 'Jump':
        return [{ kind: 'Jmp', target: instr.target }];
      case 'JumpIfZero':
      case 'JumpIfNotZero':
        return [
          { kind: 'Cmp', type: asmType(instr.condition), src: imm(0n), dst: operand(instr.condition) },
          { kind: 'JmpCC', cond: instr.kind === 'JumpIfZero' ? 'E' : 'NE', target: instr.target },
        ];
      case 'Label':
        return [{ kind: 'Label', name: instr.name }];
      case 'FunCall':
        return selectCall(instr.name, instr.args, instr.dst);
    }
  };

  const selectFunction = (fn: TackyFunction): AsmFunction => {
    const params: AsmInstruction[] = fn.params.map((name, i) => {
      const t = asmType({ kind: 'Var', name });
      const r = ARG_REGISTERS[i];
      // Stack arguments sit above the saved %rbp and the return address.
      const src: Operand = r !== undefined ? reg(r) : { kind: 'Stack', offset: 16 + 8 * (i - ARG_REGISTERS.length) };
      return { kind: 'Mov', type: t, src, dst: { kind: 'Pseudo', name } };
    });
    return {
      kind: 'Function',
      name: fn.name,
      global: fn.global,
      instructions: [...params, ...fn.body.flatMap(selectInstruction)],
    };
  };

  const selectStatic = (v: TackyStaticVariable): AsmStaticVariable => ({
    kind: 'StaticVariable',
    name: v.name,
    global: v.global,
    alignment: sizeOf(v.type),
    init: v.init.value,
    type: asmTypeOf(v.type),
  });

  return {
    topLevels: program.topLevels.map((tl) =>
      tl.kind === 'Function' ? selectFunction(tl) : selectStatic(tl),
    ),
  };
}
