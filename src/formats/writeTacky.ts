import type { ConstValue } from '../frontend/ast.js';
import { typeToString } from '../semantics/types.js';
import type {
  TackyBinaryOp,
  TackyFunction,
  TackyInstruction,
  TackyProgram,
  TackyStaticVariable,
  TackyUnaryOp,
  TackyValue,
} from '../tacky/ir.js';
import type { TacArtifact, WriteTackyOptions } from './types.js';

const UNARY_SYMBOLS: Record<TackyUnaryOp, string> = { Negate: '-', Complement: '~', Not: '!' };

const BINARY_SYMBOLS: Record<TackyBinaryOp, string> = {
  Add: '+',
  Subtract: '-',
  Multiply: '*',
  Divide: '/',
  Remainder: '%',
  BitAnd: '&',
  BitOr: '|',
  BitXor: '^',
  ShiftLeft: '<<',
  ShiftRight: '>>',
  Equal: '==',
  NotEqual: '!=',
  LessThan: '<',
  LessOrEqual: '<=',
  GreaterThan: '>',
  GreaterOrEqual: '>=',
};

const CONSTANT_SUFFIXES = { Int: '', UInt: 'U', Long: 'L', ULong: 'UL' } as const;

export function formatConstant(c: ConstValue): string {
  return `${c.value}${CONSTANT_SUFFIXES[c.type.kind]}`;
}

export function formatValue(v: TackyValue): string {
  return v.kind === 'Constant' ? formatConstant(v.value) : v.name;
}

/**
 * One listing line per instruction. Labels are indented less than instructions.
 */
export function formatInstruction(i: TackyInstruction): string {
  const v = formatValue;
  switch (i.kind) {
    case 'Return':
      return `    return ${v(i.value)}`;
    case 'SignExtend':
      return `    ${v(i.dst)} = sign_extend ${v(i.src)}`;
    case 'ZeroExtend':
      return `    ${v(i.dst)} = zero_extend ${v(i.src)}`;
    case 'Truncate':
      return `    ${v(i.dst)} = truncate ${v(i.src)}`;
    case 'Copy':
      return `    ${v(i.dst)} = ${v(i.src)}`;
    case 'Unary':
      return `    ${v(i.dst)} = ${UNARY_SYMBOLS[i.op]}${v(i.src)}`;
    case 'Binary':
      return `    ${v(i.dst)} = ${v(i.left)} ${BINARY_SYMBOLS[i.op]} ${v(i.right)}`;
    case 'Jump':
      return `    jump ${i.target}`;
    case 'JumpIfZero':
      return `    jump_if_zero ${v(i.condition)}, ${i.target}`;
    case 'JumpIfNotZero':
      return `    jump_if_not_zero ${v(i.condition)}, ${i.target}`;
    case 'Label':
      return `  ${i.name}:`;
    case 'FunCall':
      return `    ${v(i.dst)} = ${i.name}(${i.args.map(v).join(', ')})`;
  }
}

function formatFunction(fn: TackyFunction): string[] {
  const header = `${fn.global ? 'global ' : ''}function ${fn.name}(${fn.params.join(', ')}):`;
  return [header, ...fn.body.map(formatInstruction)];
}

function formatStatic(s: TackyStaticVariable): string {
  return `${s.global ? 'global ' : ''}static ${typeToString(s.type)} ${s.name} = ${formatConstant(s.init)}`;
}

/**
 * Create a readable `.tac` listing of a TAC program.
 */
export function writeTacky(program: TackyProgram, opts?: WriteTackyOptions): TacArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  // Functions are separated by a blank line; consecutive statics share one block.
  const lines = program.topLevels.flatMap((tl, idx) => {
    const body = tl.kind === 'Function' ? formatFunction(tl) : [formatStatic(tl)];
    const prev = program.topLevels[idx - 1];
    const joinsBlock = prev === undefined || (tl.kind === 'StaticVariable' && prev.kind === 'StaticVariable');
    return joinsBlock ? body : ['', ...body];
  });
  return { kind: 'tac', text: lines.join(lineEnding) + lineEnding };
}
