import type { ConstValue, IntegerType } from '../frontend/ast.js';

/**
 * Three-address-code ("Tacky") IR.
 *
 * Every instruction names its operands and result explicitly; values are typed constants or
 * variables (source variables after resolve, or temporaries registered in the symbol table).
 */
export type TackyValue = { kind: 'Constant'; value: ConstValue } | { kind: 'Var'; name: string };

export type TackyUnaryOp = 'Negate' | 'Complement' | 'Not';

export type TackyBinaryOp =
  | 'Add'
  | 'Subtract'
  | 'Multiply'
  | 'Divide'
  | 'Remainder'
  | 'BitAnd'
  | 'BitOr'
  | 'BitXor'
  | 'ShiftLeft'
  | 'ShiftRight'
  | 'Equal'
  | 'NotEqual'
  | 'LessThan'
  | 'LessOrEqual'
  | 'GreaterThan'
  | 'GreaterOrEqual';

export type TackyInstruction =
  | { kind: 'Return'; value: TackyValue }
  | { kind: 'SignExtend'; src: TackyValue; dst: TackyValue }
  | { kind: 'ZeroExtend'; src: TackyValue; dst: TackyValue }
  | { kind: 'Truncate'; src: TackyValue; dst: TackyValue }
  | { kind: 'Copy'; src: TackyValue; dst: TackyValue }
  | { kind: 'Unary'; op: TackyUnaryOp; src: TackyValue; dst: TackyValue }
  | { kind: 'Binary'; op: TackyBinaryOp; left: TackyValue; right: TackyValue; dst: TackyValue }
  | { kind: 'Jump'; target: string }
  | { kind: 'JumpIfZero'; condition: TackyValue; target: string }
  | { kind: 'JumpIfNotZero'; condition: TackyValue; target: string }
  | { kind: 'Label'; name: string }
  | { kind: 'FunCall'; name: string; args: TackyValue[]; dst: TackyValue };

export interface TackyFunction {
  kind: 'Function';
  name: string;
  global: boolean;
  params: string[];
  body: TackyInstruction[];
}

export interface TackyStaticVariable {
  kind: 'StaticVariable';
  name: string;
  global: boolean;
  type: IntegerType;
  init: ConstValue;
}

export type TackyTopLevel = TackyFunction | TackyStaticVariable;

export interface TackyProgram {
  topLevels: TackyTopLevel[];
}
