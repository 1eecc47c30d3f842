import type { BaseExprNode, CType, ConstValue, IntegerType } from '../frontend/ast.js';
import { InternalLoweringError } from '../diagnostics/errors.js';

export const IntT: IntegerType = { kind: 'Int' };
export const UIntT: IntegerType = { kind: 'UInt' };
export const LongT: IntegerType = { kind: 'Long' };
export const ULongT: IntegerType = { kind: 'ULong' };

export function isIntegerType(t: CType): t is IntegerType {
  return t.kind !== 'FunType';
}

/**
 * Structural type equality.
 */
export function sameType(a: CType, b: CType): boolean {
  if (a.kind === 'FunType' || b.kind === 'FunType') {
    if (a.kind !== 'FunType' || b.kind !== 'FunType') return false;
    return (
      sameType(a.ret, b.ret) &&
      a.params.length === b.params.length &&
      a.params.every((p, i) => {
        const q = b.params[i];
        return q !== undefined && sameType(p, q);
      })
    );
  }
  return a.kind === b.kind;
}

/** Storage size in bytes. */
export function sizeOf(t: IntegerType): 4 | 8 {
  return t.kind === 'Int' || t.kind === 'UInt' ? 4 : 8;
}

export function isSigned(t: IntegerType): boolean {
  return t.kind === 'Int' || t.kind === 'Long';
}

/**
 * Usual arithmetic conversions for two integer types (rank int < unsigned int < long < unsigned long).
 */
export function commonType(a: IntegerType, b: IntegerType): IntegerType {
  if (a.kind === b.kind) return a;
  if (sizeOf(a) === sizeOf(b)) return isSigned(a) ? b : a;
  return sizeOf(a) > sizeOf(b) ? a : b;
}

/**
 * Wrap `value` into the range of `t` (two's complement, as a C conversion does).
 */
export function wrapToType(value: bigint, t: IntegerType): bigint {
  const bits = sizeOf(t) * 8;
  return isSigned(t) ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
}

export function convertConst(c: ConstValue, t: IntegerType): ConstValue {
  return { type: t, value: wrapToType(c.value, t) };
}

export function zeroOf(t: IntegerType): ConstValue {
  return { type: t, value: 0n };
}

export function typeToString(t: CType): string {
  switch (t.kind) {
    case 'Int':
      return 'int';
    case 'UInt':
      return 'unsigned int';
    case 'Long':
      return 'long';
    case 'ULong':
      return 'unsigned long';
    case 'FunType': {
      const params = t.params.length === 0 ? 'void' : t.params.map(typeToString).join(', ');
      return `${typeToString(t.ret)} (${params})`;
    }
  }
}

/**
 * Type of an expression that has been through typecheck.
 */
export function exprType(expr: BaseExprNode): CType {
  if (!expr.type) throw new InternalLoweringError(`expression "${expr.kind}" has no type`, expr.span);
  return expr.type;
}

/**
 * Like {@link exprType}, for expressions that must be integer-valued.
 */
export function integerExprType(expr: BaseExprNode): IntegerType {
  const t = exprType(expr);
  if (!isIntegerType(t)) {
    throw new InternalLoweringError(`expression "${expr.kind}" has function type`, expr.span);
  }
  return t;
}
