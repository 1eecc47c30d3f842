import type { BinaryOp, ConstValue, ExprNode, IntegerType, SourceSpan } from '../frontend/ast.js';
import { foldExpr } from '../frontend/ast.js';
import { InvalidInitializerError } from '../diagnostics/errors.js';
import { IntT, commonType, convertConst, sizeOf, wrapToType } from './types.js';

type ComparisonOp = 'Equal' | 'NotEqual' | 'LessThan' | 'LessOrEqual' | 'GreaterThan' | 'GreaterOrEqual';
type ArithmeticOp = Exclude<BinaryOp, ComparisonOp | 'And' | 'Or' | 'ShiftLeft' | 'ShiftRight'>;

function isComparison(op: BinaryOp): op is ComparisonOp {
  return (
    op === 'Equal' ||
    op === 'NotEqual' ||
    op === 'LessThan' ||
    op === 'LessOrEqual' ||
    op === 'GreaterThan' ||
    op === 'GreaterOrEqual'
  );
}

function compare(op: ComparisonOp, l: bigint, r: bigint): boolean {
  switch (op) {
    case 'Equal':
      return l === r;
    case 'NotEqual':
      return l !== r;
    case 'LessThan':
      return l < r;
    case 'LessOrEqual':
      return l <= r;
    case 'GreaterThan':
      return l > r;
    case 'GreaterOrEqual':
      return l >= r;
  }
}

/**
 * A folded subexpression: its type is known up front, its value is computed on demand so that
 * operands C never evaluates (the right side of a decided `&&`/`||`, the untaken branch of `?:`)
 * cannot raise a division by zero.
 */
interface Folded {
  type: IntegerType;
  value: () => bigint;
}

const force = (f: Folded): ConstValue => ({ type: f.type, value: f.value() });

function arithmetic(op: ArithmeticOp, l: bigint, r: bigint, span: SourceSpan): bigint {
  switch (op) {
    case 'Add':
      return l + r;
    case 'Subtract':
      return l - r;
    case 'Multiply':
      return l * r;
    case 'Divide':
    case 'Remainder':
      if (r === 0n) {
        throw new InvalidInitializerError(
          `${op === 'Divide' ? 'Division' : 'Remainder'} by zero in constant expression`,
          span,
        );
      }
      return op === 'Divide' ? l / r : l % r;
    case 'BitAnd':
      return l & r;
    case 'BitOr':
      return l | r;
    case 'BitXor':
      return l ^ r;
  }
}

/**
 * Evaluate a static initializer at compile time, with C conversion and wraparound semantics.
 *
 * Returns `undefined` when the expression is not a constant expression (it names a variable,
 * calls a function, or assigns), even inside an operand that is never evaluated.
 */
export function evalConstantExpr(expr: ExprNode): ConstValue | undefined {
  const folded = foldExpr<Folded | undefined>(expr, (node) => {
    switch (node.kind) {
      case 'Constant': {
        const c = node.value;
        return { type: c.type, value: () => c.value };
      }
      case 'Var':
      case 'Call':
      case 'Assignment':
        return undefined;
      case 'Cast': {
        const inner = node.expr;
        const target = node.target;
        if (!inner) return undefined;
        return { type: target, value: () => convertConst(force(inner), target).value };
      }
      case 'Unary': {
        const v = node.operand;
        if (!v) return undefined;
        switch (node.op) {
          case 'Negate':
            return { type: v.type, value: () => wrapToType(-v.value(), v.type) };
          case 'Complement':
            return { type: v.type, value: () => wrapToType(~v.value(), v.type) };
          case 'Not':
            return { type: IntT, value: () => (v.value() === 0n ? 1n : 0n) };
        }
        return undefined;
      }
      case 'Conditional': {
        const { condition, then, else: otherwise } = node;
        if (!condition || !then || !otherwise) return undefined;
        const t = commonType(then.type, otherwise.type);
        return {
          type: t,
          value: () => convertConst(force(condition.value() !== 0n ? then : otherwise), t).value,
        };
      }
      case 'Binary': {
        const { left, right, op } = node;
        if (!left || !right) return undefined;
        if (op === 'And') {
          return { type: IntT, value: () => (left.value() !== 0n && right.value() !== 0n ? 1n : 0n) };
        }
        if (op === 'Or') {
          return { type: IntT, value: () => (left.value() !== 0n || right.value() !== 0n ? 1n : 0n) };
        }
        if (op === 'ShiftLeft' || op === 'ShiftRight') {
          return {
            type: left.type,
            value: () => {
              const count = right.value() & BigInt(sizeOf(left.type) * 8 - 1);
              const l = left.value();
              return wrapToType(op === 'ShiftLeft' ? l << count : l >> count, left.type);
            },
          };
        }

        const t = commonType(left.type, right.type);
        const operands = (): [bigint, bigint] => [
          convertConst(force(left), t).value,
          convertConst(force(right), t).value,
        ];
        if (isComparison(op)) {
          return {
            type: IntT,
            value: () => {
              const [l, r] = operands();
              return compare(op, l, r) ? 1n : 0n;
            },
          };
        }
        const span = node.span;
        return {
          type: t,
          value: () => {
            const [l, r] = operands();
            return wrapToType(arithmetic(op, l, r, span), t);
          },
        };
      }
    }
  });
  return folded && force(folded);
}
