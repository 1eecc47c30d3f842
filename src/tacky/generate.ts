import type {
  BlockItemNode,
  BlockNode,
  ExprNode,
  ForInitNode,
  FunctionDeclNode,
  IntegerType,
  ProgramNode,
  StatementNode,
  VarDeclNode,
} from '../frontend/ast.js';
import { foldExpr } from '../frontend/ast.js';
import { InternalLoweringError } from '../diagnostics/errors.js';
import type { SymbolEntry, SymbolTable } from '../semantics/symbols.js';
import { IntT, integerExprType, isIntegerType, isSigned, sizeOf, zeroOf } from '../semantics/types.js';
import type {
  TackyFunction,
  TackyInstruction,
  TackyProgram,
  TackyStaticVariable,
  TackyTopLevel,
  TackyValue,
} from './ir.js';

/**
 * An expression after lowering: where its result lives, and the instructions that compute it.
 */
interface Lowered {
  value: TackyValue;
  type: IntegerType;
  instructions: TackyInstruction[];
}

const intConst = (value: bigint): TackyValue => ({ kind: 'Constant', value: { type: IntT, value } });

const breakLabel = (loop: string): string => `break_${loop}`;
const continueLabel = (loop: string): string => `continue_${loop}`;

export interface TackyResult {
  program: TackyProgram;
  symbols: SymbolTable;
}

/**
 * Lower a typechecked program to three-address code.
 *
 * Temporaries are named `tmp.<n>` (skipping names already in the table) and registered in the
 * returned symbol table as locals of their result type.
 */
export function generateTacky(program: ProgramNode, input: SymbolTable): TackyResult {
  const symbols = new Map<string, SymbolEntry>(input);
  let tmpCounter = 0;
  let labelCounter = 0;

  const makeTemporary = (type: IntegerType): TackyValue => {
    let name = `tmp.${tmpCounter++}`;
    while (symbols.has(name)) name = `tmp.${tmpCounter++}`;
    symbols.set(name, { type, attrs: { kind: 'Local' } });
    return { kind: 'Var', name };
  };

  const makeLabel = (prefix: string): string => `${prefix}.${labelCounter++}`;

  const lowerExpr = (expr: ExprNode): Lowered =>
    foldExpr<Lowered>(expr, (node): Lowered => {
      const type = integerExprType(node);
      switch (node.kind) {
        case 'Constant':
          return { value: { kind: 'Constant', value: node.value }, type, instructions: [] };
        case 'Var':
          return { value: { kind: 'Var', name: node.name }, type, instructions: [] };
        case 'Cast': {
          const inner = node.expr;
          if (inner.type.kind === type.kind) return { ...inner, type };
          const dst = makeTemporary(type);
          const src = inner.value;
          let convert: TackyInstruction;
          if (sizeOf(type) === sizeOf(inner.type)) convert = { kind: 'Copy', src, dst };
          else if (sizeOf(type) < sizeOf(inner.type)) convert = { kind: 'Truncate', src, dst };
          else if (isSigned(inner.type)) convert = { kind: 'SignExtend', src, dst };
          else convert = { kind: 'ZeroExtend', src, dst };
          return { value: dst, type, instructions: [...inner.instructions, convert] };
        }
        case 'Unary': {
          const dst = makeTemporary(type);
          return {
            value: dst,
            type,
            instructions: [
              ...node.operand.instructions,
              { kind: 'Unary', op: node.op, src: node.operand.value, dst },
            ],
          };
        }
        case 'Binary': {
          const { left, right } = node;
          if (node.op === 'And' || node.op === 'Or') {
            const dst = makeTemporary(IntT);
            const isAnd = node.op === 'And';
            const shortLabel = makeLabel(isAnd ? 'and_false' : 'or_true');
            const endLabel = makeLabel(isAnd ? 'and_end' : 'or_end');
            const jump = isAnd ? 'JumpIfZero' : 'JumpIfNotZero';
            return {
              value: dst,
              type: IntT,
              instructions: [
                ...left.instructions,
                { kind: jump, condition: left.value, target: shortLabel },
                ...right.instructions,
                { kind: jump, condition: right.value, target: shortLabel },
                { kind: 'Copy', src: intConst(isAnd ? 1n : 0n), dst },
                { kind: 'Jump', target: endLabel },
                { kind: 'Label', name: shortLabel },
                { kind: 'Copy', src: intConst(isAnd ? 0n : 1n), dst },
                { kind: 'Label', name: endLabel },
              ],
            };
          }
          const dst = makeTemporary(type);
          return {
            value: dst,
            type,
            instructions: [
              ...left.instructions,
              ...right.instructions,
              { kind: 'Binary', op: node.op, left: left.value, right: right.value, dst },
            ],
          };
        }
        case 'Assignment': {
          const { target, value } = node;
          return {
            value: target.value,
            type,
            instructions: [
              ...target.instructions,
              ...value.instructions,
              { kind: 'Copy', src: value.value, dst: target.value },
            ],
          };
        }
        case 'Conditional': {
          const dst = makeTemporary(type);
          const elseLabel = makeLabel('cond_else');
          const endLabel = makeLabel('cond_end');
          return {
            value: dst,
            type,
            instructions: [
              ...node.condition.instructions,
              { kind: 'JumpIfZero', condition: node.condition.value, target: elseLabel },
              ...node.then.instructions,
              { kind: 'Copy', src: node.then.value, dst },
              { kind: 'Jump', target: endLabel },
              { kind: 'Label', name: elseLabel },
              ...node.else.instructions,
              { kind: 'Copy', src: node.else.value, dst },
              { kind: 'Label', name: endLabel },
            ],
          };
        }
        case 'Call': {
          const dst = makeTemporary(type);
          return {
            value: dst,
            type,
            instructions: [
              ...node.args.flatMap((a) => a.instructions),
              { kind: 'FunCall', name: node.callee, args: node.args.map((a) => a.value), dst },
            ],
          };
        }
      }
    });

  const lowerLocalVar = (decl: VarDeclNode): TackyInstruction[] => {
    // static and extern locals live in the data section; their initial value is static data.
    if (decl.storage !== undefined || decl.init === undefined) return [];
    const init = lowerExpr(decl.init);
    return [...init.instructions, { kind: 'Copy', src: init.value, dst: { kind: 'Var', name: decl.name } }];
  };

  const lowerForInit = (init: ForInitNode): TackyInstruction[] => {
    if (init === undefined) return [];
    return init.kind === 'VarDecl' ? lowerLocalVar(init) : lowerExpr(init).instructions;
  };

  const loopLabel = (stmt: { label: string | undefined; span: StatementNode['span'] }): string => {
    if (stmt.label === undefined) throw new InternalLoweringError('loop without a label', stmt.span);
    return stmt.label;
  };

  const lowerStatement = (stmt: StatementNode): TackyInstruction[] => {
    switch (stmt.kind) {
      case 'Return': {
        const e = lowerExpr(stmt.expr);
        return [...e.instructions, { kind: 'Return', value: e.value }];
      }
      case 'ExprStmt':
        return lowerExpr(stmt.expr).instructions;
      case 'If': {
        const c = lowerExpr(stmt.condition);
        const endLabel = makeLabel('if_end');
        if (!stmt.else) {
          return [
            ...c.instructions,
            { kind: 'JumpIfZero', condition: c.value, target: endLabel },
            ...lowerStatement(stmt.then),
            { kind: 'Label', name: endLabel },
          ];
        }
        const elseLabel = makeLabel('if_else');
        return [
          ...c.instructions,
          { kind: 'JumpIfZero', condition: c.value, target: elseLabel },
          ...lowerStatement(stmt.then),
          { kind: 'Jump', target: endLabel },
          { kind: 'Label', name: elseLabel },
          ...lowerStatement(stmt.else),
          { kind: 'Label', name: endLabel },
        ];
      }
      case 'Compound':
        return lowerBlock(stmt.block);
      case 'Break':
        return [{ kind: 'Jump', target: breakLabel(loopLabel(stmt)) }];
      case 'Continue':
        return [{ kind: 'Jump', target: continueLabel(loopLabel(stmt)) }];
      case 'DoWhile': {
        const label = loopLabel(stmt);
        const start = `start_${label}`;
        const c = lowerExpr(stmt.condition);
        return [
          { kind: 'Label', name: start },
          ...lowerStatement(stmt.body),
          { kind: 'Label', name: continueLabel(label) },
          ...c.instructions,
          { kind: 'JumpIfNotZero', condition: c.value, target: start },
          { kind: 'Label', name: breakLabel(label) },
        ];
      }
      case 'While': {
        const label = loopLabel(stmt);
        const c = lowerExpr(stmt.condition);
        return [
          { kind: 'Label', name: continueLabel(label) },
          ...c.instructions,
          { kind: 'JumpIfZero', condition: c.value, target: breakLabel(label) },
          ...lowerStatement(stmt.body),
          { kind: 'Jump', target: continueLabel(label) },
          { kind: 'Label', name: breakLabel(label) },
        ];
      }
      case 'For': {
        const label = loopLabel(stmt);
        const start = `start_${label}`;
        const out: TackyInstruction[] = [...lowerForInit(stmt.init), { kind: 'Label', name: start }];
        if (stmt.condition) {
          const c = lowerExpr(stmt.condition);
          out.push(...c.instructions, { kind: 'JumpIfZero', condition: c.value, target: breakLabel(label) });
        }
        out.push(...lowerStatement(stmt.body), { kind: 'Label', name: continueLabel(label) });
        if (stmt.post) out.push(...lowerExpr(stmt.post).instructions);
        out.push({ kind: 'Jump', target: start }, { kind: 'Label', name: breakLabel(label) });
        return out;
      }
      case 'Null':
        return [];
    }
  };

  const lowerBlockItem = (item: BlockItemNode): TackyInstruction[] => {
    switch (item.kind) {
      case 'VarDecl':
        return lowerLocalVar(item);
      case 'FunctionDecl':
        return [];
      default:
        return lowerStatement(item);
    }
  };

  function lowerBlock(block: BlockNode): TackyInstruction[] {
    return block.items.flatMap(lowerBlockItem);
  }

  const lowerFunction = (decl: FunctionDeclNode & { body: BlockNode }): TackyFunction => {
    const entry = symbols.get(decl.name);
    if (entry?.attrs.kind !== 'Fun') {
      throw new InternalLoweringError(`function "${decl.name}" missing from symbol table`, decl.span);
    }
    return {
      kind: 'Function',
      name: decl.name,
      global: entry.attrs.global,
      params: decl.params.map((p) => p.name),
      // Falling off the end of a function returns 0.
      body: [...lowerBlock(decl.body), { kind: 'Return', value: intConst(0n) }],
    };
  };

  const functions: TackyTopLevel[] = [];
  for (const decl of program.declarations) {
    if (decl.kind === 'FunctionDecl' && decl.body) functions.push(lowerFunction({ ...decl, body: decl.body }));
  }

  const statics: TackyStaticVariable[] = [];
  for (const [name, entry] of symbols) {
    if (entry.attrs.kind !== 'Static' || !isIntegerType(entry.type)) continue;
    const init = entry.attrs.init;
    if (init.kind === 'NoInitializer') continue;
    statics.push({
      kind: 'StaticVariable',
      name,
      global: entry.attrs.global,
      type: entry.type,
      init: init.kind === 'Initial' ? init.value : zeroOf(entry.type),
    });
  }

  return { program: { topLevels: [...functions, ...statics] }, symbols };
}
