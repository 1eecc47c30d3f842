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
import {
  ConflictingLinkageError,
  ConflictingTypeError,
  DuplicateDefinitionError,
  InvalidCallError,
  InvalidInitializerError,
  UndeclaredVariableError,
} from '../diagnostics/errors.js';
import { evalConstantExpr } from './constEval.js';
import type { InitialValue, SymbolEntry, SymbolTable } from './symbols.js';
import {
  IntT,
  commonType,
  convertConst,
  integerExprType,
  isIntegerType,
  sameType,
  typeToString,
  zeroOf,
} from './types.js';

/**
 * Insert an implicit conversion of `expr` to `target`; a no-op when the types already match.
 */
export function convertTo(expr: ExprNode, target: IntegerType): ExprNode {
  if (expr.type && sameType(expr.type, target)) return expr;
  return { kind: 'Cast', span: expr.span, target, expr, type: target };
}

export interface TypecheckResult {
  program: ProgramNode;
  symbols: SymbolTable;
}

/**
 * Assign a type to every expression, make implicit conversions explicit as `Cast` nodes, and
 * record every declaration in the symbol table.
 */
export function typecheckProgram(program: ProgramNode, input: SymbolTable): TypecheckResult {
  const symbols = new Map<string, SymbolEntry>(input);

  const checkExpr = (expr: ExprNode): ExprNode =>
    foldExpr<ExprNode>(expr, (node): ExprNode => {
      switch (node.kind) {
        case 'Constant':
          return { ...node, type: node.value.type };
        case 'Var': {
          const entry = symbols.get(node.name);
          if (!entry) throw new UndeclaredVariableError(node.name, node.span);
          if (!isIntegerType(entry.type)) {
            throw new InvalidCallError(`Function "${node.name}" used as a variable`, node.span);
          }
          return { ...node, type: entry.type };
        }
        case 'Cast':
          integerExprType(node.expr);
          return { ...node, type: node.target };
        case 'Unary': {
          const t = integerExprType(node.operand);
          return { ...node, type: node.op === 'Not' ? IntT : t };
        }
        case 'Binary': {
          const lt = integerExprType(node.left);
          const rt = integerExprType(node.right);
          switch (node.op) {
            case 'And':
            case 'Or':
              return { ...node, type: IntT };
            case 'ShiftLeft':
            case 'ShiftRight':
              return { ...node, type: lt };
            default:
              break;
          }
          const common = commonType(lt, rt);
          const left = convertTo(node.left, common);
          const right = convertTo(node.right, common);
          const relational =
            node.op === 'Equal' ||
            node.op === 'NotEqual' ||
            node.op === 'LessThan' ||
            node.op === 'LessOrEqual' ||
            node.op === 'GreaterThan' ||
            node.op === 'GreaterOrEqual';
          return { ...node, left, right, type: relational ? IntT : common };
        }
        case 'Assignment': {
          const t = integerExprType(node.target);
          return { ...node, value: convertTo(node.value, t), type: t };
        }
        case 'Conditional': {
          integerExprType(node.condition);
          const t = commonType(integerExprType(node.then), integerExprType(node.else));
          return { ...node, then: convertTo(node.then, t), else: convertTo(node.else, t), type: t };
        }
        case 'Call': {
          const entry = symbols.get(node.callee);
          if (!entry) throw new UndeclaredVariableError(node.callee, node.span, 'function');
          const fn = entry.type;
          if (fn.kind !== 'FunType') {
            throw new InvalidCallError(`"${node.callee}" is not a function`, node.span);
          }
          if (fn.params.length !== node.args.length) {
            throw new InvalidCallError(
              `Function "${node.callee}" expects ${fn.params.length} argument(s) but got ${node.args.length}`,
              node.span,
            );
          }
          const args = node.args.map((arg, i) => {
            const paramType = fn.params[i];
            return paramType ? convertTo(arg, paramType) : arg;
          });
          return { ...node, args, type: fn.ret };
        }
      }
    });

  const staticInitializer = (decl: VarDeclNode, init: ExprNode): ExprNode => {
    const value = evalConstantExpr(init);
    if (!value) {
      throw new InvalidInitializerError(
        `Initializer of static variable "${decl.name}" is not a constant expression`,
        init.span,
      );
    }
    const converted = convertConst(value, decl.varType);
    return { kind: 'Constant', span: init.span, value: converted, type: converted.type };
  };

  const initialValueOf = (init: ExprNode | undefined): InitialValue | undefined =>
    init?.kind === 'Constant' ? { kind: 'Initial', value: init.value } : undefined;

  const checkFileScopeVar = (decl: VarDeclNode): VarDeclNode => {
    const init = decl.init ? staticInitializer(decl, decl.init) : undefined;
    let initial: InitialValue =
      initialValueOf(init) ?? (decl.storage === 'extern' ? { kind: 'NoInitializer' } : { kind: 'Tentative' });
    let global = decl.storage !== 'static';

    const old = symbols.get(decl.name);
    if (old) {
      if (old.attrs.kind !== 'Static' || !sameType(old.type, decl.varType)) {
        throw new ConflictingTypeError(
          decl.name,
          decl.span,
          `previously declared as "${typeToString(old.type)}"`,
        );
      }
      if (decl.storage === 'extern') {
        global = old.attrs.global;
      } else if (old.attrs.global !== global) {
        throw new ConflictingLinkageError(decl.name, decl.span);
      }
      const oldInit = old.attrs.init;
      if (oldInit.kind === 'Initial') {
        if (initial.kind === 'Initial') throw new DuplicateDefinitionError(decl.name, decl.span);
        initial = oldInit;
      } else if (initial.kind !== 'Initial' && oldInit.kind === 'Tentative') {
        initial = oldInit;
      }
    }

    symbols.set(decl.name, { type: decl.varType, attrs: { kind: 'Static', init: initial, global } });
    return { ...decl, init };
  };

  const checkLocalVar = (decl: VarDeclNode): VarDeclNode => {
    if (decl.storage === 'extern') {
      if (decl.init) {
        throw new InvalidInitializerError(
          `Initializer on local extern variable declaration "${decl.name}"`,
          decl.init.span,
        );
      }
      const old = symbols.get(decl.name);
      if (old) {
        if (!sameType(old.type, decl.varType)) {
          throw new ConflictingTypeError(
            decl.name,
            decl.span,
            `previously declared as "${typeToString(old.type)}"`,
          );
        }
      } else {
        symbols.set(decl.name, {
          type: decl.varType,
          attrs: { kind: 'Static', init: { kind: 'NoInitializer' }, global: true },
        });
      }
      return decl;
    }

    if (decl.storage === 'static') {
      const init = decl.init ? staticInitializer(decl, decl.init) : undefined;
      const initial: InitialValue = initialValueOf(init) ?? {
        kind: 'Initial',
        value: zeroOf(decl.varType),
      };
      symbols.set(decl.name, { type: decl.varType, attrs: { kind: 'Static', init: initial, global: false } });
      return { ...decl, init };
    }

    symbols.set(decl.name, { type: decl.varType, attrs: { kind: 'Local' } });
    return { ...decl, init: decl.init ? convertTo(checkExpr(decl.init), decl.varType) : undefined };
  };

  const checkFunction = (decl: FunctionDeclNode): FunctionDeclNode => {
    const hasBody = decl.body !== undefined;
    let alreadyDefined = false;
    let global = decl.storage !== 'static';

    const old = symbols.get(decl.name);
    if (old) {
      if (old.attrs.kind !== 'Fun' || !sameType(old.type, decl.funType)) {
        throw new ConflictingTypeError(
          decl.name,
          decl.span,
          `previously declared as "${typeToString(old.type)}"`,
        );
      }
      alreadyDefined = old.attrs.defined;
      if (alreadyDefined && hasBody) throw new DuplicateDefinitionError(decl.name, decl.span);
      if (old.attrs.global && decl.storage === 'static') {
        throw new ConflictingLinkageError(decl.name, decl.span);
      }
      global = old.attrs.global;
    }

    symbols.set(decl.name, {
      type: decl.funType,
      attrs: { kind: 'Fun', defined: alreadyDefined || hasBody, global },
    });

    if (!decl.body) return decl;
    decl.params.forEach((p, i) => {
      const t = decl.funType.params[i] ?? IntT;
      symbols.set(p.name, { type: t, attrs: { kind: 'Local' } });
    });
    return { ...decl, body: checkBlock(decl.body, decl.funType.ret) };
  };

  const checkForInit = (init: ForInitNode): ForInitNode => {
    if (init === undefined) return undefined;
    return init.kind === 'VarDecl' ? checkLocalVar(init) : checkExpr(init);
  };

  const checkOptionalExpr = (expr: ExprNode | undefined): ExprNode | undefined =>
    expr === undefined ? undefined : checkExpr(expr);

  const checkStatement = (stmt: StatementNode, returnType: IntegerType): StatementNode => {
    switch (stmt.kind) {
      case 'Return':
        return { ...stmt, expr: convertTo(checkExpr(stmt.expr), returnType) };
      case 'ExprStmt':
        return { ...stmt, expr: checkExpr(stmt.expr) };
      case 'If':
        return {
          ...stmt,
          condition: checkExpr(stmt.condition),
          then: checkStatement(stmt.then, returnType),
          else: stmt.else ? checkStatement(stmt.else, returnType) : undefined,
        };
      case 'Compound':
        return { ...stmt, block: checkBlock(stmt.block, returnType) };
      case 'While':
        return {
          ...stmt,
          condition: checkExpr(stmt.condition),
          body: checkStatement(stmt.body, returnType),
        };
      case 'DoWhile':
        return {
          ...stmt,
          body: checkStatement(stmt.body, returnType),
          condition: checkExpr(stmt.condition),
        };
      case 'For': {
        const init = checkForInit(stmt.init);
        return {
          ...stmt,
          init,
          condition: checkOptionalExpr(stmt.condition),
          post: checkOptionalExpr(stmt.post),
          body: checkStatement(stmt.body, returnType),
        };
      }
      case 'Break':
      case 'Continue':
      case 'Null':
        return stmt;
    }
  };

  const checkBlockItem = (item: BlockItemNode, returnType: IntegerType): BlockItemNode => {
    switch (item.kind) {
      case 'VarDecl':
        return checkLocalVar(item);
      case 'FunctionDecl':
        return checkFunction(item);
      default:
        return checkStatement(item, returnType);
    }
  };

  function checkBlock(block: BlockNode, returnType: IntegerType): BlockNode {
    return { ...block, items: block.items.map((item) => checkBlockItem(item, returnType)) };
  }

  const declarations = program.declarations.map((decl) =>
    decl.kind === 'FunctionDecl' ? checkFunction(decl) : checkFileScopeVar(decl),
  );
  return { program: { ...program, declarations }, symbols };
}
