import type {
  BlockItemNode,
  BlockNode,
  DeclarationNode,
  ExprNode,
  ForInitNode,
  FunctionDeclNode,
  ProgramNode,
  StatementNode,
  VarDeclNode,
} from '../frontend/ast.js';
import { foldExpr } from '../frontend/ast.js';
import {
  DuplicateDeclarationError,
  InvalidLvalueError,
  InvalidSpecifierError,
  NestedFunctionDefinitionError,
  UndeclaredVariableError,
} from '../diagnostics/errors.js';

interface IdentifierEntry {
  uniqueName: string;
  fromCurrentScope: boolean;
  hasLinkage: boolean;
}

type IdentifierMap = Map<string, IdentifierEntry>;

function enterScope(outer: IdentifierMap): IdentifierMap {
  const inner: IdentifierMap = new Map();
  for (const [name, entry] of outer) inner.set(name, { ...entry, fromCurrentScope: false });
  return inner;
}

/**
 * Give every local variable a program-unique name (`<name>.<n>`) and check scoping rules.
 *
 * File-scope names and names with linkage (functions, `extern` locals) keep their source name.
 */
export function resolveProgram(program: ProgramNode): ProgramNode {
  let counter = 0;
  const uniqueName = (name: string): string => `${name}.${counter++}`;

  const resolveExpr = (expr: ExprNode, scope: IdentifierMap): ExprNode =>
    foldExpr<ExprNode>(expr, (node) => {
      switch (node.kind) {
        case 'Var': {
          const entry = scope.get(node.name);
          if (!entry) throw new UndeclaredVariableError(node.name, node.span);
          return { ...node, name: entry.uniqueName };
        }
        case 'Assignment':
          if (node.target.kind !== 'Var') throw new InvalidLvalueError(node.target.span);
          return node;
        case 'Call': {
          const entry = scope.get(node.callee);
          if (!entry) throw new UndeclaredVariableError(node.callee, node.span, 'function');
          return { ...node, callee: entry.uniqueName };
        }
        default:
          return node;
      }
    });

  const resolveOptionalExpr = (expr: ExprNode | undefined, scope: IdentifierMap) =>
    expr === undefined ? undefined : resolveExpr(expr, scope);

  const resolveLocalVar = (decl: VarDeclNode, scope: IdentifierMap): VarDeclNode => {
    const prev = scope.get(decl.name);
    if (prev?.fromCurrentScope && !(prev.hasLinkage && decl.storage === 'extern')) {
      throw new DuplicateDeclarationError(decl.name, decl.span);
    }
    if (decl.storage === 'extern') {
      scope.set(decl.name, { uniqueName: decl.name, fromCurrentScope: true, hasLinkage: true });
      return decl;
    }
    const name = uniqueName(decl.name);
    scope.set(decl.name, { uniqueName: name, fromCurrentScope: true, hasLinkage: false });
    return { ...decl, name, init: resolveOptionalExpr(decl.init, scope) };
  };

  const resolveFunction = (decl: FunctionDeclNode, scope: IdentifierMap): FunctionDeclNode => {
    const prev = scope.get(decl.name);
    if (prev?.fromCurrentScope && !prev.hasLinkage) {
      throw new DuplicateDeclarationError(decl.name, decl.span);
    }
    scope.set(decl.name, { uniqueName: decl.name, fromCurrentScope: true, hasLinkage: true });

    const inner = enterScope(scope);
    const params = decl.params.map((p) => {
      if (inner.get(p.name)?.fromCurrentScope) throw new DuplicateDeclarationError(p.name, p.span);
      const name = uniqueName(p.name);
      inner.set(p.name, { uniqueName: name, fromCurrentScope: true, hasLinkage: false });
      return { ...p, name };
    });
    // The body shares the parameter scope.
    const body = decl.body ? resolveBlock(decl.body, inner) : undefined;
    return { ...decl, params, body };
  };

  const resolveLocalDeclaration = (decl: DeclarationNode, scope: IdentifierMap): DeclarationNode => {
    if (decl.kind === 'VarDecl') return resolveLocalVar(decl, scope);
    if (decl.body) throw new NestedFunctionDefinitionError(decl.name, decl.span);
    if (decl.storage === 'static') {
      throw new InvalidSpecifierError(
        `Block-scope function declaration "${decl.name}" cannot be static`,
        decl.span,
      );
    }
    return resolveFunction(decl, scope);
  };

  const resolveForInit = (init: ForInitNode, scope: IdentifierMap): ForInitNode => {
    if (init === undefined) return undefined;
    if (init.kind === 'VarDecl') {
      if (init.storage) {
        throw new InvalidSpecifierError(
          'Storage class not allowed on a "for" loop header declaration',
          init.span,
        );
      }
      return resolveLocalVar(init, scope);
    }
    return resolveExpr(init, scope);
  };

  const resolveStatement = (stmt: StatementNode, scope: IdentifierMap): StatementNode => {
    switch (stmt.kind) {
      case 'Return':
      case 'ExprStmt':
        return { ...stmt, expr: resolveExpr(stmt.expr, scope) };
      case 'If':
        return {
          ...stmt,
          condition: resolveExpr(stmt.condition, scope),
          then: resolveStatement(stmt.then, scope),
          else: stmt.else ? resolveStatement(stmt.else, scope) : undefined,
        };
      case 'Compound':
        return { ...stmt, block: resolveBlock(stmt.block, enterScope(scope)) };
      case 'While':
        return {
          ...stmt,
          condition: resolveExpr(stmt.condition, scope),
          body: resolveStatement(stmt.body, scope),
        };
      case 'DoWhile':
        return {
          ...stmt,
          body: resolveStatement(stmt.body, scope),
          condition: resolveExpr(stmt.condition, scope),
        };
      case 'For': {
        const headerScope = enterScope(scope);
        const init = resolveForInit(stmt.init, headerScope);
        return {
          ...stmt,
          init,
          condition: resolveOptionalExpr(stmt.condition, headerScope),
          post: resolveOptionalExpr(stmt.post, headerScope),
          body: resolveStatement(stmt.body, headerScope),
        };
      }
      case 'Break':
      case 'Continue':
      case 'Null':
        return stmt;
    }
  };

  const resolveBlockItem = (item: BlockItemNode, scope: IdentifierMap): BlockItemNode =>
    item.kind === 'VarDecl' || item.kind === 'FunctionDecl'
      ? resolveLocalDeclaration(item, scope)
      : resolveStatement(item, scope);

  function resolveBlock(block: BlockNode, scope: IdentifierMap): BlockNode {
    return { ...block, items: block.items.map((item) => resolveBlockItem(item, scope)) };
  }

  const fileScope: IdentifierMap = new Map();
  const declarations = program.declarations.map((decl): DeclarationNode => {
    if (decl.kind === 'FunctionDecl') return resolveFunction(decl, fileScope);
    fileScope.set(decl.name, { uniqueName: decl.name, fromCurrentScope: true, hasLinkage: true });
    return decl;
  });
  return { ...program, declarations };
}
