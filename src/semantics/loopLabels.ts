import type { BlockNode, ProgramNode, StatementNode } from '../frontend/ast.js';
import { BreakOutsideLoopError, ContinueOutsideLoopError } from '../diagnostics/errors.js';

/**
 * Give each loop a unique label (`while.<n>`, `do.<n>`, `for.<n>`) and copy the label of the
 * innermost enclosing loop onto every `break` and `continue`.
 */
export function labelLoops(program: ProgramNode): ProgramNode {
  let counter = 0;

  const labelStatement = (stmt: StatementNode, current: string | undefined): StatementNode => {
    switch (stmt.kind) {
      case 'Break':
        if (current === undefined) throw new BreakOutsideLoopError(stmt.span);
        return { ...stmt, label: current };
      case 'Continue':
        if (current === undefined) throw new ContinueOutsideLoopError(stmt.span);
        return { ...stmt, label: current };
      case 'While': {
        const label = `while.${counter++}`;
        return { ...stmt, label, body: labelStatement(stmt.body, label) };
      }
      case 'DoWhile': {
        const label = `do.${counter++}`;
        return { ...stmt, label, body: labelStatement(stmt.body, label) };
      }
      case 'For': {
        const label = `for.${counter++}`;
        return { ...stmt, label, body: labelStatement(stmt.body, label) };
      }
      case 'If':
        return {
          ...stmt,
          then: labelStatement(stmt.then, current),
          else: stmt.else ? labelStatement(stmt.else, current) : undefined,
        };
      case 'Compound':
        return { ...stmt, block: labelBlock(stmt.block, current) };
      case 'Return':
      case 'ExprStmt':
      case 'Null':
        return stmt;
    }
  };

  function labelBlock(block: BlockNode, current: string | undefined): BlockNode {
    return {
      ...block,
      items: block.items.map((item) =>
        item.kind === 'VarDecl' || item.kind === 'FunctionDecl' ? item : labelStatement(item, current),
      ),
    };
  }

  return {
    ...program,
    declarations: program.declarations.map((decl) =>
      decl.kind === 'FunctionDecl' && decl.body
        ? { ...decl, body: labelBlock(decl.body, undefined) }
        : decl,
    ),
  };
}
