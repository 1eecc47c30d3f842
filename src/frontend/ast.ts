/**
 * Frontend AST contracts for the C subset.
 *
 * The parser produces these nodes; the semantic passes return rewritten copies (never mutating
 * their input), and typecheck fills in `type` on every expression.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the source text. */
  offset: number;
}

/**
 * Source span; `end` is exclusive.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

// ---------------------------------------------------------------------------
// Types

export interface IntegerType {
  kind: 'Int' | 'UInt' | 'Long' | 'ULong';
}

export interface FunType {
  kind: 'FunType';
  params: IntegerType[];
  ret: IntegerType;
}

export type CType = IntegerType | FunType;

/**
 * A typed integer constant. `value` is always within the range of `type`.
 */
export interface ConstValue {
  type: IntegerType;
  value: bigint;
}

export type StorageClass = 'static' | 'extern';

// ---------------------------------------------------------------------------
// Declarations

/**
 * A parsed translation unit.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  declarations: DeclarationNode[];
}

export type DeclarationNode = VarDeclNode | FunctionDeclNode;

export interface VarDeclNode extends BaseNode {
  kind: 'VarDecl';
  name: string;
  varType: IntegerType;
  storage: StorageClass | undefined;
  init: ExprNode | undefined;
}

export interface ParamNode extends BaseNode {
  kind: 'Param';
  name: string;
}

export interface FunctionDeclNode extends BaseNode {
  kind: 'FunctionDecl';
  name: string;
  funType: FunType;
  params: ParamNode[];
  storage: StorageClass | undefined;
  /** Absent for a declaration without a definition. */
  body: BlockNode | undefined;
}

export interface BlockNode extends BaseNode {
  kind: 'Block';
  items: BlockItemNode[];
}

export type BlockItemNode = StatementNode | DeclarationNode;

// ---------------------------------------------------------------------------
// Statements

export type StatementNode =
  | ReturnStmtNode
  | ExprStmtNode
  | IfStmtNode
  | CompoundStmtNode
  | BreakStmtNode
  | ContinueStmtNode
  | WhileStmtNode
  | DoWhileStmtNode
  | ForStmtNode
  | NullStmtNode;

export interface ReturnStmtNode extends BaseNode {
  kind: 'Return';
  expr: ExprNode;
}

export interface ExprStmtNode extends BaseNode {
  kind: 'ExprStmt';
  expr: ExprNode;
}

export interface IfStmtNode extends BaseNode {
  kind: 'If';
  condition: ExprNode;
  then: StatementNode;
  else: StatementNode | undefined;
}

export interface CompoundStmtNode extends BaseNode {
  kind: 'Compound';
  block: BlockNode;
}

/**
 * `break`; `label` names the enclosing loop once loop labeling has run.
 */
export interface BreakStmtNode extends BaseNode {
  kind: 'Break';
  label: string | undefined;
}

export interface ContinueStmtNode extends BaseNode {
  kind: 'Continue';
  label: string | undefined;
}

export interface WhileStmtNode extends BaseNode {
  kind: 'While';
  condition: ExprNode;
  body: StatementNode;
  label: string | undefined;
}

export interface DoWhileStmtNode extends BaseNode {
  kind: 'DoWhile';
  body: StatementNode;
  condition: ExprNode;
  label: string | undefined;
}

export type ForInitNode = VarDeclNode | ExprNode | undefined;

export interface ForStmtNode extends BaseNode {
  kind: 'For';
  init: ForInitNode;
  condition: ExprNode | undefined;
  post: ExprNode | undefined;
  body: StatementNode;
  label: string | undefined;
}

export interface NullStmtNode extends BaseNode {
  kind: 'Null';
}

// ---------------------------------------------------------------------------
// Expressions
//
// Composite expression nodes are generic over their child type `C`. `ExprNode` instantiates every
// variant with `ExprNode` children; `ExprLayer<R>` is one node whose children have already been
// replaced by results of type `R` (see `foldExpr`).

export type UnaryOp = 'Negate' | 'Complement' | 'Not';

export type BinaryOp =
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
  | 'GreaterOrEqual'
  | 'And'
  | 'Or';

export interface BaseExprNode extends BaseNode {
  /** Set by typecheck. */
  type?: CType;
}

export interface ConstantExprNode extends BaseExprNode {
  kind: 'Constant';
  value: ConstValue;
}

export interface VarExprNode extends BaseExprNode {
  kind: 'Var';
  name: string;
}

export interface CastExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Cast';
  target: IntegerType;
  expr: C;
}

export interface UnaryExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Unary';
  op: UnaryOp;
  operand: C;
}

export interface BinaryExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Binary';
  op: BinaryOp;
  left: C;
  right: C;
}

export interface AssignmentExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Assignment';
  target: C;
  value: C;
}

export interface ConditionalExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Conditional';
  condition: C;
  then: C;
  else: C;
}

export interface CallExprNode<C = ExprNode> extends BaseExprNode {
  kind: 'Call';
  callee: string;
  args: C[];
}

export type ExprNode =
  | ConstantExprNode
  | VarExprNode
  | CastExprNode
  | UnaryExprNode
  | BinaryExprNode
  | AssignmentExprNode
  | ConditionalExprNode
  | CallExprNode;

export type ExprLayer<R> =
  | ConstantExprNode
  | VarExprNode
  | CastExprNode<R>
  | UnaryExprNode<R>
  | BinaryExprNode<R>
  | AssignmentExprNode<R>
  | ConditionalExprNode<R>
  | CallExprNode<R>;

/**
 * Apply `f` to every child expression of `expr`, in evaluation order, keeping all other fields.
 *
 * This is the single place that declares which fields of each expression variant are children.
 */
export function mapExprChildren<R>(expr: ExprNode, f: (child: ExprNode) => R): ExprLayer<R> {
  switch (expr.kind) {
    case 'Constant':
    case 'Var':
      return expr;
    case 'Cast':
      return { ...expr, expr: f(expr.expr) };
    case 'Unary':
      return { ...expr, operand: f(expr.operand) };
    case 'Binary':
      return { ...expr, left: f(expr.left), right: f(expr.right) };
    case 'Assignment':
      return { ...expr, target: f(expr.target), value: f(expr.value) };
    case 'Conditional':
      return { ...expr, condition: f(expr.condition), then: f(expr.then), else: f(expr.else) };
    case 'Call':
      return { ...expr, args: expr.args.map(f) };
  }
}

/**
 * Post-order fold: children are folded first (left to right), then `visit` sees the node with its
 * children replaced by their results.
 */
export function foldExpr<R>(expr: ExprNode, visit: (node: ExprLayer<R>) => R): R {
  return visit(mapExprChildren(expr, (child) => foldExpr(child, visit)));
}
