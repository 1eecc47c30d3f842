import type {
  BinaryOp,
  BlockItemNode,
  BlockNode,
  ConstValue,
  DeclarationNode,
  ExprNode,
  ForInitNode,
  FunType,
  FunctionDeclNode,
  IntegerType,
  ParamNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
  StorageClass,
  UnaryOp,
  VarDeclNode,
} from './ast.js';
import type { Token, TokenKind } from './lexer.js';
import { describeToken } from './lexer.js';
import { InvalidSpecifierError, ParseError } from '../diagnostics/errors.js';
import { IntT, LongT, UIntT, ULongT } from '../semantics/types.js';

const TYPE_SPECIFIERS: ReadonlySet<TokenKind> = new Set<TokenKind>(['int', 'long', 'signed', 'unsigned']);
const STORAGE_CLASSES: ReadonlySet<TokenKind> = new Set<TokenKind>(['static', 'extern']);

const INT_MAX = (1n << 31n) - 1n;
const LONG_MAX = (1n << 63n) - 1n;
const UINT_MAX = (1n << 32n) - 1n;
const ULONG_MAX = (1n << 64n) - 1n;

function binaryOp(kind: TokenKind): BinaryOp | undefined {
  switch (kind) {
    case '+':
      return 'Add';
    case '-':
      return 'Subtract';
    case '*':
      return 'Multiply';
    case '/':
      return 'Divide';
    case '%':
      return 'Remainder';
    case '&':
      return 'BitAnd';
    case '|':
      return 'BitOr';
    case '^':
      return 'BitXor';
    case '<<':
      return 'ShiftLeft';
    case '>>':
      return 'ShiftRight';
    case '==':
      return 'Equal';
    case '!=':
      return 'NotEqual';
    case '<':
      return 'LessThan';
    case '<=':
      return 'LessOrEqual';
    case '>':
      return 'GreaterThan';
    case '>=':
      return 'GreaterOrEqual';
    case '&&':
      return 'And';
    case '||':
      return 'Or';
    default:
      return undefined;
  }
}

/**
 * Binding strength of a binary/ternary/assignment operator token; `undefined` for non-operators.
 */
function precedence(kind: TokenKind): number | undefined {
  switch (kind) {
    case '*':
    case '/':
    case '%':
      return 50;
    case '+':
    case '-':
      return 45;
    case '<<':
    case '>>':
      return 40;
    case '<':
    case '<=':
    case '>':
    case '>=':
      return 35;
    case '==':
    case '!=':
      return 30;
    case '&':
      return 25;
    case '^':
      return 20;
    case '|':
      return 15;
    case '&&':
      return 10;
    case '||':
      return 5;
    case '?':
      return 3;
    case '=':
      return 1;
    default:
      return undefined;
  }
}

function unaryOp(kind: TokenKind): UnaryOp | undefined {
  switch (kind) {
    case '-':
      return 'Negate';
    case '~':
      return 'Complement';
    case '!':
      return 'Not';
    default:
      return undefined;
  }
}

/**
 * Resolve a list of type-specifier tokens (`int`, `long`, `signed`, `unsigned`, any order).
 */
function typeFromSpecifiers(specifiers: Token[], where: SourceSpan): IntegerType {
  const words = specifiers.map((t) => t.kind);
  const set = new Set(words);
  if (words.length === 0) {
    throw new InvalidSpecifierError('Missing type specifier', where);
  }
  if (set.size !== words.length) {
    throw new InvalidSpecifierError(`Invalid type specifier "${words.join(' ')}"`, where);
  }
  if (set.has('signed') && set.has('unsigned')) {
    throw new InvalidSpecifierError('Type cannot be both signed and unsigned', where);
  }
  if (set.has('unsigned')) return set.has('long') ? ULongT : UIntT;
  return set.has('long') ? LongT : IntT;
}

function constantValue(token: Token): ConstValue | undefined {
  const digits = /^[0-9]+/.exec(token.text)?.[0];
  if (digits === undefined) return undefined;
  const value = BigInt(digits);
  switch (token.kind) {
    case 'constant':
      if (value > LONG_MAX) return undefined;
      return { type: value <= INT_MAX ? IntT : LongT, value };
    case 'longConstant':
      if (value > LONG_MAX) return undefined;
      return { type: LongT, value };
    case 'unsignedConstant':
      if (value > ULONG_MAX) return undefined;
      return { type: value <= UINT_MAX ? UIntT : ULongT, value };
    case 'unsignedLongConstant':
      if (value > ULONG_MAX) return undefined;
      return { type: ULongT, value };
    default:
      return undefined;
  }
}

/**
 * Parse a token sequence (as produced by `lex`) into a program tree.
 *
 * Recursive descent with precedence climbing for binary operators. Fails with a `ParseError`
 * (or `InvalidSpecifierError`) on the first token that does not fit the grammar.
 */
export function parse(file: string, tokens: readonly Token[]): ProgramNode {
  const origin = { line: 1, column: 1, offset: 0 };
  const eofFallback: Token = { kind: 'eof', text: '', span: { file, start: origin, end: origin } };
  let pos = 0;

  const peek = (ahead = 0): Token =>
    tokens[pos + ahead] ?? tokens[tokens.length - 1] ?? eofFallback;

  const next = (): Token => {
    const t = peek();
    if (pos < tokens.length) pos++;
    return t;
  };

  const previousEnd = (): SourceSpan['end'] =>
    (tokens[pos - 1] ?? tokens[0] ?? eofFallback).span.end;

  const spanFrom = (start: SourceSpan): SourceSpan => ({
    file,
    start: start.start,
    end: previousEnd(),
  });

  const expect = (kind: TokenKind): Token => {
    const t = peek();
    if (t.kind !== kind) {
      throw ParseError.mismatch(kind === 'identifier' ? 'an identifier' : `"${kind}"`, describeToken(t), t.span);
    }
    return next();
  };

  const accept = (kind: TokenKind): boolean => {
    if (peek().kind !== kind) return false;
    next();
    return true;
  };

  /**
   * Parse elements until `terminator` is next (left unconsumed). With a `separator`, elements
   * must be separated by it and the list ends at the first element not followed by one.
   */
  const parseRepeatedly = <T>(element: () => T, terminator: TokenKind, separator?: TokenKind): T[] => {
    const out: T[] = [];
    while (peek().kind !== terminator) {
      if (peek().kind === 'eof') {
        throw ParseError.mismatch(`"${terminator}"`, describeToken(peek()), peek().span);
      }
      out.push(element());
      if (separator !== undefined && !accept(separator)) break;
    }
    return out;
  };

  const isSpecifier = (kind: TokenKind): boolean =>
    TYPE_SPECIFIERS.has(kind) || STORAGE_CLASSES.has(kind);

  const parseSpecifiers = (): { type: IntegerType; storage: StorageClass | undefined } => {
    const start = peek().span;
    const types: Token[] = [];
    const storage: Token[] = [];
    while (isSpecifier(peek().kind)) {
      const t = next();
      (STORAGE_CLASSES.has(t.kind) ? storage : types).push(t);
    }
    const where = spanFrom(start);
    const type = typeFromSpecifiers(types, where);
    if (storage.length > 1) {
      throw new InvalidSpecifierError('At most one storage class is allowed', where);
    }
    const sc = storage[0]?.kind;
    return { type, storage: sc === 'static' || sc === 'extern' ? sc : undefined };
  };

  // Expressions ------------------------------------------------------------

  const parseFactor = (): ExprNode => {
    const t = peek();
    const start = t.span;

    if (
      t.kind === 'constant' ||
      t.kind === 'longConstant' ||
      t.kind === 'unsignedConstant' ||
      t.kind === 'unsignedLongConstant'
    ) {
      next();
      const value = constantValue(t);
      if (!value) {
        throw new ParseError(`Constant ${t.text} is too large to represent in any integer type`, t.span);
      }
      return { kind: 'Constant', span: t.span, value };
    }

    if (t.kind === 'identifier') {
      next();
      if (!accept('(')) return { kind: 'Var', span: t.span, name: t.text };
      const args = parseRepeatedly(() => parseExpr(0), ')', ',');
      expect(')');
      return { kind: 'Call', span: spanFrom(start), callee: t.text, args };
    }

    const op = unaryOp(t.kind);
    if (op) {
      next();
      const operand = parseFactor();
      return { kind: 'Unary', span: spanFrom(start), op, operand };
    }

    if (t.kind === '(') {
      next();
      if (isSpecifier(peek().kind)) {
        const specStart = peek().span;
        const specs = parseSpecifiers();
        if (specs.storage) {
          throw new InvalidSpecifierError('Storage class not allowed in a cast', spanFrom(specStart));
        }
        expect(')');
        const expr = parseFactor();
        return { kind: 'Cast', span: spanFrom(start), target: specs.type, expr };
      }
      const inner = parseExpr(0);
      expect(')');
      return inner;
    }

    throw ParseError.mismatch('an expression', describeToken(t), t.span);
  };

  const parseExpr = (minPrec: number): ExprNode => {
    let left = parseFactor();
    for (;;) {
      const t = peek();
      const prec = precedence(t.kind);
      if (prec === undefined || prec < minPrec) return left;
      next();
      if (t.kind === '=') {
        const value = parseExpr(prec);
        left = { kind: 'Assignment', span: spanFrom(left.span), target: left, value };
        continue;
      }
      if (t.kind === '?') {
        const then = parseExpr(0);
        expect(':');
        const otherwise = parseExpr(prec);
        left = {
          kind: 'Conditional',
          span: spanFrom(left.span),
          condition: left,
          then,
          else: otherwise,
        };
        continue;
      }
      const op = binaryOp(t.kind);
      if (!op) throw ParseError.mismatch('a binary operator', describeToken(t), t.span);
      const right = parseExpr(prec + 1);
      left = { kind: 'Binary', span: spanFrom(left.span), op, left, right };
    }
  };

  const parseOptionalExpr = (terminator: TokenKind): ExprNode | undefined =>
    peek().kind === terminator ? undefined : parseExpr(0);

  // Statements -------------------------------------------------------------

  const parseBlock = (): BlockNode => {
    const start = expect('{').span;
    const items = parseRepeatedly(parseBlockItem, '}');
    expect('}');
    return { kind: 'Block', span: spanFrom(start), items };
  };

  const parseBlockItem = (): BlockItemNode =>
    isSpecifier(peek().kind) ? parseDeclaration() : parseStatement();

  const parseForInit = (): ForInitNode => {
    if (isSpecifier(peek().kind)) {
      const decl = parseDeclaration();
      if (decl.kind !== 'VarDecl') {
        throw new ParseError('Function declaration is not allowed in a "for" loop header', decl.span);
      }
      return decl;
    }
    const expr = parseOptionalExpr(';');
    expect(';');
    return expr;
  };

  const parseStatement = (): StatementNode => {
    const t = peek();
    const start = t.span;
    switch (t.kind) {
      case 'return': {
        next();
        const expr = parseExpr(0);
        expect(';');
        return { kind: 'Return', span: spanFrom(start), expr };
      }
      case 'if': {
        next();
        expect('(');
        const condition = parseExpr(0);
        expect(')');
        const then = parseStatement();
        const otherwise = accept('else') ? parseStatement() : undefined;
        return { kind: 'If', span: spanFrom(start), condition, then, else: otherwise };
      }
      case '{': {
        const block = parseBlock();
        return { kind: 'Compound', span: block.span, block };
      }
      case 'break':
        next();
        expect(';');
        return { kind: 'Break', span: spanFrom(start), label: undefined };
      case 'continue':
        next();
        expect(';');
        return { kind: 'Continue', span: spanFrom(start), label: undefined };
      case 'while': {
        next();
        expect('(');
        const condition = parseExpr(0);
        expect(')');
        const body = parseStatement();
        return { kind: 'While', span: spanFrom(start), condition, body, label: undefined };
      }
      case 'do': {
        next();
        const body = parseStatement();
        expect('while');
        expect('(');
        const condition = parseExpr(0);
        expect(')');
        expect(';');
        return { kind: 'DoWhile', span: spanFrom(start), body, condition, label: undefined };
      }
      case 'for': {
        next();
        expect('(');
        const init = parseForInit();
        const condition = parseOptionalExpr(';');
        expect(';');
        const post = parseOptionalExpr(')');
        expect(')');
        const body = parseStatement();
        return { kind: 'For', span: spanFrom(start), init, condition, post, body, label: undefined };
      }
      case ';':
        next();
        return { kind: 'Null', span: t.span };
      default: {
        const expr = parseExpr(0);
        expect(';');
        return { kind: 'ExprStmt', span: spanFrom(start), expr };
      }
    }
  };

  // Declarations -----------------------------------------------------------

  const parseParam = (): { param: ParamNode; type: IntegerType } => {
    const start = peek().span;
    const specs = parseSpecifiers();
    if (specs.storage) {
      throw new InvalidSpecifierError('Storage class not allowed on a parameter', spanFrom(start));
    }
    const name = expect('identifier');
    return { param: { kind: 'Param', span: spanFrom(start), name: name.text }, type: specs.type };
  };

  const parseParamList = (): Array<{ param: ParamNode; type: IntegerType }> => {
    expect('(');
    if (peek().kind === 'void' && peek(1).kind === ')') {
      next();
      next();
      return [];
    }
    if (peek().kind === ')') {
      throw ParseError.mismatch('"void" or a parameter', describeToken(peek()), peek().span);
    }
    const params = parseRepeatedly(parseParam, ')', ',');
    expect(')');
    return params;
  };

  function parseDeclaration(): DeclarationNode {
    const start = peek().span;
    const specs = parseSpecifiers();
    const name = expect('identifier');

    if (peek().kind === '(') {
      const params = parseParamList();
      const funType: FunType = { kind: 'FunType', params: params.map((p) => p.type), ret: specs.type };
      const body = peek().kind === '{' ? parseBlock() : undefined;
      if (!body) expect(';');
      const decl: FunctionDeclNode = {
        kind: 'FunctionDecl',
        span: spanFrom(start),
        name: name.text,
        funType,
        params: params.map((p) => p.param),
        storage: specs.storage,
        body,
      };
      return decl;
    }

    const init = accept('=') ? parseExpr(0) : undefined;
    expect(';');
    const decl: VarDeclNode = {
      kind: 'VarDecl',
      span: spanFrom(start),
      name: name.text,
      varType: specs.type,
      storage: specs.storage,
      init,
    };
    return decl;
  }

  const programStart = peek().span;
  const declarations = parseRepeatedly(parseDeclaration, 'eof');
  expect('eof');
  return { kind: 'Program', span: spanFrom(programStart), declarations };
}
