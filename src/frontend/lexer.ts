import type { SourceSpan } from './ast.js';
import { LexError } from '../diagnostics/errors.js';
import { makeSourceFile, span } from './source.js';

export const KEYWORDS = [
  'int',
  'long',
  'signed',
  'unsigned',
  'void',
  'return',
  'if',
  'else',
  'do',
  'while',
  'for',
  'break',
  'continue',
  'static',
  'extern',
] as const;

export type KeywordKind = (typeof KEYWORDS)[number];

/** Multi-character operators first: the lexer takes the first (longest) match. */
const PUNCTUATORS = [
  '<<',
  '>>',
  '<=',
  '>=',
  '==',
  '!=',
  '&&',
  '||',
  '--',
  '++',
  '(',
  ')',
  '{',
  '}',
  ';',
  ',',
  '~',
  '-',
  '+',
  '*',
  '/',
  '%',
  '&',
  '|',
  '^',
  '!',
  '<',
  '>',
  '=',
  '?',
  ':',
] as const;

export type PunctuatorKind = (typeof PUNCTUATORS)[number];

export type ConstantKind =
  | 'constant'
  | 'longConstant'
  | 'unsignedConstant'
  | 'unsignedLongConstant';

export type TokenKind = KeywordKind | PunctuatorKind | ConstantKind | 'identifier' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Exact source text of the token (empty for `eof`). */
  text: string;
  span: SourceSpan;
}

const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);

function isKeyword(word: string): word is KeywordKind {
  return keywordSet.has(word);
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function constantKind(lexeme: string): ConstantKind | undefined {
  const m = /^[0-9]+([A-Za-z]*)$/.exec(lexeme);
  if (!m) return undefined;
  const suffix = (m[1] ?? '').toLowerCase();
  switch (suffix) {
    case '':
      return 'constant';
    case 'l':
      return 'longConstant';
    case 'u':
      return 'unsignedConstant';
    case 'ul':
    case 'lu':
      return 'unsignedLongConstant';
    default:
      return undefined;
  }
}

/**
 * Split C source text into tokens, ending with exactly one `eof` token.
 *
 * Whitespace, `//` and `/* *\/` comments, and preprocessor line markers (a `#` as the first
 * non-blank character of a line) are skipped.
 */
export function lex(file: string, source: string): Token[] {
  const sourceFile = makeSourceFile(file, source);
  const tokens: Token[] = [];
  let offset = 0;

  const atLineStart = (): boolean => {
    const lineStart = source.lastIndexOf('\n', offset - 1) + 1;
    return /^[ \t\r\f\v]*$/.test(source.slice(lineStart, offset));
  };

  while (offset < source.length) {
    const ch = source.charAt(offset);
    const start = offset;

    if (/\s/.test(ch)) {
      offset++;
      continue;
    }

    if (source.startsWith('//', offset) || (ch === '#' && atLineStart())) {
      const nl = source.indexOf('\n', offset);
      offset = nl < 0 ? source.length : nl;
      continue;
    }

    if (source.startsWith('/*', offset)) {
      const close = source.indexOf('*/', offset + 2);
      if (close < 0) {
        throw new LexError('Unterminated block comment', span(sourceFile, start, source.length));
      }
      offset = close + 2;
      continue;
    }

    if (isIdentStart(ch)) {
      while (offset < source.length && isIdentPart(source.charAt(offset))) offset++;
      const word = source.slice(start, offset);
      tokens.push({
        kind: isKeyword(word) ? word : 'identifier',
        text: word,
        span: span(sourceFile, start, offset),
      });
      continue;
    }

    if (isDigit(ch)) {
      while (offset < source.length && isIdentPart(source.charAt(offset))) offset++;
      const lexeme = source.slice(start, offset);
      const kind = constantKind(lexeme);
      if (!kind) {
        throw new LexError(`Invalid integer literal "${lexeme}"`, span(sourceFile, start, offset));
      }
      tokens.push({ kind, text: lexeme, span: span(sourceFile, start, offset) });
      continue;
    }

    const punct = PUNCTUATORS.find((p) => source.startsWith(p, offset));
    if (punct) {
      offset += punct.length;
      tokens.push({ kind: punct, text: punct, span: span(sourceFile, start, offset) });
      continue;
    }

    throw new LexError(`Unexpected character "${ch}"`, span(sourceFile, start, start + 1));
  }

  tokens.push({ kind: 'eof', text: '', span: span(sourceFile, source.length, source.length) });
  return tokens;
}

/**
 * Human-readable token description for diagnostics.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'identifier':
      return `identifier "${token.text}"`;
    case 'constant':
    case 'longConstant':
    case 'unsignedConstant':
    case 'unsignedLongConstant':
      return `constant ${token.text}`;
    default:
      return `"${token.text}"`;
  }
}
