import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * A translation unit's text with the offset of every line start, for turning lexer offsets into
 * line and column numbers.
 */
export interface SourceFile {
  path: string;
  text: string;
  /** Offset of the first character of each line; `lineStarts[0]` is 0. */
  lineStarts: number[];
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let nl = text.indexOf('\n'); nl !== -1; nl = text.indexOf('\n', nl + 1)) {
    lineStarts.push(nl + 1);
  }
  return { path, text, lineStarts };
}

/**
 * 1-based line and column of `offset`, clamped to the text. Columns count UTF-16 code units.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const at = Math.max(0, Math.min(offset, file.text.length));
  // Last line whose start is at or before `at`.
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((file.lineStarts[mid] ?? 0) <= at) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: at - (file.lineStarts[lo] ?? 0) + 1, offset: at };
}

/** Span covering `[start, end)`. */
export function span(file: SourceFile, start: number, end: number): SourceSpan {
  return { file: file.path, start: posAtOffset(file, start), end: posAtOffset(file, end) };
}
