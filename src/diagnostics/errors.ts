import type { SourceSpan } from '../frontend/ast.js';
import type { Diagnostic, DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Failure raised inside a compiler pass.
 *
 * Passes throw the first error they hit; the compile driver converts it into a single
 * {@link Diagnostic} and stops.
 */
export class CompileError extends Error {
  readonly id: DiagnosticId;
  readonly span: SourceSpan | undefined;

  constructor(id: DiagnosticId, message: string, span?: SourceSpan) {
    super(message);
    this.name = 'CompileError';
    this.id = id;
    this.span = span;
  }

  toDiagnostic(fallbackFile: string): Diagnostic {
    return {
      id: this.id,
      severity: 'error',
      message: this.message,
      file: this.span?.file ?? fallbackFile,
      ...(this.span ? { line: this.span.start.line, column: this.span.start.column } : {}),
    };
  }
}

export class LexError extends CompileError {
  constructor(message: string, span: SourceSpan) {
    super(DiagnosticIds.LexError, message, span);
    this.name = 'LexError';
  }
}

export class ParseError extends CompileError {
  /** What the grammar wanted, when the failure is a token mismatch. */
  readonly expected: string | undefined;
  /** What was found instead. */
  readonly actual: string | undefined;

  constructor(message: string, span: SourceSpan, mismatch?: { expected: string; actual: string }) {
    super(DiagnosticIds.ParseError, message, span);
    this.name = 'ParseError';
    this.expected = mismatch?.expected;
    this.actual = mismatch?.actual;
  }

  static mismatch(expected: string, actual: string, span: SourceSpan): ParseError {
    return new ParseError(`Expected ${expected} but found ${actual}`, span, { expected, actual });
  }
}

export class InvalidSpecifierError extends CompileError {
  constructor(message: string, span: SourceSpan) {
    super(DiagnosticIds.InvalidSpecifier, message, span);
    this.name = 'InvalidSpecifierError';
  }
}

export class DuplicateDeclarationError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
  ) {
    super(DiagnosticIds.DuplicateDeclaration, `"${identifier}" is already declared in this scope`, span);
    this.name = 'DuplicateDeclarationError';
  }
}

export class UndeclaredVariableError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
    what: 'variable' | 'function' = 'variable',
  ) {
    super(DiagnosticIds.UndeclaredVariable, `Use of undeclared ${what} "${identifier}"`, span);
    this.name = 'UndeclaredVariableError';
  }
}

export class NestedFunctionDefinitionError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
  ) {
    super(
      DiagnosticIds.NestedFunctionDefinition,
      `Function "${identifier}" cannot be defined inside another function`,
      span,
    );
    this.name = 'NestedFunctionDefinitionError';
  }
}

export class BreakOutsideLoopError extends CompileError {
  constructor(span: SourceSpan) {
    super(DiagnosticIds.BreakOutsideLoop, '"break" statement outside of a loop', span);
    this.name = 'BreakOutsideLoopError';
  }
}

export class ContinueOutsideLoopError extends CompileError {
  constructor(span: SourceSpan) {
    super(DiagnosticIds.ContinueOutsideLoop, '"continue" statement outside of a loop', span);
    this.name = 'ContinueOutsideLoopError';
  }
}

export class InvalidLvalueError extends CompileError {
  constructor(span: SourceSpan) {
    super(DiagnosticIds.InvalidLvalue, 'Left side of an assignment must be a variable', span);
    this.name = 'InvalidLvalueError';
  }
}

export class ConflictingTypeError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
    detail?: string,
  ) {
    super(
      DiagnosticIds.ConflictingType,
      `Conflicting types for "${identifier}"${detail ? `: ${detail}` : ''}`,
      span,
    );
    this.name = 'ConflictingTypeError';
  }
}

export class DuplicateDefinitionError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
  ) {
    super(DiagnosticIds.DuplicateDefinition, `Redefinition of "${identifier}"`, span);
    this.name = 'DuplicateDefinitionError';
  }
}

export class ConflictingLinkageError extends CompileError {
  constructor(
    readonly identifier: string,
    span: SourceSpan,
  ) {
    super(DiagnosticIds.ConflictingLinkage, `Conflicting linkage for "${identifier}"`, span);
    this.name = 'ConflictingLinkageError';
  }
}

export class InvalidInitializerError extends CompileError {
  constructor(message: string, span: SourceSpan) {
    super(DiagnosticIds.InvalidInitializer, message, span);
    this.name = 'InvalidInitializerError';
  }
}

export class InvalidCallError extends CompileError {
  constructor(message: string, span: SourceSpan) {
    super(DiagnosticIds.InvalidCall, message, span);
    this.name = 'InvalidCallError';
  }
}

/**
 * A TAC or assembly invariant does not hold. Reaching this is a compiler bug.
 */
export class InternalLoweringError extends CompileError {
  constructor(message: string, span?: SourceSpan) {
    super(DiagnosticIds.InternalLoweringError, `Internal lowering error: ${message}`, span);
    this.name = 'InternalLoweringError';
  }
}
