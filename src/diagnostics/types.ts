/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `CND201`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs, grouped by the pass that raises them.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'CND000',

  /** Unexpected exception escaped a pass. */
  InternalError: 'CND001',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'CND002',

  /** Invalid character or malformed integer literal. */
  LexError: 'CND100',

  /** Token did not match what the grammar expects at this point. */
  ParseError: 'CND200',

  /** Invalid combination of type specifiers or storage classes. */
  InvalidSpecifier: 'CND201',

  /** Same name declared twice in one scope. */
  DuplicateDeclaration: 'CND300',

  /** Name used without a visible declaration. */
  UndeclaredVariable: 'CND301',

  /** Function body inside another function body. */
  NestedFunctionDefinition: 'CND302',

  /** `break` with no enclosing loop. */
  BreakOutsideLoop: 'CND303',

  /** `continue` with no enclosing loop. */
  ContinueOutsideLoop: 'CND304',

  /** Assignment target is not a variable. */
  InvalidLvalue: 'CND305',

  /** Declarations of one identifier disagree on type. */
  ConflictingType: 'CND400',

  /** Function or file-scope variable defined more than once. */
  DuplicateDefinition: 'CND401',

  /** Declarations of one identifier disagree on linkage. */
  ConflictingLinkage: 'CND402',

  /** Initializer not allowed or not a compile-time constant. */
  InvalidInitializer: 'CND403',

  /** Call of a non-function, function used as a value, or wrong argument count. */
  InvalidCall: 'CND404',

  /** TAC or assembly invariant violated; a compiler defect rather than a user error. */
  InternalLoweringError: 'CND500',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
