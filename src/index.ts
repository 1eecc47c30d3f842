export { compile, compileSource } from './compile.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps, Stage } from './pipeline.js';

export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export * from './diagnostics/errors.js';

export { lex, describeToken } from './frontend/lexer.js';
export type { Token, TokenKind } from './frontend/lexer.js';
export { parse } from './frontend/parser.js';
export type * from './frontend/ast.js';
export { foldExpr, mapExprChildren } from './frontend/ast.js';

export { resolveProgram } from './semantics/resolve.js';
export { labelLoops } from './semantics/loopLabels.js';
export { typecheckProgram, convertTo } from './semantics/typecheck.js';
export { evalConstantExpr } from './semantics/constEval.js';
export { emptySymbolTable } from './semantics/symbols.js';
export type { IdentifierAttrs, InitialValue, SymbolEntry, SymbolTable } from './semantics/symbols.js';

export { generateTacky } from './tacky/generate.js';
export type * from './tacky/ir.js';

export { generateAssembly } from './lowering/index.js';
export type * from './x64/asm.js';

export { defaultFormatWriters } from './formats/index.js';
export { writeAssembly } from './formats/writeAssembly.js';
export { writeTacky } from './formats/writeTacky.js';
export type * from './formats/types.js';
