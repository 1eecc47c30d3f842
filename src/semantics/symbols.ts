import type { CType, ConstValue } from '../frontend/ast.js';

/**
 * Initial value of an object with static storage duration.
 *
 * - `Tentative`: file-scope declaration without initializer and without `extern`; zero unless
 *   another declaration in the unit supplies a value.
 * - `NoInitializer`: `extern` declaration; storage is defined elsewhere.
 */
export type InitialValue =
  | { kind: 'Tentative' }
  | { kind: 'Initial'; value: ConstValue }
  | { kind: 'NoInitializer' };

export type IdentifierAttrs =
  | { kind: 'Local' }
  | { kind: 'Static'; init: InitialValue; global: boolean }
  | { kind: 'Fun'; defined: boolean; global: boolean };

export interface SymbolEntry {
  type: CType;
  attrs: IdentifierAttrs;
}

/**
 * Frontend symbol table keyed by unique (post-resolve) name.
 *
 * Passes take a table, copy it into a private `Map`, and hand back the updated copy; the table a
 * pass receives is never modified.
 */
export type SymbolTable = ReadonlyMap<string, SymbolEntry>;

export const emptySymbolTable: SymbolTable = new Map();
