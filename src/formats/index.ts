import type { FormatWriters } from './types.js';
import { writeAssembly } from './writeAssembly.js';
import { writeTacky } from './writeTacky.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAssembly,
  writeTacky,
};
