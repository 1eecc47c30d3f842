#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, Platform } from './formats/types.js';
import type { Stage } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  platform: Platform;
  stopAfter?: Stage;
  emitTacky: boolean;
};

const STAGE_FLAGS: ReadonlyMap<string, Stage> = new Map([
  ['--lex', 'lex'],
  ['--parse', 'parse'],
  ['--validate', 'validate'],
  ['--tacky', 'tacky'],
  ['--codegen', 'codegen'],
]);

function usage(): string {
  return [
    'cinder [options] <file.c>',
    '',
    'Options:',
    '  -o, --output <file>   Assembly output path (default: <file>.s)',
    '      --platform <p>    Target platform: linux|macos (default: linux)',
    '      --lex             Stop after lexing',
    '      --parse           Stop after parsing',
    '      --validate        Stop after semantic analysis',
    '      --tacky           Stop after TAC generation',
    '      --codegen         Stop after assembly lowering',
    '      --tac             Also write the TAC listing (.tac)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <file.c> must be the last argument.',
    '  - Stage flags run the compiler up to that stage and write nothing.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  // Walk up from this module: the source tree and dist/ sit at different depths.
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

function parsePlatform(v: string): Platform {
  if (v !== 'linux' && v !== 'macos') fail(`Unsupported --platform "${v}" (expected linux|macos)`);
  return v;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let platform: Platform = 'linux';
  let stopAfter: Stage | undefined;
  let emitTacky = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (a.startsWith('--output=')) {
        const v = a.slice('--output='.length);
        if (!v) fail(`--output expects a value`);
        outputPath = v;
        continue;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--platform' || a.startsWith('--platform=')) {
      const v = a.startsWith('--platform=') ? a.slice('--platform='.length) : (argv[++i] ?? '');
      if (!v) fail(`--platform expects a value`);
      platform = parsePlatform(v);
      continue;
    }
    const stage = STAGE_FLAGS.get(a);
    if (stage) {
      if (stopAfter !== undefined && stopAfter !== stage) {
        fail(`Only one stage flag may be given (got --${stopAfter} and ${a})`);
      }
      stopAfter = stage;
      continue;
    }
    if (a === '--tac') {
      emitTacky = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <file.c> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <file.c> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    platform,
    ...(stopAfter ? { stopAfter } : {}),
    emitTacky,
  };
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

function assemblyPath(entryFile: string, outputPath?: string): string {
  return outputPath ? resolve(outputPath) : `${stripExtension(resolve(entryFile))}.s`;
}

async function writeArtifacts(asmPath: string, artifacts: Artifact[]): Promise<void> {
  const ensureDir = async (p: string) => mkdir(dirname(p), { recursive: true });
  const tacPath = `${stripExtension(asmPath)}.tac`;

  let wroteAssembly = false;
  for (const artifact of artifacts) {
    const path = artifact.kind === 'asm' ? asmPath : tacPath;
    await ensureDir(path);
    await writeFile(path, artifact.text, 'utf8');
    if (artifact.kind === 'asm') wroteAssembly = true;
  }

  if (wroteAssembly) process.stdout.write(`${asmPath}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        platform: parsed.platform,
        ...(parsed.stopAfter ? { stopAfter: parsed.stopAfter } : {}),
        emitTacky: parsed.emitTacky,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(assemblyPath(parsed.entryFile, parsed.outputPath), res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`cinder: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm's bin shim may resolve to a different spelling of the same built entry.
  return (
    normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
