#!/usr/bin/env node
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import type { LinkageMode } from './pipeline.js';
import { translate } from './translate.js';

type CliExit = { code: number };

type CliOptions = {
  input: string;
  outputPath?: string;
  bootstrap?: boolean;
  entry?: string;
  haltLoop: boolean;
  comments: boolean;
  emitListing: boolean;
  linkage: LinkageMode;
};

function usage(): string {
  return [
    'vmt [options] <input.vm | directory>',
    '',
    'Options:',
    '  -o, --output <file>   Output path (must end with .asm)',
    '      --bootstrap       Always emit bootstrap code (default: only for directories)',
    '      --no-bootstrap    Never emit bootstrap code',
    '      --entry <name>    Entry function called by the bootstrap (default: Sys.init)',
    '      --no-halt         Omit the trailing halt loop',
    '      --no-comments     Omit VM command comments from the .asm',
    '  -l, --listing         Also write a .lst listing',
    '      --linkage <m>     Linkage checks: off|warn|error (default: off)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <input> must be the last argument.',
    '  - A directory is translated as one program: every .vm file, sorted by name.',
    '  - Default output: <dir>/<stem>.asm for a file, <dir>/<dirname>.asm for a directory.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts and dist/src/cli.js sit one and two levels below the package root.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    }
    return '0.0.0';
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let bootstrap: boolean | undefined;
  let entry: string | undefined;
  let haltLoop = true;
  let comments = true;
  let emitListing = false;
  let linkage: LinkageMode = 'off';
  let input: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--bootstrap') {
      bootstrap = true;
      continue;
    }
    if (a === '--no-bootstrap') {
      bootstrap = false;
      continue;
    }
    if (a === '--entry' || a.startsWith('--entry=')) {
      const v = a.startsWith('--entry=') ? a.slice('--entry='.length) : argv[++i];
      if (!v) fail(`--entry expects a value`);
      entry = v;
      continue;
    }
    if (a === '--no-halt') {
      haltLoop = false;
      continue;
    }
    if (a === '--no-comments') {
      comments = false;
      continue;
    }
    if (a === '-l' || a === '--listing') {
      emitListing = true;
      continue;
    }
    if (a === '--linkage' || a.startsWith('--linkage=')) {
      const v = a.startsWith('--linkage=') ? a.slice('--linkage='.length) : (argv[++i] ?? '');
      if (!v) fail(`--linkage expects a value`);
      if (v !== 'off' && v !== 'warn' && v !== 'error') {
        fail(`Unsupported --linkage "${v}" (expected off|warn|error)`);
      }
      linkage = v;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (input !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <input> argument (and it must be last)`);
    }
    input = a;
  }

  if (!input) {
    fail(`Expected exactly one <input> argument (and it must be last)`);
  }

  if (outputPath && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm"`);
  }

  return {
    input,
    ...(outputPath ? { outputPath } : {}),
    ...(bootstrap !== undefined ? { bootstrap } : {}),
    ...(entry ? { entry } : {}),
    haltLoop,
    comments,
    emitListing,
    linkage,
  };
}

async function artifactBase(input: string, outputPath?: string): Promise<string> {
  if (outputPath) {
    const resolved = resolve(outputPath);
    return resolved.slice(0, -extname(resolved).length);
  }
  const entry = resolve(input);
  const isDirectory = await stat(entry).then(
    (s) => s.isDirectory(),
    () => false,
  );
  if (isDirectory) return join(entry, basename(entry));
  const ext = extname(entry);
  return ext.length > 0 ? entry.slice(0, -ext.length) : entry;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<void> {
  const asmPath = `${base}.asm`;
  const lstPath = `${base}.lst`;
  await mkdir(dirname(asmPath), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const a of artifacts) {
    if (a.kind === 'asm') writes.push(writeFile(asmPath, a.text, 'utf8'));
    else writes.push(writeFile(lstPath, a.text, 'utf8'));
  }
  await Promise.all(writes);

  process.stdout.write(`${asmPath}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

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

    const base = await artifactBase(parsed.input, parsed.outputPath);

    const res = await translate(
      parsed.input,
      {
        ...(parsed.bootstrap !== undefined ? { bootstrap: parsed.bootstrap } : {}),
        ...(parsed.entry ? { entry: parsed.entry } : {}),
        haltLoop: parsed.haltLoop,
        comments: parsed.comments,
        emitListing: parsed.emitListing,
        linkage: parsed.linkage,
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

    await writeArtifacts(base, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`vmt: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
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
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  // npm bin shims surface the built entry under a different spelling on some platforms.
  const invoked = normalizePathForCompare(invokedAs);
  const selfPath = self.replace(/\\/g, '/');
  return invoked.endsWith('/dist/src/cli.js') && selfPath.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
