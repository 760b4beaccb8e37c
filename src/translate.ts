import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type {
  PipelineDeps,
  TranslateFn,
  TranslateResult,
  TranslatorOptions,
  VmSource,
} from './pipeline.js';

import type { ProgramNode, VmFileNode } from './frontend/ast.js';
import { parseVmFile } from './frontend/parser.js';
import { emitProgram } from './lowering/emit.js';
import type { Artifact } from './formats/types.js';
import { resolveSymbols } from './formats/symbols.js';
import { buildEnv } from './semantics/env.js';
import { lintLinkage } from './lint/linkage.js';

export const DEFAULT_ENTRY = 'Sys.init';
export const VM_EXTENSION = '.vm';

function isVmFile(name: string): boolean {
  return extname(name).toLowerCase() === VM_EXTENSION;
}

/**
 * Read the translation input: a single file, or every `.vm` file of a directory sorted by name.
 */
async function loadSources(
  inputPath: string,
  diagnostics: Diagnostic[],
): Promise<{ sources: VmSource[]; isDirectory: boolean } | undefined> {
  const ioError = (file: string, err: unknown): undefined => {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read "${file}": ${String(err)}`,
      file,
    });
    return undefined;
  };

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputPath)).isDirectory();
  } catch (err) {
    return ioError(inputPath, err);
  }

  if (!isDirectory) {
    try {
      const text = await readFile(inputPath, 'utf8');
      return { sources: [{ path: inputPath, text }], isDirectory };
    } catch (err) {
      return ioError(inputPath, err);
    }
  }

  let names: string[];
  try {
    const entries = await readdir(inputPath, { withFileTypes: true });
    names = entries
      .filter((e) => e.isFile() && isVmFile(e.name))
      .map((e) => e.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  } catch (err) {
    return ioError(inputPath, err);
  }

  if (names.length === 0) {
    diagnostics.push({
      id: DiagnosticIds.NoSourceFiles,
      severity: 'error',
      message: `No ${VM_EXTENSION} files found in directory "${inputPath}"`,
      file: inputPath,
    });
    return undefined;
  }

  const sources: VmSource[] = [];
  for (const name of names) {
    const path = join(inputPath, name);
    try {
      // eslint-disable-next-line no-await-in-loop
      sources.push({ path, text: await readFile(path, 'utf8') });
    } catch (err) {
      return ioError(path, err);
    }
  }
  return { sources, isDirectory };
}

function parseProgram(
  inputPath: string,
  sources: VmSource[],
  diagnostics: Diagnostic[],
): ProgramNode {
  const files: VmFileNode[] = [];
  for (const source of sources) {
    try {
      files.push(parseVmFile(source.path, source.text, diagnostics));
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.InternalParseError,
        severity: 'error',
        message: `Internal error during parse: ${String(err)}`,
        file: source.path,
      });
    }
  }
  return { kind: 'Program', inputPath, files };
}

function runPipeline(
  inputPath: string,
  sources: VmSource[],
  bootstrapByDefault: boolean,
  options: TranslatorOptions,
  deps: PipelineDeps,
): TranslateResult {
  const diagnostics: Diagnostic[] = [];
  const program = parseProgram(inputPath, sources, diagnostics);
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const bootstrap = options.bootstrap ?? bootstrapByDefault;
  const entry = options.entry ?? DEFAULT_ENTRY;

  const linkage = options.linkage ?? 'off';
  if (linkage !== 'off') {
    lintLinkage(
      buildEnv(program),
      linkage,
      diagnostics,
      bootstrap ? { name: entry, file: inputPath } : undefined,
    );
    if (hasErrors(diagnostics)) {
      return { diagnostics, artifacts: [] };
    }
  }

  const emitted = emitProgram(program, diagnostics, {
    bootstrap,
    entry,
    haltLoop: options.haltLoop ?? true,
  });
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const artifacts: Artifact[] = [
    deps.formats.writeAsm(emitted, { comments: options.comments ?? true }),
  ];
  if (options.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(emitted, resolveSymbols(emitted).symbols));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: inputPath,
      });
    }
  }

  return { diagnostics, artifacts };
}

/**
 * Translate in-memory VM sources, in the given order, as one program.
 *
 * No bootstrap is emitted unless `options.bootstrap` asks for it.
 */
export function translateSources(
  sources: VmSource[],
  options: TranslatorOptions,
  deps: PipelineDeps,
): TranslateResult {
  return runPipeline(sources[0]?.path ?? '<input>', sources, false, options, deps);
}

/**
 * Translate a `.vm` file or a directory of `.vm` files.
 *
 * A directory is linked into one program with bootstrap code; a single file is translated as is.
 * `options.bootstrap` overrides that policy.
 */
export const translate: TranslateFn = async (
  inputPath: string,
  options: TranslatorOptions,
  deps: PipelineDeps,
): Promise<TranslateResult> => {
  const diagnostics: Diagnostic[] = [];
  const loaded = await loadSources(resolve(inputPath), diagnostics);
  if (!loaded) return { diagnostics, artifacts: [] };
  return runPipeline(resolve(inputPath), loaded.sources, loaded.isDirectory, options, deps);
};
