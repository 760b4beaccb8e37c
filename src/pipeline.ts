import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

export type LinkageMode = 'off' | 'warn' | 'error';

/**
 * Options that influence translation and which artifacts are produced.
 */
export interface TranslatorOptions {
  /**
   * Prepend bootstrap code (`SP = 256; call <entry> 0`).
   *
   * Defaults to `true` when the input is a directory and `false` for a single `.vm` file.
   */
  bootstrap?: boolean;
  /** Entry function invoked by the bootstrap (default `Sys.init`). */
  entry?: string;
  /** Append an infinite loop after the last command (default `true`). */
  haltLoop?: boolean;
  /** Echo each VM command as a comment in the `.asm` (default `true`). */
  comments?: boolean;
  /** Emit a listing (`.lst`) with ROM addresses and the symbol table. */
  emitListing?: boolean;
  /** Static linkage checks (`off` by default). */
  linkage?: LinkageMode;
}

/**
 * Result of a translation run: diagnostics plus any produced artifacts.
 *
 * `artifacts` is empty whenever `diagnostics` contains an error.
 */
export interface TranslateResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * In-memory source file handed to the pipeline.
 */
export interface VmSource {
  path: string;
  text: string;
}

/**
 * Dependency injection surface for the translator pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level translate function signature used by the pipeline contract.
 */
export type TranslateFn = (
  inputPath: string,
  options: TranslatorOptions,
  deps: PipelineDeps,
) => Promise<TranslateResult>;
