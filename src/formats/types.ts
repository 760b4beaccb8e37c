/**
 * Lowering trace entry, in emission order.
 *
 * Comments carry the VM command they introduce and, when known, its source location.
 */
export type EmittedAsmTraceEntry =
  | { kind: 'comment'; text: string; file?: string; line?: number }
  | { kind: 'label'; name: string }
  | { kind: 'instruction'; text: string };

/**
 * Output of lowering: the full assembly program as an ordered trace.
 */
export interface EmittedProgram {
  trace: EmittedAsmTraceEntry[];
}

/**
 * A resolved assembler symbol, for listings.
 *
 * `label` addresses are ROM addresses; `predefined` and `variable` addresses are RAM addresses.
 */
export interface SymbolEntry {
  kind: 'label' | 'predefined' | 'variable';
  name: string;
  address: number;
}

/**
 * Options for `.asm` emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Emit `// <vm command>` comments ahead of each translated command (default: true).
   */
  comments?: boolean;
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  text: string;
}

/**
 * Union of all artifact kinds produced by the translator.
 */
export type Artifact = AsmArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn the emitted program into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeListing?(
    program: EmittedProgram,
    symbols: SymbolEntry[],
    opts?: WriteListingOptions,
  ): ListingArtifact;
}
