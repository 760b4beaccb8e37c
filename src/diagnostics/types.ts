/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A translator diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `VMT101`). */
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
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'VMT000',

  /** Failed to read an input file or directory from disk. */
  IoReadFailed: 'VMT001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'VMT002',

  /** Input directory contains no `.vm` files. */
  NoSourceFiles: 'VMT003',

  /** Recognized mnemonic with the wrong operand count or operand shape. */
  MalformedCommand: 'VMT101',

  /** Mnemonic outside the VM command vocabulary. */
  UnknownCommand: 'VMT102',

  /**
   * Operand that cannot be lowered: an unaddressable segment/index pair (`pop constant`, `temp 8`), or
   * an index or count beyond what an A-instruction can load.
   */
  InvalidSegmentOperation: 'VMT201',

  /** `call` targets a function declared in no input file. */
  LinkageUndefinedFunction: 'VMT301',

  /** Function declared more than once across the program. */
  LinkageDuplicateFunction: 'VMT302',

  /** `goto`/`if-goto` targets a label not defined in the same scope. */
  LinkageUndefinedLabel: 'VMT303',

  /** Label defined twice in the same scope. */
  LinkageDuplicateLabel: 'VMT304',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
