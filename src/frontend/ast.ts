/**
 * Frontend contracts for VM programs.
 *
 * This module defines types only (no parsing/lowering).
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all nodes that carry a location.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

export const ARITHMETIC_OPERATORS = [
  'add',
  'sub',
  'neg',
  'eq',
  'gt',
  'lt',
  'and',
  'or',
  'not',
] as const;
export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[number];

export const SEGMENTS = [
  'constant',
  'local',
  'argument',
  'this',
  'that',
  'pointer',
  'temp',
  'static',
] as const;
export type Segment = (typeof SEGMENTS)[number];

export type BranchKind = 'label' | 'goto' | 'if-goto';

export interface ArithmeticCommand {
  readonly kind: 'Arithmetic';
  readonly operator: ArithmeticOperator;
}

export interface MemoryAccessCommand {
  readonly kind: 'MemoryAccess';
  readonly direction: 'push' | 'pop';
  readonly segment: Segment;
  readonly index: number;
}

export interface BranchCommand {
  readonly kind: 'Branch';
  readonly branch: BranchKind;
  readonly symbol: string;
}

export interface FunctionDeclCommand {
  readonly kind: 'FunctionDecl';
  readonly name: string;
  readonly nLocals: number;
}

export interface CallCommand {
  readonly kind: 'Call';
  readonly name: string;
  readonly nArgs: number;
}

export interface ReturnCommand {
  readonly kind: 'Return';
}

/**
 * One VM instruction. The vocabulary is closed; lowering switches over `kind` exhaustively.
 */
export type Command =
  | ArithmeticCommand
  | MemoryAccessCommand
  | BranchCommand
  | FunctionDeclCommand
  | CallCommand
  | ReturnCommand;

/**
 * A parsed command plus the source line it came from.
 */
export interface CommandNode extends BaseNode {
  kind: 'Command';
  command: Command;
  /** Source text of the command with comments and surrounding whitespace removed. */
  text: string;
}

/**
 * A single `.vm` source file.
 */
export interface VmFileNode extends BaseNode {
  kind: 'VmFile';
  path: string;
  /** Base name without the `.vm` extension; qualifies `static` symbols and top-level labels. */
  name: string;
  commands: CommandNode[];
}

/**
 * Parsed translation unit: every input file, in translation order.
 */
export interface ProgramNode {
  kind: 'Program';
  /** Input path as given (a `.vm` file or a directory). */
  inputPath: string;
  files: VmFileNode[];
}
