import { basename, extname } from 'node:path';

import type {
  ArithmeticOperator,
  BranchKind,
  Command,
  CommandNode,
  Segment,
  VmFileNode,
} from './ast.js';
import { ARITHMETIC_OPERATORS, SEGMENTS } from './ast.js';
import { lineText, makeSourceFile, span } from './source.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

const COMMENT_START = '//';
const IDENTIFIER_RE = /^[A-Za-z_.:][A-Za-z0-9_.:]*$/;
const COUNT_RE = /^[0-9]+$/;

const arithmeticOperators: ReadonlySet<string> = new Set(ARITHMETIC_OPERATORS);
const segments: ReadonlySet<string> = new Set(SEGMENTS);

/**
 * Outcome of parsing one line of VM source.
 *
 * `column` values are 1-based and point into the original line (comments included). `endColumn` is
 * the column just past the last token.
 */
export type ParseResult =
  | { kind: 'empty' }
  | { kind: 'command'; command: Command; text: string; column: number; endColumn: number }
  | { kind: 'error'; id: DiagnosticId; message: string; column: number };

interface Token {
  text: string;
  /** 1-based column in the raw line. */
  column: number;
}

function stripComment(line: string): string {
  const at = line.indexOf(COMMENT_START);
  return at >= 0 ? line.slice(0, at) : line;
}

function tokenize(line: string): Token[] {
  const out: Token[] = [];
  const re = /\S+/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(line)) !== null) {
    out.push({ text: m[0], column: m.index + 1 });
  }
  return out;
}

function isArithmeticOperator(s: string): s is ArithmeticOperator {
  return arithmeticOperators.has(s);
}

function isSegment(s: string): s is Segment {
  return segments.has(s);
}

function isBranchKind(s: string): s is BranchKind {
  return s === 'label' || s === 'goto' || s === 'if-goto';
}

function parseCount(text: string): number | undefined {
  if (!COUNT_RE.test(text)) return undefined;
  const n = Number.parseInt(text, 10);
  return Number.isSafeInteger(n) ? n : undefined;
}

function malformed(message: string, column: number): ParseResult {
  return { kind: 'error', id: DiagnosticIds.MalformedCommand, message, column };
}

/**
 * Parse one line of VM source text.
 *
 * Returns `empty` for blank and comment-only lines. Mnemonics are case-sensitive.
 */
export function parseCommand(line: string): ParseResult {
  const tokens = tokenize(stripComment(line));
  const head = tokens[0];
  if (!head) return { kind: 'empty' };

  const last = tokens[tokens.length - 1] ?? head;
  const text = tokens.map((t) => t.text).join(' ');
  const ok = (command: Command): ParseResult => ({
    kind: 'command',
    command,
    text,
    column: head.column,
    endColumn: last.column + last.text.length,
  });
  const operands = tokens.slice(1);
  const mnemonic = head.text;

  if (isArithmeticOperator(mnemonic)) {
    const extra = operands[0];
    if (extra) return malformed(`${mnemonic} expects no operands`, extra.column);
    return ok({ kind: 'Arithmetic', operator: mnemonic });
  }

  if (mnemonic === 'push' || mnemonic === 'pop') {
    const [segTok, indexTok, extra] = operands;
    if (!segTok || !indexTok || extra) {
      return malformed(
        `${mnemonic} expects a segment and an index`,
        extra?.column ?? last.column,
      );
    }
    if (!isSegment(segTok.text)) {
      return malformed(`${mnemonic}: unknown segment "${segTok.text}"`, segTok.column);
    }
    const index = parseCount(indexTok.text);
    if (index === undefined) {
      return malformed(
        `${mnemonic}: index must be a non-negative integer, got "${indexTok.text}"`,
        indexTok.column,
      );
    }
    return ok({ kind: 'MemoryAccess', direction: mnemonic, segment: segTok.text, index });
  }

  if (isBranchKind(mnemonic)) {
    const [symTok, extra] = operands;
    if (!symTok || extra) {
      return malformed(`${mnemonic} expects one symbol`, extra?.column ?? last.column);
    }
    if (!IDENTIFIER_RE.test(symTok.text)) {
      return malformed(`${mnemonic}: invalid symbol "${symTok.text}"`, symTok.column);
    }
    return ok({ kind: 'Branch', branch: mnemonic, symbol: symTok.text });
  }

  if (mnemonic === 'function' || mnemonic === 'call') {
    const countName = mnemonic === 'function' ? 'local count' : 'argument count';
    const [nameTok, countTok, extra] = operands;
    if (!nameTok || !countTok || extra) {
      return malformed(
        `${mnemonic} expects a name and a ${countName}`,
        extra?.column ?? last.column,
      );
    }
    if (!IDENTIFIER_RE.test(nameTok.text)) {
      return malformed(`${mnemonic}: invalid function name "${nameTok.text}"`, nameTok.column);
    }
    const count = parseCount(countTok.text);
    if (count === undefined) {
      return malformed(
        `${mnemonic}: ${countName} must be a non-negative integer, got "${countTok.text}"`,
        countTok.column,
      );
    }
    return mnemonic === 'function'
      ? ok({ kind: 'FunctionDecl', name: nameTok.text, nLocals: count })
      : ok({ kind: 'Call', name: nameTok.text, nArgs: count });
  }

  if (mnemonic === 'return') {
    const extra = operands[0];
    if (extra) return malformed('return expects no operands', extra.column);
    return ok({ kind: 'Return' });
  }

  return {
    kind: 'error',
    id: DiagnosticIds.UnknownCommand,
    message: `Unknown command "${mnemonic}"`,
    column: head.column,
  };
}

/**
 * Name used to qualify a file's `static` symbols: the base name without `.vm`.
 */
export function vmFileName(path: string): string {
  const base = basename(path);
  const ext = extname(base);
  return ext.toLowerCase() === '.vm' ? base.slice(0, -ext.length) : base;
}

/**
 * Parse a whole `.vm` file.
 *
 * Every malformed line produces one diagnostic; well-formed lines are still returned so callers can
 * decide how to proceed (the translator stops when any error was recorded).
 */
export function parseVmFile(path: string, text: string, diagnostics: Diagnostic[]): VmFileNode {
  const file = makeSourceFile(path, text);
  const commands: CommandNode[] = [];

  for (let i = 0; i < file.lineStarts.length; i++) {
    const raw = lineText(file, i);
    const res = parseCommand(raw);
    const lineStart = file.lineStarts[i] ?? 0;
    if (res.kind === 'empty') continue;
    if (res.kind === 'error') {
      diagnostics.push({
        id: res.id,
        severity: 'error',
        message: res.message,
        file: path,
        line: i + 1,
        column: res.column,
      });
      continue;
    }
    commands.push({
      kind: 'Command',
      span: span(file, lineStart + res.column - 1, lineStart + res.endColumn - 1),
      command: res.command,
      text: res.text,
    });
  }

  return {
    kind: 'VmFile',
    span: span(file, 0, text.length),
    path,
    name: vmFileName(path),
    commands,
  };
}
