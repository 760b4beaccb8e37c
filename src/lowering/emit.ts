import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { EmittedAsmTraceEntry, EmittedProgram } from '../formats/types.js';
import type {
  ArithmeticOperator,
  Command,
  CommandNode,
  MemoryAccessCommand,
  ProgramNode,
  SourceSpan,
} from '../frontend/ast.js';
import type { JumpCondition } from '../hack/machine.js';
import {
  FRAME_SIZE,
  HackRegisters,
  MAX_CONSTANT,
  SAVED_REGISTERS,
  SCRATCH_FRAME,
  SCRATCH_RETURN,
  STACK_ORIGIN,
  TEMP_BASE,
  TEMP_SIZE,
  at,
  cInstr,
  segmentBase,
} from '../hack/machine.js';

/** Label that parks the CPU after the last translated command. */
export const HALT_LABEL = '$HALT';

const binaryComp: Partial<Record<ArithmeticOperator, string>> = {
  add: 'D+M',
  sub: 'M-D',
  and: 'D&M',
  or: 'D|M',
};

const unaryComp: Partial<Record<ArithmeticOperator, string>> = {
  neg: '-M',
  not: '!M',
};

/** `call` loads `FRAME_SIZE + nArgs` into A. */
const MAX_ARGS = MAX_CONSTANT - FRAME_SIZE;
const MAX_LOCALS = MAX_CONSTANT;

const comparisonJump: Partial<Record<ArithmeticOperator, JumpCondition>> = {
  eq: 'JEQ',
  gt: 'JGT',
  lt: 'JLT',
};

/**
 * Qualifier for `label`/`goto`/`if-goto` symbols: the enclosing function, or `$File` for code outside
 * any function. VM identifiers cannot contain `$`, so the two forms never meet.
 */
export function labelScope(currentFunction: string | undefined, currentFile: string): string {
  return currentFunction ?? `$${currentFile}`;
}

/**
 * Snapshot of the translation state a {@link CodeWriter} carries between commands.
 */
export interface CodeWriterState {
  currentFile: string;
  currentFunction: string | undefined;
  labelCounter: number;
}

/**
 * Lowers VM commands into Hack assembly.
 *
 * One instance owns the state of one whole-program translation:
 * - `currentFile` qualifies `static` symbols (`File.i`) and labels outside any function (`$File$sym`).
 * - `currentFunction` qualifies `label`/`goto`/`if-goto` symbols (`Function$sym`). It survives file
 *   boundaries.
 * - `labelCounter` numbers generated labels (`$CMP_TRUE.n`, `$CMP_END.n`, `$RET.n`). VM identifiers
 *   cannot contain `$`, so generated names never collide with scoped user labels.
 */
export class CodeWriter {
  private readonly trace: EmittedAsmTraceEntry[] = [];
  private currentFile = '';
  private currentFunction: string | undefined;
  private labelCounter = 0;

  constructor(private readonly diagnostics: Diagnostic[]) {}

  get state(): CodeWriterState {
    return {
      currentFile: this.currentFile,
      currentFunction: this.currentFunction,
      labelCounter: this.labelCounter,
    };
  }

  /** Switch to a new source file. Does not reset the current function. */
  setFileName(name: string): void {
    this.currentFile = name;
  }

  comment(text: string, where?: SourceSpan): void {
    this.trace.push({
      kind: 'comment',
      text,
      ...(where ? { file: where.file, line: where.start.line } : {}),
    });
  }

  /** Lower one parsed command, prefixed by a comment echoing its source text. */
  writeNode(node: CommandNode): void {
    this.comment(node.text, node.span);
    this.write(node.command, node.span);
  }

  write(command: Command, where?: SourceSpan): void {
    switch (command.kind) {
      case 'Arithmetic':
        this.writeArithmetic(command.operator);
        return;
      case 'MemoryAccess':
        this.writePushPop(command, where);
        return;
      case 'Branch':
        if (command.branch === 'label') this.writeLabel(command.symbol);
        else if (command.branch === 'goto') this.writeGoto(command.symbol);
        else this.writeIf(command.symbol);
        return;
      case 'FunctionDecl':
        this.writeFunction(command.name, command.nLocals, where);
        return;
      case 'Call':
        this.writeCall(command.name, command.nArgs, where);
        return;
      case 'Return':
        this.writeReturn();
        return;
      default: {
        const unreachable: never = command;
        throw new Error(`Unhandled command ${JSON.stringify(unreachable)}`);
      }
    }
  }

  writeArithmetic(operator: ArithmeticOperator): void {
    const unary = unaryComp[operator];
    if (unary) {
      this.emit(at(HackRegisters.SP), cInstr('A', 'M-1'), cInstr('M', unary));
      return;
    }

    // x is below y on the stack; leave SP pointing at x.
    this.emit(at(HackRegisters.SP), cInstr('AM', 'M-1'), cInstr('D', 'M'));
    this.emit(at(HackRegisters.SP), cInstr('AM', 'M-1'));

    const binary = binaryComp[operator];
    if (binary) {
      this.emit(cInstr('M', binary));
      this.emit(at(HackRegisters.SP), cInstr('M', 'M+1'));
      return;
    }

    const jump = comparisonJump[operator];
    if (!jump) throw new Error(`No lowering for arithmetic operator "${operator}"`);
    const n = this.nextLabelId();
    const isTrue = `$CMP_TRUE.${n}`;
    const done = `$CMP_END.${n}`;
    this.emit(cInstr('D', 'M-D'), at(isTrue), cInstr(undefined, 'D', jump));
    this.emit(at(HackRegisters.SP), cInstr('A', 'M'), cInstr('M', '0'));
    this.emit(at(done), cInstr(undefined, '0', 'JMP'));
    this.label(isTrue);
    this.emit(at(HackRegisters.SP), cInstr('A', 'M'), cInstr('M', '-1'));
    this.label(done);
    this.emit(at(HackRegisters.SP), cInstr('M', 'M+1'));
  }

  writePushPop(command: MemoryAccessCommand, where?: SourceSpan): void {
    const { direction, segment, index } = command;

    if (segment === 'constant') {
      if (direction === 'pop') {
        this.invalid(`pop constant ${index}: constant is not a writable segment`, where);
        return;
      }
      if (index > MAX_CONSTANT) {
        this.invalid(`push constant ${index}: value exceeds ${MAX_CONSTANT}`, where);
        return;
      }
      this.emit(at(index), cInstr('D', 'A'));
      this.pushD();
      return;
    }

    const base = segmentBase[segment];
    if (base) {
      if (index > MAX_CONSTANT) {
        this.invalid(`${direction} ${segment} ${index}: index exceeds ${MAX_CONSTANT}`, where);
        return;
      }
      if (direction === 'push') {
        this.emit(at(base), cInstr('D', 'M'), at(index), cInstr('A', 'D+A'), cInstr('D', 'M'));
        this.pushD();
      } else {
        this.emit(at(base), cInstr('D', 'M'), at(index), cInstr('D', 'D+A'));
        this.emit(at(SCRATCH_FRAME), cInstr('M', 'D'));
        this.popD();
        this.emit(at(SCRATCH_FRAME), cInstr('A', 'M'), cInstr('M', 'D'));
      }
      return;
    }

    const direct = this.directAddress(command, where);
    if (direct === undefined) return;
    if (direction === 'push') {
      this.emit(at(direct), cInstr('D', 'M'));
      this.pushD();
    } else {
      this.popD();
      this.emit(at(direct), cInstr('M', 'D'));
    }
  }

  writeLabel(symbol: string): void {
    this.label(this.scoped(symbol));
  }

  writeGoto(symbol: string): void {
    this.emit(at(this.scoped(symbol)), cInstr(undefined, '0', 'JMP'));
  }

  writeIf(symbol: string): void {
    this.popD();
    this.emit(at(this.scoped(symbol)), cInstr(undefined, 'D', 'JNE'));
  }

  writeFunction(name: string, nLocals: number, where?: SourceSpan): void {
    if (nLocals > MAX_LOCALS) {
      this.invalid(`function ${name} ${nLocals}: local count exceeds ${MAX_LOCALS}`, where);
      return;
    }
    this.label(name);
    this.currentFunction = name;
    for (let i = 0; i < nLocals; i++) {
      this.emit(at(HackRegisters.SP), cInstr('A', 'M'), cInstr('M', '0'));
      this.emit(at(HackRegisters.SP), cInstr('M', 'M+1'));
    }
  }

  writeCall(name: string, nArgs: number, where?: SourceSpan): void {
    if (nArgs > MAX_ARGS) {
      this.invalid(`call ${name} ${nArgs}: argument count exceeds ${MAX_ARGS}`, where);
      return;
    }
    const returnLabel = `$RET.${this.nextLabelId()}`;

    this.emit(at(returnLabel), cInstr('D', 'A'));
    this.pushD();
    for (const reg of SAVED_REGISTERS) {
      this.emit(at(reg), cInstr('D', 'M'));
      this.pushD();
    }

    // ARG = SP - 5 - nArgs
    this.emit(at(HackRegisters.SP), cInstr('D', 'M'), at(FRAME_SIZE + nArgs), cInstr('D', 'D-A'));
    this.emit(at(HackRegisters.ARG), cInstr('M', 'D'));
    // LCL = SP
    this.emit(at(HackRegisters.SP), cInstr('D', 'M'), at(HackRegisters.LCL), cInstr('M', 'D'));

    this.emit(at(name), cInstr(undefined, '0', 'JMP'));
    this.label(returnLabel);
  }

  writeReturn(): void {
    // frame = LCL; the return address is read before *ARG is overwritten (they alias when nArgs = 0).
    this.emit(at(HackRegisters.LCL), cInstr('D', 'M'), at(SCRATCH_FRAME), cInstr('M', 'D'));
    this.emit(at(FRAME_SIZE), cInstr('A', 'D-A'), cInstr('D', 'M'));
    this.emit(at(SCRATCH_RETURN), cInstr('M', 'D'));

    // *ARG = pop(); SP = ARG + 1
    this.popD();
    this.emit(at(HackRegisters.ARG), cInstr('A', 'M'), cInstr('M', 'D'));
    this.emit(at(HackRegisters.ARG), cInstr('D', 'M+1'), at(HackRegisters.SP), cInstr('M', 'D'));

    // THAT, THIS, ARG, LCL from frame-1 .. frame-4
    for (const reg of [...SAVED_REGISTERS].reverse()) {
      this.emit(at(SCRATCH_FRAME), cInstr('AM', 'M-1'), cInstr('D', 'M'));
      this.emit(at(reg), cInstr('M', 'D'));
    }

    this.emit(at(SCRATCH_RETURN), cInstr('A', 'M'), cInstr(undefined, '0', 'JMP'));
  }

  /** `SP = 256; call <entry> 0` */
  writeBootstrap(entry: string): void {
    this.comment('bootstrap');
    this.emit(at(STACK_ORIGIN), cInstr('D', 'A'), at(HackRegisters.SP), cInstr('M', 'D'));
    this.comment(`call ${entry} 0`);
    this.writeCall(entry, 0);
  }

  writeHaltLoop(): void {
    this.comment('halt');
    this.label(HALT_LABEL);
    this.emit(at(HALT_LABEL), cInstr(undefined, '0', 'JMP'));
  }

  finish(): EmittedProgram {
    return { trace: [...this.trace] };
  }

  private scoped(symbol: string): string {
    return `${labelScope(this.currentFunction, this.currentFile)}$${symbol}`;
  }

  private directAddress(command: MemoryAccessCommand, where?: SourceSpan): string | undefined {
    const { direction, segment, index } = command;
    switch (segment) {
      case 'pointer':
        if (index === 0) return HackRegisters.THIS;
        if (index === 1) return HackRegisters.THAT;
        this.invalid(`${direction} pointer ${index}: pointer index must be 0 or 1`, where);
        return undefined;
      case 'temp':
        if (index < TEMP_SIZE) return `R${TEMP_BASE + index}`;
        this.invalid(
          `${direction} temp ${index}: temp index must be below ${TEMP_SIZE}`,
          where,
        );
        return undefined;
      case 'static':
        return `${this.currentFile}.${index}`;
      default:
        throw new Error(`Segment "${segment}" is not directly addressed`);
    }
  }

  private nextLabelId(): number {
    return this.labelCounter++;
  }

  private pushD(): void {
    this.emit(at(HackRegisters.SP), cInstr('A', 'M'), cInstr('M', 'D'));
    this.emit(at(HackRegisters.SP), cInstr('M', 'M+1'));
  }

  private popD(): void {
    this.emit(at(HackRegisters.SP), cInstr('AM', 'M-1'), cInstr('D', 'M'));
  }

  private emit(...instructions: string[]): void {
    for (const text of instructions) this.trace.push({ kind: 'instruction', text });
  }

  private label(name: string): void {
    this.trace.push({ kind: 'label', name });
  }

  private invalid(message: string, where?: SourceSpan): void {
    this.diagnostics.push({
      id: DiagnosticIds.InvalidSegmentOperation,
      severity: 'error',
      message,
      file: where?.file ?? this.currentFile,
      ...(where ? { line: where.start.line, column: where.start.column } : {}),
    });
  }
}

export interface EmitOptions {
  /** Prepend `SP = 256; call <entry> 0`. */
  bootstrap: boolean;
  /** Entry function called by the bootstrap. */
  entry: string;
  /** Append an infinite loop after the last command. */
  haltLoop: boolean;
}

/**
 * Lower every file of a parsed program, in order, through one shared {@link CodeWriter}.
 */
export function emitProgram(
  program: ProgramNode,
  diagnostics: Diagnostic[],
  options: EmitOptions,
): EmittedProgram {
  const writer = new CodeWriter(diagnostics);
  if (options.bootstrap) writer.writeBootstrap(options.entry);

  for (const file of program.files) {
    writer.setFileName(file.name);
    for (const node of file.commands) writer.writeNode(node);
  }

  if (options.haltLoop) writer.writeHaltLoop();
  return writer.finish();
}
