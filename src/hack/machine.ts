import type { Segment } from '../frontend/ast.js';

/**
 * Hack platform constants used by lowering.
 *
 * RAM[0..4] hold the stack pointer and the four segment base pointers; `temp` lives in RAM[5..12] and
 * RAM[13..15] are free scratch registers.
 */
export const HackRegisters = {
  SP: 'SP',
  LCL: 'LCL',
  ARG: 'ARG',
  THIS: 'THIS',
  THAT: 'THAT',
} as const;

export type HackRegister = (typeof HackRegisters)[keyof typeof HackRegisters];

/** First RAM address of the operand stack. */
export const STACK_ORIGIN = 256;

/** RAM address of `temp 0`. */
export const TEMP_BASE = 5;
export const TEMP_SIZE = 8;

/** Scratch registers owned by the translator. */
export const SCRATCH_FRAME = 'R13';
export const SCRATCH_RETURN = 'R14';

/** Largest value an A-instruction can load (15 bits). */
export const MAX_CONSTANT = 0x7fff;

/** Saved call frame: return address + four segment bases. */
export const FRAME_SIZE = 5;

/** Segment base registers for the pointer-relative segments. */
export const segmentBase: Partial<Record<Segment, HackRegister>> = {
  local: HackRegisters.LCL,
  argument: HackRegisters.ARG,
  this: HackRegisters.THIS,
  that: HackRegisters.THAT,
};

/** Registers saved by `call` after the return address, in push order. */
export const SAVED_REGISTERS: readonly HackRegister[] = [
  HackRegisters.LCL,
  HackRegisters.ARG,
  HackRegisters.THIS,
  HackRegisters.THAT,
];

export type JumpCondition = 'JGT' | 'JEQ' | 'JGE' | 'JLT' | 'JNE' | 'JLE' | 'JMP';

/** `@value` */
export function at(value: string | number): string {
  return `@${value}`;
}

/** `dest=comp;jump` with the optional parts omitted. */
export function cInstr(dest: string | undefined, comp: string, jump?: JumpCondition): string {
  const head = dest ? `${dest}=${comp}` : comp;
  return jump ? `${head};${jump}` : head;
}

/**
 * Symbols that the Hack assembler predefines; translator-generated names must never shadow these.
 */
export const PREDEFINED_SYMBOLS: ReadonlyMap<string, number> = new Map([
  ['SP', 0],
  ['LCL', 1],
  ['ARG', 2],
  ['THIS', 3],
  ['THAT', 4],
  ...Array.from({ length: 16 }, (_, i): [string, number] => [`R${i}`, i]),
  ['SCREEN', 0x4000],
  ['KBD', 0x6000],
]);
