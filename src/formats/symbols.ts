import { PREDEFINED_SYMBOLS } from '../hack/machine.js';
import type { EmittedProgram, SymbolEntry } from './types.js';

/** First RAM address the Hack assembler hands out to variables. */
export const VARIABLE_BASE = 16;

/**
 * Symbol table for an emitted program, resolved the way the Hack assembler does it.
 *
 * - Labels bind to the ROM address of the next instruction.
 * - `@name` references that are neither labels nor predefined become variables, allocated from RAM[16]
 *   in order of first reference.
 */
export interface ResolvedSymbols {
  /** Instructions in ROM order. */
  instructions: string[];
  table: Map<string, number>;
  /** Every label, plus the predefined symbols and variables the program references. */
  symbols: SymbolEntry[];
}

export function resolveSymbols(program: EmittedProgram): ResolvedSymbols {
  const instructions: string[] = [];
  const labels = new Map<string, number>();
  const symbols: SymbolEntry[] = [];

  for (const entry of program.trace) {
    if (entry.kind === 'instruction') {
      instructions.push(entry.text);
    } else if (entry.kind === 'label' && !labels.has(entry.name)) {
      labels.set(entry.name, instructions.length);
      symbols.push({ kind: 'label', name: entry.name, address: instructions.length });
    }
  }

  const table = new Map(labels);
  let nextVariable = VARIABLE_BASE;
  for (const text of instructions) {
    if (!text.startsWith('@')) continue;
    const name = text.slice(1);
    if (/^[0-9]+$/.test(name) || table.has(name)) continue;
    const predefined = PREDEFINED_SYMBOLS.get(name);
    if (predefined !== undefined) {
      table.set(name, predefined);
      symbols.push({ kind: 'predefined', name, address: predefined });
      continue;
    }
    table.set(name, nextVariable);
    symbols.push({ kind: 'variable', name, address: nextVariable });
    nextVariable++;
  }

  return { instructions, table, symbols };
}
