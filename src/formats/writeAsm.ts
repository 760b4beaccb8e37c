import type { AsmArtifact, EmittedProgram, WriteAsmOptions } from './types.js';

/**
 * Render the lowering trace as Hack assembly source, one line per trace entry, in emission order.
 */
export function writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const comments = opts?.comments ?? true;

  const lines: string[] = [];
  for (const entry of program.trace) {
    if (entry.kind === 'comment') {
      if (comments) lines.push(`// ${entry.text}`);
      continue;
    }
    if (entry.kind === 'label') {
      lines.push(`(${entry.name})`);
      continue;
    }
    lines.push(entry.text);
  }

  return { kind: 'asm', text: lines.length > 0 ? lines.join(lineEnding) + lineEnding : '' };
}
