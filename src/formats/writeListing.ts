import type {
  EmittedProgram,
  ListingArtifact,
  SymbolEntry,
  WriteListingOptions,
} from './types.js';

const ADDRESS_WIDTH = 5;

function formatSymbol(s: SymbolEntry): string {
  const space = s.kind === 'label' ? 'ROM' : 'RAM';
  return `${s.kind} ${s.name} = ${space}[${s.address}]`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  const rank = (s: SymbolEntry): number => {
    if (s.kind === 'label') return 0;
    if (s.kind === 'predefined') return 1;
    return 2;
  };
  const r = rank(a) - rank(b);
  if (r !== 0) return r;
  if (a.address !== b.address) return a.address - b.address;
  return a.name.localeCompare(b.name);
}

/**
 * Create a deterministic `.lst` listing: every instruction with its ROM address, labels and source
 * comments interleaved, followed by the resolved symbol table.
 */
export function writeListing(
  program: EmittedProgram,
  symbols: SymbolEntry[],
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const blank = ' '.repeat(ADDRESS_WIDTH);

  let rom = 0;
  const lines: string[] = [];
  lines.push('// vmt listing');
  lines.push(`// ${program.trace.filter((e) => e.kind === 'instruction').length} instructions`);
  lines.push('');

  for (const entry of program.trace) {
    if (entry.kind === 'comment') {
      const loc =
        entry.file !== undefined && entry.line !== undefined ? `${entry.file}:${entry.line}: ` : '';
      lines.push(`${blank}  // ${loc}${entry.text}`);
      continue;
    }
    if (entry.kind === 'label') {
      lines.push(`${blank}  (${entry.name})`);
      continue;
    }
    lines.push(`${String(rom).padStart(ADDRESS_WIDTH, '0')}  ${entry.text}`);
    rom++;
  }

  lines.push('');
  lines.push('// symbols:');
  for (const s of [...symbols].sort(sortSymbols)) {
    lines.push(`// ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
