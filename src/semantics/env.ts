import type { ProgramNode, SourceSpan } from '../frontend/ast.js';
import { labelScope } from '../lowering/emit.js';

/**
 * Labels and jumps seen in one label scope (a function, or a file's top-level code).
 */
export interface LabelScope {
  /** Function or file name, for messages. */
  name: string;
  /** Label symbol -> every definition site. */
  labels: Map<string, SourceSpan[]>;
  jumps: { symbol: string; span: SourceSpan }[];
}

/**
 * Program-wide link information: which functions exist, who calls what, and what each label scope
 * defines and references.
 */
export interface LinkEnv {
  /** Function name -> every `function` declaration site. */
  functions: Map<string, SourceSpan[]>;
  calls: { name: string; span: SourceSpan }[];
  /** Keyed by the qualifier used in emitted label names. */
  scopes: Map<string, LabelScope>;
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

/**
 * Collect link information for a parsed program.
 *
 * Label scoping mirrors lowering: the current function carries across file boundaries, and labels
 * before the first `function` belong to the file.
 */
export function buildEnv(program: ProgramNode): LinkEnv {
  const functions = new Map<string, SourceSpan[]>();
  const calls: LinkEnv['calls'] = [];
  const scopes = new Map<string, LabelScope>();
  let currentFunction: string | undefined;

  const scopeFor = (fn: string | undefined, fileName: string): LabelScope => {
    const key = labelScope(fn, fileName);
    let scope = scopes.get(key);
    if (!scope) {
      scope = { name: fn ?? fileName, labels: new Map(), jumps: [] };
      scopes.set(key, scope);
    }
    return scope;
  };

  for (const file of program.files) {
    for (const node of file.commands) {
      const c = node.command;
      if (c.kind === 'FunctionDecl') {
        pushTo(functions, c.name, node.span);
        currentFunction = c.name;
        scopeFor(c.name, file.name);
        continue;
      }
      if (c.kind === 'Call') {
        calls.push({ name: c.name, span: node.span });
        continue;
      }
      if (c.kind !== 'Branch') continue;

      const scope = scopeFor(currentFunction, file.name);
      if (c.branch === 'label') pushTo(scope.labels, c.symbol, node.span);
      else scope.jumps.push({ symbol: c.symbol, span: node.span });
    }
  }

  return { functions, calls, scopes };
}
