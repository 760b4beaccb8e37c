import { DiagnosticIds, type Diagnostic, type DiagnosticId } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/ast.js';
import type { LinkageMode } from '../pipeline.js';
import type { LinkEnv } from '../semantics/env.js';

function report(
  mode: Exclude<LinkageMode, 'off'>,
  id: DiagnosticId,
  message: string,
  span: SourceSpan,
  diagnostics: Diagnostic[],
): void {
  diagnostics.push({
    id,
    severity: mode === 'error' ? 'error' : 'warning',
    message: `Linkage: ${message}`,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

/**
 * Static link checks that lowering deliberately skips.
 *
 * Reports calls to undeclared functions, functions declared twice, jumps to labels missing from
 * their scope, and labels defined twice in one scope. Call/return balance is not checked.
 *
 * `entry`, when given, is treated as called by the bootstrap; a missing entry function is reported
 * against `entry.file`.
 */
export function lintLinkage(
  env: LinkEnv,
  mode: LinkageMode,
  diagnostics: Diagnostic[],
  entry?: { name: string; file: string },
): void {
  if (mode === 'off') return;

  if (entry && !env.functions.has(entry.name)) {
    diagnostics.push({
      id: DiagnosticIds.LinkageUndefinedFunction,
      severity: mode === 'error' ? 'error' : 'warning',
      message: `Linkage: entry function "${entry.name}" is not declared in any input file`,
      file: entry.file,
    });
  }

  for (const call of env.calls) {
    if (env.functions.has(call.name)) continue;
    report(
      mode,
      DiagnosticIds.LinkageUndefinedFunction,
      `call to undeclared function "${call.name}"`,
      call.span,
      diagnostics,
    );
  }

  for (const [name, sites] of env.functions) {
    const [first, ...rest] = sites;
    if (!first) continue;
    for (const dup of rest) {
      report(
        mode,
        DiagnosticIds.LinkageDuplicateFunction,
        `function "${name}" already declared at ${first.file}:${first.start.line}`,
        dup,
        diagnostics,
      );
    }
  }

  for (const scope of env.scopes.values()) {
    for (const [symbol, sites] of scope.labels) {
      const [first, ...rest] = sites;
      if (!first) continue;
      for (const dup of rest) {
        report(
          mode,
          DiagnosticIds.LinkageDuplicateLabel,
          `label "${symbol}" already defined in "${scope.name}" at line ${first.start.line}`,
          dup,
          diagnostics,
        );
      }
    }
    for (const jump of scope.jumps) {
      if (scope.labels.has(jump.symbol)) continue;
      report(
        mode,
        DiagnosticIds.LinkageUndefinedLabel,
        `label "${jump.symbol}" is not defined in "${scope.name}"`,
        jump.span,
        diagnostics,
      );
    }
  }
}
