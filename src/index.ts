export { translate, translateSources, DEFAULT_ENTRY } from './translate.js';
export type {
  LinkageMode,
  PipelineDeps,
  TranslateFn,
  TranslateResult,
  TranslatorOptions,
  VmSource,
} from './pipeline.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export type { Command, CommandNode, ProgramNode, VmFileNode } from './frontend/ast.js';
export { parseCommand, parseVmFile } from './frontend/parser.js';
export type { ParseResult } from './frontend/parser.js';
export { CodeWriter, emitProgram } from './lowering/emit.js';
export { defaultFormatWriters } from './formats/index.js';
export { resolveSymbols } from './formats/symbols.js';
export type { Artifact, AsmArtifact, EmittedProgram, ListingArtifact } from './formats/types.js';
