/**
 * Entry point for parsing a whole SIL source file.
 */

import type { Program } from "./ast/nodes/index.ts";
import { type Diagnostic, DiagnosticEngine } from "./errors/index.ts";
import { Parser } from "./parser/index.ts";
import type { SilModule } from "./sil/sil-module.ts";
import { SourceFile } from "./utils/source.ts";

export interface SilParseResult {
  source: SourceFile;
  program: Program;
  module: SilModule;
  diagnostics: ReadonlyArray<Diagnostic>;
  /** True when no error was diagnosed; notes and warnings are allowed. */
  success: boolean;
}

/**
 * Parse `content`, then check every type declaration, including aliases no
 * SIL type referred to.
 */
export function parseSil(content: string, filename = "<input>"): SilParseResult {
  const source = new SourceFile(filename, content);
  const diagnostics = new DiagnosticEngine();
  const parser = new Parser(source, diagnostics);

  const program = parser.parse();
  parser.unit.finishParsing();

  const access = parser.unit.beginTypeChecking();
  parser.checker.checkDeclarations(access);
  parser.unit.finishTypeChecking(access);

  return {
    source,
    program,
    module: parser.module,
    diagnostics: diagnostics.getDiagnostics(),
    success: !diagnostics.hasErrors(),
  };
}

export { printSilFunction, printSilModule, printSilType } from "./sil/printer.ts";
export { SilModule } from "./sil/sil-module.ts";
export * from "./sil/sil-types/index.ts";
