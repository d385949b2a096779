/**
 * Diagnostic sink shared by the lexer, parser and type checker.
 *
 * Recording a diagnostic never interrupts control flow: callers signal
 * failure through their own return values (or the parser's ParseError).
 */

import {
  DIAGNOSTICS,
  type Diagnostic,
  type DiagnosticArgMap,
  type DiagnosticKind,
  Severity,
  type SourceLocation,
} from "./diagnostic.ts";

export class DiagnosticEngine {
  private diagnostics: Diagnostic[] = [];

  diagnose<K extends DiagnosticKind>(
    location: SourceLocation,
    kind: K,
    ...args: DiagnosticArgMap[K]
  ): Diagnostic {
    const spec = DIAGNOSTICS[kind];
    const diagnostic: Diagnostic = {
      kind,
      severity: spec.severity,
      message: spec.format(...args),
      location,
    };
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  errorCount(): number {
    return this.diagnostics.filter((d) => d.severity === Severity.Error).length;
  }

  hasErrors(): boolean {
    return this.errorCount() > 0;
  }
}
