import type { SourceFile } from "../utils/source.ts";
import type { Diagnostic } from "./diagnostic.ts";

/** Format a diagnostic with source context: file:line:col, message, source line, caret. */
export function formatDiagnostic(diag: Diagnostic, source: SourceFile): string {
  const loc = diag.location;
  const header = `${loc.file || "<unknown>"}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`;

  const srcLine = source.lineText(loc.line);
  if (srcLine === undefined) return header;

  const caret = `${" ".repeat(Math.max(0, loc.column - 1))}^`;
  return `${header}\n  ${srcLine}\n  ${caret}`;
}
