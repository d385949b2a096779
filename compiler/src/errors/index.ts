export {
  DIAGNOSTICS,
  type Diagnostic,
  type DiagnosticArgMap,
  type DiagnosticKind,
  Severity,
  type SourceLocation,
} from "./diagnostic.ts";
export { DiagnosticEngine } from "./diagnostic-engine.ts";
export { formatDiagnostic } from "./format.ts";
