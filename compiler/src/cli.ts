import { readFileSync } from "node:fs";
import { type Diagnostic, DiagnosticEngine, formatDiagnostic } from "./errors/index.ts";
import { parseSil } from "./index.ts";
import { Lexer } from "./lexer/index.ts";
import { printSilModule } from "./sil/printer.ts";
import { SourceFile } from "./utils/source.ts";

const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set(["--tokens", "--print", "--json", "--check", "--help", "--version"]);

// ─── Argument parsing ────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  printHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-V")) {
  console.log(`silp ${VERSION}`);
  process.exit(0);
}

const filePath = args.find((a) => !a.startsWith("-"));

if (!filePath) {
  console.error("error: no input file provided\n");
  printHelp();
  process.exit(1);
}

const flags = new Set(args.filter((a) => a.startsWith("-")));

for (const flag of flags) {
  if (!KNOWN_FLAGS.has(flag)) {
    console.error(`error: unknown flag '${flag}'`);
    console.error("Run with --help to see available options.\n");
    process.exit(1);
  }
}

const showTokens = flags.has("--tokens");
const showJson = flags.has("--json");
const runCheck = flags.has("--check");

// ─── Formatting helpers ──────────────────────────────────────────────────────

/** Print all diagnostics with source context. Returns the error count. */
function reportDiagnostics(diagnostics: readonly Diagnostic[], source: SourceFile): number {
  let errorCount = 0;
  for (const diag of diagnostics) {
    console.error(formatDiagnostic(diag, source));
    if (diag.severity === "error") errorCount++;
  }
  return errorCount;
}

/** Block references point back into the block graph; emit their ids instead. */
function jsonReplacer(key: string, value: unknown): unknown {
  if (key === "block" && typeof value === "object" && value !== null && "id" in value) {
    return value.id;
  }
  return value;
}

function printHelp(): void {
  console.log(`silp ${VERSION} — SIL textual-form parser

Usage: silp <file.sil> [options]

Options:
  --tokens       Print the tokens of the file, lexed in SIL mode
  --print        Print the parsed module (default)
  --json         Print the parsed module as JSON
  --check        Parse and check only; print nothing on success but a summary
  --help, -h     Show this help message
  --version, -V  Show the version

Examples:
  silp add.sil               Parse add.sil and print it back
  silp add.sil --check       Report diagnostics for add.sil
  silp add.sil --json        Dump the functions and blocks of add.sil`);
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

let content: string;
try {
  content = readFileSync(filePath, "utf8");
} catch {
  console.error(`error: could not read file '${filePath}'`);
  process.exit(1);
}

if (showTokens) {
  const source = new SourceFile(filePath, content);
  const diagnostics = new DiagnosticEngine();
  const lexer = new Lexer(source, diagnostics);
  lexer.setSilMode(true);
  const tokens = lexer.tokenize();

  reportDiagnostics(diagnostics.getDiagnostics(), source);
  for (const token of tokens) {
    console.log(`${token.kind}\t${token.lexeme}\t${token.line}:${token.column}`);
  }
  process.exit(diagnostics.hasErrors() ? 1 : 0);
}

const result = parseSil(content, filePath);

if (result.diagnostics.length > 0) {
  const errorCount = reportDiagnostics(result.diagnostics, result.source);
  if (errorCount > 0) {
    console.error(`\n${errorCount} error${errorCount !== 1 ? "s" : ""} emitted`);
    process.exit(1);
  }
}

if (runCheck) {
  const count = result.module.functions.length;
  console.log(`Check passed: ${count} function${count !== 1 ? "s" : ""}, no errors.`);
} else if (showJson) {
  console.log(JSON.stringify({ structs: result.module.structs, functions: result.module.functions }, jsonReplacer, 2));
} else {
  process.stdout.write(printSilModule(result.module));
}
