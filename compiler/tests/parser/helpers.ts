import type { SilFunctionDecl } from "../../src/ast/nodes/index.ts";
import type { DiagnosticEngine } from "../../src/errors/index.ts";
import { parseSil, type SilParseResult } from "../../src/index.ts";
import { Parser } from "../../src/parser/index.ts";
import type { SilBasicBlock, SilFunction, SilInstruction } from "../../src/sil/sil-types/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function parse(source: string): SilParseResult {
  return parseSil(source, "test.sil");
}

/** Join lines so tests can state exact line and column numbers. */
export function lines(...text: string[]): string {
  return text.join("\n");
}

export function messages(result: SilParseResult): string[] {
  return result.diagnostics.map((d) => d.message);
}

export function silDecls(result: SilParseResult): SilFunctionDecl[] {
  return result.program.declarations.filter((d): d is SilFunctionDecl => d.kind === "SilFunctionDecl");
}

export function onlyFunction(result: SilParseResult): SilFunction {
  const [fn] = result.module.functions;
  if (fn === undefined || result.module.functions.length !== 1) {
    throw new Error(`expected exactly one function, got ${result.module.functions.length}`);
  }
  return fn;
}

export function blockAt(fn: SilFunction, index: number): SilBasicBlock {
  const block = fn.blocks[index];
  if (block === undefined) throw new Error(`function '${fn.name}' has no block ${index}`);
  return block;
}

export function instructionAt(block: SilBasicBlock, index: number): SilInstruction {
  const inst = block.instructions[index];
  if (inst === undefined) throw new Error(`block '${block.name}' has no instruction ${index}`);
  return inst;
}

/**
 * A parser positioned just after a leading `sil` keyword, with SIL lexing on,
 * for exercising a single grammar rule. `run` receives the parser.
 */
export function withSilParser<T>(rest: string, diagnostics: DiagnosticEngine, run: (parser: Parser) => T): T {
  const parser = new Parser(new SourceFile("test.sil", `sil ${rest}`), diagnostics);
  return parser.withSilBody(() => {
    parser.advance();
    return run(parser);
  });
}
