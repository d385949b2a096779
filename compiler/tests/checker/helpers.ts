import type { TypeAliasDecl, TypeRepr } from "../../src/ast/nodes/index.ts";
import { DiagnosticEngine } from "../../src/errors/index.ts";
import { parseSil, type SilParseResult } from "../../src/index.ts";
import { TypeChecker } from "../../src/checker/type-checker.ts";
import { SourceUnit } from "../../src/checker/stage.ts";
import { SourceFile } from "../../src/utils/source.ts";

const NO_SPAN = { start: 0, end: 0 };

export function check(source: string): SilParseResult {
  return parseSil(source, "test.sil");
}

export function messages(source: string): string[] {
  return check(source).diagnostics.map((d) => d.message);
}

export function named(name: string, start = 0): TypeRepr {
  return { kind: "NamedTypeRepr", name, span: { start, end: start + name.length } };
}

export function tuple(...elements: TypeRepr[]): TypeRepr {
  return { kind: "TupleTypeRepr", elements, span: NO_SPAN };
}

export function alias(name: string, repr: TypeRepr): TypeAliasDecl {
  return { kind: "TypeAliasDecl", name, target: { repr, type: null }, span: NO_SPAN };
}

/** A checker over `text`, with its own diagnostics and unit. */
export function makeChecker(text = "") {
  const diagnostics = new DiagnosticEngine();
  const checker = new TypeChecker(new SourceFile("test.sil", text), diagnostics);
  return { checker, diagnostics, unit: new SourceUnit() };
}
