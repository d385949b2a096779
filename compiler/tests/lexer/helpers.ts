import { DiagnosticEngine } from "../../src/errors/index.ts";
import { Lexer, type Token, TokenKind } from "../../src/lexer/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function lex(input: string, silMode = false): { tokens: Token[]; diagnostics: DiagnosticEngine } {
  const diagnostics = new DiagnosticEngine();
  const lexer = new Lexer(new SourceFile("test.sil", input), diagnostics);
  lexer.setSilMode(silMode);
  return { tokens: lexer.tokenize(), diagnostics };
}

export function kinds(input: string, silMode = false): TokenKind[] {
  return lex(input, silMode).tokens.map((t) => t.kind);
}

export { TokenKind };
