import { describe, expect, test } from "vitest";
import { kinds, lex, TokenKind } from "./helpers.ts";

describe("comments", () => {
  test("line comment is skipped", () => {
    const { tokens } = lex("// leading comment\nsil");
    expect(tokens[0]?.kind).toBe(TokenKind.Sil);
    expect(tokens[0]?.line).toBe(2);
    expect(tokens[0]?.atStartOfLine).toBe(true);
  });

  test("block comment is skipped", () => {
    expect(kinds("a /* b c */ d")).toEqual([TokenKind.Identifier, TokenKind.Identifier, TokenKind.Eof]);
  });

  test("a newline inside a block comment starts a new line", () => {
    const { tokens } = lex("a /* x\n */ b");
    expect(tokens[1]?.lexeme).toBe("b");
    expect(tokens[1]?.atStartOfLine).toBe(true);
  });

  test("a slash that does not start a comment is an operator", () => {
    const { tokens } = lex("a/b");
    expect(tokens.map((t) => t.kind)).toEqual([
      TokenKind.Identifier,
      TokenKind.Operator,
      TokenKind.Identifier,
      TokenKind.Eof,
    ]);
    expect(tokens[1]?.lexeme).toBe("/");
  });
});
