/**
 * Top-level declarations: `sil` functions, `typealias` and `struct`.
 * Surface declarations are handed to the type checker as soon as they are
 * parsed, so later SIL types can refer to them.
 */

import type { Declaration, StructDecl, TypeAliasDecl } from "../ast/nodes/index.ts";
import { describeToken, TokenKind } from "../lexer/token.ts";
import type { ParserContext } from "./parser.ts";
import { parseDeclSil } from "./sil/sil-decl-parser.ts";

export function parseDeclaration(ctx: ParserContext): Declaration {
  const token = ctx.current();

  switch (token.kind) {
    case TokenKind.Sil:
      return parseDeclSil(ctx);
    case TokenKind.Typealias:
      return parseTypeAliasDecl(ctx);
    case TokenKind.Struct:
      return parseStructDecl(ctx);
    default:
      ctx.diagnose(token, "expectedDeclaration", describeToken(token));
      ctx.throwParseError();
  }
}

function parseTypeAliasDecl(ctx: ParserContext): TypeAliasDecl {
  const start = ctx.expect(TokenKind.Typealias);
  const name = ctx.expectIdentifier().lexeme;
  ctx.expect(TokenKind.Equal);
  const repr = ctx.parseType();

  const decl: TypeAliasDecl = {
    kind: "TypeAliasDecl",
    name,
    target: { repr, type: null },
    span: { start: start.span.start, end: repr.span.end },
  };
  ctx.checker.declareTypeAlias(decl);
  return decl;
}

function parseStructDecl(ctx: ParserContext): StructDecl {
  const start = ctx.expect(TokenKind.Struct);
  const name = ctx.expectIdentifier().lexeme;
  const lbrace = ctx.expect(TokenKind.LeftBrace);
  if (!ctx.check(TokenKind.RightBrace)) {
    ctx.diagnose(ctx.current(), "expectedToken", "}", describeToken(ctx.current()));
    ctx.diagnose(lbrace, "openingBracketNote", "{");
    ctx.throwParseError();
  }
  const end = ctx.advance();

  const decl: StructDecl = {
    kind: "StructDecl",
    name,
    span: { start: start.span.start, end: end.span.end },
  };
  if (ctx.checker.declareStruct(decl)) {
    ctx.module.declareStruct(name);
  }
  return decl;
}
