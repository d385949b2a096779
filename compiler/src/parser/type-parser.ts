/**
 * Surface type expressions.
 *
 *   type      := type-atom ('->' type)?
 *   type-atom := identifier | '(' (type (',' type)*)? ')'
 *
 * A parenthesized single type is that type, not a one-element tuple.
 */

import type { TypeRepr } from "../ast/nodes/index.ts";
import { describeToken, TokenKind } from "../lexer/token.ts";
import type { ParserContext } from "./parser.ts";

export function parseType(ctx: ParserContext): TypeRepr {
  const input = parseTypeAtom(ctx);
  if (!ctx.match(TokenKind.Arrow)) return input;

  const result = parseType(ctx);
  return {
    kind: "FunctionTypeRepr",
    input,
    result,
    span: { start: input.span.start, end: result.span.end },
  };
}

function parseTypeAtom(ctx: ParserContext): TypeRepr {
  const token = ctx.current();

  if (token.kind === TokenKind.Identifier) {
    ctx.advance();
    return { kind: "NamedTypeRepr", name: token.lexeme, span: token.span };
  }

  if (token.kind === TokenKind.LeftParen) {
    ctx.advance();
    const elements: TypeRepr[] = [];
    if (!ctx.check(TokenKind.RightParen)) {
      do {
        elements.push(parseType(ctx));
      } while (ctx.match(TokenKind.Comma));
    }
    const end = ctx.expect(TokenKind.RightParen);

    const [only] = elements;
    if (only !== undefined && elements.length === 1) return only;
    return {
      kind: "TupleTypeRepr",
      elements,
      span: { start: token.span.start, end: end.span.end },
    };
  }

  ctx.diagnose(token, "expectedType", describeToken(token));
  ctx.throwParseError();
}
