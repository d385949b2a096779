/**
 * SIL types.
 *
 *   sil-type            := '$' sil-type-attributes? '*'? type
 *   sil-type-attributes := '[' sil-type-attribute (',' sil-type-attribute)* ']'
 *   sil-type-attribute  := 'sil_sret' | 'sil_uncurry' '=' integer
 *
 * The surface type is checked as soon as it is parsed, while the rest of the
 * file is still unparsed, and then lowered through the module's converter.
 */

import type { TypeLoc } from "../../ast/nodes/index.ts";
import { TokenKind } from "../../lexer/token.ts";
import type { SilType, SilTypeAttributes } from "../../sil/sil-types/index.ts";
import type { ParserContext } from "../parser.ts";

const MAX_UNCURRY_LEVEL = 0xffff_ffff;

export function parseSilType(ctx: ParserContext): SilType {
  if (!ctx.check(TokenKind.SilDollar)) {
    ctx.diagnose(ctx.current(), "expectedSilType");
    ctx.throwParseError();
  }
  ctx.advance();

  const attributes = parseSilTypeAttributes(ctx);

  let isAddress = false;
  if (ctx.check(TokenKind.Operator) && ctx.current().lexeme === "*") {
    isAddress = true;
    ctx.advance();
  }

  const typeLoc: TypeLoc = { repr: ctx.parseType(), type: null };
  const checked = ctx.unit.withEarlyCheck((access) => ctx.checker.checkTypeLoc(typeLoc, access));
  const type = typeLoc.type;
  if (!checked || type === null) ctx.throwParseError();

  // attributes.structReturn does not affect lowering.
  const lowered = ctx.module.types.getLoweredType(type, attributes.uncurryLevel);
  return isAddress ? ctx.module.types.getAddressType(lowered) : lowered;
}

/**
 * Parse an optional attribute list. `[` only starts one when the next token
 * is a `sil_` identifier; otherwise nothing is consumed.
 */
export function parseSilTypeAttributes(ctx: ParserContext): SilTypeAttributes {
  const attributes: SilTypeAttributes = { uncurryLevel: 0, structReturn: false };

  if (!ctx.check(TokenKind.LeftBracket)) return attributes;
  const next = ctx.peekNext();
  if (next.kind !== TokenKind.Identifier || !next.lexeme.startsWith("sil_")) return attributes;
  ctx.advance();

  do {
    if (!ctx.check(TokenKind.Identifier)) {
      ctx.diagnose(ctx.current(), "expectedIdentifierSilTypeAttributes");
      ctx.throwParseError();
    }
    const attr = ctx.advance();

    switch (attr.lexeme) {
      case "sil_sret":
        attributes.structReturn = true;
        break;
      case "sil_uncurry":
        attributes.uncurryLevel = parseUncurryLevel(ctx);
        break;
      default:
        ctx.diagnose(attr, "unknownSilTypeAttribute", attr.lexeme);
        ctx.throwParseError();
    }
  } while (ctx.match(TokenKind.Comma));

  if (!ctx.match(TokenKind.RightBracket)) {
    ctx.diagnose(ctx.current(), "expectedBracketSilTypeAttributes");
    ctx.throwParseError();
  }
  return attributes;
}

function parseUncurryLevel(ctx: ParserContext): number {
  if (!ctx.match(TokenKind.Equal)) {
    ctx.diagnose(ctx.current(), "malformedSilUncurryAttribute");
    ctx.throwParseError();
  }
  const token = ctx.current();
  if (token.kind !== TokenKind.IntLiteral || token.value === undefined || token.value > MAX_UNCURRY_LEVEL) {
    ctx.diagnose(token, "malformedSilUncurryAttribute");
    ctx.throwParseError();
  }
  ctx.advance();
  return token.value;
}
