/**
 * SIL function declarations.
 *
 *   decl-sil        := 'sil' sil-linkage? '@' identifier ':' sil-type decl-sil-body?
 *   decl-sil-body   := '{' sil-basic-block+ '}'
 *   sil-basic-block := identifier ':' sil-instruction+
 *   sil-linkage     := 'internal' | 'clang_thunk'
 */

import { ParseOutcome, type SilFunctionDecl } from "../../ast/nodes/index.ts";
import { TokenKind } from "../../lexer/token.ts";
import { type SilFunction, SilLinkage } from "../../sil/sil-types/index.ts";
import { ParseError } from "../parse-error.ts";
import type { ParserContext } from "../parser.ts";
import { BlockResolver } from "./block-resolver.ts";
import { parseSilInstruction } from "./instruction-parser.ts";
import { parseSilType } from "./sil-type-parser.ts";

const LINKAGE_KEYWORDS: ReadonlyMap<string, SilLinkage> = new Map([
  ["internal", SilLinkage.Internal],
  ["clang_thunk", SilLinkage.ClangThunk],
]);

/**
 * Parse a `sil` declaration, starting at the `sil` keyword. On success the
 * function has been added to the module. A syntax error abandons the
 * declaration where it occurred; the caller is responsible for skipping the
 * remaining tokens.
 */
export function parseDeclSil(ctx: ParserContext): SilFunctionDecl {
  const start = ctx.current();

  // Switch the lexer before consuming 'sil' so every later token is lexed as SIL.
  return ctx.withSilBody((): SilFunctionDecl => {
    ctx.expect(TokenKind.Sil);

    let fn: SilFunction | null = null;
    let outcome: ParseOutcome;
    try {
      fn = parseSilFunctionHeader(ctx);
      outcome = parseSilFunctionBody(ctx, fn);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      outcome = ParseOutcome.SyntaxError;
    }

    return {
      kind: "SilFunctionDecl",
      outcome,
      function: fn,
      span: { start: start.span.start, end: ctx.previous().span.end },
    };
  });
}

export function parseSilLinkage(ctx: ParserContext): SilLinkage {
  const token = ctx.current();
  if (token.kind !== TokenKind.Identifier) return SilLinkage.External;

  const linkage = LINKAGE_KEYWORDS.get(token.lexeme);
  if (linkage === undefined) {
    ctx.diagnose(token, "expectedSilLinkageOrFunction");
    ctx.throwParseError();
  }
  ctx.advance();
  return linkage;
}

function parseSilFunctionHeader(ctx: ParserContext): SilFunction {
  const linkage = parseSilLinkage(ctx);

  if (!ctx.match(TokenKind.SilAtSign)) {
    ctx.diagnose(ctx.current(), "expectedSilFunctionName");
    ctx.throwParseError();
  }
  const nameToken = ctx.current();
  if (nameToken.kind !== TokenKind.Identifier) {
    ctx.diagnose(nameToken, "expectedSilFunctionName");
    ctx.throwParseError();
  }
  ctx.advance();

  if (!ctx.match(TokenKind.Colon)) {
    ctx.diagnose(ctx.current(), "expectedSilType");
    ctx.throwParseError();
  }
  // TODO: reject declared types that are not function types.
  const type = parseSilType(ctx);

  return ctx.module.createFunction(nameToken.lexeme, linkage, type, ctx.locationOf(nameToken));
}

/**
 * Parse the optional body of `fn`. Resolution problems are reported once the
 * whole body has been read, so one pass reports all of them.
 */
function parseSilFunctionBody(ctx: ParserContext, fn: SilFunction): ParseOutcome {
  const resolver = new BlockResolver(ctx.module, fn, ctx.diagnostics);

  const lbrace = ctx.current();
  if (ctx.match(TokenKind.LeftBrace)) {
    do {
      parseSilBasicBlock(ctx, resolver);
    } while (!ctx.check(TokenKind.RightBrace) && !ctx.isAtEnd());

    if (!ctx.match(TokenKind.RightBrace)) {
      ctx.diagnose(ctx.current(), "expectedSilRbrace");
      ctx.diagnose(lbrace, "openingBracketNote", "{");
    }
  }

  // A missing '}' is reported but does not change the outcome.
  const hadResolutionError = resolver.diagnoseProblems();
  return hadResolutionError ? ParseOutcome.ResolutionError : ParseOutcome.Success;
}

function parseSilBasicBlock(ctx: ParserContext, resolver: BlockResolver): void {
  const nameToken = ctx.current();
  if (nameToken.kind !== TokenKind.Identifier) {
    ctx.diagnose(nameToken, "expectedSilBlockName");
    ctx.throwParseError();
  }
  ctx.advance();

  if (!ctx.match(TokenKind.Colon)) {
    ctx.diagnose(ctx.current(), "expectedSilBlockColon");
    ctx.throwParseError();
  }

  const block = resolver.getBBForDefinition(nameToken.lexeme, ctx.locationOf(nameToken));
  do {
    block.instructions.push(parseSilInstruction(ctx, resolver));
  } while (ctx.check(TokenKind.SilLocalName));
}
