/**
 * SIL instructions.
 *
 *   sil-instruction := sil-local-name '=' opcode operands
 *
 * Opcodes are recognised by their spelling rather than their token kind, so
 * an opcode may share its name with a keyword (`return`). Adding an opcode
 * means one OPCODES entry and one operand parser.
 */

import type { SourceLocation } from "../../errors/index.ts";
import { type Token, TokenKind } from "../../lexer/token.ts";
import {
  type BlockRef,
  type SilInstruction,
  SilOpcode,
  type TypedValueRef,
} from "../../sil/sil-types/index.ts";
import type { ParserContext } from "../parser.ts";
import type { BlockResolver } from "./block-resolver.ts";
import { parseSilType } from "./sil-type-parser.ts";

const OPCODES: ReadonlyMap<string, SilOpcode> = new Map([
  ["tuple", SilOpcode.Tuple],
  ["return", SilOpcode.Return],
  ["br", SilOpcode.Branch],
  ["cond_br", SilOpcode.CondBranch],
]);

/** What every instruction has before its operands. */
interface InstructionHead {
  result: string;
  location: SourceLocation;
  start: number;
}

type OperandParser<Op extends SilOpcode> = (
  ctx: ParserContext,
  resolver: BlockResolver,
  head: InstructionHead
) => Extract<SilInstruction, { opcode: Op }>;

const OPERAND_PARSERS: { [Op in SilOpcode]: OperandParser<Op> } = {
  [SilOpcode.Tuple]: parseTupleOperands,
  [SilOpcode.Return]: parseReturnOperands,
  [SilOpcode.Branch]: parseBranchOperands,
  [SilOpcode.CondBranch]: parseCondBranchOperands,
};

// ─── Instructions ────────────────────────────────────────────────────────────

export function parseSilInstruction(ctx: ParserContext, resolver: BlockResolver): SilInstruction {
  const nameToken = ctx.current();
  if (nameToken.kind !== TokenKind.SilLocalName) {
    ctx.diagnose(nameToken, "expectedSilInstrName");
    ctx.throwParseError();
  }
  // Requiring a fresh line lets a missing terminator show up here.
  if (!nameToken.atStartOfLine) {
    ctx.diagnose(nameToken, "expectedSilInstrStartOfLine");
    ctx.throwParseError();
  }
  ctx.advance();

  if (!ctx.match(TokenKind.Equal)) {
    ctx.diagnose(ctx.current(), "expectedEqualInSilInstr");
    ctx.throwParseError();
  }

  const opcode = parseSilOpcode(ctx);
  const head: InstructionHead = {
    result: nameToken.lexeme,
    location: ctx.locationOf(nameToken),
    start: nameToken.span.start,
  };
  return OPERAND_PARSERS[opcode](ctx, resolver, head);
}

export function parseSilOpcode(ctx: ParserContext): SilOpcode {
  const token = ctx.current();
  const opcode = OPCODES.get(token.lexeme);
  if (opcode === undefined) {
    ctx.diagnose(token, "expectedSilInstrOpcode");
    ctx.throwParseError();
  }
  ctx.advance();
  return opcode;
}

function parseTupleOperands(
  ctx: ParserContext,
  _resolver: BlockResolver,
  head: InstructionHead
): Extract<SilInstruction, { opcode: SilOpcode.Tuple }> {
  expectInInstruction(ctx, TokenKind.LeftParen, SilOpcode.Tuple);
  const elements: TypedValueRef[] = [];
  while (!ctx.check(TokenKind.RightParen)) {
    elements.push(parseTypedValueRef(ctx));
  }
  ctx.advance();
  return { opcode: SilOpcode.Tuple, ...finishHead(ctx, head), elements };
}

function parseReturnOperands(
  ctx: ParserContext,
  _resolver: BlockResolver,
  head: InstructionHead
): Extract<SilInstruction, { opcode: SilOpcode.Return }> {
  const operand = parseTypedValueRef(ctx);
  return { opcode: SilOpcode.Return, ...finishHead(ctx, head), operand };
}

function parseBranchOperands(
  ctx: ParserContext,
  resolver: BlockResolver,
  head: InstructionHead
): Extract<SilInstruction, { opcode: SilOpcode.Branch }> {
  const target = parseBlockRef(ctx, resolver);
  return { opcode: SilOpcode.Branch, ...finishHead(ctx, head), target };
}

function parseCondBranchOperands(
  ctx: ParserContext,
  resolver: BlockResolver,
  head: InstructionHead
): Extract<SilInstruction, { opcode: SilOpcode.CondBranch }> {
  const condition = parseTypedValueRef(ctx);
  expectInInstruction(ctx, TokenKind.Comma, SilOpcode.CondBranch);
  const trueTarget = parseBlockRef(ctx, resolver);
  expectInInstruction(ctx, TokenKind.Comma, SilOpcode.CondBranch);
  const falseTarget = parseBlockRef(ctx, resolver);
  return { opcode: SilOpcode.CondBranch, ...finishHead(ctx, head), condition, trueTarget, falseTarget };
}

function finishHead(ctx: ParserContext, head: InstructionHead): Omit<SilInstruction, "opcode"> {
  return {
    result: head.result,
    location: head.location,
    span: { start: head.start, end: ctx.previous().span.end },
  };
}

function expectInInstruction(ctx: ParserContext, kind: TokenKind, opcode: SilOpcode): Token {
  if (ctx.check(kind)) return ctx.advance();
  ctx.diagnose(ctx.current(), "expectedTokInSilInstr", kind, opcode);
  ctx.throwParseError();
}

// ─── Operands ────────────────────────────────────────────────────────────────

/** `sil-type ':' sil-local-name`. The value name is recorded, not resolved. */
export function parseTypedValueRef(ctx: ParserContext): TypedValueRef {
  const start = ctx.current();
  const type = parseSilType(ctx);

  if (!ctx.match(TokenKind.Colon)) {
    ctx.diagnose(ctx.current(), "expectedSilColonValueRef");
    ctx.throwParseError();
  }
  if (!ctx.check(TokenKind.SilLocalName)) {
    ctx.diagnose(ctx.current(), "expectedSilValueName");
    ctx.throwParseError();
  }
  const name = ctx.advance();

  return { type, name: name.lexeme, location: ctx.locationOf(start) };
}

function parseBlockRef(ctx: ParserContext, resolver: BlockResolver): BlockRef {
  const token = ctx.current();
  if (token.kind !== TokenKind.Identifier) {
    ctx.diagnose(token, "expectedSilBlockName");
    ctx.throwParseError();
  }
  ctx.advance();

  const location = ctx.locationOf(token);
  return { name: token.lexeme, block: resolver.getBBForReference(token.lexeme, location), location };
}
