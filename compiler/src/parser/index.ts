export { type ParserContext, Parser } from "./parser.ts";
export { ParseError } from "./parse-error.ts";
export { BlockResolver } from "./sil/block-resolver.ts";
export { parseDeclSil, parseSilLinkage } from "./sil/sil-decl-parser.ts";
export { parseSilInstruction, parseSilOpcode, parseTypedValueRef } from "./sil/instruction-parser.ts";
export { parseSilType, parseSilTypeAttributes } from "./sil/sil-type-parser.ts";
