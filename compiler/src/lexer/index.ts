export { Lexer } from "./lexer.ts";
export { type Token, TokenKind } from "./token.ts";
export { TokenStream } from "./token-stream.ts";
