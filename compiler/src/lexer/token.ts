/**
 * Token types and keyword lookup for the SIL lexer.
 *
 * @module token
 */

/** Byte-offset range within source text (half-open: `[start, end)`). */
export interface Span {
  start: number;
  end: number;
}

/** Discriminator for every token the lexer can produce. */
export enum TokenKind {
  // Special tokens
  Eof = "EOF",
  Error = "Error",

  // Literals
  IntLiteral = "IntLiteral",

  // Identifiers
  Identifier = "Identifier",

  // Keywords
  Sil = "sil",
  Typealias = "typealias",
  Struct = "struct",
  Return = "return",

  // Operators
  Equal = "=",
  Arrow = "->",
  /** Any other run of operator characters; the lexeme holds the spelling. */
  Operator = "Operator",

  // Punctuation
  LeftBrace = "{",
  RightBrace = "}",
  LeftParen = "(",
  RightParen = ")",
  LeftBracket = "[",
  RightBracket = "]",
  Colon = ":",
  Comma = ",",

  // Only produced inside a SIL declaration
  SilDollar = "$",
  SilAtSign = "@",
  SilLocalName = "SilLocalName",
}

/**
 * A single lexical token produced by the {@link Lexer}.
 */
export interface Token {
  kind: TokenKind;
  /** Raw source text that was consumed to produce this token. */
  lexeme: string;
  /** Byte-offset span within the source file. */
  span: Span;
  /** 1-based line number where the token starts. */
  line: number;
  /** 1-based column number where the token starts. */
  column: number;
  /** True when no other token precedes this one on its line. */
  atStartOfLine: boolean;
  /** Parsed value of integer literals. */
  value?: number;
}

const KEYWORD_MAP: ReadonlyMap<string, TokenKind> = new Map([
  ["sil", TokenKind.Sil],
  ["typealias", TokenKind.Typealias],
  ["struct", TokenKind.Struct],
  ["return", TokenKind.Return],
]);

/** Returns the keyword {@link TokenKind} for `identifier`, or `undefined` if it is not a keyword. */
export function lookupKeyword(identifier: string): TokenKind | undefined {
  return KEYWORD_MAP.get(identifier);
}

/** Human-readable spelling of a token for diagnostics. */
export function describeToken(token: Token): string {
  return token.kind === TokenKind.Eof ? "end of file" : token.lexeme;
}
