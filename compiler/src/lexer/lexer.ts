/**
 * Lexer for SIL source files.
 *
 * Tokens are produced on demand. The lexer has a SIL-body mode in which `$`,
 * `@` and `%name` are recognised; outside of it `$` and `@` are errors and
 * `%` is an ordinary operator character. Because the mode can change between
 * two tokens, the lexer can be restarted at any token boundary.
 */

import type { DiagnosticArgMap, DiagnosticEngine, DiagnosticKind } from "../errors/index.ts";
import type { SourceFile } from "../utils/source.ts";
import { lookupKeyword, type Token, TokenKind } from "./token.ts";

// ─── Character helpers ────────────────────────────────────────────────────

const CHAR_0 = 48; // '0'
const CHAR_9 = 57; // '9'
const CHAR_UNDERSCORE = 95;

const OPERATOR_CHARS = new Set(["/", "=", "-", "+", "*", "%", "<", ">", "!", "&", "|", "^", "~", "?", "."]);

function isDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_9;
}

function isAlpha(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (code >= 97 && code <= 122) || (code >= 65 && code <= 90) || code === CHAR_UNDERSCORE;
}

function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

function isOperatorChar(ch: string): boolean {
  return OPERATOR_CHARS.has(ch);
}

// ─── Lexer class ──────────────────────────────────────────────────────────

export class Lexer {
  readonly source: SourceFile;
  private pos = 0;
  private silMode = false;
  private atLineStart = true;
  private muted = false;
  private readonly diagnostics: DiagnosticEngine;
  /** Offsets already diagnosed, so re-lexing after a restart does not repeat errors. */
  private readonly reported = new Set<number>();

  constructor(source: SourceFile, diagnostics: DiagnosticEngine) {
    this.source = source;
    this.diagnostics = diagnostics;
  }

  get inSilBody(): boolean {
    return this.silMode;
  }

  setSilMode(enabled: boolean): void {
    this.silMode = enabled;
  }

  /** Resume scanning at `offset`, which must be a token boundary. */
  restartAt(offset: number, atStartOfLine: boolean): void {
    this.pos = offset;
    this.atLineStart = atStartOfLine;
  }

  /**
   * Scan the token starting at `offset` again without reporting diagnostics;
   * used when a token lexed under one mode is handed back to the other.
   */
  rescan(offset: number, atStartOfLine: boolean): Token {
    this.restartAt(offset, atStartOfLine);
    this.muted = true;
    try {
      return this.nextToken();
    } finally {
      this.muted = false;
    }
  }

  /**
   * Scans the rest of the source in the current mode and returns its tokens.
   * The returned array always ends with a {@link TokenKind.Eof} token.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token = this.nextToken();
    while (token.kind !== TokenKind.Eof) {
      tokens.push(token);
      token = this.nextToken();
    }
    tokens.push(token);
    return tokens;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const ch = this.peek();

    if (isAlpha(ch)) return this.readIdentifierOrKeyword();
    if (isDigit(ch)) return this.readInteger();

    if (this.silMode) {
      if (ch === "$") return this.single(TokenKind.SilDollar);
      if (ch === "@") return this.single(TokenKind.SilAtSign);
      if (ch === "%" && isAlphaNumeric(this.peek(1))) return this.readLocalName();
    } else if (ch === "$" || ch === "@") {
      this.report(this.pos, "silOnlyCharacter", ch);
      return this.single(TokenKind.Error);
    }

    if (isOperatorChar(ch)) return this.readOperator();

    switch (ch) {
      case "{":
        return this.single(TokenKind.LeftBrace);
      case "}":
        return this.single(TokenKind.RightBrace);
      case "(":
        return this.single(TokenKind.LeftParen);
      case ")":
        return this.single(TokenKind.RightParen);
      case "[":
        return this.single(TokenKind.LeftBracket);
      case "]":
        return this.single(TokenKind.RightBracket);
      case ":":
        return this.single(TokenKind.Colon);
      case ",":
        return this.single(TokenKind.Comma);
      default:
        this.report(this.pos, "unexpectedCharacter", ch);
        return this.single(TokenKind.Error);
    }
  }

  private peek(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  private isCommentStart(): boolean {
    return this.peek() === "/" && (this.peek(1) === "/" || this.peek(1) === "*");
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.peek();

      if (ch === "\n" || ch === "\r") {
        this.atLineStart = true;
        this.pos++;
        continue;
      }

      if (ch === " " || ch === "\t") {
        this.pos++;
        continue;
      }

      if (ch === "/" && this.peek(1) === "/") {
        this.pos += 2;
        while (this.pos < this.source.length && this.peek() !== "\n" && this.peek() !== "\r") {
          this.pos++;
        }
        continue;
      }

      if (ch === "/" && this.peek(1) === "*") {
        this.skipBlockComment();
        continue;
      }

      break;
    }
  }

  private skipBlockComment(): void {
    const start = this.pos;
    this.pos += 2; // skip /*
    while (this.pos < this.source.length) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        this.pos += 2;
        return;
      }
      if (this.peek() === "\n" || this.peek() === "\r") {
        this.atLineStart = true;
      }
      this.pos++;
    }
    this.report(start, "unterminatedComment");
  }

  private readIdentifierOrKeyword(): Token {
    const start = this.pos;
    while (this.pos < this.source.length && isAlphaNumeric(this.peek())) {
      this.pos++;
    }
    const lexeme = this.source.content.slice(start, this.pos);
    return this.makeToken(lookupKeyword(lexeme) ?? TokenKind.Identifier, start, this.pos);
  }

  private readInteger(): Token {
    const start = this.pos;
    while (this.pos < this.source.length && isDigit(this.peek())) {
      this.pos++;
    }
    const token = this.makeToken(TokenKind.IntLiteral, start, this.pos);
    return { ...token, value: Number(token.lexeme) };
  }

  private readLocalName(): Token {
    const start = this.pos;
    this.pos++; // skip %
    while (this.pos < this.source.length && isAlphaNumeric(this.peek())) {
      this.pos++;
    }
    return this.makeToken(TokenKind.SilLocalName, start, this.pos);
  }

  private readOperator(): Token {
    const start = this.pos;
    while (this.pos < this.source.length && isOperatorChar(this.peek())) {
      if (this.pos > start && this.isCommentStart()) break;
      if (this.silMode && this.peek() === "%" && isAlphaNumeric(this.peek(1))) break;
      this.pos++;
    }
    const lexeme = this.source.content.slice(start, this.pos);
    if (lexeme === "=") return this.makeToken(TokenKind.Equal, start, this.pos);
    if (lexeme === "->") return this.makeToken(TokenKind.Arrow, start, this.pos);
    return this.makeToken(TokenKind.Operator, start, this.pos);
  }

  private single(kind: TokenKind): Token {
    const start = this.pos;
    this.pos++;
    return this.makeToken(kind, start, this.pos);
  }

  private makeToken(kind: TokenKind, start: number, end: number): Token {
    const { line, column } = this.source.lineCol(start);
    const token: Token = {
      kind,
      lexeme: this.source.content.slice(start, end),
      span: { start, end },
      line,
      column,
      atStartOfLine: this.atLineStart,
    };
    this.atLineStart = false;
    return token;
  }

  private report<K extends DiagnosticKind>(offset: number, kind: K, ...args: DiagnosticArgMap[K]): void {
    if (this.muted || this.reported.has(offset)) return;
    this.reported.add(offset);
    this.diagnostics.diagnose(this.source.locationAt(offset), kind, ...args);
  }
}
