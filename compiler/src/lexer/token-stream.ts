/**
 * Pull-based token stream over a {@link Lexer} with one token of lookahead.
 *
 * Switching the SIL-body mode invalidates any buffered lookahead: the lexer
 * is restarted at the last token boundary so later tokens are scanned under
 * the new mode.
 */

import type { Lexer } from "./lexer.ts";
import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

export class TokenStream {
  private readonly lexer: Lexer;
  private tok: Token;
  private prev: Token;
  private lookahead: Token | null = null;

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.tok = lexer.nextToken();
    this.prev = this.tok;
  }

  current(): Token {
    return this.tok;
  }

  previous(): Token {
    return this.prev;
  }

  peek(): Token {
    if (this.lookahead === null) {
      this.lookahead = this.tok.kind === TokenKind.Eof ? this.tok : this.lexer.nextToken();
    }
    return this.lookahead;
  }

  advance(): Token {
    const token = this.tok;
    if (token.kind === TokenKind.Eof) return token;
    this.prev = token;
    if (this.lookahead !== null) {
      this.tok = this.lookahead;
      this.lookahead = null;
    } else {
      this.tok = this.lexer.nextToken();
    }
    return token;
  }

  get inSilBody(): boolean {
    return this.lexer.inSilBody;
  }

  /**
   * Run `body` with SIL lexing enabled for every token after the current one.
   * On exit (normal or exceptional) the previous mode is restored and the
   * current token is scanned again under it.
   */
  withSilBody<T>(body: () => T): T {
    const saved = this.lexer.inSilBody;
    this.switchMode(true, false);
    try {
      return body();
    } finally {
      this.switchMode(saved, true);
    }
  }

  private switchMode(silMode: boolean, rescanCurrent: boolean): void {
    this.lexer.setSilMode(silMode);
    this.lookahead = null;
    if (rescanCurrent) {
      this.tok = this.lexer.rescan(this.tok.span.start, this.tok.atStartOfLine);
    } else {
      this.lexer.restartAt(this.tok.span.end, false);
    }
  }
}
