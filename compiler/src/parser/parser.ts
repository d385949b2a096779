/**
 * Recursive descent parser for SIL source files.
 *
 * Declaration parsing lives in decl-parser.ts and, for `sil` functions, under
 * sil/. All of them operate on the ParserContext interface implemented by the
 * Parser class below.
 */

import { type Declaration, ParseOutcome, type Program, type TypeRepr } from "../ast/nodes/index.ts";
import { SourceUnit } from "../checker/stage.ts";
import { TypeChecker } from "../checker/type-checker.ts";
import type { DiagnosticArgMap, DiagnosticEngine, DiagnosticKind, SourceLocation } from "../errors/index.ts";
import { Lexer } from "../lexer/lexer.ts";
import { describeToken, type Token, TokenKind } from "../lexer/token.ts";
import { TokenStream } from "../lexer/token-stream.ts";
import { SilModule } from "../sil/sil-module.ts";
import type { SourceFile } from "../utils/source.ts";
import { parseDeclaration } from "./decl-parser.ts";
import { ParseError } from "./parse-error.ts";
import { parseType } from "./type-parser.ts";

/** Keywords that can synchronize after an error */
const SYNC_KEYWORDS: ReadonlySet<TokenKind> = new Set([TokenKind.Sil, TokenKind.Typealias, TokenKind.Struct]);

/**
 * Interface exposed to the extracted declaration and SIL parsers.
 * Keeps the extracted modules decoupled from the Parser class internals.
 */
export interface ParserContext {
  readonly source: SourceFile;
  readonly diagnostics: DiagnosticEngine;
  readonly module: SilModule;
  readonly unit: SourceUnit;
  readonly checker: TypeChecker;

  current(): Token;
  previous(): Token;
  peekNext(): Token;
  isAtEnd(): boolean;
  check(kind: TokenKind): boolean;
  advance(): Token;
  match(...kinds: TokenKind[]): boolean;
  expect(kind: TokenKind): Token;
  expectIdentifier(): Token;
  diagnose<K extends DiagnosticKind>(token: Token, kind: K, ...args: DiagnosticArgMap[K]): void;
  locationOf(token: Token): SourceLocation;
  throwParseError(): never;

  /** Lex everything after the current token in SIL-body mode while `body` runs. */
  withSilBody<T>(body: () => T): T;

  // Cross-module callbacks
  parseType(): TypeRepr;
}

export class Parser implements ParserContext {
  readonly source: SourceFile;
  readonly diagnostics: DiagnosticEngine;
  readonly module = new SilModule();
  readonly unit = new SourceUnit();
  readonly checker: TypeChecker;
  private readonly stream: TokenStream;

  constructor(source: SourceFile, diagnostics: DiagnosticEngine) {
    this.source = source;
    this.diagnostics = diagnostics;
    this.checker = new TypeChecker(source, diagnostics);
    this.stream = new TokenStream(new Lexer(source, diagnostics));
  }

  parse(): Program {
    const declarations: Declaration[] = [];
    const startSpan = this.current().span.start;

    while (!this.isAtEnd()) {
      const declStart = this.current().span.start;
      try {
        const decl = parseDeclaration(this);
        declarations.push(decl);
        if (decl.kind === "SilFunctionDecl" && decl.outcome === ParseOutcome.SyntaxError) {
          // The rest of a broken SIL body still has to be lexed as SIL.
          this.withSilBody(() => this.synchronize(declStart));
        }
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        this.synchronize(declStart);
      }
    }

    const endSpan = this.previous().span.end;
    return {
      kind: "Program",
      declarations,
      span: { start: startSpan, end: Math.max(startSpan, endSpan) },
    };
  }

  // ─── Helpers (ParserContext implementation) ────────────────────────

  current(): Token {
    return this.stream.current();
  }

  previous(): Token {
    return this.stream.previous();
  }

  peekNext(): Token {
    return this.stream.peek();
  }

  isAtEnd(): boolean {
    return this.current().kind === TokenKind.Eof;
  }

  check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  advance(): Token {
    return this.stream.advance();
  }

  match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  expect(kind: TokenKind): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    const token = this.current();
    this.diagnose(token, "expectedToken", kind, describeToken(token));
    throw new ParseError();
  }

  expectIdentifier(): Token {
    if (this.check(TokenKind.Identifier)) {
      return this.advance();
    }
    const token = this.current();
    this.diagnose(token, "expectedIdentifier", describeToken(token));
    throw new ParseError();
  }

  diagnose<K extends DiagnosticKind>(token: Token, kind: K, ...args: DiagnosticArgMap[K]): void {
    this.diagnostics.diagnose(this.locationOf(token), kind, ...args);
  }

  locationOf(token: Token): SourceLocation {
    return {
      file: this.source.filename,
      line: token.line,
      column: token.column,
      offset: token.span.start,
    };
  }

  throwParseError(): never {
    throw new ParseError();
  }

  withSilBody<T>(body: () => T): T {
    return this.stream.withSilBody(body);
  }

  parseType(): TypeRepr {
    return parseType(this);
  }

  /**
   * Skip to the next token that can start a declaration. Always makes
   * progress when the failed declaration consumed nothing.
   */
  private synchronize(declStart: number): void {
    if (this.current().span.start === declStart) {
      this.advance();
    }
    while (!this.isAtEnd() && !SYNC_KEYWORDS.has(this.current().kind)) {
      this.advance();
    }
  }
}
