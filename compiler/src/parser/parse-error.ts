/**
 * Thrown after a syntax error has been diagnosed, to unwind to the nearest
 * point that can recover. Never escapes the parser.
 */
export class ParseError extends Error {
  constructor() {
    super("Parse error");
  }
}
