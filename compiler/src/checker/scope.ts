/**
 * File-level type scope: the named types declared so far, in declaration order.
 */

import { isPrimitiveTypeName } from "./builtins.ts";
import type { TypeSymbol } from "./symbols.ts";

export class TypeScope {
  /** Symbols in the order they were declared. */
  readonly symbols: Map<string, TypeSymbol> = new Map();

  /**
   * Define a type symbol.
   *
   * Returns `false` if the name is already taken by a builtin or an earlier
   * declaration; the existing binding is kept.
   */
  define(symbol: TypeSymbol): boolean {
    if (isPrimitiveTypeName(symbol.name) || this.symbols.has(symbol.name)) {
      return false;
    }
    this.symbols.set(symbol.name, symbol);
    return true;
  }

  lookup(name: string): TypeSymbol | undefined {
    return this.symbols.get(name);
  }
}
