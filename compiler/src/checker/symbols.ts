/**
 * Symbols for named surface types. A SIL file only declares types at file
 * scope, so a symbol is either a nominal struct or a type alias.
 */

import type { StructDecl, TypeAliasDecl } from "../ast/nodes/index.ts";
import type { StructType } from "./types.ts";
import { structType } from "./types.ts";

// ─── Symbol Kind Constants ──────────────────────────────────────────────────

export const SymbolKind = {
  Struct: "struct",
  Alias: "alias",
} as const;

// ─── Symbol Definitions ─────────────────────────────────────────────────────

export interface StructSymbol {
  kind: typeof SymbolKind.Struct;
  name: string;
  type: StructType;
  declaration: StructDecl;
}

/** A type alias; its target is resolved on first use through `declaration.target`. */
export interface AliasSymbol {
  kind: typeof SymbolKind.Alias;
  name: string;
  declaration: TypeAliasDecl;
}

export type TypeSymbol = StructSymbol | AliasSymbol;

// ─── Factories ──────────────────────────────────────────────────────────────

export function structSymbol(declaration: StructDecl): StructSymbol {
  return {
    kind: SymbolKind.Struct,
    name: declaration.name,
    type: structType(declaration.name),
    declaration,
  };
}

export function aliasSymbol(declaration: TypeAliasDecl): AliasSymbol {
  return { kind: SymbolKind.Alias, name: declaration.name, declaration };
}
