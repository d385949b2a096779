/**
 * Name binding and validation of surface types.
 *
 * Declarations are registered as the parser meets them, so a type can only
 * name builtins and types declared earlier in the file. Aliases resolve
 * lazily, the first time something refers to them, with cycle detection.
 */

import type { StructDecl, TypeAliasDecl, TypeLoc, TypeRepr } from "../ast/nodes/index.ts";
import type { DiagnosticEngine } from "../errors/index.ts";
import type { SourceFile } from "../utils/source.ts";
import { lookupPrimitiveType } from "./builtins.ts";
import { TypeScope } from "./scope.ts";
import type { CheckAccess } from "./stage.ts";
import { type AliasSymbol, aliasSymbol, structSymbol, SymbolKind } from "./symbols.ts";
import { functionType, tupleType, type Type } from "./types.ts";

export class TypeChecker {
  private readonly scope = new TypeScope();
  private readonly source: SourceFile;
  private readonly diagnostics: DiagnosticEngine;
  /** Aliases currently being resolved, for cycle detection. */
  private readonly resolving = new Set<string>();
  /** Aliases already diagnosed as unresolvable. */
  private readonly failedAliases = new Set<string>();

  constructor(source: SourceFile, diagnostics: DiagnosticEngine) {
    this.source = source;
    this.diagnostics = diagnostics;
  }

  declareStruct(decl: StructDecl): boolean {
    if (this.scope.define(structSymbol(decl))) return true;
    this.diagnostics.diagnose(this.source.locationAt(decl.span.start), "typeRedeclaration", decl.name);
    return false;
  }

  declareTypeAlias(decl: TypeAliasDecl): boolean {
    if (this.scope.define(aliasSymbol(decl))) return true;
    this.diagnostics.diagnose(this.source.locationAt(decl.span.start), "typeRedeclaration", decl.name);
    return false;
  }

  /**
   * Resolve `typeLoc.repr` and store the result in `typeLoc.type`.
   * Returns `false` if resolution failed; diagnostics have been emitted.
   */
  checkTypeLoc(typeLoc: TypeLoc, access: CheckAccess): boolean {
    this.requireAccess(access);
    if (typeLoc.type !== null) return true;
    const type = this.resolve(typeLoc.repr);
    if (type === null) return false;
    typeLoc.type = type;
    return true;
  }

  /**
   * Resolve every alias declared in the unit, including those no SIL type
   * ever referred to. Returns `false` if any of them is invalid.
   */
  checkDeclarations(access: CheckAccess): boolean {
    this.requireAccess(access);
    let ok = true;
    for (const symbol of this.scope.symbols.values()) {
      if (symbol.kind === SymbolKind.Alias && this.resolveAlias(symbol) === null) {
        ok = false;
      }
    }
    return ok;
  }

  private requireAccess(access: CheckAccess): void {
    if (!access.isActive) {
      throw new Error("type checking attempted with a revoked check access");
    }
  }

  private resolve(repr: TypeRepr): Type | null {
    switch (repr.kind) {
      case "NamedTypeRepr":
        return this.resolveNamed(repr.name, repr.span.start);
      case "TupleTypeRepr": {
        const elements = repr.elements.map((el) => this.resolve(el));
        const resolved = elements.filter((el): el is Type => el !== null);
        return resolved.length === elements.length ? tupleType(resolved) : null;
      }
      case "FunctionTypeRepr": {
        const input = this.resolve(repr.input);
        const result = this.resolve(repr.result);
        return input !== null && result !== null ? functionType(input, result) : null;
      }
    }
  }

  private resolveNamed(name: string, offset: number): Type | null {
    const primitive = lookupPrimitiveType(name);
    if (primitive) return primitive;

    const symbol = this.scope.lookup(name);
    if (symbol?.kind === SymbolKind.Struct) return symbol.type;
    if (symbol?.kind === SymbolKind.Alias) return this.resolveAlias(symbol);

    this.diagnostics.diagnose(this.source.locationAt(offset), "undeclaredType", name);
    return null;
  }

  private resolveAlias(symbol: AliasSymbol): Type | null {
    const target = symbol.declaration.target;
    if (target.type !== null) return target.type;
    if (this.failedAliases.has(symbol.name)) return null;

    if (this.resolving.has(symbol.name)) {
      this.failedAliases.add(symbol.name);
      this.diagnostics.diagnose(
        this.source.locationAt(symbol.declaration.span.start),
        "circularTypeAlias",
        symbol.name
      );
      return null;
    }

    this.resolving.add(symbol.name);
    const type = this.resolve(target.repr);
    this.resolving.delete(symbol.name);

    if (type === null) {
      this.failedAliases.add(symbol.name);
      return null;
    }
    target.type = type;
    return type;
  }
}
