export type { BaseNode } from "./base.ts";

export { TypeReprKind } from "./types.ts";
export type { FunctionTypeRepr, NamedTypeRepr, TupleTypeRepr, TypeLoc, TypeRepr } from "./types.ts";

export { ParseOutcome } from "./declarations.ts";
export type { Declaration, SilFunctionDecl, StructDecl, TypeAliasDecl } from "./declarations.ts";

export type { Program } from "./program.ts";
