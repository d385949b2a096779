import type { SilFunction } from "../../sil/sil-types/index.ts";
import type { BaseNode } from "./base.ts";
import type { TypeLoc } from "./types.ts";

/** How the parse of one declaration ended. */
export enum ParseOutcome {
  Success = "success",
  /** Malformed syntax; the declaration was abandoned where the error occurred. */
  SyntaxError = "syntax-error",
  /** The body parsed, but block references or definitions were inconsistent. */
  ResolutionError = "resolution-error",
}

/** `typealias Name = type` */
export interface TypeAliasDecl extends BaseNode {
  kind: "TypeAliasDecl";
  name: string;
  target: TypeLoc;
}

/** `struct Name { }`, a nominal type with no members. */
export interface StructDecl extends BaseNode {
  kind: "StructDecl";
  name: string;
}

/** A `sil` function declaration and the outcome of parsing it. */
export interface SilFunctionDecl extends BaseNode {
  kind: "SilFunctionDecl";
  outcome: ParseOutcome;
  /** `null` when the parse failed before the function object was created. */
  function: SilFunction | null;
}

export type Declaration = TypeAliasDecl | StructDecl | SilFunctionDecl;
