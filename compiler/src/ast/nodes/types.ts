import type { Type } from "../../checker/types.ts";
import type { BaseNode } from "./base.ts";

export enum TypeReprKind {
  Named = "NamedTypeRepr",
  Tuple = "TupleTypeRepr",
  Function = "FunctionTypeRepr",
}

/** A type referenced by name, e.g. `Int32`, `Point`. */
export interface NamedTypeRepr extends BaseNode {
  kind: "NamedTypeRepr";
  name: string;
}

/** A tuple type `(A, B)`; `()` is the empty tuple. */
export interface TupleTypeRepr extends BaseNode {
  kind: "TupleTypeRepr";
  elements: TypeRepr[];
}

/** A function type `A -> B`. */
export interface FunctionTypeRepr extends BaseNode {
  kind: "FunctionTypeRepr";
  input: TypeRepr;
  result: TypeRepr;
}

/** Any type annotation in surface syntax, before name binding. */
export type TypeRepr = NamedTypeRepr | TupleTypeRepr | FunctionTypeRepr;

/**
 * A written type together with its checked meaning. `type` stays `null`
 * until the type checker resolves `repr`.
 */
export interface TypeLoc {
  repr: TypeRepr;
  type: Type | null;
}
