// ─── Lowered Types ───────────────────────────────────────────────────────────

/** Union of all lowered type representations used by SIL values. */
export type LoweredType =
  | LoweredIntType
  | LoweredFloatType
  | LoweredStructType
  | LoweredTupleType
  | LoweredFunctionType;

export interface LoweredIntType {
  kind: "int";
  bits: 1 | 8 | 16 | 32 | 64;
}

export interface LoweredFloatType {
  kind: "float";
  bits: 32 | 64;
}

export interface LoweredStructType {
  kind: "struct";
  name: string;
}

export interface LoweredTupleType {
  kind: "tuple";
  elements: LoweredType[];
}

/**
 * A function type with `uncurryLevel + 1` argument clauses flattened into
 * `inputs`, in application order. Curried clauses past that level stay in
 * `result`.
 */
export interface LoweredFunctionType {
  kind: "function";
  uncurryLevel: number;
  inputs: LoweredType[];
  result: LoweredType;
}

// ─── SIL Types ───────────────────────────────────────────────────────────────

export type SilValueCategory = "object" | "address";

/** The type of a SIL value: a lowered type, either held directly or behind an address. */
export interface SilType {
  category: SilValueCategory;
  type: LoweredType;
}

/** Bracketed attributes written between `$` and the type, e.g. `$[sil_uncurry=1]`. */
export interface SilTypeAttributes {
  uncurryLevel: number;
  /** Set by `sil_sret`. Parsed, but not passed to lowering. */
  structReturn: boolean;
}
