/**
 * Semantic surface types: what a TypeRepr means after name binding.
 * Type aliases never appear here: they resolve to their targets.
 */

// ─── Type Kind Constants ────────────────────────────────────────────────────

export const TypeKind = {
  Int: "int",
  Float: "float",
  Struct: "struct",
  Tuple: "tuple",
  Function: "function",
} as const;

// ─── Type Definitions ───────────────────────────────────────────────────────

/** Builtin fixed-width integer (`Int1` … `Int64`). */
export interface IntType {
  kind: typeof TypeKind.Int;
  bits: 1 | 8 | 16 | 32 | 64;
}

/** Builtin IEEE 754 float (`Float32`, `Float64`). */
export interface FloatType {
  kind: typeof TypeKind.Float;
  bits: 32 | 64;
}

/** Nominal type introduced by a `struct` declaration. */
export interface StructType {
  kind: typeof TypeKind.Struct;
  name: string;
}

export interface TupleType {
  kind: typeof TypeKind.Tuple;
  elements: Type[];
}

/** A single-clause function type; curried functions nest in `result`. */
export interface FunctionType {
  kind: typeof TypeKind.Function;
  input: Type;
  result: Type;
}

export type Type = IntType | FloatType | StructType | TupleType | FunctionType;

// ─── Constructors ───────────────────────────────────────────────────────────

export function intType(bits: IntType["bits"]): IntType {
  return { kind: TypeKind.Int, bits };
}

export function floatType(bits: FloatType["bits"]): FloatType {
  return { kind: TypeKind.Float, bits };
}

export function structType(name: string): StructType {
  return { kind: TypeKind.Struct, name };
}

export function tupleType(elements: Type[]): TupleType {
  return { kind: TypeKind.Tuple, elements };
}

export function functionType(input: Type, result: Type): FunctionType {
  return { kind: TypeKind.Function, input, result };
}

// ─── Utilities ──────────────────────────────────────────────────────────────

export function typeToString(t: Type): string {
  switch (t.kind) {
    case TypeKind.Int:
      return `Int${t.bits}`;
    case TypeKind.Float:
      return `Float${t.bits}`;
    case TypeKind.Struct:
      return t.name;
    case TypeKind.Tuple:
      return `(${t.elements.map(typeToString).join(", ")})`;
    case TypeKind.Function: {
      const input = typeToString(t.input);
      return `${t.input.kind === TypeKind.Function ? `(${input})` : input} -> ${typeToString(t.result)}`;
    }
  }
}
