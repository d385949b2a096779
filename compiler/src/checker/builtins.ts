/**
 * Builtin types visible in every SIL file without a declaration.
 */

import type { Type } from "./types.ts";
import { floatType, intType } from "./types.ts";

const PRIMITIVE_TYPE_MAP: ReadonlyMap<string, Type> = new Map<string, Type>([
  ["Int1", intType(1)],
  ["Int8", intType(8)],
  ["Int16", intType(16)],
  ["Int32", intType(32)],
  ["Int64", intType(64)],
  ["Float32", floatType(32)],
  ["Float64", floatType(64)],
]);

export function lookupPrimitiveType(name: string): Type | undefined {
  return PRIMITIVE_TYPE_MAP.get(name);
}

export function isPrimitiveTypeName(name: string): boolean {
  return PRIMITIVE_TYPE_MAP.has(name);
}
