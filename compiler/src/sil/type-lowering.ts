/**
 * Lowering of checked surface types to the types SIL values carry.
 *
 * A function type lowered at uncurry level N takes its first N + 1 argument
 * clauses as `inputs`; the rest stays curried in `result`. The level is
 * clamped to the clauses the type actually has.
 */

import { type FunctionType, type Type, TypeKind, typeToString } from "../checker/types.ts";
import type { LoweredFunctionType, LoweredType, SilType } from "./sil-types/index.ts";

export class TypeConverter {
  private readonly cache = new Map<string, LoweredType>();

  /** Object-category SIL type for `type` at the given uncurry level. */
  getLoweredType(type: Type, uncurryLevel = 0): SilType {
    return { category: "object", type: this.lower(type, uncurryLevel) };
  }

  getAddressType(type: SilType): SilType {
    return { category: "address", type: type.type };
  }

  private lower(type: Type, uncurryLevel: number): LoweredType {
    const level = type.kind === TypeKind.Function ? uncurryLevel : 0;
    const key = `${level}:${typeToString(type)}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const lowered = this.lowerUncached(type, level);
    this.cache.set(key, lowered);
    return lowered;
  }

  private lowerUncached(type: Type, uncurryLevel: number): LoweredType {
    switch (type.kind) {
      case TypeKind.Int:
        return { kind: "int", bits: type.bits };
      case TypeKind.Float:
        return { kind: "float", bits: type.bits };
      case TypeKind.Struct:
        return { kind: "struct", name: type.name };
      case TypeKind.Tuple:
        return { kind: "tuple", elements: type.elements.map((el) => this.lower(el, 0)) };
      case TypeKind.Function:
        return this.lowerFunction(type, uncurryLevel);
    }
  }

  private lowerFunction(type: FunctionType, uncurryLevel: number): LoweredFunctionType {
    const inputs: LoweredType[] = [];
    let current: Type = type;
    while (current.kind === TypeKind.Function && inputs.length <= uncurryLevel) {
      inputs.push(this.lower(current.input, 0));
      current = current.result;
    }
    return {
      kind: "function",
      uncurryLevel: inputs.length - 1,
      inputs,
      result: this.lower(current, 0),
    };
  }
}
