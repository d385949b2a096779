import { describe, expect, test } from "vitest";
import { floatType, functionType, intType, structType, tupleType } from "../../src/checker/types.ts";
import { TypeConverter } from "../../src/sil/type-lowering.ts";

const INT8 = intType(8);
const INT16 = intType(16);
const INT32 = intType(32);

/** Int8 -> Int16 -> Int32 */
const CURRIED = functionType(INT8, functionType(INT16, INT32));

describe("TypeConverter", () => {
  test("scalars and structs", () => {
    const types = new TypeConverter();
    expect(types.getLoweredType(INT32)).toEqual({ category: "object", type: { kind: "int", bits: 32 } });
    expect(types.getLoweredType(floatType(32)).type).toEqual({ kind: "float", bits: 32 });
    expect(types.getLoweredType(structType("S")).type).toEqual({ kind: "struct", name: "S" });
  });

  test("lowered types are cached", () => {
    const types = new TypeConverter();
    const first = types.getLoweredType(tupleType([INT8, INT16]));
    const second = types.getLoweredType(tupleType([INT8, INT16]));
    expect(first).not.toBe(second);
    expect(first.type).toBe(second.type);
  });

  test("converters do not share a cache", () => {
    expect(new TypeConverter().getLoweredType(INT8).type).not.toBe(new TypeConverter().getLoweredType(INT8).type);
  });

  test("uncurry level is part of the cache key for functions only", () => {
    const types = new TypeConverter();
    expect(types.getLoweredType(CURRIED, 0).type).not.toBe(types.getLoweredType(CURRIED, 1).type);
    expect(types.getLoweredType(INT8, 3).type).toBe(types.getLoweredType(INT8).type);
  });

  test("level 0 keeps one clause", () => {
    expect(new TypeConverter().getLoweredType(CURRIED).type).toEqual({
      kind: "function",
      uncurryLevel: 0,
      inputs: [{ kind: "int", bits: 8 }],
      result: {
        kind: "function",
        uncurryLevel: 0,
        inputs: [{ kind: "int", bits: 16 }],
        result: { kind: "int", bits: 32 },
      },
    });
  });

  test("level 1 flattens two clauses", () => {
    expect(new TypeConverter().getLoweredType(CURRIED, 1).type).toEqual({
      kind: "function",
      uncurryLevel: 1,
      inputs: [
        { kind: "int", bits: 8 },
        { kind: "int", bits: 16 },
      ],
      result: { kind: "int", bits: 32 },
    });
  });

  test("levels past the last clause are clamped", () => {
    const lowered = new TypeConverter().getLoweredType(CURRIED, 10).type;
    expect(lowered.kind === "function" && lowered.uncurryLevel).toBe(1);
  });

  test("function-typed inputs and tuple elements are lowered at level 0", () => {
    const types = new TypeConverter();
    const higherOrder = functionType(CURRIED, INT32);
    const lowered = types.getLoweredType(higherOrder, 1).type;
    if (lowered.kind !== "function") throw new Error("expected a function type");
    expect(lowered.uncurryLevel).toBe(0);
    expect(lowered.inputs[0]).toBe(types.getLoweredType(CURRIED).type);

    const inTuple = types.getLoweredType(tupleType([CURRIED])).type;
    expect(inTuple.kind === "tuple" && inTuple.elements[0]).toBe(types.getLoweredType(CURRIED).type);
  });

  test("address type keeps the lowered type", () => {
    const types = new TypeConverter();
    const object = types.getLoweredType(INT16);
    const address = types.getAddressType(object);
    expect(address.category).toBe("address");
    expect(address.type).toBe(object.type);
    expect(object.category).toBe("object");
  });
});
