import { describe, expect, test } from "vitest";
import type { TypeLoc } from "../../src/ast/nodes/index.ts";
import { floatType, intType, tupleType } from "../../src/checker/types.ts";
import { alias, check, makeChecker, messages, named, tuple } from "./helpers.ts";

describe("TypeChecker", () => {
  test("resolves builtins", () => {
    const { checker, unit } = makeChecker();
    const typeLoc: TypeLoc = { repr: tuple(named("Int1"), named("Float32")), type: null };
    expect(unit.withEarlyCheck((access) => checker.checkTypeLoc(typeLoc, access))).toBe(true);
    expect(typeLoc.type).toEqual(tupleType([intType(1), floatType(32)]));
  });

  test("undeclared name inside a tuple fails the whole type", () => {
    const { checker, diagnostics, unit } = makeChecker("(Int8, Nope)");
    const typeLoc: TypeLoc = { repr: tuple(named("Int8", 1), named("Nope", 7)), type: null };

    expect(unit.withEarlyCheck((access) => checker.checkTypeLoc(typeLoc, access))).toBe(false);
    expect(typeLoc.type).toBeNull();
    expect(diagnostics.getDiagnostics().map((d) => [d.message, d.location.column])).toEqual([
      ["use of undeclared type 'Nope'", 8],
    ]);
  });

  test("an already resolved TypeLoc is left alone", () => {
    const { checker, unit } = makeChecker();
    const typeLoc: TypeLoc = { repr: named("Missing"), type: intType(8) };
    expect(unit.withEarlyCheck((access) => checker.checkTypeLoc(typeLoc, access))).toBe(true);
    expect(typeLoc.type).toEqual(intType(8));
  });

  test("rejects a revoked access", () => {
    const { checker, unit } = makeChecker();
    const leaked = unit.withEarlyCheck((access) => access);
    const typeLoc: TypeLoc = { repr: named("Int32"), type: null };
    expect(() => checker.checkTypeLoc(typeLoc, leaked)).toThrow("revoked");
  });

  test("checkDeclarations resolves unused aliases", () => {
    const { checker, unit } = makeChecker();
    const decl = alias("Pair", tuple(named("Int16"), named("Int16")));
    checker.declareTypeAlias(decl);

    unit.finishParsing();
    const access = unit.beginTypeChecking();
    expect(checker.checkDeclarations(access)).toBe(true);
    unit.finishTypeChecking(access);

    expect(decl.target.type).toEqual(tupleType([intType(16), intType(16)]));
  });

  test("builtin names cannot be redeclared", () => {
    const { checker, diagnostics } = makeChecker("struct Int32 {}");
    expect(checker.declareStruct({ kind: "StructDecl", name: "Int32", span: { start: 0, end: 15 } })).toBe(false);
    expect(diagnostics.getDiagnostics().map((d) => d.message)).toEqual(["invalid redeclaration of 'Int32'"]);
  });
});

describe("type declarations in a file", () => {
  test("struct types are nominal", () => {
    const result = check("struct Point {}\nsil @f : $Point");
    expect(result.module.functions[0]?.type.type).toEqual({ kind: "struct", name: "Point" });
    expect(result.program.declarations.map((d) => d.kind)).toEqual(["StructDecl", "SilFunctionDecl"]);
  });

  test("aliases may refer to aliases declared after them", () => {
    const result = check("typealias A = B\ntypealias B = Int16\nsil @f : $A");
    expect(result.success).toBe(true);
    expect(result.module.functions[0]?.type.type).toEqual({ kind: "int", bits: 16 });
  });

  test("circular aliases are reported once", () => {
    const result = check("typealias A = B\ntypealias B = A");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["type alias 'A' references itself"]);
    expect(result.diagnostics[0]?.location).toMatchObject({ line: 1, column: 1 });
  });

  test("self-referencing alias", () => {
    expect(messages("typealias A = A")).toEqual(["type alias 'A' references itself"]);
  });

  test("unused alias with an undeclared target", () => {
    const result = check("typealias X = Missing");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["use of undeclared type 'Missing'"]);
    expect(result.diagnostics[0]?.location).toMatchObject({ line: 1, column: 15 });
  });

  test("a broken alias is reported once even when used", () => {
    expect(messages("typealias X = Missing\nsil @f : $X")).toEqual(["use of undeclared type 'Missing'"]);
  });

  test("struct redeclaration", () => {
    const result = check("struct P {}\nstruct P {}");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["invalid redeclaration of 'P'"]);
    expect(result.diagnostics[0]?.location).toMatchObject({ line: 2, column: 1 });
    expect(result.module.structs).toEqual(["P"]);
  });

  test("an alias cannot take a struct's name", () => {
    const result = check("struct P {}\ntypealias P = Int8\nsil @f : $P");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["invalid redeclaration of 'P'"]);
    expect(result.module.functions[0]?.type.type).toEqual({ kind: "struct", name: "P" });
  });

  test("builtin struct name", () => {
    const result = check("struct Int32 {}");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["invalid redeclaration of 'Int32'"]);
    expect(result.module.structs).toEqual([]);
  });
});
