import { describe, expect, test } from "vitest";
import { intType } from "../../src/checker/types.ts";
import { DiagnosticEngine, type SourceLocation } from "../../src/errors/index.ts";
import { BlockResolver } from "../../src/parser/index.ts";
import { SilModule } from "../../src/sil/sil-module.ts";
import { SilLinkage } from "../../src/sil/sil-types/index.ts";

function at(line: number): SourceLocation {
  return { file: "test.sil", line, column: 1, offset: 0 };
}

function setup() {
  const module = new SilModule();
  const fn = module.createFunction("f", SilLinkage.External, module.types.getLoweredType(intType(32)), at(1));
  const diagnostics = new DiagnosticEngine();
  const resolver = new BlockResolver(module, fn, diagnostics);
  const reported = () => diagnostics.getDiagnostics().map((d) => [d.message, d.location.line]);
  return { fn, resolver, reported };
}

describe("BlockResolver", () => {
  test("reference then definition yield the same block", () => {
    const { fn, resolver, reported } = setup();
    const used = resolver.getBBForReference("bb1", at(2));
    const defined = resolver.getBBForDefinition("bb1", at(3));

    expect(defined).toBe(used);
    expect(fn.blocks).toEqual([used]);
    expect(resolver.diagnoseProblems()).toBe(false);
    expect(reported()).toEqual([]);
  });

  test("repeated references share one block", () => {
    const { fn, resolver } = setup();
    const first = resolver.getBBForReference("bb1", at(2));
    expect(resolver.getBBForReference("bb1", at(3))).toBe(first);
    expect(fn.blocks).toHaveLength(1);
  });

  test("a definition moves a referenced block behind earlier definitions", () => {
    const { fn, resolver } = setup();
    resolver.getBBForDefinition("x", at(2));
    resolver.getBBForReference("y", at(3));
    resolver.getBBForDefinition("z", at(4));
    resolver.getBBForDefinition("y", at(5));
    expect(fn.blocks.map((b) => b.name)).toEqual(["x", "z", "y"]);
  });

  test("redefinition creates a new block and is an error", () => {
    const { fn, resolver, reported } = setup();
    const first = resolver.getBBForDefinition("bb0", at(2));
    const second = resolver.getBBForDefinition("bb0", at(4));

    expect(second).not.toBe(first);
    expect(fn.blocks).toEqual([first, second]);
    expect(resolver.getBBForReference("bb0", at(5))).toBe(second);
    expect(reported()).toEqual([["redefinition of basic block 'bb0'", 4]]);
    expect(resolver.diagnoseProblems()).toBe(true);
  });

  test("defining a forward-referenced block twice is a redefinition", () => {
    const { resolver, reported } = setup();
    resolver.getBBForReference("bb1", at(2));
    resolver.getBBForDefinition("bb1", at(3));
    resolver.getBBForDefinition("bb1", at(6));
    expect(reported()).toEqual([["redefinition of basic block 'bb1'", 6]]);
  });

  test("undefined blocks are reported at their first use, in order", () => {
    const { resolver, reported } = setup();
    resolver.getBBForReference("b", at(2));
    resolver.getBBForReference("a", at(3));
    resolver.getBBForReference("b", at(4));

    expect(resolver.diagnoseProblems()).toBe(true);
    expect(reported()).toEqual([
      ["use of undefined basic block 'b'", 2],
      ["use of undefined basic block 'a'", 3],
    ]);
  });

  test("a defined block is no longer pending", () => {
    const { resolver, reported } = setup();
    resolver.getBBForReference("a", at(2));
    resolver.getBBForReference("b", at(3));
    resolver.getBBForDefinition("a", at(4));

    resolver.diagnoseProblems();
    expect(reported()).toEqual([["use of undefined basic block 'b'", 3]]);
  });
});
