import { describe, expect, test } from "vitest";
import { type CheckAccess, SourceUnit, UnitStage } from "../../src/checker/stage.ts";

describe("SourceUnit", () => {
  test("starts in the parsing stage", () => {
    expect(new SourceUnit().stage).toBe(UnitStage.Parsing);
  });

  test("early access is active only inside the callback", () => {
    const unit = new SourceUnit();
    let inside: boolean | undefined;
    const access = unit.withEarlyCheck((a) => {
      inside = a.isActive;
      return a;
    });
    expect(inside).toBe(true);
    expect(access.isActive).toBe(false);
  });

  test("early access is revoked when the callback throws", () => {
    const unit = new SourceUnit();
    let captured: CheckAccess | undefined;
    expect(() =>
      unit.withEarlyCheck((a) => {
        captured = a;
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(captured?.isActive).toBe(false);
  });

  test("early checking is refused once parsing has finished", () => {
    const unit = new SourceUnit();
    unit.finishParsing();
    expect(() => unit.withEarlyCheck(() => true)).toThrow("early type checking requested in stage 'parsed'");
  });

  test("regular checking must wait for parsing to finish", () => {
    expect(() => new SourceUnit().beginTypeChecking()).toThrow("type checking requested in stage 'parsing'");
  });

  test("full lifecycle", () => {
    const unit = new SourceUnit();
    unit.finishParsing();
    expect(unit.stage).toBe(UnitStage.Parsed);

    const access = unit.beginTypeChecking();
    expect(access.isActive).toBe(true);

    unit.finishTypeChecking(access);
    expect(access.isActive).toBe(false);
    expect(unit.stage).toBe(UnitStage.TypeChecked);
  });

  test("stages cannot be repeated", () => {
    const unit = new SourceUnit();
    unit.finishParsing();
    expect(() => unit.finishParsing()).toThrow("cannot move from stage 'parsed' to 'parsed'");
  });
});
