/**
 * Translation-unit stages and the capability that gates type checking.
 *
 * Type checking normally waits until the whole unit is parsed. SIL types
 * must be checked while their declaration is still being parsed, so the
 * unit hands out a {@link CheckAccess} for exactly the duration of one
 * callback; the access is revoked as soon as the callback returns.
 */

export enum UnitStage {
  Parsing = "parsing",
  Parsed = "parsed",
  TypeChecked = "type-checked",
}

/** Permission to run the type checker. Only valid while `isActive`. */
export class CheckAccess {
  private active = true;

  get isActive(): boolean {
    return this.active;
  }

  revoke(): void {
    this.active = false;
  }
}

export class SourceUnit {
  private currentStage: UnitStage = UnitStage.Parsing;

  get stage(): UnitStage {
    return this.currentStage;
  }

  /**
   * Check a fragment before the unit has finished parsing. `body` receives an
   * access that is revoked when it returns or throws.
   */
  withEarlyCheck<T>(body: (access: CheckAccess) => T): T {
    if (this.currentStage !== UnitStage.Parsing) {
      throw new Error(`early type checking requested in stage '${this.currentStage}'`);
    }
    const access = new CheckAccess();
    try {
      return body(access);
    } finally {
      access.revoke();
    }
  }

  finishParsing(): void {
    this.advanceTo(UnitStage.Parsing, UnitStage.Parsed);
  }

  /** Access for the regular checking phase that follows parsing. */
  beginTypeChecking(): CheckAccess {
    if (this.currentStage !== UnitStage.Parsed) {
      throw new Error(`type checking requested in stage '${this.currentStage}'`);
    }
    return new CheckAccess();
  }

  finishTypeChecking(access: CheckAccess): void {
    access.revoke();
    this.advanceTo(UnitStage.Parsed, UnitStage.TypeChecked);
  }

  private advanceTo(from: UnitStage, to: UnitStage): void {
    if (this.currentStage !== from) {
      throw new Error(`cannot move from stage '${this.currentStage}' to '${to}'`);
    }
    this.currentStage = to;
  }
}
