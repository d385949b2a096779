/**
 * Per-function basic block table.
 *
 * Blocks may be used by a branch before their label appears, so a block is
 * created at its first mention and remembered as pending until defined. Any
 * block still pending when the body ends is diagnosed by diagnoseProblems().
 */

import type { DiagnosticEngine, SourceLocation } from "../../errors/index.ts";
import type { SilModule } from "../../sil/sil-module.ts";
import type { BlockName, SilBasicBlock, SilFunction } from "../../sil/sil-types/index.ts";

interface PendingReference {
  name: BlockName;
  location: SourceLocation;
}

export class BlockResolver {
  private readonly module: SilModule;
  private readonly fn: SilFunction;
  private readonly diagnostics: DiagnosticEngine;
  private readonly blocksByName = new Map<BlockName, SilBasicBlock>();
  /** Referenced but not yet defined, in order of first mention. */
  private readonly undefinedBlocks = new Map<SilBasicBlock, PendingReference>();
  private hadError = false;

  constructor(module: SilModule, fn: SilFunction, diagnostics: DiagnosticEngine) {
    this.module = module;
    this.fn = fn;
    this.diagnostics = diagnostics;
  }

  /**
   * Block for a use of `name`. The first use of an unknown name creates the
   * block and records `location` in case it is never defined.
   */
  getBBForReference(name: BlockName, location: SourceLocation): SilBasicBlock {
    const existing = this.blocksByName.get(name);
    if (existing) return existing;

    const block = this.module.createBasicBlock(this.fn, name, location);
    this.blocksByName.set(name, block);
    this.undefinedBlocks.set(block, { name, location });
    return block;
  }

  /**
   * Block for the label `name:`. A forward-referenced block keeps its
   * identity and moves behind the blocks defined so far. A redefinition is
   * diagnosed and gets a fresh block, leaving the first one untouched.
   */
  getBBForDefinition(name: BlockName, location: SourceLocation): SilBasicBlock {
    const existing = this.blocksByName.get(name);
    if (!existing) {
      const block = this.module.createBasicBlock(this.fn, name, location);
      this.blocksByName.set(name, block);
      return block;
    }

    if (this.undefinedBlocks.delete(existing)) {
      this.module.moveBlockToEnd(this.fn, existing);
      return existing;
    }

    this.diagnostics.diagnose(location, "basicBlockRedefinition", name);
    this.hadError = true;
    const block = this.module.createBasicBlock(this.fn, name, location);
    this.blocksByName.set(name, block);
    return block;
  }

  /**
   * Diagnose every block that was used but never defined. Returns `true` if
   * this function had any resolution error.
   */
  diagnoseProblems(): boolean {
    for (const { name, location } of this.undefinedBlocks.values()) {
      this.diagnostics.diagnose(location, "undefinedBasicBlockUse", name);
      this.hadError = true;
    }
    return this.hadError;
  }
}
