import type { SourceLocation } from "../errors/index.ts";
import type { BlockName, SilBasicBlock, SilFunction, SilLinkage, SilType } from "./sil-types/index.ts";
import { TypeConverter } from "./type-lowering.ts";

/**
 * Owns every function and basic block parsed from one file, and the type
 * lowering cache they share. Nothing is ever removed from a module.
 */
export class SilModule {
  readonly functions: SilFunction[] = [];
  /** Names of `struct` declarations, in declaration order. */
  readonly structs: string[] = [];
  readonly types = new TypeConverter();
  private nextBlockId = 0;

  createFunction(name: string, linkage: SilLinkage, type: SilType, location: SourceLocation): SilFunction {
    const fn: SilFunction = { name, linkage, type, blocks: [], location };
    this.functions.push(fn);
    return fn;
  }

  /** Create an empty block and append it to `fn`. */
  createBasicBlock(fn: SilFunction, name: BlockName, location: SourceLocation): SilBasicBlock {
    const block: SilBasicBlock = { id: this.nextBlockId++, name, instructions: [], location };
    fn.blocks.push(block);
    return block;
  }

  /** Move `block` behind every other block of `fn`. */
  moveBlockToEnd(fn: SilFunction, block: SilBasicBlock): void {
    const index = fn.blocks.indexOf(block);
    if (index === -1 || index === fn.blocks.length - 1) return;
    fn.blocks.splice(index, 1);
    fn.blocks.push(block);
  }

  declareStruct(name: string): void {
    this.structs.push(name);
  }

  lookupFunction(name: string): SilFunction | undefined {
    return this.functions.find((fn) => fn.name === name);
  }
}
