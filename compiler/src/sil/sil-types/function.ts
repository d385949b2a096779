import type { SourceLocation } from "../../errors/index.ts";
import type { BlockId, BlockName } from "./identifiers.ts";
import type { SilInstruction } from "./instructions.ts";
import type { SilType } from "./types.ts";

// ─── Function ────────────────────────────────────────────────────────────────

export enum SilLinkage {
  External = "external",
  Internal = "internal",
  ClangThunk = "clang_thunk",
}

/**
 * A SIL function. `type` is expected to be a function type, though nothing
 * checks it. A function without blocks is a declaration.
 */
export interface SilFunction {
  name: string;
  linkage: SilLinkage;
  type: SilType;
  blocks: SilBasicBlock[];
  location: SourceLocation;
}

// ─── Basic Block ─────────────────────────────────────────────────────────────

/**
 * A basic block. Created at its first mention, which may be a branch that
 * precedes the definition; `location` points at that mention.
 */
export interface SilBasicBlock {
  id: BlockId;
  name: BlockName;
  instructions: SilInstruction[];
  location: SourceLocation;
}
