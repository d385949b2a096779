/**
 * SIL node types: lowered types, functions, basic blocks and instructions.
 * Uses discriminated unions, on `kind` for types and `opcode` for instructions.
 */

export type * from "./identifiers.ts";
export type * from "./types.ts";
export { SilLinkage } from "./function.ts";
export type { SilBasicBlock, SilFunction } from "./function.ts";
export { SilOpcode } from "./instructions.ts";
export type {
  BlockRef,
  SilBranchInst,
  SilCondBranchInst,
  SilInstruction,
  SilReturnInst,
  SilTupleInst,
  TypedValueRef,
} from "./instructions.ts";
