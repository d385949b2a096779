import type { Span } from "../../lexer/token.ts";
import type { SourceLocation } from "../../errors/index.ts";
import type { BlockName, ValueName } from "./identifiers.ts";
import type { SilBasicBlock } from "./function.ts";
import type { SilType } from "./types.ts";

// ─── Operands ────────────────────────────────────────────────────────────────

/** A `$type : %name` operand. The name is not bound to a definition here. */
export interface TypedValueRef {
  type: SilType;
  name: ValueName;
  location: SourceLocation;
}

/** A reference to a basic block of the enclosing function. */
export interface BlockRef {
  name: BlockName;
  block: SilBasicBlock;
  location: SourceLocation;
}

// ─── Instructions ────────────────────────────────────────────────────────────

/** Closed set of opcodes the parser understands. */
export enum SilOpcode {
  Tuple = "tuple",
  Return = "return",
  Branch = "br",
  CondBranch = "cond_br",
}

/** Union of all SIL instructions. */
export type SilInstruction = SilTupleInst | SilReturnInst | SilBranchInst | SilCondBranchInst;

interface SilInstructionBase {
  /** Local name bound by `%name = ...`. */
  result: ValueName;
  location: SourceLocation;
  span: Span;
}

/** Build a tuple from zero or more operands: `tuple ($A:%a $B:%b)`. */
export interface SilTupleInst extends SilInstructionBase {
  opcode: SilOpcode.Tuple;
  elements: TypedValueRef[];
}

/** Leave the function with a value: `return $T:%v`. */
export interface SilReturnInst extends SilInstructionBase {
  opcode: SilOpcode.Return;
  operand: TypedValueRef;
}

/** Unconditional jump: `br bb1`. */
export interface SilBranchInst extends SilInstructionBase {
  opcode: SilOpcode.Branch;
  target: BlockRef;
}

/** Two-way branch: `cond_br $Int1:%c, bbTrue, bbFalse`. */
export interface SilCondBranchInst extends SilInstructionBase {
  opcode: SilOpcode.CondBranch;
  condition: TypedValueRef;
  trueTarget: BlockRef;
  falseTarget: BlockRef;
}
