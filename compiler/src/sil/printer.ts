/**
 * SIL text printer. The output uses the same grammar the parser accepts.
 */

import {
  type BlockRef,
  type LoweredType,
  type SilBasicBlock,
  type SilFunction,
  type SilInstruction,
  SilLinkage,
  SilOpcode,
  type SilType,
  type TypedValueRef,
} from "./sil-types/index.ts";
import type { SilModule } from "./sil-module.ts";

export function printSilModule(module: SilModule): string {
  const sections: string[] = [];

  for (const name of module.structs) {
    sections.push(`struct ${name} {}`);
  }

  for (const fn of module.functions) {
    sections.push(printSilFunction(fn));
  }

  return sections.length === 0 ? "" : `${sections.join("\n\n")}\n`;
}

export function printSilFunction(fn: SilFunction): string {
  const linkage = fn.linkage === SilLinkage.External ? "" : `${fn.linkage} `;
  const header = `sil ${linkage}@${fn.name} : ${printSilType(fn.type)}`;
  if (fn.blocks.length === 0) return header;

  const lines = [`${header} {`];
  for (const block of fn.blocks) {
    lines.push(...printBlock(block));
  }
  lines.push("}");
  return lines.join("\n");
}

function printBlock(block: SilBasicBlock): string[] {
  return [`${block.name}:`, ...block.instructions.map((inst) => `  ${printInstruction(inst)}`)];
}

export function printInstruction(inst: SilInstruction): string {
  return `${inst.result} = ${inst.opcode} ${printOperands(inst)}`;
}

function printOperands(inst: SilInstruction): string {
  switch (inst.opcode) {
    case SilOpcode.Tuple:
      return `(${inst.elements.map(printValueRef).join(" ")})`;
    case SilOpcode.Return:
      return printValueRef(inst.operand);
    case SilOpcode.Branch:
      return printBlockRef(inst.target);
    case SilOpcode.CondBranch:
      return `${printValueRef(inst.condition)}, ${printBlockRef(inst.trueTarget)}, ${printBlockRef(inst.falseTarget)}`;
  }
}

function printValueRef(ref: TypedValueRef): string {
  return `${printSilType(ref.type)}:${ref.name}`;
}

function printBlockRef(ref: BlockRef): string {
  return ref.name;
}

// ─── Types ───────────────────────────────────────────────────────────────────

export function printSilType(type: SilType): string {
  const uncurry =
    type.type.kind === "function" && type.type.uncurryLevel > 0 ? `[sil_uncurry=${type.type.uncurryLevel}]` : "";
  const address = type.category === "address" ? "*" : "";
  return `$${uncurry}${address}${printLoweredType(type.type)}`;
}

export function printLoweredType(type: LoweredType): string {
  switch (type.kind) {
    case "int":
      return `Int${type.bits}`;
    case "float":
      return `Float${type.bits}`;
    case "struct":
      return type.name;
    case "tuple":
      return `(${type.elements.map(printLoweredType).join(", ")})`;
    case "function": {
      const inputs = type.inputs.map((input) =>
        input.kind === "function" ? `(${printLoweredType(input)})` : printLoweredType(input)
      );
      return [...inputs, printLoweredType(type.result)].join(" -> ");
    }
  }
}
