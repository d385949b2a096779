import type { BaseNode } from "./base.ts";
import type { Declaration } from "./declarations.ts";

/** Root node: every declaration of a SIL source file, in source order. */
export interface Program extends BaseNode {
  kind: "Program";
  declarations: Declaration[];
}
