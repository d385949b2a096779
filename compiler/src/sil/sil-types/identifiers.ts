// ─── Identifiers ─────────────────────────────────────────────────────────────

/** Local value name including its sigil, e.g. `"%0"`, `"%sum"`. */
export type ValueName = string;

/** Basic block label as written, e.g. `"bb0"`, `"exit"`. Scoped to one function. */
export type BlockName = string;

/** Module-unique block number, assigned in creation order. */
export type BlockId = number;
