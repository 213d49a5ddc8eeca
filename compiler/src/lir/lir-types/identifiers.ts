// ─── Identifiers ─────────────────────────────────────────────────────────────

/**
 * SSA value identifier. Function-local values start with `%` (`"%0"`,
 * `"%x.1"`); module-level values (globals, constants, functions) with `@`.
 */
export type VarId = string;

/** Basic block label, e.g. `"entry"`, `"if.then"`, `"d0.eblk"`. */
export type BlockId = string;
