/**
 * LIR (low-level intermediate representation) node types.
 * Uses discriminated unions with a `kind` field.
 *
 * LIR is an SSA-based IR made of basic blocks with explicit terminators and
 * phi nodes at control-flow join points. Pointer types carry an address
 * space so passes can tell node-owned memory from replicated memory.
 */

export * from "./identifiers.ts";
export * from "./types.ts";
export * from "./module.ts";
export * from "./function.ts";
export * from "./instructions.ts";
export * from "./terminators.ts";
