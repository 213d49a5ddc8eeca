import type { BlockId, VarId } from "./identifiers.ts";
import type { LirInst } from "./instructions.ts";
import type { LirTerminator } from "./terminators.ts";
import type { LirType } from "./types.ts";

// ─── Function ────────────────────────────────────────────────────────────────

/** A LIR function: a list of basic blocks in SSA form. The first block is the entry. */
export interface LirFunction {
  name: string;
  params: LirParam[];
  returnType: LirType;
  blocks: LirBlock[];
  /**
   * Function attributes, e.g. `async` (task entry point), `unbound`
   * (no location-sensitive memory effects), `readnone`.
   */
  attributes: string[];
}

/** Named function parameter. Inside the body it is the value `%name`. */
export interface LirParam {
  name: string;
  type: LirType;
}

// ─── Basic Block ─────────────────────────────────────────────────────────────

/**
 * A basic block: a straight-line sequence of instructions ending with
 * exactly one terminator. May have phi nodes at the top for SSA merges.
 */
export interface LirBlock {
  id: BlockId;
  phis: LirPhi[];
  instructions: LirInst[];
  terminator: LirTerminator;
}

// ─── Phi Node ────────────────────────────────────────────────────────────────

/** SSA phi node: selects a value based on which predecessor block executed. */
export interface LirPhi {
  kind: "phi";
  dest: VarId;
  type: LirType;
  incoming: { value: VarId; from: BlockId }[];
}

/** Anything that occupies a position in a block: phi, instruction or terminator. */
export type LirNode = LirPhi | LirInst | LirTerminator;
