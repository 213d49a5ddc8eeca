import type { BlockId, VarId } from "./identifiers.ts";

// ─── Terminators ─────────────────────────────────────────────────────────────

/** Union of all block terminators: exactly one per basic block. */
export type LirTerminator =
  | LirRet
  | LirRetVoid
  | LirJump
  | LirBranch
  | LirSwitch
  | LirUnreachable;

/** Return a value from the function. */
export interface LirRet {
  kind: "ret";
  value: VarId;
}

/** Return void from the function. */
export interface LirRetVoid {
  kind: "ret_void";
}

/** Unconditional jump to a target block. */
export interface LirJump {
  kind: "jump";
  target: BlockId;
}

/** Conditional branch: jumps to `thenBlock` if `cond` is true, else `elseBlock`. */
export interface LirBranch {
  kind: "br";
  cond: VarId;
  thenBlock: BlockId;
  elseBlock: BlockId;
}

/** Multi-way switch on an integer value with a default fallthrough. */
export interface LirSwitch {
  kind: "switch";
  value: VarId;
  cases: { value: VarId; target: BlockId }[];
  defaultBlock: BlockId;
}

/** Marks unreachable code. */
export interface LirUnreachable {
  kind: "unreachable";
}
