import type { VarId } from "./identifiers.ts";
import type { LirFloatType, LirIntType, LirType } from "./types.ts";

// ─── Instructions ────────────────────────────────────────────────────────────

/** Union of all LIR instructions (everything except phis and terminators). */
export type LirInst =
  // Memory
  | LirStackAlloc
  | LirLoad
  | LirStore
  | LirFieldPtr
  | LirIndexPtr
  // Arithmetic & Comparison
  | LirBinOp
  | LirNeg
  // Logical
  | LirNot
  // Bitwise unary
  | LirBitNot
  // Constants
  | LirConstInt
  | LirConstFloat
  | LirConstBool
  | LirConstNull
  // Functions
  | LirCall
  | LirCallVoid
  | LirCallExtern
  | LirCallExternVoid
  // Type ops
  | LirCast
  | LirSizeof
  // Checks
  | LirNullCheck
  | LirAssertCheck;

// ── Memory ───────────────────────────────────────────────────────────────────

/** Allocate space on the stack for a local variable; `dest` is a pointer to it. */
export interface LirStackAlloc {
  kind: "stack_alloc";
  dest: VarId;
  type: LirType;
}

/** Load a value of `type` from a pointer. */
export interface LirLoad {
  kind: "load";
  dest: VarId;
  ptr: VarId;
  type: LirType;
}

/** Store a value through a pointer. */
export interface LirStore {
  kind: "store";
  ptr: VarId;
  value: VarId;
}

/**
 * Compute a pointer to a named field within a struct. `type` is the field
 * type; the result points to it in the base pointer's address space.
 */
export interface LirFieldPtr {
  kind: "field_ptr";
  dest: VarId;
  base: VarId;
  field: string;
  type: LirType;
}

/**
 * Compute a pointer to the element at `index` from `base`. `inbounds`
 * asserts the result stays inside the object `base` points into.
 */
export interface LirIndexPtr {
  kind: "index_ptr";
  dest: VarId;
  base: VarId;
  index: VarId;
  inbounds: boolean;
  type: LirType;
}

// ── Arithmetic, Comparison, Logical, Bitwise (binary) ────────────────────────

/** All supported binary operations. */
export type BinOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "eq"
  | "neq"
  | "lt"
  | "gt"
  | "lte"
  | "gte"
  | "and"
  | "or"
  | "bit_and"
  | "bit_or"
  | "bit_xor"
  | "shl"
  | "shr";

/** Binary operation on two SSA values. */
export interface LirBinOp {
  kind: "bin_op";
  op: BinOp;
  dest: VarId;
  lhs: VarId;
  rhs: VarId;
  type: LirType;
}

/** Arithmetic negation (`-x`). */
export interface LirNeg {
  kind: "neg";
  dest: VarId;
  operand: VarId;
  type: LirType;
}

/** Logical NOT (`!x`). */
export interface LirNot {
  kind: "not";
  dest: VarId;
  operand: VarId;
}

/** Bitwise NOT (`~x`). */
export interface LirBitNot {
  kind: "bit_not";
  dest: VarId;
  operand: VarId;
  type: LirType;
}

// ── Constants ────────────────────────────────────────────────────────────────

/** Integer constant. */
export interface LirConstInt {
  kind: "const_int";
  dest: VarId;
  type: LirIntType;
  value: number;
}

/** Floating-point constant. */
export interface LirConstFloat {
  kind: "const_float";
  dest: VarId;
  type: LirFloatType;
  value: number;
}

/** Boolean constant (`true` / `false`). */
export interface LirConstBool {
  kind: "const_bool";
  dest: VarId;
  value: boolean;
}

/** Null pointer constant. */
export interface LirConstNull {
  kind: "const_null";
  dest: VarId;
  type: LirType;
}

// ── Function calls ───────────────────────────────────────────────────────────

/** Call a module function that returns a value. */
export interface LirCall {
  kind: "call";
  dest: VarId;
  func: string;
  args: VarId[];
  type: LirType;
}

/** Call a void-returning module function. */
export interface LirCallVoid {
  kind: "call_void";
  func: string;
  args: VarId[];
}

/** Call an extern function that returns a value. */
export interface LirCallExtern {
  kind: "call_extern";
  dest: VarId;
  func: string;
  args: VarId[];
  type: LirType;
}

/** Call a void-returning extern function. */
export interface LirCallExternVoid {
  kind: "call_extern_void";
  func: string;
  args: VarId[];
}

// ── Type operations ──────────────────────────────────────────────────────────

/** Explicit reinterpretation of a value as `targetType`. */
export interface LirCast {
  kind: "cast";
  dest: VarId;
  value: VarId;
  targetType: LirType;
}

/** Compile-time size of a type in bytes (result is u64). */
export interface LirSizeof {
  kind: "sizeof";
  dest: VarId;
  type: LirType;
}

// ── Checks ───────────────────────────────────────────────────────────────────

/** Runtime null pointer check: panics if `ptr` is null. */
export interface LirNullCheck {
  kind: "null_check";
  ptr: VarId;
}

/** Runtime assertion: panics with `message` if `cond` is false. */
export interface LirAssertCheck {
  kind: "assert_check";
  cond: VarId;
  message: string;
}
