import type { AddressSpace, LirStructType, LirType } from "./types.ts";
import type { LirFunction, LirParam } from "./function.ts";

// ─── Module ──────────────────────────────────────────────────────────────────

/** Top-level LIR module: the unit of compilation. */
export interface LirModule {
  name: string;
  types: LirTypeDecl[];
  externs: LirExtern[];
  globals: LirGlobal[];
  constants: LirConstant[];
  functions: LirFunction[];
}

/** Named struct declaration at module scope. */
export interface LirTypeDecl {
  name: string;
  type: LirStructType;
}

/**
 * Module-level variable. The value `@name` is a pointer to `type` in the
 * global's address space.
 */
export interface LirGlobal {
  name: string;
  type: LirType;
  space?: AddressSpace;
}

/** External function declaration: no body. */
export interface LirExtern {
  name: string;
  params: LirParam[];
  returnType: LirType;
  attributes: string[];
}

// ─── Constant expressions ────────────────────────────────────────────────────

/**
 * A named compile-time address expression, referenced as `@name`.
 * Operands are other `@` values; indices are immediates.
 */
export interface LirConstant {
  name: string;
  expr: LirConstExpr;
}

export type LirConstExpr = LirConstFieldPtr | LirConstIndexPtr | LirConstCast;

export interface LirConstFieldPtr {
  kind: "field_ptr";
  base: string;
  field: string;
  type: LirType;
}

export interface LirConstIndexPtr {
  kind: "index_ptr";
  base: string;
  index: number;
  inbounds: boolean;
  type: LirType;
}

export interface LirConstCast {
  kind: "cast";
  value: string;
  targetType: LirType;
}
