// ─── LIR Types ───────────────────────────────────────────────────────────────

/** Union of all LIR-level type representations. */
export type LirType =
  | LirIntType
  | LirFloatType
  | LirBoolType
  | LirVoidType
  | LirPtrType
  | LirStructType
  | LirArrayType
  | LirFunctionType;

/** Fixed-width integer type. */
export interface LirIntType {
  kind: "int";
  bits: 8 | 16 | 32 | 64;
  signed: boolean;
}

/** Floating-point type. */
export interface LirFloatType {
  kind: "float";
  bits: 32 | 64;
}

/** Boolean type. */
export interface LirBoolType {
  kind: "bool";
}

/** Void type: used for functions with no return value. */
export interface LirVoidType {
  kind: "void";
}

/**
 * Address space of a pointer.
 *
 * - `global`: memory owned by one node of the cluster; dereferencing it from
 *   anywhere else is a remote operation.
 * - `symmetric`: memory replicated identically on every node.
 *
 * Pointers without a space are plain local pointers.
 */
export type AddressSpace = "global" | "symmetric";

/** Pointer type. */
export interface LirPtrType {
  kind: "ptr";
  pointee: LirType;
  space?: AddressSpace;
}

/** Named field within a struct type. */
export interface LirField {
  name: string;
  type: LirType;
}

/** Struct type: laid out as a flat sequence of named fields. */
export interface LirStructType {
  kind: "struct";
  name: string;
  fields: LirField[];
}

/** Fixed-length array type. */
export interface LirArrayType {
  kind: "array";
  element: LirType;
  length: number;
}

/** Function signature type (the type of an `@fn` reference). */
export interface LirFunctionType {
  kind: "function";
  params: LirType[];
  returnType: LirType;
}
