/**
 * Operand and definition accessors for LIR nodes.
 *
 * This is the single source of truth for which fields of each node kind
 * are value operands. Renaming mutates nodes in place so that maps keyed
 * by node identity stay valid across rewrites.
 */

import type { LirBlock, LirInst, LirNode, LirTerminator, VarId } from "./lir-types.ts";

/** A block's nodes in execution order: phis, instructions, terminator. */
export function blockNodes(block: LirBlock): LirNode[] {
  return [...block.phis, ...block.instructions, block.terminator];
}

/** The value a node defines, if any. */
export function nodeDest(node: LirNode): VarId | undefined {
  return "dest" in node ? node.dest : undefined;
}

/** Value operands of an instruction, in operand order. */
export function instOperands(inst: LirInst): VarId[] {
  switch (inst.kind) {
    case "load":
      return [inst.ptr];
    case "store":
      return [inst.ptr, inst.value];
    case "field_ptr":
      return [inst.base];
    case "index_ptr":
      return [inst.base, inst.index];
    case "bin_op":
      return [inst.lhs, inst.rhs];
    case "neg":
    case "not":
    case "bit_not":
      return [inst.operand];
    case "call":
    case "call_void":
    case "call_extern":
    case "call_extern_void":
      return [...inst.args];
    case "cast":
      return [inst.value];
    case "null_check":
      return [inst.ptr];
    case "assert_check":
      return [inst.cond];
    case "stack_alloc":
    case "const_int":
    case "const_float":
    case "const_bool":
    case "const_null":
    case "sizeof":
      return [];
  }
}

/** Value operands of a terminator. */
export function terminatorOperands(term: LirTerminator): VarId[] {
  switch (term.kind) {
    case "ret":
      return [term.value];
    case "br":
      return [term.cond];
    case "switch":
      return [term.value, ...term.cases.map((c) => c.value)];
    default:
      return [];
  }
}

/** Value operands of any node; for a phi, its incoming values. */
export function nodeOperands(node: LirNode): VarId[] {
  switch (node.kind) {
    case "phi":
      return node.incoming.map((e) => e.value);
    case "ret":
    case "ret_void":
    case "jump":
    case "br":
    case "switch":
    case "unreachable":
      return terminatorOperands(node);
    default:
      return instOperands(node);
  }
}

/** Whether a node is a block terminator. */
export function isTerminator(node: LirNode): node is LirTerminator {
  switch (node.kind) {
    case "ret":
    case "ret_void":
    case "jump":
    case "br":
    case "switch":
    case "unreachable":
      return true;
    default:
      return false;
  }
}

/** Rewrite all value operands of an instruction in place. */
export function renameInstOperands(inst: LirInst, mapVar: (v: VarId) => VarId): void {
  switch (inst.kind) {
    case "load":
      inst.ptr = mapVar(inst.ptr);
      break;
    case "store":
      inst.ptr = mapVar(inst.ptr);
      inst.value = mapVar(inst.value);
      break;
    case "field_ptr":
      inst.base = mapVar(inst.base);
      break;
    case "index_ptr":
      inst.base = mapVar(inst.base);
      inst.index = mapVar(inst.index);
      break;
    case "bin_op":
      inst.lhs = mapVar(inst.lhs);
      inst.rhs = mapVar(inst.rhs);
      break;
    case "neg":
    case "not":
    case "bit_not":
      inst.operand = mapVar(inst.operand);
      break;
    case "call":
    case "call_void":
    case "call_extern":
    case "call_extern_void":
      inst.args = inst.args.map(mapVar);
      break;
    case "cast":
      inst.value = mapVar(inst.value);
      break;
    case "null_check":
      inst.ptr = mapVar(inst.ptr);
      break;
    case "assert_check":
      inst.cond = mapVar(inst.cond);
      break;
    default:
      break;
  }
}

/** Rewrite all value operands of any node in place. */
export function renameNodeOperands(node: LirNode, mapVar: (v: VarId) => VarId): void {
  switch (node.kind) {
    case "phi":
      for (const entry of node.incoming) entry.value = mapVar(entry.value);
      break;
    case "ret":
      node.value = mapVar(node.value);
      break;
    case "br":
      node.cond = mapVar(node.cond);
      break;
    case "switch":
      node.value = mapVar(node.value);
      for (const c of node.cases) c.value = mapVar(c.value);
      break;
    case "ret_void":
    case "jump":
    case "unreachable":
      break;
    default:
      renameInstOperands(node, mapVar);
  }
}

/** Whether an instruction may read or write memory. */
export function touchesMemory(node: LirNode): boolean {
  switch (node.kind) {
    case "load":
    case "store":
    case "call":
    case "call_void":
    case "call_extern":
    case "call_extern_void":
      return true;
    default:
      return false;
  }
}

/** Whether `v` names a module-level value (`@global`, `@constant`, `@fn`). */
export function isModuleRef(v: VarId): boolean {
  return v.startsWith("@");
}
