/**
 * Pointer provenance: for every load and store, the base value its address
 * was derived from, found by walking address computations backwards.
 *
 * - `field_ptr` is transparent.
 * - `index_ptr` is transparent when `inbounds`, except that a first index
 *   other than a literal zero at a global-space base starts a new root.
 *   Indexing without `inbounds` is a root.
 * - `cast` is transparent when the chain below it resolves to a pointer.
 * - `@` constant expressions are matched as the instruction they spell.
 * - Anything else is its own root.
 */

import type {
  BlockId,
  LirConstExpr,
  LirFunction,
  LirLoad,
  LirNode,
  LirStore,
  VarId,
} from "../lir/lir-types.ts";
import type { ValueTable } from "../lir/values.ts";
import type { AnalysisContext } from "./context.ts";

export type BaseClass = "global-remote" | "symmetric" | "static" | "constant" | "stack-local" | "unknown";

/** A load or store together with its resolved base. */
export interface Access {
  node: LirLoad | LirStore;
  block: BlockId;
  base: VarId;
  classification: BaseClass;
}

export function isMemoryAccess(node: LirNode): node is LirLoad | LirStore {
  return node.kind === "load" || node.kind === "store";
}

export class ProvenanceAnalyzer {
  private ctx: AnalysisContext;
  private values: ValueTable;

  constructor(ctx: AnalysisContext, values: ValueTable) {
    this.ctx = ctx;
    this.values = values;
  }

  /** Base of the address a load or store uses; undefined for other nodes. */
  provenance(node: LirNode): VarId | undefined {
    if (!isMemoryAccess(node)) return undefined;
    const cached = this.ctx.cachedProvenance(node);
    if (cached !== undefined) return cached;
    return this.ctx.memoizeProvenance(node, this.baseOf(node.ptr));
  }

  /** Walk address derivations back from `v` to the value they start at. */
  baseOf(v: VarId, visiting: Set<VarId> = new Set()): VarId {
    if (visiting.has(v)) return v;
    visiting.add(v);

    const ref = this.values.moduleRef(v);
    if (ref) {
      return ref.kind === "constant" ? this.constantBase(v, ref.constant.expr, visiting) : v;
    }

    const def = this.values.def(v);
    if (def?.kind !== "inst") return v;
    const inst = def.node;
    switch (inst.kind) {
      case "field_ptr":
        return this.baseOf(inst.base, visiting);
      case "index_ptr":
        if (!inst.inbounds) return v;
        if (this.isGlobalSpace(inst.base) && !this.isZero(inst.index)) return v;
        return this.baseOf(inst.base, visiting);
      case "cast":
        return this.castBase(v, inst.value, visiting);
      default:
        return v;
    }
  }

  private constantBase(v: VarId, expr: LirConstExpr, visiting: Set<VarId>): VarId {
    switch (expr.kind) {
      case "field_ptr":
        return this.baseOf(expr.base, visiting);
      case "index_ptr":
        if (!expr.inbounds) return v;
        if (this.isGlobalSpace(expr.base) && expr.index !== 0) return v;
        return this.baseOf(expr.base, visiting);
      case "cast":
        return this.castBase(v, expr.value, visiting);
    }
  }

  private castBase(v: VarId, operand: VarId, visiting: Set<VarId>): VarId {
    const base = this.baseOf(operand, visiting);
    return this.values.typeOf(base)?.kind === "ptr" ? base : v;
  }

  private isGlobalSpace(v: VarId): boolean {
    const type = this.values.typeOf(v);
    return type?.kind === "ptr" && type.space === "global";
  }

  private isZero(v: VarId): boolean {
    const def = this.values.def(v);
    return def?.kind === "inst" && def.node.kind === "const_int" && def.node.value === 0;
  }

  classify(base: VarId): BaseClass {
    const type = this.values.typeOf(base);
    if (type?.kind === "ptr" && type.space === "global") return "global-remote";
    if (type?.kind === "ptr" && type.space === "symmetric") return "symmetric";

    const ref = this.values.moduleRef(base);
    if (ref) return ref.kind === "global" ? "static" : "constant";

    const def = this.values.def(base);
    if (!def) return "unknown";
    if (def.kind === "param") return "stack-local";
    if (def.kind === "phi") return "unknown";
    switch (def.node.kind) {
      case "stack_alloc":
        return "stack-local";
      case "const_int":
      case "const_float":
      case "const_bool":
      case "const_null":
        return "constant";
      default:
        return "unknown";
    }
  }

  /** Provenance and class of every load and store of `fn`, in program order. */
  analyzeFunction(fn: LirFunction): Access[] {
    const accesses: Access[] = [];
    for (const block of fn.blocks) {
      for (const inst of block.instructions) {
        if (!isMemoryAccess(inst)) continue;
        const base = this.provenance(inst);
        if (base === undefined) continue;
        accesses.push({ node: inst, block: block.id, base, classification: this.classify(base) });
      }
    }
    return accesses;
  }
}

export function isAnchorClass(classification: BaseClass): boolean {
  return classification === "global-remote" || classification === "stack-local";
}
