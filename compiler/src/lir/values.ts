/**
 * Value table: definition sites and types of the values visible in one
 * function: its parameters, every phi/instruction result, and the
 * module-level `@` values.
 *
 * The table is a snapshot; rebuild it after editing the function.
 */

import type {
  BlockId,
  LirConstant,
  LirExtern,
  LirFunction,
  LirGlobal,
  LirInst,
  LirModule,
  LirParam,
  LirPhi,
  LirType,
  VarId,
} from "./lir-types.ts";
import { isModuleRef } from "./operands.ts";

const U64: LirType = { kind: "int", bits: 64, signed: false };

/** Where a function-local value comes from. */
export type ValueDef =
  | { kind: "param"; param: LirParam; index: number }
  | { kind: "phi"; node: LirPhi; block: BlockId }
  | { kind: "inst"; node: LirInst; block: BlockId };

/** What a module-level `@name` refers to. */
export type ModuleRef =
  | { kind: "global"; global: LirGlobal }
  | { kind: "constant"; constant: LirConstant }
  | { kind: "function"; fn: LirFunction }
  | { kind: "extern"; ext: LirExtern };

/** The SSA value naming a parameter inside its function. */
export function paramVar(param: LirParam): VarId {
  return `%${param.name}`;
}

/** Look up a module-level symbol by bare name (no `@`). */
export function lookupModuleSymbol(module: LirModule, name: string): ModuleRef | undefined {
  const global = module.globals.find((g) => g.name === name);
  if (global) return { kind: "global", global };
  const constant = module.constants.find((c) => c.name === name);
  if (constant) return { kind: "constant", constant };
  const fn = module.functions.find((f) => f.name === name);
  if (fn) return { kind: "function", fn };
  const ext = module.externs.find((e) => e.name === name);
  if (ext) return { kind: "extern", ext };
  return undefined;
}

export class ValueTable {
  readonly module: LirModule;
  readonly fn: LirFunction;
  private defs = new Map<VarId, ValueDef>();
  private types = new Map<VarId, LirType>();

  constructor(module: LirModule, fn: LirFunction) {
    this.module = module;
    this.fn = fn;
    fn.params.forEach((param, index) => {
      this.defs.set(paramVar(param), { kind: "param", param, index });
    });
    for (const block of fn.blocks) {
      for (const phi of block.phis) {
        this.defs.set(phi.dest, { kind: "phi", node: phi, block: block.id });
      }
      for (const inst of block.instructions) {
        if ("dest" in inst) {
          this.defs.set(inst.dest, { kind: "inst", node: inst, block: block.id });
        }
      }
    }
  }

  /** Definition of a function-local value. */
  def(v: VarId): ValueDef | undefined {
    return this.defs.get(v);
  }

  /** Referent of a module-level value. */
  moduleRef(v: VarId): ModuleRef | undefined {
    if (!isModuleRef(v)) return undefined;
    return lookupModuleSymbol(this.module, v.slice(1));
  }

  /** Type of any value visible in the function, or undefined if unknown. */
  typeOf(v: VarId): LirType | undefined {
    return this.resolveType(v, new Set());
  }

  private resolveType(v: VarId, visiting: Set<VarId>): LirType | undefined {
    const cached = this.types.get(v);
    if (cached) return cached;
    if (visiting.has(v)) return undefined;
    visiting.add(v);

    const type = isModuleRef(v) ? this.moduleRefType(v, visiting) : this.localType(v, visiting);
    if (type) this.types.set(v, type);
    return type;
  }

  private localType(v: VarId, visiting: Set<VarId>): LirType | undefined {
    const def = this.defs.get(v);
    if (!def) return undefined;
    switch (def.kind) {
      case "param":
        return def.param.type;
      case "phi":
        return def.node.type;
      case "inst":
        return this.instType(def.node, visiting);
    }
  }

  private instType(inst: LirInst, visiting: Set<VarId>): LirType | undefined {
    switch (inst.kind) {
      case "stack_alloc":
        return { kind: "ptr", pointee: inst.type };
      case "field_ptr":
      case "index_ptr":
        return this.derivedPtr(inst.base, inst.type, visiting);
      case "not":
      case "const_bool":
        return { kind: "bool" };
      case "cast":
        return inst.targetType;
      case "sizeof":
        return U64;
      case "load":
      case "bin_op":
      case "neg":
      case "bit_not":
      case "const_int":
      case "const_float":
      case "const_null":
      case "call":
      case "call_extern":
        return inst.type;
      default:
        return undefined;
    }
  }

  private moduleRefType(v: VarId, visiting: Set<VarId>): LirType | undefined {
    const ref = this.moduleRef(v);
    if (!ref) return undefined;
    switch (ref.kind) {
      case "global": {
        const { type, space } = ref.global;
        return space ? { kind: "ptr", pointee: type, space } : { kind: "ptr", pointee: type };
      }
      case "constant": {
        const expr = ref.constant.expr;
        if (expr.kind === "cast") return expr.targetType;
        return this.derivedPtr(expr.base, expr.type, visiting);
      }
      case "function":
        return {
          kind: "function",
          params: ref.fn.params.map((p) => p.type),
          returnType: ref.fn.returnType,
        };
      case "extern":
        return {
          kind: "function",
          params: ref.ext.params.map((p) => p.type),
          returnType: ref.ext.returnType,
        };
    }
  }

  /** Pointer to `pointee` in the same address space as `base`. */
  private derivedPtr(base: VarId, pointee: LirType, visiting: Set<VarId>): LirType {
    const baseType = this.resolveType(base, visiting);
    if (baseType?.kind === "ptr" && baseType.space) {
      return { kind: "ptr", pointee, space: baseType.space };
    }
    return { kind: "ptr", pointee };
  }
}
