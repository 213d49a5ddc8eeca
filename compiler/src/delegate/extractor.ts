/**
 * Outlining of a grown region into a delegate unit.
 *
 * The unit takes two byte buffers, the packed inputs and room for the
 * outputs, and returns the code of the exit it left through. The caller
 * gets a dispatch block in place of the region: it packs the inputs,
 * resolves the target's location, invokes the unit there, unpacks the
 * outputs and switches on the exit code back to the original successors.
 */

import { DelegateError, type DelegateErrorCode } from "../errors/index.ts";
import { buildCFG, retargetTerminator, uniqueSuccessors } from "../lir/cfg.ts";
import { computeDominators, dominates } from "../lir/dominance.ts";
import { definedNames, findBlock, findNode, freshBlockId, NameAllocator, splitBlock } from "../lir/edit.ts";
import type {
  BlockId,
  LirBlock,
  LirFunction,
  LirInst,
  LirNode,
  LirPtrType,
  LirStructType,
  LirType,
  VarId,
} from "../lir/lir-types.ts";
import { blockNodes, isModuleRef, nodeDest, nodeOperands, renameNodeOperands } from "../lir/operands.ts";
import { printNode } from "../lir/printer.ts";
import { lookupModuleSymbol, ValueTable } from "../lir/values.ts";
import type { AnalysisContext, CandidateRegion } from "./context.ts";
import { checkExtraction } from "./integrity.ts";
import type { RemotePrimitives } from "./primitives.ts";

const BYTE_PTR: LirPtrType = { kind: "ptr", pointee: { kind: "int", bits: 8, signed: false } };
const GLOBAL_BYTE_PTR: LirPtrType = { ...BYTE_PTR, space: "global" };

/** One exit of a region as a control-flow edge after boundary splitting. */
interface ExitEdge {
  code: number;
  /** Region block the edge leaves from. */
  from: BlockId;
  /** Block outside the region, or the region entry for a back edge. */
  to: BlockId;
}

export interface ExtractedUnit {
  region: number;
  unit: LirFunction;
  inputs: VarId[];
  outputs: VarId[];
  /** Exit code of each exit, in recording order. */
  exitCodes: number[];
  dispatchBlock: BlockId;
}

function bareName(v: VarId): string {
  return v.slice(1);
}

export class CodeExtractor {
  private ctx: AnalysisContext;
  private primitives: RemotePrimitives;

  constructor(ctx: AnalysisContext, primitives: RemotePrimitives) {
    this.ctx = ctx;
    this.primitives = primitives;
  }

  extract(region: CandidateRegion): ExtractedUnit {
    const fn = region.fn;
    const module = this.ctx.module;
    const prefix = this.unitName(region.id);
    const fail = (code: DelegateErrorCode, message: string, node?: LirNode): DelegateError =>
      new DelegateError(code, message, {
        fn: fn.name,
        region: region.id,
        node: node ? printNode(node) : undefined,
      });

    // ── Boundaries become block boundaries ──────────────────────────────
    const entryBlock = this.materializeEntry(fn, region, prefix, fail);
    const exits = this.materializeExits(fn, region, prefix, fail);

    // ── Region blocks ───────────────────────────────────────────────────
    const regionBlocks = this.collectBlocks(fn, entryBlock, exits);
    const regionIds = new Set(regionBlocks.map((b) => b.id));
    for (const block of regionBlocks) {
      for (const node of blockNodes(block)) {
        if (this.ctx.ownerOf(node) !== region.id) {
          throw fail("bad-visit", `block '${block.id}' holds a node outside the region`, node);
        }
      }
    }

    // ── Live-in and live-out values ─────────────────────────────────────
    const definedIn = new Map<VarId, BlockId>();
    for (const block of regionBlocks) {
      for (const node of blockNodes(block)) {
        const dest = nodeDest(node);
        if (dest !== undefined) definedIn.set(dest, block.id);
      }
    }

    const inputs: VarId[] = [];
    for (const block of regionBlocks) {
      for (const node of blockNodes(block)) {
        for (const v of nodeOperands(node)) {
          if (isModuleRef(v) || definedIn.has(v) || inputs.includes(v)) continue;
          inputs.push(v);
        }
      }
    }

    const usedOutside = new Set<VarId>();
    for (const block of fn.blocks) {
      if (regionIds.has(block.id)) continue;
      for (const node of blockNodes(block)) {
        for (const v of nodeOperands(node)) usedOutside.add(v);
      }
    }
    const outputs = [...definedIn.keys()].filter((v) => usedOutside.has(v));

    // ── Layout ──────────────────────────────────────────────────────────
    const values = new ValueTable(module, fn);
    const typeOf = (v: VarId): LirType => {
      const type = values.typeOf(v);
      if (!type) throw fail("untyped-value", `cannot determine the type of ${v}`);
      return type;
    };
    const inType: LirStructType = {
      kind: "struct",
      name: `${prefix}.in`,
      fields: inputs.map((v, i) => ({ name: `f${i}`, type: typeOf(v) })),
    };
    const outType: LirStructType = {
      kind: "struct",
      name: `${prefix}.out`,
      fields: outputs.map((v, i) => ({ name: `f${i}`, type: typeOf(v) })),
    };

    // ── Unit ────────────────────────────────────────────────────────────
    const unit = this.buildUnit(prefix, regionBlocks, entryBlock.id, exits, inputs, outputs, definedIn, {
      inType,
      outType,
    });

    // ── Caller ──────────────────────────────────────────────────────────
    const names = new NameAllocator(definedNames(fn));
    const inSlot = names.fresh(`${prefix}.in`);
    const outSlot = names.fresh(`${prefix}.out`);
    const dispatchId = freshBlockId(fn, `${prefix}.call`);
    const badExitId = freshBlockId(fn, `${prefix}.bad_exit`);
    const { resolve, invoke, codeType } = this.primitives;

    const dispatch: LirInst[] = [];
    inputs.forEach((v, i) => {
      const field = inType.fields[i];
      if (!field) return;
      const ptr = names.fresh(`${prefix}.in.f${i}`);
      dispatch.push({ kind: "field_ptr", dest: ptr, base: inSlot, field: field.name, type: field.type });
      dispatch.push({ kind: "store", ptr, value: v });
    });

    const target = names.fresh(`${prefix}.target`);
    const location = names.fresh(`${prefix}.loc`);
    const inSize = names.fresh(`${prefix}.in.size`);
    const outSize = names.fresh(`${prefix}.out.size`);
    const unitPtr = names.fresh(`${prefix}.unit`);
    const inPtr = names.fresh(`${prefix}.in.ptr`);
    const outPtr = names.fresh(`${prefix}.out.ptr`);
    const code = names.fresh(`${prefix}.code`);
    dispatch.push(
      { kind: "cast", dest: target, value: region.target, targetType: GLOBAL_BYTE_PTR },
      { kind: "call_extern", dest: location, func: resolve.name, args: [target], type: resolve.returnType },
      { kind: "sizeof", dest: inSize, type: inType },
      { kind: "sizeof", dest: outSize, type: outType },
      { kind: "cast", dest: unitPtr, value: `@${unit.name}`, targetType: BYTE_PTR },
      { kind: "cast", dest: inPtr, value: inSlot, targetType: BYTE_PTR },
      { kind: "cast", dest: outPtr, value: outSlot, targetType: BYTE_PTR },
      {
        kind: "call_extern",
        dest: code,
        func: invoke.name,
        args: [location, unitPtr, inPtr, inSize, outPtr, outSize],
        type: codeType,
      }
    );

    const outputLoads = new Map<VarId, VarId>();
    outputs.forEach((v, i) => {
      const field = outType.fields[i];
      if (!field) return;
      const ptr = names.fresh(`${prefix}.out.f${i}`);
      const loaded = names.fresh(`${bareName(v)}.out`);
      dispatch.push({ kind: "field_ptr", dest: ptr, base: outSlot, field: field.name, type: field.type });
      dispatch.push({ kind: "load", dest: loaded, ptr, type: field.type });
      outputLoads.set(v, loaded);
    });

    const cases: { value: VarId; target: BlockId }[] = [];
    for (const exit of exits) {
      const caseValue = names.fresh(`${prefix}.code.${exit.code}`);
      dispatch.push({ kind: "const_int", dest: caseValue, type: codeType, value: exit.code });
      cases.push({ value: caseValue, target: exit.to === entryBlock.id ? dispatchId : exit.to });
    }

    const dispatchBlock: LirBlock = {
      id: dispatchId,
      phis: [],
      instructions: dispatch,
      terminator: { kind: "switch", value: code, cases, defaultBlock: badExitId },
    };
    const badExitBlock: LirBlock = {
      id: badExitId,
      phis: [],
      instructions: [],
      terminator: { kind: "unreachable" },
    };

    for (const block of fn.blocks) {
      if (regionIds.has(block.id)) continue;
      retargetTerminator(block.terminator, entryBlock.id, dispatchId);
      for (const node of blockNodes(block)) {
        renameNodeOperands(node, (v) => outputLoads.get(v) ?? v);
      }
    }

    for (const exit of exits) {
      const successor = findBlock(fn, exit.to);
      if (!successor || regionIds.has(successor.id)) continue;
      for (const phi of successor.phis) {
        for (const entry of phi.incoming) {
          if (entry.from === exit.from) entry.from = dispatchId;
        }
      }
    }

    this.ctx.renamePending(fn, region.id, outputLoads);

    const at = fn.blocks.indexOf(entryBlock);
    fn.blocks.splice(at, 0, dispatchBlock, badExitBlock);
    fn.blocks = fn.blocks.filter((b) => !regionIds.has(b.id));

    const first = fn.blocks[0];
    if (first) {
      first.instructions.unshift(
        { kind: "stack_alloc", dest: inSlot, type: inType },
        { kind: "stack_alloc", dest: outSlot, type: outType }
      );
    }

    checkExtraction(fn, regionIds, new Set(definedIn.keys()), region.id);

    module.types.push({ name: inType.name, type: inType }, { name: outType.name, type: outType });
    module.functions.push(unit);
    this.ctx.recordDispatch(region.entry, dispatchId);

    return {
      region: region.id,
      unit,
      inputs,
      outputs,
      exitCodes: exits.map((e) => e.code),
      dispatchBlock: dispatchId,
    };
  }

  /** `d<id>`, or `d<id>.N` if a module symbol already has that name. */
  private unitName(id: number): string {
    const base = `d${id}`;
    let name = base;
    let n = 1;
    while (lookupModuleSymbol(this.ctx.module, name)) {
      name = `${base}.${n++}`;
    }
    return name;
  }

  private materializeEntry(
    fn: LirFunction,
    region: CandidateRegion,
    prefix: string,
    fail: (code: DelegateErrorCode, message: string, node?: LirNode) => DelegateError
  ): LirBlock {
    const position = findNode(fn, region.entry);
    if (!position) throw fail("bad-visit", "region entry is not in the function", region.entry);
    if (position.index === 0) return position.block;
    if (position.index < position.block.phis.length) {
      throw fail("split-phi", "region entry falls between phi nodes", region.entry);
    }
    const before = blockNodes(position.block)[position.index - 1];
    const tail = splitBlock(fn, position.block, position.index, freshBlockId(fn, `${prefix}.eblk`));
    // The jump left in front of the entry goes with the node before it.
    const owner = before === undefined ? undefined : this.ctx.ownerOf(before);
    const holder = owner === undefined ? undefined : this.ctx.regions[owner];
    if (holder) this.ctx.claim(position.block.terminator, holder);
    return tail;
  }

  /**
   * Split every block where an exit falls mid-block, then describe each
   * exit as an edge between blocks.
   */
  private materializeExits(
    fn: LirFunction,
    region: CandidateRegion,
    prefix: string,
    fail: (code: DelegateErrorCode, message: string, node?: LirNode) => DelegateError
  ): ExitEdge[] {
    for (const [boundary, frontier] of region.exits) {
      const inner = findNode(fn, frontier);
      const outer = findNode(fn, boundary);
      if (!inner) throw fail("bad-visit", "exit frontier is not in the function", frontier);
      if (!outer || outer.block !== inner.block || inner.index > outer.index) continue;
      if (outer.index < outer.block.phis.length) {
        throw fail("split-phi", "exit boundary falls between phi nodes", boundary);
      }
      splitBlock(fn, outer.block, outer.index, freshBlockId(fn, `${prefix}.split`));
      // The jump the split leaves behind stays in the region.
      this.ctx.claim(outer.block.terminator, region);
    }

    const edges: ExitEdge[] = [];
    for (const [boundary, frontier] of region.exits) {
      const inner = findNode(fn, frontier);
      if (!inner) throw fail("bad-visit", "exit frontier is not in the function", frontier);
      const outer = findNode(fn, boundary);
      // A boundary that was the entry of an earlier extracted region now
      // lives in that region's unit; its dispatch block takes its place.
      const to = outer ? outer.block.id : this.ctx.dispatchBlockFor(boundary);
      if (to === undefined) throw fail("unresolved-exit", "exit boundary is no longer in the function", boundary);
      if (outer && outer.index !== 0) throw fail("unresolved-exit", "exit boundary does not start a block", boundary);
      edges.push({ code: edges.length, from: inner.block.id, to });
    }
    return edges;
  }

  /** Blocks reached from the entry without crossing an exit edge, in discovery order. */
  private collectBlocks(fn: LirFunction, entry: LirBlock, exits: readonly ExitEdge[]): LirBlock[] {
    const blocks: LirBlock[] = [entry];
    const seen = new Set<BlockId>([entry.id]);
    for (let i = 0; i < blocks.length; i++) {
      const block = blocks[i];
      if (!block) break;
      for (const succId of uniqueSuccessors(block.terminator)) {
        if (seen.has(succId)) continue;
        if (exits.some((e) => e.from === block.id && e.to === succId)) continue;
        const succ = findBlock(fn, succId);
        if (!succ) continue;
        seen.add(succId);
        blocks.push(succ);
      }
    }
    return blocks;
  }

  private buildUnit(
    name: string,
    regionBlocks: readonly LirBlock[],
    entryId: BlockId,
    exits: readonly ExitEdge[],
    inputs: readonly VarId[],
    outputs: readonly VarId[],
    definedIn: ReadonlyMap<VarId, BlockId>,
    layout: { inType: LirStructType; outType: LirStructType }
  ): LirFunction {
    const { codeType } = this.primitives;
    const clones: LirBlock[] = structuredClone([...regionBlocks]);

    const names = new NameAllocator(inputs);
    for (const block of clones) {
      for (const node of blockNodes(block)) {
        const dest = nodeDest(node);
        if (dest !== undefined) names.reserve(dest);
      }
    }
    const inParam = names.fresh("in");
    const outParam = names.fresh("out");
    const inBuf = names.fresh("in.buf");
    const outBuf = names.fresh("out.buf");

    const unit: LirFunction = {
      name,
      params: [
        { name: bareName(inParam), type: BYTE_PTR },
        { name: bareName(outParam), type: BYTE_PTR },
      ],
      returnType: codeType,
      blocks: [],
      attributes: [],
    };

    const entry: LirInst[] = [
      { kind: "cast", dest: inBuf, value: inParam, targetType: { kind: "ptr", pointee: layout.inType } },
      { kind: "cast", dest: outBuf, value: outParam, targetType: { kind: "ptr", pointee: layout.outType } },
    ];
    const inputLoads = new Map<VarId, VarId>();
    inputs.forEach((v, i) => {
      const field = layout.inType.fields[i];
      if (!field) return;
      const ptr = names.fresh(`in.f${i}`);
      const loaded = names.fresh(`${bareName(v)}.in`);
      entry.push({ kind: "field_ptr", dest: ptr, base: inBuf, field: field.name, type: field.type });
      entry.push({ kind: "load", dest: loaded, ptr, type: field.type });
      inputLoads.set(v, loaded);
    });
    for (const block of clones) {
      for (const node of blockNodes(block)) {
        renameNodeOperands(node, (v) => inputLoads.get(v) ?? v);
      }
    }

    unit.blocks = [...clones];
    const entryBlockId = freshBlockId(unit, `${name}.entry`);
    unit.blocks.unshift({ id: entryBlockId, phis: [], instructions: entry, terminator: { kind: "jump", target: entryId } });

    const retId = freshBlockId(unit, `${name}.ret`);
    const leaves: LirBlock[] = [];
    for (const exit of exits) {
      const leaveId = freshBlockId(unit, `${name}.leave.${exit.code}`);
      const source = unit.blocks.find((b) => b.id === exit.from);
      if (source) retargetTerminator(source.terminator, exit.to, leaveId);
      const leave: LirBlock = { id: leaveId, phis: [], instructions: [], terminator: { kind: "jump", target: retId } };
      leaves.push(leave);
      unit.blocks.push(leave);
    }

    const codes = exits.map((exit) => names.fresh(`code.${exit.code}`));
    const result = names.fresh("code");
    unit.blocks.push({
      id: retId,
      phis:
        exits.length > 0
          ? [
              {
                kind: "phi",
                dest: result,
                type: codeType,
                incoming: leaves.map((leave, k) => ({ value: codes[k] ?? result, from: leave.id })),
              },
            ]
          : [],
      instructions: [],
      terminator: exits.length > 0 ? { kind: "ret", value: result } : { kind: "unreachable" },
    });

    // An output is stored on an exit only where its definition dominates it.
    const idom = computeDominators(buildCFG(unit.blocks));
    exits.forEach((exit, k) => {
      const leave = leaves[k];
      const codeVar = codes[k];
      if (!leave || codeVar === undefined) return;
      leave.instructions.push({ kind: "const_int", dest: codeVar, type: codeType, value: exit.code });
      outputs.forEach((v, i) => {
        const field = layout.outType.fields[i];
        const defBlock = definedIn.get(v);
        if (!field || defBlock === undefined || !dominates(idom, defBlock, exit.from)) return;
        const ptr = names.fresh(`out.f${i}`);
        leave.instructions.push({ kind: "field_ptr", dest: ptr, base: outBuf, field: field.name, type: field.type });
        leave.instructions.push({ kind: "store", ptr, value: v });
      });
    });

    return unit;
  }
}
