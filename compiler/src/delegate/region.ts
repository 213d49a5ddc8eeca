/**
 * Region growth: claim the largest forward region from an anchor whose
 * nodes may all run at the anchor's target location.
 *
 * A block is entered only once every predecessor has been sealed into the
 * region. Until then the edge is a tentative exit, kept in `pending` and
 * retried when the worklist drains; whatever is still pending at the end
 * becomes a real exit.
 */

import { DelegateError } from "../errors/index.ts";
import { buildCFG, type CFG, uniqueSuccessors } from "../lir/cfg.ts";
import { firstNode } from "../lir/edit.ts";
import type { BlockId, LirBlock, LirFunction, LirNode } from "../lir/lir-types.ts";
import { blockNodes, touchesMemory } from "../lir/operands.ts";
import { printNode } from "../lir/printer.ts";
import { lookupModuleSymbol, ValueTable } from "../lir/values.ts";
import type { AnalysisContext, CandidateRegion } from "./context.ts";
import { ProvenanceAnalyzer } from "./provenance.ts";

interface Position {
  block: LirBlock;
  index: number;
}

interface GrowthState {
  queue: LirNode[];
  queued: Set<LirNode>;
  sealed: Set<BlockId>;
  retry: Set<BlockId>;
  pending: Map<BlockId, LirNode[]>;
}

export class RegionBuilder {
  readonly fn: LirFunction;
  readonly values: ValueTable;
  readonly cfg: CFG;
  readonly provenance: ProvenanceAnalyzer;
  private ctx: AnalysisContext;
  private positions = new Map<LirNode, Position>();

  constructor(ctx: AnalysisContext, fn: LirFunction) {
    this.ctx = ctx;
    this.fn = fn;
    this.values = new ValueTable(ctx.module, fn);
    this.cfg = buildCFG(fn.blocks);
    this.provenance = new ProvenanceAnalyzer(ctx, this.values);
    for (const block of fn.blocks) {
      blockNodes(block).forEach((node, index) => this.positions.set(node, { block, index }));
    }
  }

  /** Whether `node` may be part of `region`. */
  isValid(node: LirNode, region: CandidateRegion): boolean {
    const owner = this.ctx.ownerOf(node);
    if (owner !== undefined && owner !== region.id) return false;

    // Leaving the function is done by the caller, after the dispatch.
    if (node.kind === "ret" || node.kind === "ret_void" || node.kind === "unreachable") return false;

    if (!touchesMemory(node)) return true;

    const base = this.provenance.provenance(node);
    if (base !== undefined) {
      if (region.validPtrs.has(base)) return true;
      const classification = this.provenance.classify(base);
      return classification === "symmetric" || classification === "static" || classification === "constant";
    }

    if (this.isAgnosticCall(node)) return true;
    this.ctx.info(`no provenance for '${printNode(node)}' in ${this.fn.name}`);
    return false;
  }

  private isAgnosticCall(node: LirNode): boolean {
    if (
      node.kind !== "call" &&
      node.kind !== "call_void" &&
      node.kind !== "call_extern" &&
      node.kind !== "call_extern_void"
    ) {
      return false;
    }
    const callee = lookupModuleSymbol(this.ctx.module, node.func);
    let attributes: string[];
    if (callee?.kind === "function") attributes = callee.fn.attributes;
    else if (callee?.kind === "extern") attributes = callee.ext.attributes;
    else return false;
    return attributes.some((attr) => this.ctx.options.agnosticAttributes.includes(attr));
  }

  /** Grow `region` to closure, claiming its nodes in the context. */
  expand(region: CandidateRegion): void {
    const state: GrowthState = {
      queue: [],
      queued: new Set(),
      sealed: new Set(),
      retry: new Set(),
      pending: new Map(),
    };
    this.enqueue(state, region.entry);

    for (;;) {
      let start = state.queue.shift();
      while (start) {
        this.walk(region, start, state);
        start = state.queue.shift();
      }

      let progress = false;
      for (const id of [...state.retry]) {
        if (!this.predecessorsSealed(id, state.sealed)) continue;
        state.retry.delete(id);
        state.pending.delete(id);
        this.enqueue(state, firstNode(this.block(id)));
        progress = true;
      }
      if (!progress) break;
    }

    for (const [id, frontiers] of state.pending) {
      const boundary = firstNode(this.block(id));
      for (const frontier of frontiers) {
        this.recordExit(region, boundary, frontier);
      }
    }
  }

  private enqueue(state: GrowthState, node: LirNode): void {
    if (state.queued.has(node)) return;
    state.queued.add(node);
    state.queue.push(node);
  }

  /** Claim valid nodes forward from `start`; seal the block if its terminator is reached. */
  private walk(region: CandidateRegion, start: LirNode, state: GrowthState): void {
    const { block, index } = this.position(start);
    let previous: LirNode | undefined;
    for (const node of blockNodes(block).slice(index)) {
      if (!this.isValid(node, region)) {
        if (previous) this.recordExit(region, node, previous);
        return;
      }
      this.ctx.claim(node, region);
      previous = node;
    }

    state.sealed.add(block.id);
    for (const succId of uniqueSuccessors(block.terminator)) {
      const head = firstNode(this.block(succId));
      if (!this.isValid(head, region)) {
        this.recordExit(region, head, block.terminator);
      } else if (this.predecessorsSealed(succId, state.sealed)) {
        state.pending.delete(succId);
        state.retry.delete(succId);
        this.enqueue(state, head);
      } else {
        state.retry.add(succId);
        const frontiers = state.pending.get(succId) ?? [];
        if (!frontiers.includes(block.terminator)) frontiers.push(block.terminator);
        state.pending.set(succId, frontiers);
      }
    }
  }

  private recordExit(region: CandidateRegion, boundary: LirNode, frontier: LirNode): void {
    const existing = region.exits.get(boundary);
    if (existing !== undefined && existing !== frontier) {
      throw new DelegateError("ambiguous-merge", "exit boundary reached from two different frontiers", {
        fn: this.fn.name,
        region: region.id,
        node: printNode(boundary),
      });
    }
    region.exits.set(boundary, frontier);
  }

  private predecessorsSealed(id: BlockId, sealed: Set<BlockId>): boolean {
    return (this.cfg.preds.get(id) ?? []).every((pred) => sealed.has(pred));
  }

  /**
   * Walk the grown region forward from its entry, stopping at exits, and
   * check that every node on the way belongs to it.
   */
  verify(region: CandidateRegion): void {
    const seen = new Set<LirNode>();
    const stack: LirNode[] = [region.entry];
    let start = stack.pop();
    while (start) {
      if (!seen.has(start)) {
        seen.add(start);
        if (this.verifyFrom(region, start)) {
          const { block } = this.position(start);
          for (const succId of uniqueSuccessors(block.terminator)) {
            stack.push(firstNode(this.block(succId)));
          }
        }
      }
      start = stack.pop();
    }
  }

  /** True when the walk from `start` ran through the terminator. */
  private verifyFrom(region: CandidateRegion, start: LirNode): boolean {
    const { block, index } = this.position(start);
    for (const node of blockNodes(block).slice(index)) {
      // The entry itself can be a boundary when a back edge returns to it.
      if (node !== region.entry && region.exits.has(node)) return false;
      if (this.ctx.ownerOf(node) !== region.id) {
        throw new DelegateError("bad-visit", "region walk reached a node outside the region", {
          fn: this.fn.name,
          region: region.id,
          node: printNode(node),
        });
      }
    }
    return true;
  }

  position(node: LirNode): Position {
    const position = this.positions.get(node);
    if (!position) throw new Error(`node '${printNode(node)}' is not in function '${this.fn.name}'`);
    return position;
  }

  private block(id: BlockId): LirBlock {
    const block = this.cfg.blockMap.get(id);
    if (!block) throw new Error(`unknown block '${id}' in function '${this.fn.name}'`);
    return block;
  }
}
