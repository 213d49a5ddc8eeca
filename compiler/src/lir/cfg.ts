/**
 * CFG construction: builds control flow graph from LIR blocks.
 *
 * Computes predecessor/successor maps from terminator edges and derives
 * a reverse post-order (RPO) via DFS from the entry block.
 */

import type { BlockId, LirBlock, LirTerminator } from "./lir-types.ts";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface CFG {
  preds: Map<BlockId, BlockId[]>;
  succs: Map<BlockId, BlockId[]>;
  /** Blocks in reverse post-order (reachable from entry only). */
  blockOrder: BlockId[];
  blockMap: Map<BlockId, LirBlock>;
}

// ─── CFG helpers ────────────────────────────────────────────────────────────

/**
 * Build the control-flow graph for a function's blocks.
 *
 * Computes predecessor/successor maps from terminator edges, then
 * derives a reverse post-order (RPO) via DFS from the entry block.
 * Only blocks reachable from the entry appear in blockOrder.
 * A block that reaches the same target along two edges (a `br` with equal
 * arms, a `switch` with repeated targets) is listed once per edge.
 */
export function buildCFG(blocks: LirBlock[]): CFG {
  const preds = new Map<BlockId, BlockId[]>();
  const succs = new Map<BlockId, BlockId[]>();
  const blockMap = new Map<BlockId, LirBlock>();

  for (const block of blocks) {
    blockMap.set(block.id, block);
    preds.set(block.id, []);
    succs.set(block.id, []);
  }

  for (const block of blocks) {
    const targets = terminatorTargets(block.terminator);
    succs.set(block.id, targets);
    for (const target of targets) {
      const predList = preds.get(target);
      if (predList) predList.push(block.id);
    }
  }

  const visited = new Set<BlockId>();
  const rpo: BlockId[] = [];

  function dfs(id: BlockId) {
    if (visited.has(id)) return;
    visited.add(id);
    for (const succ of succs.get(id) ?? []) {
      dfs(succ);
    }
    rpo.push(id);
  }

  const entry = blocks[0];
  if (entry) {
    dfs(entry.id);
  }
  rpo.reverse();

  return { preds, succs, blockOrder: rpo, blockMap };
}

/** Extract branch targets from a terminator instruction. */
export function terminatorTargets(term: LirTerminator): BlockId[] {
  switch (term.kind) {
    case "jump":
      return [term.target];
    case "br":
      return [term.thenBlock, term.elseBlock];
    case "switch": {
      const targets = term.cases.map((c) => c.target);
      targets.push(term.defaultBlock);
      return targets;
    }
    default:
      return [];
  }
}

/** Distinct successors of a block, in terminator order. */
export function uniqueSuccessors(term: LirTerminator): BlockId[] {
  return [...new Set(terminatorTargets(term))];
}

/**
 * Send every edge of `term` that targets `from` to `to` instead.
 * Mutates in place: terminators are identified by object identity.
 */
export function retargetTerminator(term: LirTerminator, from: BlockId, to: BlockId): void {
  const swap = (id: BlockId) => (id === from ? to : id);
  switch (term.kind) {
    case "jump":
      term.target = swap(term.target);
      break;
    case "br":
      term.thenBlock = swap(term.thenBlock);
      term.elseBlock = swap(term.elseBlock);
      break;
    case "switch":
      for (const c of term.cases) c.target = swap(c.target);
      term.defaultBlock = swap(term.defaultBlock);
      break;
    default:
      break;
  }
}
