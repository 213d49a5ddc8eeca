/**
 * Dominance computation: iterative dominator algorithm and dominance
 * queries over the idom map.
 *
 * Uses the Cooper-Harvey-Kennedy iterative algorithm for immediate
 * dominators.
 */

import type { BlockId } from "./lir-types.ts";
import type { CFG } from "./cfg.ts";

// ─── Dominance (Cooper, Harvey, Kennedy) ────────────────────────────────────

/**
 * Compute immediate dominators using the Cooper-Harvey-Kennedy algorithm.
 *
 * This is an iterative fixed-point algorithm that works on RPO-numbered
 * blocks. The entry block dominates itself (idom[entry] = entry). For
 * every other block, we intersect the idom paths of all processed
 * predecessors to find the nearest common dominator.
 *
 * Returns a map from each reachable block to its immediate dominator.
 */
export function computeDominators(cfg: CFG): Map<BlockId, BlockId> {
  const { blockOrder, preds } = cfg;
  const entryBlock = blockOrder[0];
  if (entryBlock === undefined) return new Map();

  // Lower index = earlier in RPO = dominates more blocks.
  const rpoIndex = new Map<BlockId, number>();
  blockOrder.forEach((id, i) => rpoIndex.set(id, i));

  const idom = new Map<BlockId, BlockId>();
  idom.set(entryBlock, entryBlock);

  const indexOf = (id: BlockId): number => rpoIndex.get(id) ?? 0;
  const parentIndex = (idx: number): number => {
    const parent = idom.get(blockOrder[idx] ?? entryBlock);
    return parent === undefined ? 0 : indexOf(parent);
  };

  /**
   * Walk up the dominator tree from two blocks to find their nearest
   * common dominator. The block with the higher RPO index is farther
   * from the entry, so we step it upward.
   */
  const intersect = (b1: BlockId, b2: BlockId): BlockId => {
    let idx1 = indexOf(b1);
    let idx2 = indexOf(b2);
    while (idx1 !== idx2) {
      while (idx1 > idx2) idx1 = parentIndex(idx1);
      while (idx2 > idx1) idx2 = parentIndex(idx2);
    }
    return blockOrder[idx1] ?? entryBlock;
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const blockId of blockOrder.slice(1)) {
      const predList = preds.get(blockId) ?? [];

      // Pick the first already-processed predecessor as the initial idom
      let newIdom: BlockId | null = null;
      for (const pred of predList) {
        if (idom.has(pred)) {
          newIdom = pred;
          break;
        }
      }
      if (newIdom === null) continue;

      for (const pred of predList) {
        if (pred === newIdom) continue;
        if (idom.has(pred)) {
          newIdom = intersect(pred, newIdom);
        }
      }

      if (idom.get(blockId) !== newIdom) {
        idom.set(blockId, newIdom);
        changed = true;
      }
    }
  }

  return idom;
}

/**
 * Whether block `a` dominates block `b` (reflexively). Blocks missing from
 * the idom map are unreachable and dominate nothing.
 */
export function dominates(idom: Map<BlockId, BlockId>, a: BlockId, b: BlockId): boolean {
  if (!idom.has(a) || !idom.has(b)) return false;
  let runner = b;
  for (;;) {
    if (runner === a) return true;
    const parent = idom.get(runner);
    if (parent === undefined || parent === runner) return false;
    runner = parent;
  }
}
