/**
 * In-place editing helpers for LIR functions: locating nodes, splitting
 * blocks and allocating fresh block and value names.
 *
 * Nodes are moved, never copied, so anything keyed by node identity keeps
 * pointing at the right place after an edit.
 */

import { terminatorTargets } from "./cfg.ts";
import type { BlockId, LirBlock, LirFunction, LirNode, VarId } from "./lir-types.ts";
import { blockNodes, nodeDest } from "./operands.ts";
import { paramVar } from "./values.ts";

export interface NodePosition {
  block: LirBlock;
  /** Position in {@link blockNodes} order. */
  index: number;
}

/** Find the block holding `node` and its position there. */
export function findNode(fn: LirFunction, node: LirNode): NodePosition | undefined {
  for (const block of fn.blocks) {
    const index = blockNodes(block).indexOf(node);
    if (index >= 0) return { block, index };
  }
  return undefined;
}

/** The first node of a block. */
export function firstNode(block: LirBlock): LirNode {
  return block.phis[0] ?? block.instructions[0] ?? block.terminator;
}

export function findBlock(fn: LirFunction, id: BlockId): LirBlock | undefined {
  return fn.blocks.find((b) => b.id === id);
}

/** A block id not yet used in `fn`: `base`, else `base.1`, `base.2`, … */
export function freshBlockId(fn: LirFunction, base: string): BlockId {
  const used = new Set(fn.blocks.map((b) => b.id));
  if (!used.has(base)) return base;
  let n = 1;
  while (used.has(`${base}.${n}`)) n++;
  return `${base}.${n}`;
}

/**
 * Split `block` before the node at `index` (in {@link blockNodes} order).
 *
 * The original block keeps its phis and the instructions before `index`
 * and ends in a jump to the new block `newId`, which receives the rest and
 * the old terminator. The new block is placed right after the original,
 * and phis in the successors now name it as their predecessor.
 */
export function splitBlock(fn: LirFunction, block: LirBlock, index: number, newId: BlockId): LirBlock {
  const phiCount = block.phis.length;
  if (index < phiCount) {
    throw new RangeError(`cannot split block '${block.id}' between its phi nodes`);
  }
  const instIndex = index - phiCount;
  if (instIndex < 0 || instIndex > block.instructions.length) {
    throw new RangeError(`split position ${index} is outside block '${block.id}'`);
  }

  const tail: LirBlock = {
    id: newId,
    phis: [],
    instructions: block.instructions.splice(instIndex),
    terminator: block.terminator,
  };
  block.terminator = { kind: "jump", target: newId };

  for (const succId of new Set(terminatorTargets(tail.terminator))) {
    const succ = findBlock(fn, succId);
    if (!succ) continue;
    for (const phi of succ.phis) {
      for (const entry of phi.incoming) {
        if (entry.from === block.id) entry.from = newId;
      }
    }
  }

  fn.blocks.splice(fn.blocks.indexOf(block) + 1, 0, tail);
  return tail;
}

/** Every value name defined in a function, parameters included. */
export function definedNames(fn: LirFunction): Set<VarId> {
  const names = new Set<VarId>(fn.params.map(paramVar));
  for (const block of fn.blocks) {
    for (const node of blockNodes(block)) {
      const dest = nodeDest(node);
      if (dest !== undefined) names.add(dest);
    }
  }
  return names;
}

/** Hands out `%`-names that collide with nothing already taken. */
export class NameAllocator {
  private taken: Set<VarId>;

  constructor(taken: Iterable<VarId> = []) {
    this.taken = new Set(taken);
  }

  reserve(name: VarId): void {
    this.taken.add(name);
  }

  fresh(base: string): VarId {
    let name = `%${base}`;
    let n = 1;
    while (this.taken.has(name)) {
      name = `%${base}.${n++}`;
    }
    this.taken.add(name);
    return name;
  }
}
