import { DelegateError } from "../errors/index.ts";
import { terminatorTargets } from "../lir/cfg.ts";
import type { BlockId, LirFunction, VarId } from "../lir/lir-types.ts";
import { blockNodes, isModuleRef, nodeDest, nodeOperands } from "../lir/operands.ts";
import { printNode } from "../lir/printer.ts";
import { paramVar } from "../lir/values.ts";

/**
 * After the caller rewrite, nothing outside the region may use a value
 * defined inside it or branch into one of its blocks, and every value the
 * rest of the function uses must still be defined there.
 */
export function checkExtraction(
  fn: LirFunction,
  regionBlocks: ReadonlySet<BlockId>,
  definedInside: ReadonlySet<VarId>,
  region: number
): void {
  const outside = fn.blocks.filter((block) => !regionBlocks.has(block.id));
  const defined = new Set<VarId>(fn.params.map(paramVar));
  for (const block of outside) {
    for (const node of blockNodes(block)) {
      const dest = nodeDest(node);
      if (dest !== undefined) defined.add(dest);
    }
  }

  for (const block of outside) {
    for (const node of blockNodes(block)) {
      const operands = nodeOperands(node);
      const escaped = operands.find((v) => definedInside.has(v));
      if (escaped !== undefined) {
        throw new DelegateError("use-escaped", `value ${escaped} of the region is used outside it`, {
          fn: fn.name,
          region,
          node: printNode(node),
        });
      }
      const missing = operands.find((v) => !isModuleRef(v) && !defined.has(v));
      if (missing !== undefined) {
        throw new DelegateError("use-undefined", `value ${missing} is no longer defined`, {
          fn: fn.name,
          region,
          node: printNode(node),
        });
      }
    }

    for (const phi of block.phis) {
      const edge = phi.incoming.find((entry) => regionBlocks.has(entry.from));
      if (edge) {
        throw new DelegateError("block-escaped", `phi still names region block '${edge.from}'`, {
          fn: fn.name,
          region,
          node: printNode(phi),
        });
      }
    }

    const target = terminatorTargets(block.terminator).find((id) => regionBlocks.has(id));
    if (target !== undefined) {
      throw new DelegateError("block-escaped", `block '${block.id}' still branches to region block '${target}'`, {
        fn: fn.name,
        region,
        node: printNode(block.terminator),
      });
    }
  }
}
