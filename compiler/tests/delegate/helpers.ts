import { AnalysisContext } from "../../src/delegate/context.ts";
import { resolveOptions } from "../../src/delegate/options.ts";
import { RegionBuilder } from "../../src/delegate/region.ts";
import type { LirFunction, LirModule, LirNode } from "../../src/lir/lir-types.ts";
import { blockNodes } from "../../src/lir/operands.ts";
import { printNode } from "../../src/lir/printer.ts";
import { parseLir } from "../lir/helpers.ts";

export const PRIMITIVES = `extern fn delegate_resolve_location(p: gptr<u8>): i16

extern fn delegate_invoke_remote(loc: i16, unit: ptr<u8>, in: ptr<u8>, in_size: u64, out: ptr<u8>, out_size: u64): i16`;

/** A module named `test` with the remote primitives declared before `body`. */
export function program(body: string, withPrimitives = true): LirModule {
  return parseLir(`module test\n\n${withPrimitives ? `${PRIMITIVES}\n\n` : ""}${body}`);
}

export function fnNamed(module: LirModule, name: string): LirFunction {
  const fn = module.functions.find((f) => f.name === name);
  if (!fn) throw new Error(`no function '${name}'`);
  return fn;
}

/** The node of `fn` whose printed form is `text`. */
export function nodeByText(fn: LirFunction, text: string): LirNode {
  for (const block of fn.blocks) {
    for (const node of blockNodes(block)) {
      if (printNode(node) === text) return node;
    }
  }
  throw new Error(`no node '${text}' in '${fn.name}'`);
}

export function builderFor(module: LirModule, name: string): { ctx: AnalysisContext; builder: RegionBuilder } {
  const ctx = new AnalysisContext(module, resolveOptions());
  return { ctx, builder: new RegionBuilder(ctx, fnNamed(module, name)) };
}

/** Printed boundary/frontier pairs of a region's exits, in recording order. */
export function exitTexts(exits: Map<LirNode, LirNode>): [string, string][] {
  return [...exits].map(([boundary, frontier]) => [printNode(boundary), printNode(frontier)]);
}
