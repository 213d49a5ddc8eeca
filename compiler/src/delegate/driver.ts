/**
 * Delegate pass driver.
 *
 * Functions are taken from a deduplicating worklist seeded with the task
 * entry points; every module function they call is queued in turn. For
 * each function, all regions are grown before any is extracted, and
 * extraction follows region creation order.
 */

import type { Diagnostic } from "../errors/index.ts";
import type { LirFunction, LirModule, VarId } from "../lir/lir-types.ts";
import { printNode } from "../lir/printer.ts";
import { lookupModuleSymbol } from "../lir/values.ts";
import { selectAnchors } from "./anchors.ts";
import { AnalysisContext, type CandidateRegion } from "./context.ts";
import { CodeExtractor } from "./extractor.ts";
import { type DelegateOptions, resolveOptions } from "./options.ts";
import { findPrimitives } from "./primitives.ts";
import { RegionBuilder } from "./region.ts";
import { recordExtraction, type RegionSummary, summarizeRegion } from "./report.ts";

/** A stack-local anchor: recorded, not grown. */
export interface StackAnchor {
  function: string;
  node: string;
  base: VarId;
}

export interface DelegateResult {
  /** The rewritten copy of the input module. */
  module: LirModule;
  regions: RegionSummary[];
  units: LirFunction[];
  stackAnchors: StackAnchor[];
  diagnostics: Diagnostic[];
}

/**
 * Run the pass over a copy of `input`. A `DelegateError` thrown from here
 * means nothing was produced.
 */
export function runDelegatePass(input: LirModule, options: DelegateOptions = {}): DelegateResult {
  const module = structuredClone(input);
  const ctx = new AnalysisContext(module, resolveOptions(options));

  let extractor: CodeExtractor | undefined;
  if (ctx.options.extract) {
    const lookup = findPrimitives(module, ctx.options);
    if (lookup.ok) {
      extractor = new CodeExtractor(ctx, lookup.primitives);
    } else {
      ctx.info(`extraction disabled: ${lookup.reason}`);
    }
  }

  const regions: RegionSummary[] = [];
  const units: LirFunction[] = [];
  const stackAnchors: StackAnchor[] = [];

  const queue = module.functions.filter((fn) => fn.attributes.includes(ctx.options.taskAttribute));
  const queued = new Set(queue.map((fn) => fn.name));

  for (let fn = queue.shift(); fn; fn = queue.shift()) {
    const builder = new RegionBuilder(ctx, fn);
    const grown: { region: CandidateRegion; summary: RegionSummary }[] = [];

    for (const anchor of selectAnchors(builder.provenance.analyzeFunction(fn))) {
      if (anchor.classification === "stack-local") {
        stackAnchors.push({ function: fn.name, node: printNode(anchor.node), base: anchor.base });
        continue;
      }
      if (ctx.ownerOf(anchor.node) !== undefined) {
        ctx.info(`anchor already in another delegate: '${printNode(anchor.node)}' in ${fn.name}`);
        continue;
      }
      const region = ctx.createRegion(fn, anchor.node, anchor.base);
      builder.expand(region);
      builder.verify(region);
      const summary = summarizeRegion(region);
      regions.push(summary);
      grown.push({ region, summary });
    }

    for (const block of fn.blocks) {
      for (const inst of block.instructions) {
        if (inst.kind !== "call" && inst.kind !== "call_void") continue;
        const callee = lookupModuleSymbol(module, inst.func);
        if (callee?.kind !== "function" || queued.has(callee.fn.name)) continue;
        queued.add(callee.fn.name);
        queue.push(callee.fn);
      }
    }

    if (!extractor) continue;
    for (const { region, summary } of grown) {
      const extracted = extractor.extract(region);
      recordExtraction(summary, extracted);
      units.push(extracted.unit);
    }
  }

  return { module, regions, units, stackAnchors, diagnostics: ctx.diagnostics };
}
