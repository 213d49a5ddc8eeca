/**
 * Analysis context of one delegate pass run.
 *
 * Regions live in an arena and are referred to by index; node ownership is
 * a map from node to region id. The context is owned by the driver and
 * handed by reference to the builder and the extractor.
 */

import { type Diagnostic, moduleLocation, Severity } from "../errors/index.ts";
import type { BlockId, LirFunction, LirModule, LirNode, VarId } from "../lir/lir-types.ts";
import type { ResolvedOptions } from "./options.ts";

export interface CandidateRegion {
  id: number;
  fn: LirFunction;
  /** First node of the region, the anchor it was grown from. */
  entry: LirNode;
  /** The single remote location the region may touch. */
  target: VarId;
  /** Provenance bases accepted inside the region. */
  validPtrs: Set<VarId>;
  /** Boundary (first node outside) → frontier (last node inside), in recording order. */
  exits: Map<LirNode, LirNode>;
}

export class AnalysisContext {
  readonly module: LirModule;
  readonly options: ResolvedOptions;
  readonly regions: CandidateRegion[] = [];
  readonly diagnostics: Diagnostic[] = [];

  private owners = new Map<LirNode, number>();
  private provenanceMemo = new Map<LirNode, VarId>();
  /** Entry node of an extracted region → the dispatch block now standing in for it. */
  private dispatchBlocks = new Map<LirNode, BlockId>();
  private reported = new Set<string>();

  constructor(module: LirModule, options: ResolvedOptions) {
    this.module = module;
    this.options = options;
  }

  createRegion(fn: LirFunction, entry: LirNode, target: VarId): CandidateRegion {
    const region: CandidateRegion = {
      id: this.regions.length,
      fn,
      entry,
      target,
      validPtrs: new Set([target]),
      exits: new Map(),
    };
    this.regions.push(region);
    return region;
  }

  ownerOf(node: LirNode): number | undefined {
    return this.owners.get(node);
  }

  claim(node: LirNode, region: CandidateRegion): void {
    this.owners.set(node, region.id);
  }

  cachedProvenance(node: LirNode): VarId | undefined {
    return this.provenanceMemo.get(node);
  }

  /** Record the provenance of `node`; a value once set is kept. */
  memoizeProvenance(node: LirNode, base: VarId): VarId {
    const existing = this.provenanceMemo.get(node);
    if (existing !== undefined) return existing;
    this.provenanceMemo.set(node, base);
    return base;
  }

  /**
   * Rename the target and accepted bases of the regions of `fn` created
   * after `extracted`, once its outputs are read back under new names.
   */
  renamePending(fn: LirFunction, extracted: number, rename: ReadonlyMap<VarId, VarId>): void {
    for (const region of this.regions) {
      if (region.fn !== fn || region.id <= extracted) continue;
      region.target = rename.get(region.target) ?? region.target;
      region.validPtrs = new Set([...region.validPtrs].map((v) => rename.get(v) ?? v));
    }
  }

  recordDispatch(entry: LirNode, block: BlockId): void {
    this.dispatchBlocks.set(entry, block);
  }

  dispatchBlockFor(entry: LirNode): BlockId | undefined {
    return this.dispatchBlocks.get(entry);
  }

  /** Add an info diagnostic; the same message is reported once. */
  info(message: string): void {
    if (this.reported.has(message)) return;
    this.reported.add(message);
    this.diagnostics.push({
      severity: Severity.Info,
      message,
      location: moduleLocation(this.module.name),
    });
  }
}
