/**
 * Plain-data summaries of grown regions, and their text form for the CLI.
 */

import type { VarId } from "../lir/lir-types.ts";
import { printNode } from "../lir/printer.ts";
import type { CandidateRegion } from "./context.ts";
import type { ExtractedUnit } from "./extractor.ts";

export interface ExitSummary {
  /** Exit code, once the region is extracted. */
  code?: number;
  boundary: string;
  frontier: string;
}

export interface RegionSummary {
  id: number;
  function: string;
  entry: string;
  target: VarId;
  validPtrs: VarId[];
  exits: ExitSummary[];
  unit?: string;
  inputs?: VarId[];
  outputs?: VarId[];
}

/** Snapshot a grown region; node text is taken now, before any rewrite. */
export function summarizeRegion(region: CandidateRegion): RegionSummary {
  return {
    id: region.id,
    function: region.fn.name,
    entry: printNode(region.entry),
    target: region.target,
    validPtrs: [...region.validPtrs],
    exits: [...region.exits].map(([boundary, frontier]) => ({
      boundary: printNode(boundary),
      frontier: printNode(frontier),
    })),
  };
}

export function recordExtraction(summary: RegionSummary, extracted: ExtractedUnit): void {
  summary.unit = extracted.unit.name;
  summary.inputs = [...extracted.inputs];
  summary.outputs = [...extracted.outputs];
  summary.exits.forEach((exit, i) => {
    exit.code = extracted.exitCodes[i];
  });
}

function list(values: readonly string[] | undefined): string {
  return values && values.length > 0 ? values.join(", ") : "none";
}

export function formatRegion(summary: RegionSummary): string {
  const lines = [
    `region ${summary.id} in ${summary.function}`,
    `  entry:  ${summary.entry}`,
    `  target: ${summary.target}`,
    `  valid:  ${list(summary.validPtrs)}`,
  ];
  summary.exits.forEach((exit, i) => {
    const label = exit.code === undefined ? `exit ${i}` : `exit ${i} (code ${exit.code})`;
    lines.push(`  ${label}: ${exit.boundary}`);
    lines.push(`    after: ${exit.frontier}`);
  });
  if (summary.unit !== undefined) {
    lines.push(`  unit:   ${summary.unit}`);
    lines.push(`  inputs: ${list(summary.inputs)}`);
    lines.push(`  outputs: ${list(summary.outputs)}`);
  }
  return lines.join("\n");
}
