export { selectAnchors } from "./anchors.ts";
export { AnalysisContext, type CandidateRegion } from "./context.ts";
export { type DelegateResult, runDelegatePass, type StackAnchor } from "./driver.ts";
export { CodeExtractor, type ExtractedUnit } from "./extractor.ts";
export { checkExtraction } from "./integrity.ts";
export { DEFAULT_OPTIONS, type DelegateOptions, type ResolvedOptions, resolveOptions } from "./options.ts";
export { findPrimitives, type RemotePrimitives } from "./primitives.ts";
export { type Access, type BaseClass, isAnchorClass, ProvenanceAnalyzer } from "./provenance.ts";
export { RegionBuilder } from "./region.ts";
export { type ExitSummary, formatRegion, type RegionSummary, summarizeRegion } from "./report.ts";
