/** What went wrong when the delegate pass aborts. */
export type DelegateErrorCode =
  /** One exit boundary reached from two different frontiers. */
  | "ambiguous-merge"
  /** A value defined inside an extracted region is still used outside it. */
  | "use-escaped"
  /** The caller uses a value that no longer has a definition. */
  | "use-undefined"
  /** A block of an extracted region is still targeted from outside it. */
  | "block-escaped"
  /** Region walk found a node the region does not own. */
  | "bad-visit"
  /** A region boundary falls between two phi nodes. */
  | "split-phi"
  /** An exit boundary could not be found in the function. */
  | "unresolved-exit"
  /** A value crossing the region boundary has no known type. */
  | "untyped-value";

export interface DelegateErrorDetails {
  /** Function being transformed. */
  fn: string;
  region?: number;
  /** Printed form of the offending node or value. */
  node?: string;
}

/**
 * Fatal condition of the delegate pass. The pass never recovers from one:
 * the caller gets no partially rewritten module.
 */
export class DelegateError extends Error {
  readonly code: DelegateErrorCode;
  readonly fn: string;
  readonly region: number | undefined;
  readonly node: string | undefined;

  constructor(code: DelegateErrorCode, message: string, details: DelegateErrorDetails) {
    const where = details.region === undefined ? details.fn : `${details.fn}, region ${details.region}`;
    const suffix = details.node ? `: ${details.node}` : "";
    super(`${message} (in ${where})${suffix}`);
    this.name = "DelegateError";
    this.code = code;
    this.fn = details.fn;
    this.region = details.region;
    this.node = details.node;
  }
}
