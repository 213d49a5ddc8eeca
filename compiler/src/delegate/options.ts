/** Settings of the delegate pass. */
export interface DelegateOptions {
  /** Extern that maps a global pointer to the node owning it. */
  resolveLocation?: string;
  /** Extern that runs a unit on a node and returns its exit code. */
  invokeRemote?: string;
  /** Function attribute marking task entry points, the roots of the walk. */
  taskAttribute?: string;
  /** Callee attributes that make a call valid in any region. */
  agnosticAttributes?: string[];
  /** Grow and report regions without rewriting anything. */
  extract?: boolean;
}

export type ResolvedOptions = Required<DelegateOptions>;

export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = {
  resolveLocation: "delegate_resolve_location",
  invokeRemote: "delegate_invoke_remote",
  taskAttribute: "async",
  agnosticAttributes: ["unbound", "readnone"],
  extract: true,
};

export function resolveOptions(options: DelegateOptions = {}): ResolvedOptions {
  return {
    resolveLocation: options.resolveLocation ?? DEFAULT_OPTIONS.resolveLocation,
    invokeRemote: options.invokeRemote ?? DEFAULT_OPTIONS.invokeRemote,
    taskAttribute: options.taskAttribute ?? DEFAULT_OPTIONS.taskAttribute,
    agnosticAttributes: options.agnosticAttributes ?? [...DEFAULT_OPTIONS.agnosticAttributes],
    extract: options.extract ?? DEFAULT_OPTIONS.extract,
  };
}
