import type { LirExtern, LirIntType, LirModule, LirType } from "../lir/lir-types.ts";
import type { ResolvedOptions } from "./options.ts";

/** The runtime entry points a dispatch block calls. */
export interface RemotePrimitives {
  /** `resolve(target: gptr<u8>) -> location` */
  resolve: LirExtern;
  /** `invoke(location, unit, in, in size, out, out size) -> exit code` */
  invoke: LirExtern;
  /** Type of exit codes: the return type of `invoke`. */
  codeType: LirIntType;
}

export type PrimitiveLookup = { ok: true; primitives: RemotePrimitives } | { ok: false; reason: string };

function isInt(type: LirType): type is LirIntType {
  return type.kind === "int";
}

export function findPrimitives(module: LirModule, options: ResolvedOptions): PrimitiveLookup {
  const resolve = module.externs.find((e) => e.name === options.resolveLocation);
  if (!resolve) return { ok: false, reason: `extern '${options.resolveLocation}' is not declared` };
  if (resolve.params.length !== 1) {
    return { ok: false, reason: `extern '${resolve.name}' must take exactly one parameter` };
  }

  const invoke = module.externs.find((e) => e.name === options.invokeRemote);
  if (!invoke) return { ok: false, reason: `extern '${options.invokeRemote}' is not declared` };
  if (invoke.params.length !== 6) {
    return { ok: false, reason: `extern '${invoke.name}' must take six parameters` };
  }
  const codeType = invoke.returnType;
  if (!isInt(codeType)) {
    return { ok: false, reason: `extern '${invoke.name}' must return an integer exit code` };
  }

  return { ok: true, primitives: { resolve, invoke, codeType } };
}
