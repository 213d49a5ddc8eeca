import type { BlockId, LirBlock, LirModule, LirTerminator } from "../../src/lir/lir-types.ts";
import { readLir } from "../../src/lir/reader/index.ts";

export function block(id: BlockId, terminator: LirTerminator): LirBlock {
  return { id, phis: [], instructions: [], terminator };
}

export function retVoid(): LirTerminator {
  return { kind: "ret_void" };
}

export function jump(target: BlockId): LirTerminator {
  return { kind: "jump", target };
}

export function br(cond: string, thenBlock: BlockId, elseBlock: BlockId): LirTerminator {
  return { kind: "br", cond, thenBlock, elseBlock };
}

export function switchTerm(
  value: string,
  cases: { value: string; target: BlockId }[],
  defaultBlock: BlockId
): LirTerminator {
  return { kind: "switch", value, cases, defaultBlock };
}

/** Read LIR text that is expected to be free of errors. */
export function parseLir(source: string): LirModule {
  const { module, diagnostics } = readLir(source);
  const errors = diagnostics.filter((d) => d.severity === "error");
  if (errors.length > 0) {
    throw new Error(`unexpected diagnostics:\n${errors.map((d) => `${d.location.line}:${d.location.column} ${d.message}`).join("\n")}`);
  }
  return module;
}
