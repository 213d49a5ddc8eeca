import { describe, expect, test } from "vitest";
import { buildCFG, retargetTerminator, terminatorTargets, uniqueSuccessors } from "../../src/lir/cfg.ts";
import type { LirTerminator } from "../../src/lir/lir-types.ts";
import { block, br, jump, retVoid, switchTerm } from "./helpers.ts";

describe("buildCFG", () => {
  test("empty blocks array returns empty CFG", () => {
    const cfg = buildCFG([]);
    expect(cfg.blockOrder).toEqual([]);
    expect(cfg.preds.size).toBe(0);
    expect(cfg.blockMap.size).toBe(0);
  });

  test("diamond: merge has both arms as predecessors", () => {
    const cfg = buildCFG([
      block("entry", br("%c", "left", "right")),
      block("left", jump("merge")),
      block("right", jump("merge")),
      block("merge", retVoid()),
    ]);

    expect(cfg.succs.get("entry")).toEqual(["left", "right"]);
    expect(cfg.preds.get("merge")).toEqual(["left", "right"]);
    expect(cfg.blockOrder[0]).toBe("entry");
    expect(cfg.blockOrder[cfg.blockOrder.length - 1]).toBe("merge");
  });

  test("a branch with equal arms lists the edge twice", () => {
    const cfg = buildCFG([block("entry", br("%c", "next", "next")), block("next", retVoid())]);

    expect(cfg.succs.get("entry")).toEqual(["next", "next"]);
    expect(cfg.preds.get("next")).toEqual(["entry", "entry"]);
  });

  test("unreachable blocks stay out of blockOrder", () => {
    const cfg = buildCFG([block("entry", retVoid()), block("dead", jump("entry"))]);

    expect(cfg.blockOrder).toEqual(["entry"]);
    expect(cfg.preds.get("entry")).toEqual(["dead"]);
  });

  test("loop back edge is a predecessor of the header", () => {
    const cfg = buildCFG([
      block("entry", jump("head")),
      block("head", br("%c", "body", "exit")),
      block("body", jump("head")),
      block("exit", retVoid()),
    ]);

    expect(cfg.preds.get("head")).toEqual(["entry", "body"]);
    expect(cfg.blockOrder).toHaveLength(4);
  });
});

describe("terminator edges", () => {
  test("switch targets are the cases followed by the default", () => {
    const term = switchTerm("%v", [{ value: "%a", target: "one" }, { value: "%b", target: "two" }], "other");
    expect(terminatorTargets(term)).toEqual(["one", "two", "other"]);
  });

  test("uniqueSuccessors drops repeated targets", () => {
    const term = switchTerm("%v", [{ value: "%a", target: "x" }, { value: "%b", target: "x" }], "y");
    expect(uniqueSuccessors(term)).toEqual(["x", "y"]);
  });

  test("retargetTerminator rewrites every matching edge in place", () => {
    const term: LirTerminator = br("%c", "old", "old");
    retargetTerminator(term, "old", "new");
    expect(term).toEqual({ kind: "br", cond: "%c", thenBlock: "new", elseBlock: "new" });
  });

  test("retargetTerminator updates switch cases and default", () => {
    const term = switchTerm("%v", [{ value: "%a", target: "old" }, { value: "%b", target: "keep" }], "old");
    retargetTerminator(term, "old", "new");
    expect(terminatorTargets(term)).toEqual(["new", "keep", "new"]);
  });

  test("returns have no targets to rewrite", () => {
    const term: LirTerminator = { kind: "ret", value: "%0" };
    retargetTerminator(term, "a", "b");
    expect(term).toEqual({ kind: "ret", value: "%0" });
  });
});
