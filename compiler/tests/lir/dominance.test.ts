import { describe, expect, test } from "vitest";
import { buildCFG } from "../../src/lir/cfg.ts";
import { computeDominators, dominates } from "../../src/lir/dominance.ts";
import { block, br, jump, retVoid } from "./helpers.ts";

describe("computeDominators", () => {
  test("empty CFG returns empty idom map", () => {
    expect(computeDominators(buildCFG([])).size).toBe(0);
  });

  test("entry is its own immediate dominator", () => {
    const idom = computeDominators(buildCFG([block("entry", retVoid())]));
    expect(idom.get("entry")).toBe("entry");
  });

  test("diamond: merge is dominated by the branch, not an arm", () => {
    const idom = computeDominators(
      buildCFG([
        block("entry", br("%c", "left", "right")),
        block("left", jump("merge")),
        block("right", jump("merge")),
        block("merge", retVoid()),
      ])
    );

    expect(idom.get("left")).toBe("entry");
    expect(idom.get("right")).toBe("entry");
    expect(idom.get("merge")).toBe("entry");
  });

  test("loop: header dominates body and exit", () => {
    const idom = computeDominators(
      buildCFG([
        block("entry", jump("head")),
        block("head", br("%c", "body", "exit")),
        block("body", jump("head")),
        block("exit", retVoid()),
      ])
    );

    expect(idom.get("head")).toBe("entry");
    expect(idom.get("body")).toBe("head");
    expect(idom.get("exit")).toBe("head");
  });

  test("unreachable blocks get no immediate dominator", () => {
    const idom = computeDominators(buildCFG([block("entry", retVoid()), block("dead", jump("entry"))]));
    expect(idom.has("dead")).toBe(false);
  });
});

describe("dominates", () => {
  const idom = computeDominators(
    buildCFG([
      block("entry", br("%c", "left", "right")),
      block("left", jump("merge")),
      block("right", jump("merge")),
      block("merge", retVoid()),
      block("dead", jump("merge")),
    ])
  );

  test("is reflexive", () => {
    expect(dominates(idom, "left", "left")).toBe(true);
  });

  test("entry dominates everything reachable", () => {
    expect(dominates(idom, "entry", "merge")).toBe(true);
    expect(dominates(idom, "entry", "right")).toBe(true);
  });

  test("an arm does not dominate the merge or its sibling", () => {
    expect(dominates(idom, "left", "merge")).toBe(false);
    expect(dominates(idom, "left", "right")).toBe(false);
  });

  test("unreachable blocks dominate nothing and are dominated by nothing", () => {
    expect(dominates(idom, "dead", "merge")).toBe(false);
    expect(dominates(idom, "entry", "dead")).toBe(false);
  });
});
