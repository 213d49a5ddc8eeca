import { describe, expect, test } from "vitest";
import { selectAnchors } from "../../src/delegate/anchors.ts";
import { AnalysisContext } from "../../src/delegate/context.ts";
import { resolveOptions } from "../../src/delegate/options.ts";
import { ProvenanceAnalyzer } from "../../src/delegate/provenance.ts";
import { printNode } from "../../src/lir/printer.ts";
import { ValueTable } from "../../src/lir/values.ts";
import { fnNamed, nodeByText, program } from "./helpers.ts";

const module = program(
  `global table: array<i64, 4> #global

global shared: i64 #symmetric

global plain: i64

const @first = index_ptr inbounds i64, @table, 0

const @second = index_ptr inbounds i64, @table, 1

fn f(%p: gptr<i64>, %q: ptr<i64>): void {
entry:
  %zero = const_int i64 0
  %one = const_int i64 1
  %a = index_ptr inbounds i64, %p, %zero
  %b = index_ptr inbounds i64, %p, %one
  %c = index_ptr i64, %p, %zero
  %d = index_ptr inbounds i64, %q, %one
  %e = cast %p, gptr<u8>
  %f = cast %one, gptr<i64>
  %k = const_null ptr<i64>
  %s = stack_alloc i64
  %0 = load i64, %a
  %1 = load i64, %b
  %2 = load i64, %c
  %3 = load i64, %d
  %4 = load u8, %e
  %5 = load i64, %f
  %6 = load i64, @first
  %7 = load i64, @second
  %8 = load i64, @shared
  %9 = load i64, @plain
  %10 = load i64, %k
  store %s, %zero
  ret_void
}

fn g(%p: gptr<i64>, %r: gptr<i64>, %c: bool): i64 {
entry:
  br %c, a, b
a:
  jump b
b:
  %m = φ gptr<i64> [%p from entry, %r from a]
  %v = load i64, %m
  ret %v
}`,
  false
);

function analyzer(name: string): { ctx: AnalysisContext; analyzer: ProvenanceAnalyzer } {
  const ctx = new AnalysisContext(module, resolveOptions());
  return { ctx, analyzer: new ProvenanceAnalyzer(ctx, new ValueTable(module, fnNamed(module, name))) };
}

describe("provenance", () => {
  const fn = fnNamed(module, "f");
  const { analyzer: prov } = analyzer("f");
  const baseOf = (text: string) => prov.provenance(nodeByText(fn, text));

  test("zero index at a global base passes through", () => {
    expect(baseOf("%0 = load i64, %a")).toBe("%p");
  });

  test("non-zero index at a global base is a new root", () => {
    expect(baseOf("%1 = load i64, %b")).toBe("%b");
  });

  test("indexing without inbounds is a root", () => {
    expect(baseOf("%2 = load i64, %c")).toBe("%c");
  });

  test("any inbounds indexing at a plain base passes through", () => {
    expect(baseOf("%3 = load i64, %d")).toBe("%q");
  });

  test("a cast of a pointer chain resolves through the cast", () => {
    expect(baseOf("%4 = load u8, %e")).toBe("%p");
  });

  test("a cast of a non-pointer is its own root", () => {
    expect(baseOf("%5 = load i64, %f")).toBe("%f");
  });

  test("constant expressions are matched like instructions", () => {
    expect(baseOf("%6 = load i64, @first")).toBe("@table");
    expect(baseOf("%7 = load i64, @second")).toBe("@second");
  });

  test("stores use their pointer operand", () => {
    expect(baseOf("store %s, %zero")).toBe("%s");
  });

  test("nodes other than loads and stores have none", () => {
    expect(baseOf("%zero = const_int i64 0")).toBeUndefined();
  });

  test("a phi is a root", () => {
    const g = fnNamed(module, "g");
    const { analyzer: gProv } = analyzer("g");
    const base = gProv.provenance(nodeByText(g, "%v = load i64, %m"));
    expect(base).toBe("%m");
    expect(gProv.classify("%m")).toBe("global-remote");
  });

  test("recomputing gives the memoized value", () => {
    const { ctx, analyzer: fresh } = analyzer("f");
    const node = nodeByText(fn, "%1 = load i64, %b");
    const first = fresh.provenance(node);
    expect(ctx.cachedProvenance(node)).toBe(first);
    expect(fresh.provenance(node)).toBe(first);
  });
});

describe("classify", () => {
  const { analyzer: prov } = analyzer("f");

  test("address space comes first", () => {
    expect(prov.classify("%p")).toBe("global-remote");
    expect(prov.classify("%b")).toBe("global-remote");
    expect(prov.classify("%f")).toBe("global-remote");
    expect(prov.classify("@table")).toBe("global-remote");
    expect(prov.classify("@shared")).toBe("symmetric");
  });

  test("module globals without a space are static", () => {
    expect(prov.classify("@plain")).toBe("static");
  });

  test("constants and functions", () => {
    expect(prov.classify("%k")).toBe("constant");
    expect(prov.classify("@g")).toBe("constant");
  });

  test("stack allocations and plain parameters are stack-local", () => {
    expect(prov.classify("%s")).toBe("stack-local");
    expect(prov.classify("%q")).toBe("stack-local");
  });

  test("anything else is unknown", () => {
    expect(prov.classify("%0")).toBe("unknown");
    expect(prov.classify("%nope")).toBe("unknown");
  });
});

describe("selectAnchors", () => {
  test("keeps global-remote and stack-local accesses in program order", () => {
    const { analyzer: prov } = analyzer("f");
    const anchors = selectAnchors(prov.analyzeFunction(fnNamed(module, "f")));
    expect(anchors.map((a) => [printNode(a.node), a.base, a.classification])).toEqual([
      ["%0 = load i64, %a", "%p", "global-remote"],
      ["%1 = load i64, %b", "%b", "global-remote"],
      ["%2 = load i64, %c", "%c", "global-remote"],
      ["%3 = load i64, %d", "%q", "stack-local"],
      ["%4 = load u8, %e", "%p", "global-remote"],
      ["%5 = load i64, %f", "%f", "global-remote"],
      ["%6 = load i64, @first", "@table", "global-remote"],
      ["%7 = load i64, @second", "@second", "global-remote"],
      ["store %s, %zero", "%s", "stack-local"],
    ]);
  });
});
