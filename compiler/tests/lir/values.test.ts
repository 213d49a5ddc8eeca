import { describe, expect, test } from "vitest";
import type { LirNode } from "../../src/lir/lir-types.ts";
import { isTerminator, nodeOperands, renameNodeOperands, touchesMemory } from "../../src/lir/operands.ts";
import { printNode, printType } from "../../src/lir/printer.ts";
import { ValueTable } from "../../src/lir/values.ts";
import { parseLir } from "./helpers.ts";

const SOURCE = `module m

type Pair = struct {
  a: i64
  b: i64
}

extern fn log_value(v: i64): void

global table: array<i64, 4> #global

global shared: Pair #symmetric

const @second = index_ptr inbounds i64, @table, 1

const @raw = cast @table, ptr<u8>

fn f(%p: gptr<Pair>, %n: i64): i64 {
entry:
  %0 = field_ptr i64, %p, "b"
  %1 = index_ptr inbounds i64, %0, %n
  %2 = sizeof Pair
  %3 = load i64, %1
  ret %3
}
`;

describe("ValueTable", () => {
  const module = parseLir(SOURCE);
  const fn = module.functions[0];
  if (!fn) throw new Error("missing function");
  const values = new ValueTable(module, fn);

  test("address computations keep the base's address space", () => {
    expect(printType(values.typeOf("%0") ?? { kind: "void" })).toBe("gptr<i64>");
    expect(printType(values.typeOf("%1") ?? { kind: "void" })).toBe("gptr<i64>");
  });

  test("globals are pointers in their declared space", () => {
    expect(printType(values.typeOf("@table") ?? { kind: "void" })).toBe("gptr<array<i64, 4>>");
    expect(printType(values.typeOf("@shared") ?? { kind: "void" })).toBe("sptr<Pair>");
  });

  test("constant expressions", () => {
    expect(printType(values.typeOf("@second") ?? { kind: "void" })).toBe("gptr<i64>");
    expect(printType(values.typeOf("@raw") ?? { kind: "void" })).toBe("ptr<u8>");
  });

  test("sizeof is u64 and externs are function values", () => {
    expect(printType(values.typeOf("%2") ?? { kind: "void" })).toBe("u64");
    expect(printType(values.typeOf("@log_value") ?? { kind: "void" })).toBe("fn(i64): void");
  });

  test("definitions", () => {
    expect(values.def("%n")).toEqual({ kind: "param", param: fn.params[1], index: 1 });
    expect(values.def("%3")?.kind).toBe("inst");
    expect(values.def("%9")).toBeUndefined();
    expect(values.moduleRef("@second")?.kind).toBe("constant");
    expect(values.moduleRef("%0")).toBeUndefined();
  });
});

describe("operands", () => {
  test("renaming rewrites operands in place", () => {
    const node: LirNode = { kind: "store", ptr: "%a", value: "%b" };
    renameNodeOperands(node, (v) => (v === "%b" ? "%c" : v));
    expect(node).toEqual({ kind: "store", ptr: "%a", value: "%c" });
  });

  test("switch operands include the case values", () => {
    const node: LirNode = {
      kind: "switch",
      value: "%v",
      cases: [{ value: "%k", target: "x" }],
      defaultBlock: "y",
    };
    expect(nodeOperands(node)).toEqual(["%v", "%k"]);
    expect(isTerminator(node)).toBe(true);
    expect(printNode(node)).toBe("switch %v, [%k → x], default: y");
  });

  test("loads, stores and calls touch memory; address arithmetic does not", () => {
    expect(touchesMemory({ kind: "load", dest: "%x", ptr: "%p", type: { kind: "bool" } })).toBe(true);
    expect(touchesMemory({ kind: "call_void", func: "g", args: [] })).toBe(true);
    expect(touchesMemory({ kind: "field_ptr", dest: "%x", base: "%p", field: "a", type: { kind: "bool" } })).toBe(
      false
    );
  });
});
