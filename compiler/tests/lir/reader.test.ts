import { describe, expect, test } from "vitest";
import { printLir } from "../../src/lir/printer.ts";
import { readLir } from "../../src/lir/reader/index.ts";
import { Lexer } from "../../src/lir/reader/lexer.ts";
import { TokenKind } from "../../src/lir/reader/token.ts";
import { SourceFile } from "../../src/utils/source.ts";

const DEMO = `module demo

type Pair = struct {
  a: i64
  b: i64
}

extern fn delegate_resolve_location(p: gptr<u8>): i16 #readnone

global counter: i64 #symmetric

global table: array<i64, 4> #global

const @second = index_ptr inbounds i64, @table, 1

fn worker(%p: gptr<Pair>, %c: bool): i64 #async {
entry:
  %0 = field_ptr i64, %p, "b"
  %1 = load i64, %0
  br %c, then, done
then:
  %2 = const_int i64 -1
  %3 = mul i64 %1, %2
  jump done
done:
  %4 = φ i64 [%1 from entry, %3 from then]
  ret %4
}
`;

function kinds(source: string): TokenKind[] {
  return new Lexer(new SourceFile("t.lir", source)).tokenize().map((t) => t.kind);
}

describe("Lexer", () => {
  test("sigil names and attributes", () => {
    expect(kinds("%x.1 @table #async")).toEqual([
      TokenKind.LocalName,
      TokenKind.GlobalName,
      TokenKind.Attribute,
      TokenKind.Eof,
    ]);
  });

  test("φ and phi are the same keyword", () => {
    expect(kinds("φ phi")).toEqual([TokenKind.Phi, TokenKind.Phi, TokenKind.Eof]);
  });

  test("both arrow spellings", () => {
    expect(kinds("→ ->")).toEqual([TokenKind.Arrow, TokenKind.Arrow, TokenKind.Eof]);
  });

  test("negative integers and floats carry their value", () => {
    const tokens = new Lexer(new SourceFile("t.lir", "-12 2.5")).tokenize();
    expect(tokens[0]?.value).toBe(-12);
    expect(tokens[1]?.kind).toBe(TokenKind.FloatLiteral);
    expect(tokens[1]?.value).toBe(2.5);
  });

  test("comments are skipped", () => {
    expect(kinds("// line\n/* block */ fn")).toEqual([TokenKind.Fn, TokenKind.Eof]);
  });

  test("unterminated block comment is reported", () => {
    const lexer = new Lexer(new SourceFile("t.lir", "/* open"));
    lexer.tokenize();
    expect(lexer.getDiagnostics()[0]?.message).toBe("Unterminated multi-line comment (started at 1:1)");
  });

  test("unexpected character is reported with its position", () => {
    const lexer = new Lexer(new SourceFile("t.lir", "fn\n  $"));
    const tokens = lexer.tokenize();
    expect(tokens[1]?.kind).toBe(TokenKind.Error);
    const diag = lexer.getDiagnostics()[0];
    expect(diag?.message).toBe("Unexpected character '$'");
    expect(diag?.location.line).toBe(2);
    expect(diag?.location.column).toBe(3);
  });
});

describe("readLir", () => {
  test("printing what was read gives back the same text", () => {
    const { module, diagnostics } = readLir(DEMO);
    expect(diagnostics).toEqual([]);
    expect(printLir(module)).toBe(DEMO);
  });

  test("module-level declarations", () => {
    const { module } = readLir(DEMO);
    expect(module.name).toBe("demo");
    expect(module.globals).toEqual([
      { name: "counter", type: { kind: "int", bits: 64, signed: true }, space: "symmetric" },
      {
        name: "table",
        type: { kind: "array", element: { kind: "int", bits: 64, signed: true }, length: 4 },
        space: "global",
      },
    ]);
    expect(module.constants[0]).toEqual({
      name: "second",
      expr: {
        kind: "index_ptr",
        base: "@table",
        index: 1,
        inbounds: true,
        type: { kind: "int", bits: 64, signed: true },
      },
    });
    expect(module.externs[0]?.attributes).toEqual(["readnone"]);
  });

  test("struct names resolve to the declared struct", () => {
    const { module } = readLir(DEMO);
    const param = module.functions[0]?.params[0];
    expect(param?.type).toEqual({ kind: "ptr", space: "global", pointee: module.types[0]?.type });
  });

  test("phi spelled out and ASCII arrows", () => {
    const { module, diagnostics } = readLir(`module m
fn f(%v: i32): void {
entry:
  %a = const_int i32 1
  switch %v, [%a -> one], default: two
one:
  jump two
two:
  %x = phi i32 [%v from entry, %a from one]
  ret_void
}
`);
    expect(diagnostics).toEqual([]);
    const blocks = module.functions[0]?.blocks ?? [];
    expect(blocks[0]?.terminator).toEqual({
      kind: "switch",
      value: "%v",
      cases: [{ value: "%a", target: "one" }],
      defaultBlock: "two",
    });
    expect(blocks[2]?.phis[0]?.incoming).toEqual([
      { value: "%v", from: "entry" },
      { value: "%a", from: "one" },
    ]);
  });

  test("unknown instruction drops the function and reports where", () => {
    const { module, diagnostics } = readLir(`module m
fn f(): void {
entry:
  frob %x
  ret_void
}
`);
    expect(module.functions).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe("Unknown instruction 'frob'");
    expect(diagnostics[0]?.location.line).toBe(4);
    expect(diagnostics[0]?.location.column).toBe(3);
  });

  test("parsing resumes at the next declaration after an error", () => {
    const { module, diagnostics } = readLir(`module m
global g: quux
global h: i8
`);
    expect(diagnostics.map((d) => d.message)).toEqual(["Unknown type 'quux'"]);
    expect(module.globals.map((g) => g.name)).toEqual(["h"]);
  });

  test("block without terminator", () => {
    const { diagnostics } = readLir(`module m
fn f(): void {
entry:
  %a = const_bool true
`);
    expect(diagnostics[0]?.message).toBe("Block 'entry' has no terminator");
  });
});
