/**
 * Recursive descent parser for the LIR text format produced by
 * `printLir`.
 *
 * Errors are recorded as diagnostics; the parser then skips to the next
 * top-level declaration and carries on, so one bad function does not hide
 * problems in the rest of the file.
 */

import type { Diagnostic } from "../../errors/diagnostic.ts";
import { Severity } from "../../errors/diagnostic.ts";
import type {
  BinOp,
  LirBlock,
  LirConstExpr,
  LirConstant,
  LirExtern,
  LirFunction,
  LirGlobal,
  LirInst,
  LirIntType,
  LirModule,
  LirParam,
  LirPhi,
  LirStructType,
  LirTerminator,
  LirType,
  LirTypeDecl,
  VarId,
} from "../lir-types.ts";
import { type Token, TokenKind } from "./token.ts";

const BIN_OPS: ReadonlySet<string> = new Set<BinOp>([
  "add",
  "sub",
  "mul",
  "div",
  "mod",
  "eq",
  "neq",
  "lt",
  "gt",
  "lte",
  "gte",
  "and",
  "or",
  "bit_and",
  "bit_or",
  "bit_xor",
  "shl",
  "shr",
]);

const PRIMITIVE_TYPES: ReadonlyMap<string, LirType> = new Map<string, LirType>([
  ["i8", { kind: "int", bits: 8, signed: true }],
  ["i16", { kind: "int", bits: 16, signed: true }],
  ["i32", { kind: "int", bits: 32, signed: true }],
  ["i64", { kind: "int", bits: 64, signed: true }],
  ["u8", { kind: "int", bits: 8, signed: false }],
  ["u16", { kind: "int", bits: 16, signed: false }],
  ["u32", { kind: "int", bits: 32, signed: false }],
  ["u64", { kind: "int", bits: 64, signed: false }],
  ["f32", { kind: "float", bits: 32 }],
  ["f64", { kind: "float", bits: 64 }],
  ["bool", { kind: "bool" }],
  ["void", { kind: "void" }],
]);

const TERMINATORS: ReadonlySet<string> = new Set(["ret", "ret_void", "jump", "br", "switch", "unreachable"]);

/** Keywords a top-level declaration can start with. */
const SYNC_KEYWORDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Type,
  TokenKind.Extern,
  TokenKind.Global,
  TokenKind.Const,
  TokenKind.Fn,
]);

class ParseError extends Error {}

function isBinOp(name: string): name is BinOp {
  return BIN_OPS.has(name);
}

export class Parser {
  private tokens: Token[];
  private pos: number;
  private diagnostics: Diagnostic[];
  private filename: string;
  private structs = new Map<string, LirStructType>();

  constructor(tokens: Token[], filename = "") {
    this.tokens = tokens;
    this.pos = 0;
    this.diagnostics = [];
    this.filename = filename;
  }

  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  parse(): LirModule {
    const module: LirModule = {
      name: "main",
      types: [],
      externs: [],
      globals: [],
      constants: [],
      functions: [],
    };

    try {
      this.expect(TokenKind.Module);
      module.name = this.expectIdentifier().lexeme;
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      this.synchronize(0);
    }

    while (!this.isAtEnd()) {
      const start = this.pos;
      try {
        this.parseDeclaration(module);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        this.synchronize(start);
      }
    }

    return module;
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private current(): Token {
    const token = this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    if (!token) throw new Error("token stream is empty");
    return token;
  }

  private peekNext(): Token | undefined {
    return this.tokens[this.pos + 1];
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.Eof;
  }

  private check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private checkWord(word: string): boolean {
    return this.check(TokenKind.Identifier) && this.current().lexeme === word;
  }

  private advance(): Token {
    const token = this.current();
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return token;
  }

  private match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private expect(kind: TokenKind): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    const token = this.current();
    this.fail(`Expected '${kind}' but found '${token.lexeme || token.kind}'`, token);
  }

  private expectIdentifier(): Token {
    if (this.check(TokenKind.Identifier)) {
      return this.advance();
    }
    const token = this.current();
    this.fail(`Expected identifier but found '${token.lexeme || token.kind}'`, token);
  }

  private expectWord(word: string): void {
    if (this.checkWord(word)) {
      this.advance();
      return;
    }
    const token = this.current();
    this.fail(`Expected '${word}' but found '${token.lexeme || token.kind}'`, token);
  }

  private expectOperand(): VarId {
    if (this.check(TokenKind.LocalName) || this.check(TokenKind.GlobalName)) {
      return this.advance().lexeme;
    }
    const token = this.current();
    this.fail(`Expected a value but found '${token.lexeme || token.kind}'`, token);
  }

  private expectInt(): number {
    const token = this.expect(TokenKind.IntLiteral);
    return typeof token.value === "number" ? token.value : 0;
  }

  private expectString(): string {
    const token = this.expect(TokenKind.StringLiteral);
    return typeof token.value === "string" ? token.value : "";
  }

  private addError(message: string, token: Token): void {
    this.diagnostics.push({
      severity: Severity.Error,
      message,
      location: {
        file: this.filename,
        line: token.line,
        column: token.column,
        offset: token.span.start,
      },
    });
  }

  private fail(message: string, token: Token): never {
    this.addError(message, token);
    throw new ParseError(message);
  }

  /** Skip to the next declaration keyword, moving at least one token past `start`. */
  private synchronize(start: number): void {
    if (this.pos === start) this.advance();
    while (!this.isAtEnd()) {
      if (SYNC_KEYWORDS.has(this.current().kind)) return;
      this.advance();
    }
  }

  // ─── Declarations ──────────────────────────────────────────────────

  private parseDeclaration(module: LirModule): void {
    const token = this.current();
    switch (token.kind) {
      case TokenKind.Type:
        module.types.push(this.parseTypeDecl());
        return;
      case TokenKind.Extern:
        module.externs.push(this.parseExtern());
        return;
      case TokenKind.Global:
        module.globals.push(this.parseGlobal());
        return;
      case TokenKind.Const:
        module.constants.push(this.parseConstant());
        return;
      case TokenKind.Fn:
        module.functions.push(this.parseFunction());
        return;
      default:
        this.fail(`Expected a declaration but found '${token.lexeme || token.kind}'`, token);
    }
  }

  private parseTypeDecl(): LirTypeDecl {
    this.expect(TokenKind.Type);
    const name = this.expectIdentifier().lexeme;
    this.expect(TokenKind.Equal);
    this.expect(TokenKind.Struct);
    this.expect(TokenKind.LeftBrace);

    // Registered before the fields so a struct can point to itself.
    const type: LirStructType = { kind: "struct", name, fields: [] };
    this.structs.set(name, type);

    while (!this.check(TokenKind.RightBrace) && !this.isAtEnd()) {
      const fieldName = this.expectIdentifier().lexeme;
      this.expect(TokenKind.Colon);
      type.fields.push({ name: fieldName, type: this.parseType() });
    }
    this.expect(TokenKind.RightBrace);
    return { name, type };
  }

  private parseAttributes(): string[] {
    const attributes: string[] = [];
    while (this.check(TokenKind.Attribute)) {
      attributes.push(this.advance().lexeme.slice(1));
    }
    return attributes;
  }

  private parseExtern(): LirExtern {
    this.expect(TokenKind.Extern);
    this.expect(TokenKind.Fn);
    const name = this.expectIdentifier().lexeme;
    const params = this.parseParams(TokenKind.Identifier);
    this.expect(TokenKind.Colon);
    const returnType = this.parseType();
    return { name, params, returnType, attributes: this.parseAttributes() };
  }

  private parseGlobal(): LirGlobal {
    this.expect(TokenKind.Global);
    const name = this.expectIdentifier().lexeme;
    this.expect(TokenKind.Colon);
    const type = this.parseType();
    const global: LirGlobal = { name, type };
    if (this.check(TokenKind.Attribute)) {
      const token = this.advance();
      const space = token.lexeme.slice(1);
      if (space === "global" || space === "symmetric") {
        global.space = space;
      } else {
        this.addError(`Unknown address space '${space}'`, token);
      }
    }
    return global;
  }

  private parseConstant(): LirConstant {
    this.expect(TokenKind.Const);
    const name = this.expect(TokenKind.GlobalName).lexeme.slice(1);
    this.expect(TokenKind.Equal);
    const op = this.expectIdentifier();
    let expr: LirConstExpr;
    switch (op.lexeme) {
      case "field_ptr": {
        const type = this.parseType();
        this.expect(TokenKind.Comma);
        const base = this.expect(TokenKind.GlobalName).lexeme;
        this.expect(TokenKind.Comma);
        expr = { kind: "field_ptr", base, field: this.expectString(), type };
        break;
      }
      case "index_ptr": {
        const inbounds = this.match(TokenKind.Inbounds);
        const type = this.parseType();
        this.expect(TokenKind.Comma);
        const base = this.expect(TokenKind.GlobalName).lexeme;
        this.expect(TokenKind.Comma);
        expr = { kind: "index_ptr", base, index: this.expectInt(), inbounds, type };
        break;
      }
      case "cast": {
        const value = this.expect(TokenKind.GlobalName).lexeme;
        this.expect(TokenKind.Comma);
        expr = { kind: "cast", value, targetType: this.parseType() };
        break;
      }
      default:
        this.fail(`'${op.lexeme}' is not a constant expression`, op);
    }
    return { name, expr };
  }

  /** `(name: T, ...)`; function parameters are written `%name`, extern ones bare. */
  private parseParams(nameKind: TokenKind): LirParam[] {
    this.expect(TokenKind.LeftParen);
    const params: LirParam[] = [];
    if (!this.check(TokenKind.RightParen)) {
      do {
        const token = this.expect(nameKind);
        const name = nameKind === TokenKind.LocalName ? token.lexeme.slice(1) : token.lexeme;
        this.expect(TokenKind.Colon);
        params.push({ name, type: this.parseType() });
      } while (this.match(TokenKind.Comma));
    }
    this.expect(TokenKind.RightParen);
    return params;
  }

  private parseFunction(): LirFunction {
    this.expect(TokenKind.Fn);
    const name = this.expectIdentifier().lexeme;
    const params = this.parseParams(TokenKind.LocalName);
    this.expect(TokenKind.Colon);
    const returnType = this.parseType();
    const attributes = this.parseAttributes();
    this.expect(TokenKind.LeftBrace);

    const blocks: LirBlock[] = [];
    while (!this.check(TokenKind.RightBrace) && !this.isAtEnd()) {
      blocks.push(this.parseBlock());
    }
    this.expect(TokenKind.RightBrace);

    return { name, params, returnType, blocks, attributes };
  }

  // ─── Blocks ────────────────────────────────────────────────────────

  private parseBlock(): LirBlock {
    const id = this.expectIdentifier().lexeme;
    this.expect(TokenKind.Colon);

    const phis: LirPhi[] = [];
    const instructions: LirInst[] = [];

    while (!this.isAtEnd()) {
      if (this.check(TokenKind.Identifier) && TERMINATORS.has(this.current().lexeme)) {
        return { id, phis, instructions, terminator: this.parseTerminator() };
      }
      if (this.check(TokenKind.LocalName) && this.peekNext()?.kind === TokenKind.Equal) {
        const dest = this.advance().lexeme;
        this.advance();
        if (this.match(TokenKind.Phi)) {
          if (instructions.length > 0) {
            this.addError("Phi nodes must come before the other instructions of a block", this.current());
          }
          phis.push(this.parsePhi(dest));
        } else {
          instructions.push(this.parseValueInst(dest));
        }
        continue;
      }
      instructions.push(this.parseEffectInst());
    }

    this.fail(`Block '${id}' has no terminator`, this.current());
  }

  private parsePhi(dest: VarId): LirPhi {
    const type = this.parseType();
    this.expect(TokenKind.LeftBracket);
    const incoming: { value: VarId; from: string }[] = [];
    if (!this.check(TokenKind.RightBracket)) {
      do {
        const value = this.expectOperand();
        this.expect(TokenKind.From);
        incoming.push({ value, from: this.expectIdentifier().lexeme });
      } while (this.match(TokenKind.Comma));
    }
    this.expect(TokenKind.RightBracket);
    return { kind: "phi", dest, type, incoming };
  }

  private parseCallArgs(): { func: string; args: VarId[] } {
    const func = this.expectIdentifier().lexeme;
    this.expect(TokenKind.LeftParen);
    const args: VarId[] = [];
    if (!this.check(TokenKind.RightParen)) {
      do {
        args.push(this.expectOperand());
      } while (this.match(TokenKind.Comma));
    }
    this.expect(TokenKind.RightParen);
    return { func, args };
  }

  private parseIntType(): LirIntType {
    const token = this.current();
    const type = this.parseType();
    if (type.kind !== "int") {
      this.fail(`Expected an integer type but found '${token.lexeme}'`, token);
    }
    return type;
  }

  /** Instructions written `%dest = op ...`. */
  private parseValueInst(dest: VarId): LirInst {
    const op = this.expectIdentifier();
    switch (op.lexeme) {
      case "stack_alloc":
        return { kind: "stack_alloc", dest, type: this.parseType() };
      case "load": {
        const type = this.parseType();
        this.expect(TokenKind.Comma);
        return { kind: "load", dest, ptr: this.expectOperand(), type };
      }
      case "field_ptr": {
        const type = this.parseType();
        this.expect(TokenKind.Comma);
        const base = this.expectOperand();
        this.expect(TokenKind.Comma);
        return { kind: "field_ptr", dest, base, field: this.expectString(), type };
      }
      case "index_ptr": {
        const inbounds = this.match(TokenKind.Inbounds);
        const type = this.parseType();
        this.expect(TokenKind.Comma);
        const base = this.expectOperand();
        this.expect(TokenKind.Comma);
        return { kind: "index_ptr", dest, base, index: this.expectOperand(), inbounds, type };
      }
      case "neg":
        return { kind: "neg", dest, type: this.parseType(), operand: this.expectOperand() };
      case "not":
        return { kind: "not", dest, operand: this.expectOperand() };
      case "bit_not":
        return { kind: "bit_not", dest, type: this.parseType(), operand: this.expectOperand() };
      case "const_int": {
        const type = this.parseIntType();
        return { kind: "const_int", dest, type, value: this.expectInt() };
      }
      case "const_float": {
        const type = this.parseType();
        if (type.kind !== "float") this.fail(`Expected a float type for const_float`, op);
        const token = this.current();
        if (!this.match(TokenKind.FloatLiteral, TokenKind.IntLiteral)) {
          this.fail(`Expected a number but found '${token.lexeme || token.kind}'`, token);
        }
        return { kind: "const_float", dest, type, value: typeof token.value === "number" ? token.value : 0 };
      }
      case "const_bool": {
        const token = this.current();
        if (!this.match(TokenKind.True, TokenKind.False)) {
          this.fail(`Expected 'true' or 'false' but found '${token.lexeme || token.kind}'`, token);
        }
        return { kind: "const_bool", dest, value: token.kind === TokenKind.True };
      }
      case "const_null":
        return { kind: "const_null", dest, type: this.parseType() };
      case "call": {
        const type = this.parseType();
        return { kind: "call", dest, type, ...this.parseCallArgs() };
      }
      case "call_extern": {
        const type = this.parseType();
        return { kind: "call_extern", dest, type, ...this.parseCallArgs() };
      }
      case "cast": {
        const value = this.expectOperand();
        this.expect(TokenKind.Comma);
        return { kind: "cast", dest, value, targetType: this.parseType() };
      }
      case "sizeof":
        return { kind: "sizeof", dest, type: this.parseType() };
      default: {
        if (isBinOp(op.lexeme)) {
          const type = this.parseType();
          const lhs = this.expectOperand();
          this.expect(TokenKind.Comma);
          return { kind: "bin_op", op: op.lexeme, dest, type, lhs, rhs: this.expectOperand() };
        }
        this.fail(`Unknown instruction '${op.lexeme}'`, op);
      }
    }
  }

  /** Instructions without a result. */
  private parseEffectInst(): LirInst {
    const op = this.expectIdentifier();
    switch (op.lexeme) {
      case "store": {
        const ptr = this.expectOperand();
        this.expect(TokenKind.Comma);
        return { kind: "store", ptr, value: this.expectOperand() };
      }
      case "call_void":
        return { kind: "call_void", ...this.parseCallArgs() };
      case "call_extern_void":
        return { kind: "call_extern_void", ...this.parseCallArgs() };
      case "null_check":
        return { kind: "null_check", ptr: this.expectOperand() };
      case "assert_check": {
        const cond = this.expectOperand();
        this.expect(TokenKind.Comma);
        return { kind: "assert_check", cond, message: this.expectString() };
      }
      default:
        this.fail(`Unknown instruction '${op.lexeme}'`, op);
    }
  }

  private parseTerminator(): LirTerminator {
    const op = this.expectIdentifier();
    switch (op.lexeme) {
      case "ret":
        return { kind: "ret", value: this.expectOperand() };
      case "ret_void":
        return { kind: "ret_void" };
      case "jump":
        return { kind: "jump", target: this.expectIdentifier().lexeme };
      case "br": {
        const cond = this.expectOperand();
        this.expect(TokenKind.Comma);
        const thenBlock = this.expectIdentifier().lexeme;
        this.expect(TokenKind.Comma);
        return { kind: "br", cond, thenBlock, elseBlock: this.expectIdentifier().lexeme };
      }
      case "switch": {
        const value = this.expectOperand();
        this.expect(TokenKind.Comma);
        this.expect(TokenKind.LeftBracket);
        const cases: { value: VarId; target: string }[] = [];
        if (!this.check(TokenKind.RightBracket)) {
          do {
            const caseValue = this.expectOperand();
            this.expect(TokenKind.Arrow);
            cases.push({ value: caseValue, target: this.expectIdentifier().lexeme });
          } while (this.match(TokenKind.Comma));
        }
        this.expect(TokenKind.RightBracket);
        this.expect(TokenKind.Comma);
        this.expect(TokenKind.Default);
        this.expect(TokenKind.Colon);
        return { kind: "switch", value, cases, defaultBlock: this.expectIdentifier().lexeme };
      }
      case "unreachable":
        return { kind: "unreachable" };
      default:
        this.fail(`Unknown terminator '${op.lexeme}'`, op);
    }
  }

  // ─── Types ─────────────────────────────────────────────────────────

  parseType(): LirType {
    const token = this.current();

    if (token.kind === TokenKind.Fn) {
      this.advance();
      this.expect(TokenKind.LeftParen);
      const params: LirType[] = [];
      if (!this.check(TokenKind.RightParen)) {
        do {
          params.push(this.parseType());
        } while (this.match(TokenKind.Comma));
      }
      this.expect(TokenKind.RightParen);
      this.expect(TokenKind.Colon);
      return { kind: "function", params, returnType: this.parseType() };
    }

    if (token.kind !== TokenKind.Identifier) {
      this.fail(`Expected type but found '${token.lexeme || token.kind}'`, token);
    }
    this.advance();

    const primitive = PRIMITIVE_TYPES.get(token.lexeme);
    if (primitive) return primitive;

    switch (token.lexeme) {
      case "ptr":
      case "gptr":
      case "sptr": {
        this.expect(TokenKind.Less);
        const pointee = this.parseType();
        this.expect(TokenKind.Greater);
        if (token.lexeme === "gptr") return { kind: "ptr", pointee, space: "global" };
        if (token.lexeme === "sptr") return { kind: "ptr", pointee, space: "symmetric" };
        return { kind: "ptr", pointee };
      }
      case "array": {
        this.expect(TokenKind.Less);
        const element = this.parseType();
        this.expect(TokenKind.Comma);
        const length = this.expectInt();
        this.expect(TokenKind.Greater);
        return { kind: "array", element, length };
      }
      default: {
        const struct = this.structs.get(token.lexeme);
        if (!struct) this.fail(`Unknown type '${token.lexeme}'`, token);
        return struct;
      }
    }
  }
}
