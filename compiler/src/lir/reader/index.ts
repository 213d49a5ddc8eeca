/**
 * Reader for the LIR text format: `readLir(printLir(m))` yields a module
 * equal to `m`.
 */

import type { Diagnostic } from "../../errors/index.ts";
import { SourceFile } from "../../utils/source.ts";
import type { LirModule } from "../lir-types.ts";
import { Lexer } from "./lexer.ts";
import { Parser } from "./parser.ts";

export interface ReadResult {
  module: LirModule;
  diagnostics: Diagnostic[];
}

export function readLir(source: string, filename = "<input>"): ReadResult {
  const file = new SourceFile(filename, source);
  const lexer = new Lexer(file);
  const tokens = lexer.tokenize();
  const parser = new Parser(tokens, filename);
  const module = parser.parse();
  return {
    module,
    diagnostics: [...lexer.getDiagnostics(), ...parser.getDiagnostics()],
  };
}

export { Lexer } from "./lexer.ts";
export { Parser } from "./parser.ts";
export { type Token, TokenKind } from "./token.ts";
