/**
 * Token types and keyword lookup for the LIR text reader.
 *
 * @module token
 */

/** Byte-offset range within source text (half-open: `[start, end)`). */
export interface Span {
  start: number;
  end: number;
}

/** Discriminator for every token the lexer can produce. */
export enum TokenKind {
  // Special tokens
  Eof = "EOF",
  Error = "Error",

  // Literals
  IntLiteral = "IntLiteral",
  FloatLiteral = "FloatLiteral",
  StringLiteral = "StringLiteral",

  // Names
  Identifier = "Identifier",
  /** `%name`: a function-local value. */
  LocalName = "LocalName",
  /** `@name`: a module-level value. */
  GlobalName = "GlobalName",
  /** `#name`: a function or global attribute. */
  Attribute = "Attribute",

  // Keywords
  Const = "const",
  Default = "default",
  Extern = "extern",
  False = "false",
  Fn = "fn",
  From = "from",
  Global = "global",
  Inbounds = "inbounds",
  Module = "module",
  Phi = "phi",
  Struct = "struct",
  True = "true",
  Type = "type",

  // Punctuation
  LeftBrace = "{",
  RightBrace = "}",
  LeftParen = "(",
  RightParen = ")",
  LeftBracket = "[",
  RightBracket = "]",
  Less = "<",
  Greater = ">",
  Comma = ",",
  Colon = ":",
  Equal = "=",
  Arrow = "→",
}

/**
 * A single lexical token produced by the {@link Lexer}.
 *
 * Every token carries its raw source text (`lexeme`), location information,
 * and an optional pre-parsed `value` for literals.
 */
export interface Token {
  kind: TokenKind;
  /** Raw source text that was consumed to produce this token. */
  lexeme: string;
  /** Byte-offset span within the source file. */
  span: Span;
  /** 1-based line number where the token starts. */
  line: number;
  /** 1-based column number where the token starts. */
  column: number;
  /** Pre-parsed literal value (numbers, strings, booleans). */
  value?: number | string | boolean;
}

const KEYWORD_MAP: ReadonlyMap<string, TokenKind> = new Map([
  ["const", TokenKind.Const],
  ["default", TokenKind.Default],
  ["extern", TokenKind.Extern],
  ["false", TokenKind.False],
  ["fn", TokenKind.Fn],
  ["from", TokenKind.From],
  ["global", TokenKind.Global],
  ["inbounds", TokenKind.Inbounds],
  ["module", TokenKind.Module],
  ["phi", TokenKind.Phi],
  ["φ", TokenKind.Phi],
  ["struct", TokenKind.Struct],
  ["true", TokenKind.True],
  ["type", TokenKind.Type],
]);

/** Look up the keyword kind for an identifier lexeme, if it is one. */
export function lookupKeyword(lexeme: string): TokenKind | undefined {
  return KEYWORD_MAP.get(lexeme);
}
