/**
 * Lexer for the LIR text format.
 *
 * Converts a {@link SourceFile} into a stream of {@link Token}s. On an
 * invalid character or malformed literal it emits a {@link TokenKind.Error}
 * token, records a diagnostic, and keeps scanning.
 */

import { type Diagnostic, Severity } from "../../errors/index.ts";
import type { SourceFile } from "../../utils/source.ts";
import { lookupKeyword, type Token, TokenKind } from "./token.ts";

// ─── Character helpers ────────────────────────────────────────────────────

const CHAR_0 = 48; // '0'
const CHAR_9 = 57; // '9'
const CHAR_a = 97;
const CHAR_z = 122;
const CHAR_A = 65;
const CHAR_Z = 90;
const CHAR_UNDERSCORE = 95;

function isDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_9;
}

function isAlpha(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= CHAR_a && code <= CHAR_z) || (code >= CHAR_A && code <= CHAR_Z) || code === CHAR_UNDERSCORE
  );
}

/** Characters allowed after the first one in names and labels (`if.then`, `%x.1`). */
function isNameChar(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch) || ch === ".";
}

// ─── Lexer class ──────────────────────────────────────────────────────────

export class Lexer {
  source: SourceFile;
  pos: number;
  diagnostics: Diagnostic[];

  constructor(source: SourceFile) {
    this.source = source;
    this.pos = 0;
    this.diagnostics = [];
  }

  /** Returns all diagnostics accumulated during the most recent tokenization. */
  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  /**
   * Scans the entire source file and returns an array of tokens.
   *
   * The returned array always ends with a {@link TokenKind.Eof} token.
   * Calling this method resets the lexer position and diagnostics.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.pos = 0;
    this.diagnostics = [];
    let token = this.nextToken();
    while (token.kind !== TokenKind.Eof) {
      tokens.push(token);
      token = this.nextToken();
    }
    tokens.push(token);
    return tokens;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const ch = this.peek();

    if (isAlpha(ch) || ch === "φ") {
      return this.readIdentifierOrKeyword();
    }

    if (isDigit(ch) || (ch === "-" && isDigit(this.peek(1)))) {
      return this.readNumber();
    }

    if (ch === "%" || ch === "@" || ch === "#") {
      return this.readSigilName();
    }

    if (ch === '"') {
      return this.readString();
    }

    return this.readPunctuation();
  }

  peek(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  advance(): string {
    const ch = this.source.charAt(this.pos);
    this.pos++;
    return ch;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.pos++;
        continue;
      }

      if (ch === "/" && this.peek(1) === "/") {
        while (this.pos < this.source.length && this.peek() !== "\n") this.pos++;
        continue;
      }

      if (ch === "/" && this.peek(1) === "*") {
        this.skipMultiLineComment();
        continue;
      }

      break;
    }
  }

  private skipMultiLineComment(): void {
    const start = this.pos;
    this.pos += 2; // skip /*
    while (this.pos < this.source.length) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        this.pos += 2;
        return;
      }
      this.pos++;
    }
    const { line, column } = this.source.lineCol(start);
    this.addDiagnostic(
      Severity.Error,
      `Unterminated multi-line comment (started at ${line}:${column})`,
      start
    );
  }

  private readIdentifierOrKeyword(): Token {
    const start = this.pos;
    this.pos++;
    while (this.pos < this.source.length && isNameChar(this.peek())) {
      this.pos++;
    }
    const lexeme = this.source.content.slice(start, this.pos);

    const keywordKind = lookupKeyword(lexeme);
    if (keywordKind === TokenKind.True) {
      return { ...this.makeToken(keywordKind, start, this.pos), value: true };
    }
    if (keywordKind === TokenKind.False) {
      return { ...this.makeToken(keywordKind, start, this.pos), value: false };
    }
    return this.makeToken(keywordKind ?? TokenKind.Identifier, start, this.pos);
  }

  private readSigilName(): Token {
    const start = this.pos;
    const sigil = this.advance();
    const nameStart = this.pos;
    while (this.pos < this.source.length && isNameChar(this.peek())) {
      this.pos++;
    }
    if (this.pos === nameStart) {
      this.addDiagnostic(Severity.Error, `Expected a name after '${sigil}'`, start);
      return this.makeToken(TokenKind.Error, start, this.pos);
    }
    const kind =
      sigil === "%" ? TokenKind.LocalName : sigil === "@" ? TokenKind.GlobalName : TokenKind.Attribute;
    return this.makeToken(kind, start, this.pos);
  }

  private readNumber(): Token {
    const start = this.pos;
    if (this.peek() === "-") this.pos++;
    this.consumeDigits();

    let isFloat = false;
    if (this.peek() === "." && isDigit(this.peek(1))) {
      isFloat = true;
      this.pos++;
      this.consumeDigits();
    }
    if ((this.peek() === "e" || this.peek() === "E") && (isDigit(this.peek(1)) || this.peek(1) === "-")) {
      isFloat = true;
      this.pos += 2;
      this.consumeDigits();
    }

    const lexeme = this.source.content.slice(start, this.pos);
    const value = Number(lexeme);
    if (Number.isNaN(value)) {
      this.addDiagnostic(Severity.Error, `Invalid number literal '${lexeme}'`, start);
      return this.makeToken(TokenKind.Error, start, this.pos);
    }
    const kind = isFloat ? TokenKind.FloatLiteral : TokenKind.IntLiteral;
    return { ...this.makeToken(kind, start, this.pos), value };
  }

  private consumeDigits(): void {
    while (this.pos < this.source.length && isDigit(this.peek())) {
      this.pos++;
    }
  }

  private readString(): Token {
    const start = this.pos;
    this.pos++; // opening quote
    let value = "";
    while (this.pos < this.source.length) {
      const ch = this.advance();
      if (ch === '"') {
        return { ...this.makeToken(TokenKind.StringLiteral, start, this.pos), value };
      }
      if (ch === "\n") break;
      if (ch === "\\") {
        const escaped = this.advance();
        switch (escaped) {
          case "n":
            value += "\n";
            break;
          case "t":
            value += "\t";
            break;
          case '"':
          case "\\":
            value += escaped;
            break;
          default:
            this.addDiagnostic(Severity.Error, `Invalid escape sequence '\\${escaped}'`, this.pos - 2);
        }
        continue;
      }
      value += ch;
    }
    this.addDiagnostic(Severity.Error, "Unterminated string literal", start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  private readPunctuation(): Token {
    const start = this.pos;
    const ch = this.advance();

    switch (ch) {
      case "{":
        return this.makeToken(TokenKind.LeftBrace, start, this.pos);
      case "}":
        return this.makeToken(TokenKind.RightBrace, start, this.pos);
      case "(":
        return this.makeToken(TokenKind.LeftParen, start, this.pos);
      case ")":
        return this.makeToken(TokenKind.RightParen, start, this.pos);
      case "[":
        return this.makeToken(TokenKind.LeftBracket, start, this.pos);
      case "]":
        return this.makeToken(TokenKind.RightBracket, start, this.pos);
      case "<":
        return this.makeToken(TokenKind.Less, start, this.pos);
      case ">":
        return this.makeToken(TokenKind.Greater, start, this.pos);
      case ",":
        return this.makeToken(TokenKind.Comma, start, this.pos);
      case ":":
        return this.makeToken(TokenKind.Colon, start, this.pos);
      case "=":
        return this.makeToken(TokenKind.Equal, start, this.pos);
      case "→":
        return this.makeToken(TokenKind.Arrow, start, this.pos);
      case "-":
        if (this.peek() === ">") {
          this.pos++;
          return this.makeToken(TokenKind.Arrow, start, this.pos);
        }
        break;
      default:
        break;
    }
    this.addDiagnostic(Severity.Error, `Unexpected character '${ch}'`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  makeToken(kind: TokenKind, start: number, end: number): Token {
    const { line, column } = this.source.lineCol(start);
    return {
      kind,
      lexeme: this.source.content.slice(start, end),
      span: { start, end },
      line,
      column,
    };
  }

  addDiagnostic(severity: Severity, message: string, offset: number): void {
    const { line, column } = this.source.lineCol(offset);
    this.diagnostics.push({
      severity,
      message,
      location: {
        file: this.source.filename,
        line,
        column,
        offset,
      },
    });
  }
}
