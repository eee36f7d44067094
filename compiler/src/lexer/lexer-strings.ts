/**
 * String literal scanning methods for Lexer.
 * Extracted from lexer.ts for modularity.
 */

import { Severity } from "../errors/index.ts";
import type { Lexer } from "./lexer.ts";
import { isDigit, isHexDigit } from "./lexer.ts";
import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ["'", "'"],
  ["\\", "\\"],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["b", "\b"],
  ["f", "\f"],
  ["v", "\v"],
]);

const MAX_CODE_POINT = 0x10ffff;

// ─── String scanning ──────────────────────────────────────────────────────

export function readString(this: Lexer): Token {
  const start = this.pos;
  this.pos++; // skip opening quote
  let value = "";

  while (this.pos < this.source.length) {
    const ch = this.peek();

    if (ch === '"') {
      this.pos++;
      return { ...this.makeToken(TokenKind.StringLiteral, start, this.pos), value };
    }

    if (ch === "\n") {
      this.addDiagnostic(
        Severity.Error,
        "Unterminated string literal (strings cannot contain unescaped newlines)",
        start
      );
      return this.makeToken(TokenKind.Error, start, this.pos);
    }

    if (ch === "\\") {
      this.pos++;
      const escaped = this.readEscapeSequence(start);
      if (escaped !== undefined) {
        value += escaped;
      }
      continue;
    }

    value += ch;
    this.pos++;
  }

  this.addDiagnostic(Severity.Error, "Unterminated string literal (missing closing '\"')", start);
  return this.makeToken(TokenKind.Error, start, this.pos);
}

export function readEscapeSequence(this: Lexer, stringStart: number): string | undefined {
  if (this.pos >= this.source.length) {
    this.addDiagnostic(Severity.Error, "Unexpected end of string escape", stringStart);
    return undefined;
  }

  const escapeStart = this.pos - 1;
  const ch = this.advance();
  const simple = SIMPLE_ESCAPES.get(ch);
  if (simple !== undefined) return simple;

  switch (ch) {
    case "0":
      if (isDigit(this.peek())) {
        this.addDiagnostic(Severity.Error, "'\\0' cannot be followed by a digit", escapeStart);
        return undefined;
      }
      return "\0";
    case "x": {
      const hex1 = this.peek();
      const hex2 = this.peek(1);
      if (isHexDigit(hex1) && isHexDigit(hex2)) {
        this.pos += 2;
        return String.fromCharCode(Number.parseInt(hex1 + hex2, 16));
      }
      this.addDiagnostic(Severity.Error, "Invalid hex escape sequence, expected \\xHH", escapeStart);
      return undefined;
    }
    case "u":
      return this.readUnicodeEscape(escapeStart);
    default:
      this.addDiagnostic(Severity.Error, `Invalid escape sequence '\\${ch}'`, escapeStart);
      return undefined;
  }
}

/** `\uHHHH` or `\u{H…}` with one to six hex digits naming a Unicode scalar value. */
export function readUnicodeEscape(this: Lexer, escapeStart: number): string | undefined {
  let digits = "";
  if (this.peek() === "{") {
    this.pos++;
    while (digits.length < 6 && isHexDigit(this.peek())) {
      digits += this.advance();
    }
    if (digits.length === 0 || this.peek() !== "}") {
      this.addDiagnostic(Severity.Error, "Invalid unicode escape, expected \\u{H…}", escapeStart);
      return undefined;
    }
    this.pos++;
  } else {
    while (digits.length < 4 && isHexDigit(this.peek())) {
      digits += this.advance();
    }
    if (digits.length < 4) {
      this.addDiagnostic(Severity.Error, "Invalid unicode escape, expected \\uHHHH", escapeStart);
      return undefined;
    }
  }

  const code = Number.parseInt(digits, 16);
  if (code > MAX_CODE_POINT || (code >= 0xd800 && code <= 0xdfff)) {
    this.addDiagnostic(Severity.Error, `'\\u${digits}' is not a Unicode scalar value`, escapeStart);
    return undefined;
  }
  return String.fromCodePoint(code);
}
