/**
 * Number literal scanning methods for Lexer.
 * Extracted from lexer.ts for modularity.
 */

import { Severity } from "../errors/index.ts";
import type { Lexer } from "./lexer.ts";
import { isBinaryDigit, isDigit, isHexDigit, isOctalDigit, isSymbolChar, isSymbolStart } from "./lexer.ts";
import type { Token } from "./token.ts";
import { TokenKind } from "./token.ts";

const RADIX_PREFIXES: ReadonlyMap<string, number> = new Map([
  ["x", 16],
  ["b", 2],
  ["o", 8],
]);

const RADIX_DIGITS: ReadonlyMap<number, (ch: string) => boolean> = new Map([
  [16, isHexDigit],
  [2, isBinaryDigit],
  [8, isOctalDigit],
]);

// ─── Number scanning ──────────────────────────────────────────────────────

export function readNumber(this: Lexer): Token {
  const start = this.pos;
  const sign = this.peek() === "-" || this.peek() === "+" ? this.advance() : "";

  // Check for prefix: 0x, 0b, 0o
  if (this.peek() === "0") {
    const radix = RADIX_PREFIXES.get(this.peek(1).toLowerCase());
    if (radix !== undefined) {
      return this.readRadixNumber(start, sign, radix);
    }
  }

  return this.readDecimalNumber(start);
}

export function readRadixNumber(this: Lexer, start: number, sign: string, radix: number): Token {
  this.pos += 2; // skip 0x / 0b / 0o
  const digitsStart = this.pos;
  this.consumeDigits(RADIX_DIGITS.get(radix) ?? isDigit);
  const digits = this.source.content.slice(digitsStart, this.pos);
  if (digits.length === 0) {
    const prefix = this.source.content.slice(digitsStart - 2, digitsStart);
    this.addDiagnostic(Severity.Error, `Expected digits after '${prefix}'`, start);
    this.skipSymbolChars();
    return this.makeToken(TokenKind.Error, start, this.pos);
  }
  const magnitude = Number.parseInt(digits, radix);
  return this.finishNumber(start, sign === "-" ? -magnitude : magnitude);
}

export function readDecimalNumber(this: Lexer, start: number): Token {
  this.consumeDigits(isDigit);
  if (this.peek() === ".") {
    this.pos++;
    this.consumeDigits(isDigit);
  }
  this.consumeExponent();
  return this.finishNumber(start, Number(this.source.content.slice(start, this.pos)));
}

export function consumeDigits(this: Lexer, isValidDigit: (ch: string) => boolean): void {
  while (this.pos < this.source.length && isValidDigit(this.peek())) {
    this.pos++;
  }
}

/** Consumes `e[+-]digits` when it is well formed; otherwise leaves the cursor alone. */
export function consumeExponent(this: Lexer): void {
  if (this.peek() !== "e" && this.peek() !== "E") return;
  const signed = this.peek(1) === "+" || this.peek(1) === "-";
  if (!isDigit(this.peek(signed ? 2 : 1))) return;
  this.pos += signed ? 2 : 1;
  this.consumeDigits(isDigit);
}

/**
 * A number must not run into symbol characters. `-x1` or `.5a` re-read as
 * symbols since their first character may start one; `5a` is an error.
 */
export function finishNumber(this: Lexer, start: number, value: number): Token {
  if (isSymbolChar(this.peekCodePoint())) {
    if (isSymbolStart(this.source.charAt(start))) {
      this.pos = start;
      return this.readSymbolOrBoolean();
    }
    this.skipSymbolChars();
    const lexeme = this.source.content.slice(start, this.pos);
    this.addDiagnostic(Severity.Error, `Invalid number literal '${lexeme}'`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  return { ...this.makeToken(TokenKind.NumberLiteral, start, this.pos), value };
}
