/**
 * Lexer for scrawl source text.
 *
 * Converts a {@link SourceFile} into a stream of {@link Token}s.  The lexer
 * performs error recovery: when it encounters an invalid character or malformed
 * literal it emits a {@link TokenKind.Error} token, records a diagnostic, and
 * continues scanning so that the parser receives as many valid tokens as
 * possible.
 *
 * Method implementations are split across:
 *   - lexer-numbers.ts  (number literal scanning)
 *   - lexer-strings.ts  (string literal scanning)
 */

import { type Diagnostic, Severity } from "../errors/index.ts";
import type { SourceFile } from "../utils/source.ts";
import * as numberMethods from "./lexer-numbers.ts";
import * as stringMethods from "./lexer-strings.ts";
import { lookupBoolean, SYMBOL_PUNCTUATION, type Token, TokenKind } from "./token.ts";

// ─── Character helpers ────────────────────────────────────────────────────

const CHAR_0 = 48; // '0'
const CHAR_9 = 57; // '9'
const CHAR_a = 97;
const CHAR_f = 102;
const CHAR_A = 65;
const CHAR_F = 70;
const CHAR_7 = 55;

const ALPHABETIC = /^\p{Alphabetic}$/u;

export function isDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_9;
}

export function isHexDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= CHAR_0 && code <= CHAR_9) ||
    (code >= CHAR_a && code <= CHAR_f) ||
    (code >= CHAR_A && code <= CHAR_F)
  );
}

export function isBinaryDigit(ch: string): boolean {
  return ch === "0" || ch === "1";
}

export function isOctalDigit(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_7;
}

export function isSymbolStart(ch: string): boolean {
  return ch !== "" && (ALPHABETIC.test(ch) || SYMBOL_PUNCTUATION.has(ch));
}

export function isSymbolChar(ch: string): boolean {
  return isSymbolStart(ch) || isDigit(ch);
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

  /**
   * Scans and returns the next token from the source.
   *
   * Returns {@link TokenKind.Eof} when the end of input is reached.
   */
  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const ch = this.peek();

    if (ch === "(") {
      this.pos++;
      return this.makeToken(TokenKind.LeftParen, this.pos - 1, this.pos);
    }

    if (ch === ")") {
      this.pos++;
      return this.makeToken(TokenKind.RightParen, this.pos - 1, this.pos);
    }

    if (ch === '"') {
      return this.readString();
    }

    if (this.startsNumber()) {
      return this.readNumber();
    }

    if (isSymbolStart(this.peekCodePoint())) {
      return this.readSymbolOrBoolean();
    }

    const start = this.pos;
    const bad = this.peekCodePoint();
    this.pos += bad.length;
    this.addDiagnostic(Severity.Error, `Unexpected character '${bad}'`, start);
    return this.makeToken(TokenKind.Error, start, this.pos);
  }

  peek(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  /** The full code point at the cursor, so astral letters are not split. */
  peekCodePoint(): string {
    const code = this.source.content.codePointAt(this.pos);
    return code === undefined ? "" : String.fromCodePoint(code);
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

      if (ch === ";") {
        this.skipLineComment();
        continue;
      }

      break;
    }
  }

  private skipLineComment(): void {
    this.pos++; // skip ;
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === "\n" || ch === "\r") {
        break;
      }
      this.pos++;
    }
  }

  /** Digits, `.5`, and signed forms such as `-3` or `+.5` open a number. */
  private startsNumber(): boolean {
    let offset = 0;
    if (this.peek() === "+" || this.peek() === "-") {
      offset++;
    }
    if (isDigit(this.peek(offset))) return true;
    return this.peek(offset) === "." && isDigit(this.peek(offset + 1));
  }

  /** Consumes symbol characters from the cursor, returning the new position. */
  skipSymbolChars(): number {
    while (this.pos < this.source.length) {
      const ch = this.peekCodePoint();
      if (!isSymbolChar(ch)) break;
      this.pos += ch.length;
    }
    return this.pos;
  }

  readSymbolOrBoolean(): Token {
    const start = this.pos;
    this.skipSymbolChars();
    const lexeme = this.source.content.slice(start, this.pos);

    const booleanKind = lookupBoolean(lexeme);
    if (booleanKind !== undefined) {
      return { ...this.makeToken(booleanKind, start, this.pos), value: booleanKind === TokenKind.True };
    }

    return this.makeToken(TokenKind.Symbol, start, this.pos);
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
    this.diagnostics.push({
      severity,
      message,
      location: this.source.location(offset),
    });
  }

  // ─── Number scanning methods (from lexer-numbers.ts) ──────────────────────
  declare readNumber: typeof numberMethods.readNumber;
  declare readRadixNumber: typeof numberMethods.readRadixNumber;
  declare readDecimalNumber: typeof numberMethods.readDecimalNumber;
  declare consumeDigits: typeof numberMethods.consumeDigits;
  declare consumeExponent: typeof numberMethods.consumeExponent;
  declare finishNumber: typeof numberMethods.finishNumber;

  // ─── String scanning methods (from lexer-strings.ts) ──────────────────────
  declare readString: typeof stringMethods.readString;
  declare readEscapeSequence: typeof stringMethods.readEscapeSequence;
  declare readUnicodeEscape: typeof stringMethods.readUnicodeEscape;
}

// ─── Attach extracted methods to Lexer prototype ──────────────────────────────

// Number scanning methods
Lexer.prototype.readNumber = numberMethods.readNumber;
Lexer.prototype.readRadixNumber = numberMethods.readRadixNumber;
Lexer.prototype.readDecimalNumber = numberMethods.readDecimalNumber;
Lexer.prototype.consumeDigits = numberMethods.consumeDigits;
Lexer.prototype.consumeExponent = numberMethods.consumeExponent;
Lexer.prototype.finishNumber = numberMethods.finishNumber;

// String scanning methods
Lexer.prototype.readString = stringMethods.readString;
Lexer.prototype.readEscapeSequence = stringMethods.readEscapeSequence;
Lexer.prototype.readUnicodeEscape = stringMethods.readUnicodeEscape;
