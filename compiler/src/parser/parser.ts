/**
 * Recursive descent parser for scrawl's parenthesised syntax.
 *
 * Reads any number of top-level expressions. A malformed form records a
 * diagnostic and the parser skips to the end of the enclosing top-level form
 * before continuing.
 */

import type { Form, Program, SExpr } from "../ast/nodes.ts";
import type { Diagnostic } from "../errors/diagnostic.ts";
import { Severity } from "../errors/diagnostic.ts";
import type { Token } from "../lexer/token.ts";
import { TokenKind } from "../lexer/token.ts";

export class Parser {
  private tokens: Token[];
  private pos: number;
  private depth: number;
  private diagnostics: Diagnostic[];
  private filename: string;

  constructor(tokens: Token[], filename = "") {
    this.tokens = tokens;
    this.pos = 0;
    this.depth = 0;
    this.diagnostics = [];
    this.filename = filename;
  }

  getDiagnostics(): ReadonlyArray<Diagnostic> {
    return this.diagnostics;
  }

  parse(): Program {
    const forms: SExpr[] = [];
    const startSpan = this.current().span.start;

    while (!this.isAtEnd()) {
      try {
        forms.push(this.parseExpr());
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        this.synchronize();
      }
    }

    return {
      kind: "Program",
      forms,
      span: { start: startSpan, end: this.current().span.end },
    };
  }

  // ─── Expressions ────────────────────────────────────────────────────

  parseExpr(): SExpr {
    const token = this.current();
    switch (token.kind) {
      case TokenKind.NumberLiteral:
        this.advance();
        return {
          kind: "NumberLit",
          value: typeof token.value === "number" ? token.value : Number(token.lexeme),
          span: token.span,
        };
      case TokenKind.StringLiteral:
        this.advance();
        return {
          kind: "StringLit",
          value: typeof token.value === "string" ? token.value : "",
          span: token.span,
        };
      case TokenKind.True:
      case TokenKind.False:
        this.advance();
        return { kind: "BoolLit", value: token.kind === TokenKind.True, span: token.span };
      case TokenKind.Symbol:
        this.advance();
        return { kind: "Symbol", name: token.lexeme, span: token.span };
      case TokenKind.LeftParen:
        return this.parseForm();
      case TokenKind.RightParen:
        this.addError("Unexpected ')'", token);
        this.advance();
        throw new ParseError();
      case TokenKind.Error:
        // Already reported by the lexer.
        this.advance();
        throw new ParseError();
      case TokenKind.Eof:
        this.addError("Unexpected end of input", token);
        throw new ParseError();
    }
  }

  private parseForm(): Form {
    const open = this.advance();
    this.depth++;

    if (this.check(TokenKind.RightParen)) {
      this.addError("Empty form '()'", open);
      this.advance();
      this.depth--;
      throw new ParseError();
    }

    const head = this.parseExpr();
    const args: SExpr[] = [];
    while (!this.check(TokenKind.RightParen) && !this.isAtEnd()) {
      args.push(this.parseExpr());
    }

    if (this.isAtEnd()) {
      this.addError(`Expected ')' to close the form opened at ${open.line}:${open.column}`, this.current());
      throw new ParseError();
    }

    const close = this.advance();
    this.depth--;
    return { kind: "Form", head, args, span: { start: open.span.start, end: close.span.end } };
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  current(): Token {
    const token = this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new Error("Parser requires a token stream ending in EOF");
    }
    return token;
  }

  isAtEnd(): boolean {
    return this.current().kind === TokenKind.Eof;
  }

  check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  advance(): Token {
    const token = this.current();
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return token;
  }

  addError(message: string, token: Token): void {
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

  /** Skip what is left of the open forms so parsing resumes at the next top-level form. */
  private synchronize(): void {
    while (this.depth > 0 && !this.isAtEnd()) {
      const token = this.advance();
      if (token.kind === TokenKind.LeftParen) this.depth++;
      if (token.kind === TokenKind.RightParen) this.depth--;
    }
    this.depth = 0;
  }
}

class ParseError extends Error {
  constructor() {
    super("Parse error");
  }
}
