/**
 * Test utilities for the lexer.
 */

import { Lexer } from "../../src/lexer/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function tokenize(input: string) {
  const source = new SourceFile("test.scrawl", input);
  const lexer = new Lexer(source);
  return { tokens: lexer.tokenize(), diagnostics: lexer.getDiagnostics() };
}

/** Kinds of every token except the trailing EOF. */
export function kinds(input: string): string[] {
  return tokenize(input)
    .tokens.slice(0, -1)
    .map((t) => t.kind);
}
