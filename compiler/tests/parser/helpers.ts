/**
 * Test utilities for the parser.
 */

import type { Program, SExpr } from "../../src/ast/nodes.ts";
import { Lexer } from "../../src/lexer/index.ts";
import { Parser } from "../../src/parser/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

export function parse(input: string) {
  const source = new SourceFile("test.scrawl", input);
  const lexer = new Lexer(source);
  const parser = new Parser(lexer.tokenize(), source.filename);
  const program = parser.parse();
  return { program, diagnostics: [...lexer.getDiagnostics(), ...parser.getDiagnostics()] };
}

/** Parse source that must be free of errors. */
export function parseOk(input: string): Program {
  const { program, diagnostics } = parse(input);
  if (diagnostics.length > 0) {
    throw new Error(`Parser errors: ${diagnostics.map((d) => d.message).join(", ")}`);
  }
  return program;
}

/** Compact text form of an expression, for structural assertions. */
export function show(expr: SExpr): string {
  switch (expr.kind) {
    case "NumberLit":
    case "BoolLit":
      return String(expr.value);
    case "StringLit":
      return JSON.stringify(expr.value);
    case "Symbol":
      return expr.name;
    case "Form":
      return `(${[expr.head, ...expr.args].map(show).join(" ")})`;
  }
}
