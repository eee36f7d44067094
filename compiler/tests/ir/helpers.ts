/**
 * Test utilities for IR construction.
 */

import type { SExpr } from "../../src/ast/nodes.ts";
import { CompileError } from "../../src/errors/index.ts";
import { buildExpr, buildProgram, buildStmt, type IrExpr, type IrProgram, type IrStmt } from "../../src/ir/index.ts";
import { Lexer } from "../../src/lexer/index.ts";
import { Parser } from "../../src/parser/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

function parseForms(input: string): SExpr[] {
  const source = new SourceFile("test.scrawl", input);
  const lexer = new Lexer(source);
  const parser = new Parser(lexer.tokenize(), source.filename);
  const program = parser.parse();
  const diagnostics = [...lexer.getDiagnostics(), ...parser.getDiagnostics()];
  if (diagnostics.length > 0) {
    throw new Error(`Parser errors: ${diagnostics.map((d) => d.message).join(", ")}`);
  }
  return program.forms;
}

function single(input: string): SExpr {
  const [form] = parseForms(input);
  if (form === undefined) throw new Error("expected one expression");
  return form;
}

export function build(input: string): IrProgram {
  const source = new SourceFile("test.scrawl", input);
  const parser = new Parser(new Lexer(source).tokenize());
  return buildProgram(parser.parse());
}

export function expr(input: string): IrExpr {
  return buildExpr(single(input));
}

export function stmt(input: string): IrStmt {
  return buildStmt(single(input));
}

/** The CompileError thrown by `fn`, which must throw one. */
export function compileError(fn: () => unknown): CompileError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CompileError) return err;
    throw err;
  }
  throw new Error("expected a CompileError");
}
