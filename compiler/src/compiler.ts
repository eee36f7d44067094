/**
 * The whole pipeline: source text → tokens → AST → IR → assembly.
 *
 * Reader diagnostics are accumulated; the first CompileError from IR
 * construction or code generation ends the unit and is returned as a
 * diagnostic.
 */

import type { Program } from "./ast/nodes.ts";
import { emitAsm } from "./backend/index.ts";
import { CompileError, countErrors, type Diagnostic } from "./errors/index.ts";
import { buildProgram, type IrProgram } from "./ir/index.ts";
import { Lexer, type Token } from "./lexer/index.ts";
import { Parser } from "./parser/index.ts";
import type { SourceFile } from "./utils/source.ts";

export interface ParseResult {
  tokens: Token[];
  program: Program;
  diagnostics: Diagnostic[];
}

export interface CompileResult {
  /** Null when any error was reported. */
  assembly: string | null;
  /** Null when the reader failed or IR construction raised an error. */
  ir: IrProgram | null;
  diagnostics: Diagnostic[];
}

export function parseSource(source: SourceFile): ParseResult {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser(tokens, source.filename);
  const program = parser.parse();
  return {
    tokens,
    program,
    diagnostics: [...lexer.getDiagnostics(), ...parser.getDiagnostics()],
  };
}

export function compileSource(source: SourceFile): CompileResult {
  const { program, diagnostics } = parseSource(source);
  if (countErrors(diagnostics) > 0) {
    return { assembly: null, ir: null, diagnostics };
  }

  let ir: IrProgram | null = null;
  try {
    ir = buildProgram(program);
    return { assembly: emitAsm(ir), ir, diagnostics };
  } catch (err) {
    if (!(err instanceof CompileError)) throw err;
    return { assembly: null, ir, diagnostics: [...diagnostics, err.toDiagnostic(source)] };
  }
}
