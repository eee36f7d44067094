/**
 * Test utilities for assembly generation.
 */

import type { SExpr } from "../../src/ast/nodes.ts";
import { AsmEmitter, emitAsm } from "../../src/backend/index.ts";
import type { Typ } from "../../src/backend/representation.ts";
import { isRuntimeHelper, RUNTIME_HELPERS } from "../../src/backend/runtime.ts";
import { CompileError } from "../../src/errors/index.ts";
import { buildExpr, buildProgram, buildStmt } from "../../src/ir/index.ts";
import { Lexer } from "../../src/lexer/index.ts";
import { Parser } from "../../src/parser/index.ts";
import { SourceFile } from "../../src/utils/source.ts";

/** Declarations every expression and statement test can refer to. */
export const DECLARATIONS = "(stage (variables x y) (lists items))";

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

export function emitterFor(declarations = DECLARATIONS): AsmEmitter {
  const source = new SourceFile("test.scrawl", declarations);
  return new AsmEmitter(buildProgram(new Parser(new Lexer(source).tokenize()).parse()));
}

export interface Options {
  /** Stack parity before the code starts; aligned by default. */
  aligned?: boolean;
  declarations?: string;
}

/** Emitted instructions with indentation removed; labels keep their colon. */
export function lines(emitter: AsmEmitter): string[] {
  return emitter.text.map((line) => line.trim());
}

export function compileExpr(input: string, options: Options = {}): { typ: Typ; lines: string[]; emitter: AsmEmitter } {
  const emitter = emitterFor(options.declarations);
  emitter.stackAligned = options.aligned ?? true;
  const typ = emitter.compileExpr(buildExpr(single(input)));
  return { typ, lines: lines(emitter), emitter };
}

export function compileStmt(input: string, options: Options = {}): { lines: string[]; emitter: AsmEmitter } {
  const emitter = emitterFor(options.declarations);
  emitter.stackAligned = options.aligned ?? true;
  emitter.generateStmt(buildStmt(single(input)));
  return { lines: lines(emitter), emitter };
}

export function compileProgram(input: string): string {
  const source = new SourceFile("test.scrawl", input);
  return emitAsm(buildProgram(new Parser(new Lexer(source).tokenize()).parse()));
}

/** Instructions of the routine at `label`, up to the blank line that ends it. */
export function routine(asm: string, label: string): string[] {
  const all = asm.split("\n");
  const start = all.indexOf(`${label}:`);
  if (start === -1) throw new Error(`no routine '${label}'`);
  const end = all.indexOf("", start);
  return all.slice(start + 1, end === -1 ? undefined : end).map((line) => line.trim());
}

export function count(haystack: readonly string[], line: string): number {
  return haystack.filter((l) => l === line).length;
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

// ─── Stack simulation ────────────────────────────────────────────────────────

export interface StackTrace {
  /** Targets of calls made while rsp was not 16-byte aligned. */
  misaligned: string[];
  /** Words on the stack at the end, relative to the start. */
  depth: number;
}

/**
 * Follows rsp through straight-line output, ignoring jumps, and checks every
 * call. Every branch of the generated code leaves the stack as the fall-through
 * path does, so the linear walk sees the depth each call runs at.
 */
export function simulateStack(instructions: readonly string[], startAligned = true): StackTrace {
  const misaligned: string[] = [];
  let depth = 0;
  const parityOffset = startAligned ? 0 : 1;

  for (const instruction of instructions) {
    const [op = "", ...rest] = instruction.split(/\s+/);
    const operands = rest.join(" ");
    if (op === "push") depth++;
    else if (op === "pop") depth--;
    else if (op === "sub" && operands.startsWith("rsp,")) depth += Number(operands.slice(4)) / 8;
    else if (op === "add" && operands.startsWith("rsp,")) depth -= Number(operands.slice(4)) / 8;
    else if (op === "call") {
      const target = rest[0] ?? "";
      if ((depth + parityOffset) % 2 !== 0) misaligned.push(target);
      if (isRuntimeHelper(target)) depth -= RUNTIME_HELPERS[target].stackWords;
    }
  }

  return { misaligned, depth };
}
