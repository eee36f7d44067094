/**
 * Procedures for AsmEmitter: registration, bodies and calls.
 * Extracted from asm-emitter.ts for modularity.
 *
 * Arguments are pushed as Any pairs, first argument first, and released by
 * the caller after the call returns. Inside the body parameter i of n sits
 * at [rbp + 16 * (n - i)].
 */

import { CompileError } from "../errors/index.ts";
import { ENTRY_PROCEDURE, type IrProcCall, type IrProcedure, type IrSprite } from "../ir/ir-types.ts";
import type { AsmEmitter } from "./asm-emitter.ts";

export interface ProcedureInfo {
  label: string;
  arity: number;
}

/**
 * Assigns a label to every procedure of `sprite` and makes its custom
 * procedures callable. Returns the labels in declaration order.
 */
export function registerProcedures(this: AsmEmitter, sprite: IrSprite): string[] {
  this.procedures = new Map();
  const labels: string[] = [];

  for (const proc of sprite.procedures) {
    const label = `proc_${this.freshId()}`;
    labels.push(label);

    if (proc.name === ENTRY_PROCEDURE) {
      if (proc.params.length > 0) {
        throw new CompileError(
          "InvalidEntrySignature",
          `'${ENTRY_PROCEDURE}' takes no parameters, found ${proc.params.length}`,
          proc.span
        );
      }
      this.entryPoints.push(label);
      continue;
    }

    if (this.procedures.has(proc.name)) {
      throw new CompileError(
        "DuplicateProcedure",
        `procedure '${proc.name}' is already defined in '${sprite.name}'`,
        proc.span
      );
    }
    this.procedures.set(proc.name, { label, arity: proc.params.length });
  }

  return labels;
}

export function generateSprite(this: AsmEmitter, sprite: IrSprite): void {
  this.sprite = sprite;
  const labels = this.registerProcedures(sprite);
  sprite.procedures.forEach((proc, idx) => {
    const label = labels[idx];
    if (label !== undefined) this.generateProcedure(proc, label);
  });
}

export function generateProcedure(this: AsmEmitter, proc: IrProcedure, label: string): void {
  this.text.push("");
  this.emitLabel(label);
  this.params = proc.params;
  // The call pushed a return address.
  this.stackAligned = false;
  this.push("rbp");
  this.emit("mov rbp, rsp");
  this.generateStmt(proc.body);
  this.pop("rbp");
  this.emit("ret");
  this.params = [];
}

export function generateProcCall(this: AsmEmitter, stmt: IrProcCall): void {
  const info = this.procedures.get(stmt.name);
  if (info === undefined) {
    throw new CompileError(
      "UnknownProcedure",
      `unknown procedure '${stmt.name}' in '${this.sprite.name}'`,
      stmt.span
    );
  }
  if (info.arity !== stmt.args.length) {
    const noun = info.arity === 1 ? "argument" : "arguments";
    throw new CompileError(
      "ProcedureWrongArgCount",
      `'${stmt.name}' takes ${info.arity} ${noun}, found ${stmt.args.length}`,
      stmt.span
    );
  }

  const padded = this.padFor(0);
  for (const arg of stmt.args) {
    this.compileAs(arg, "any");
    this.push("rdx");
    this.push("rax");
  }
  this.assertAligned(stmt.name);
  this.emit(`call ${info.label}`);
  for (const _arg of stmt.args) {
    this.callPopping("drop_pop_any");
  }
  this.unpad(padded);
}
