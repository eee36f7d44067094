/**
 * List expressions and statements for AsmEmitter.
 * Extracted from asm-emitter.ts for modularity.
 */

import { CompileError } from "../errors/index.ts";
import type { IrExpr, IrListAppend, IrListDelete, IrListDeleteAll, IrListReplace } from "../ir/ir-types.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { argument } from "./asm-expr.ts";
import { Typ } from "./representation.ts";

/** The label of a list named by a bare symbol argument. */
function listArgument(emitter: AsmEmitter, expr: IrExpr): string {
  if (expr.kind !== "sym") {
    throw new CompileError("ExpectedListName", "expected a list name", expr.span);
  }
  return emitter.listLabel(expr.name, expr.span);
}

// ─── Expressions ──────────────────────────────────────────────────────────

export function compileListLength(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  const list = listArgument(this, argument(args, 0));
  this.emit(`mov rdi, [${list}+8]`);
  this.alignedCall("usize_to_double");
  return Typ.Double;
}

/** `(!! list index)`: a copy of the item; "last" picks the final one. */
export function compileListItem(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  const list = listArgument(this, argument(args, 0));
  this.compileAs(argument(args, 1), "any");
  this.emit("mov rdi, rax", "mov rsi, rdx", `lea rdx, [${list}]`);
  this.alignedCall("list_get");
  return Typ.Any;
}

// ─── Statements ───────────────────────────────────────────────────────────

export function generateListAppend(this: AsmEmitter, stmt: IrListAppend): void {
  const list = this.listLabel(stmt.list, stmt.span);
  this.compileAs(stmt.value, "any");
  this.emit("mov rsi, rax", `lea rdi, [${list}]`);
  this.alignedCall("list_append");
}

export function generateListDelete(this: AsmEmitter, stmt: IrListDelete): void {
  const list = this.listLabel(stmt.list, stmt.span);
  this.compileAs(stmt.index, "any");
  this.emit("mov rdi, rax", "mov rsi, rdx", `lea rdx, [${list}]`);
  this.alignedCall("list_delete");
}

export function generateListDeleteAll(this: AsmEmitter, stmt: IrListDeleteAll): void {
  const list = this.listLabel(stmt.list, stmt.span);
  this.emit(`lea rdi, [${list}]`);
  this.alignedCall("list_delete_all");
}

/** Index first, then value; the value is held on the stack meanwhile. */
export function generateListReplace(this: AsmEmitter, stmt: IrListReplace): void {
  const list = this.listLabel(stmt.list, stmt.span);
  this.compileAs(stmt.index, "any");
  this.push("rdx");
  this.push("rax");
  this.compileAs(stmt.value, "any");
  this.emit("mov rcx, rdx", "mov rdx, rax");
  this.pop("rdi");
  this.pop("rsi");
  this.emit(`lea r8, [${list}]`);
  this.alignedCall("list_replace");
}
