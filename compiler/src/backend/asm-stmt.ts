/**
 * Statement code generation for AsmEmitter.
 * Extracted from asm-emitter.ts for modularity.
 *
 * A statement leaves the stack as it found it, so loops may keep their
 * counters at [rsp] across the body.
 */

import type {
  IrFor,
  IrIfElse,
  IrPrint,
  IrRepeat,
  IrSetVar,
  IrStmt,
  IrUntil,
  IrWhile,
} from "../ir/ir-types.ts";
import { valueToText } from "../ir/value.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { type AnySlot, byteLength } from "./asm-utils.ts";
import { Typ } from "./representation.ts";

const SYS_WRITE = 1;
const STDOUT = 1;

export function generateStmt(this: AsmEmitter, stmt: IrStmt): void {
  switch (stmt.kind) {
    case "proc_call":
      this.generateProcCall(stmt);
      return;
    case "print":
      this.generatePrint(stmt);
      return;
    case "set_var":
      this.generateSetVar(stmt);
      return;
    case "list_append":
      this.generateListAppend(stmt);
      return;
    case "list_delete":
      this.generateListDelete(stmt);
      return;
    case "list_delete_all":
      this.generateListDeleteAll(stmt);
      return;
    case "list_replace":
      this.generateListReplace(stmt);
      return;
    case "do":
      for (const inner of stmt.body) {
        this.generateStmt(inner);
      }
      return;
    case "if_else":
      this.generateIfElse(stmt);
      return;
    case "repeat":
      this.generateRepeat(stmt);
      return;
    case "forever": {
      const top = this.localLabel();
      this.emitLabel(top);
      this.generateStmt(stmt.body);
      this.emit(`jmp ${top}`);
      return;
    }
    case "until":
    case "while":
      this.generateConditionLoop(stmt);
      return;
    case "for":
      this.generateFor(stmt);
      return;
  }
}

// ─── Output ───────────────────────────────────────────────────────────────

/** Writes the text form of the value to stdout with a raw `write`. */
export function generatePrint(this: AsmEmitter, stmt: IrPrint): void {
  if (stmt.value.kind === "lit") {
    const text = valueToText(stmt.value.value);
    if (text === "") return;
    this.emit(
      `mov eax, ${SYS_WRITE}`,
      `mov edi, ${STDOUT}`,
      `lea rsi, [${this.internString(text)}]`,
      `mov edx, ${byteLength(text)}`,
      "syscall"
    );
    return;
  }

  const typ = this.compileAs(stmt.value, "cow");
  if (typ === Typ.StaticStr) {
    this.emit("mov rsi, rax", `mov eax, ${SYS_WRITE}`, `mov edi, ${STDOUT}`, "syscall");
    return;
  }

  const padded = this.padFor(2);
  this.push("rdx");
  this.push("rax");
  this.emit("mov rsi, rax", `mov eax, ${SYS_WRITE}`, `mov edi, ${STDOUT}`, "syscall");
  this.callPopping("drop_pop_cow");
  this.unpad(padded);
}

// ─── Variables ────────────────────────────────────────────────────────────

export function generateSetVar(this: AsmEmitter, stmt: IrSetVar): void {
  const slot = this.variableSlot(stmt.name, stmt.span);
  this.compileAs(stmt.value, "any");
  this.storeAny(slot);
}

/** Moves the Any in rax:rdx into `slot`, releasing what was there. */
export function storeAny(this: AsmEmitter, slot: AnySlot): void {
  this.push("rdx");
  this.push("rax");
  this.emit(`mov rdi, ${slot.discriminant}`, `mov rsi, ${slot.payload}`);
  this.alignedCall("drop_any");
  this.pop("rax");
  this.pop("rdx");
  this.emit(`mov ${slot.discriminant}, rax`, `mov ${slot.payload}, rdx`);
}

// ─── Control flow ─────────────────────────────────────────────────────────

export function generateIfElse(this: AsmEmitter, stmt: IrIfElse): void {
  const elseLabel = this.localLabel();
  const end = this.localLabel();
  this.compileAs(stmt.condition, "bool");
  this.emit("test rax, rax", `jz ${elseLabel}`);
  this.generateStmt(stmt.consequent);
  this.emit(`jmp ${end}`);
  this.emitLabel(elseLabel);
  this.generateStmt(stmt.alternate);
  this.emitLabel(end);
}

/** rax = the count, rounded to the nearest integer and clamped at 0. */
function compileCount(emitter: AsmEmitter, stmt: IrRepeat | IrFor): void {
  emitter.compileAs(stmt.times, "double");
  emitter.emit("roundsd xmm0, xmm0, 0");
  emitter.alignedCall("double_to_usize");
}

export function generateRepeat(this: AsmEmitter, stmt: IrRepeat): void {
  const top = this.localLabel();
  const end = this.localLabel();
  compileCount(this, stmt);
  this.push("rax");
  this.emitLabel(top);
  this.emit("cmp qword [rsp], 0", `je ${end}`, "dec qword [rsp]");
  this.generateStmt(stmt.body);
  this.emit(`jmp ${top}`);
  this.emitLabel(end);
  this.release(8);
}

/** The condition is tested before every run of the body. */
export function generateConditionLoop(this: AsmEmitter, stmt: IrUntil | IrWhile): void {
  const top = this.localLabel();
  const end = this.localLabel();
  this.emitLabel(top);
  this.compileAs(stmt.condition, "bool");
  this.emit("test rax, rax", `${stmt.kind === "until" ? "jnz" : "jz"} ${end}`);
  this.generateStmt(stmt.body);
  this.emit(`jmp ${top}`);
  this.emitLabel(end);
}

/** Counter at [rsp], limit at [rsp+8]. */
export function generateFor(this: AsmEmitter, stmt: IrFor): void {
  const slot = this.variableSlot(stmt.counter, stmt.span);
  const top = this.localLabel();
  const end = this.localLabel();
  compileCount(this, stmt);
  this.push("rax");
  this.push("qword 0");
  this.emitLabel(top);
  this.emit(
    "mov rax, [rsp]",
    "cmp rax, [rsp+8]",
    `jae ${end}`,
    "inc rax",
    "mov [rsp], rax",
    "cvtsi2sd xmm0, rax",
    "movq rdx, xmm0",
    "mov eax, 2"
  );
  this.storeAny(slot);
  this.generateStmt(stmt.body);
  this.emit(`jmp ${top}`);
  this.emitLabel(end);
  this.release(16);
}
