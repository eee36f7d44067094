/**
 * Text operations for AsmEmitter: concatenation, length and character
 * access. Extracted from asm-emitter.ts for modularity.
 *
 * Operands arrive in cow form. Read-only text needs no release; anything
 * else is kept on the stack and released with `drop_pop_cow` once used.
 */

import type { IrExpr } from "../ir/ir-types.ts";
import { valueToText } from "../ir/value.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { argument } from "./asm-expr.ts";
import { Typ } from "./representation.ts";

/** Number of Unicode code points, as `str_length` counts UTF-8 sequences. */
export function codePointLength(text: string): number {
  return [...text].length;
}

/** Drops a cow pair from the top of the stack, releasing it unless it is read-only. */
function popCow(emitter: AsmEmitter, typ: Typ): void {
  if (typ === Typ.StaticStr) {
    emitter.release(16);
  } else {
    emitter.callPopping("drop_pop_cow");
  }
}

/**
 * `++` folds from the right: each step allocates `left + acc`, copies both
 * in, and releases the inputs that are not read-only.
 *
 * Stack during a step, from rsp up: left pointer, left length, acc pointer,
 * acc length, result pointer, total length.
 */
export function compileConcat(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  const last = args[args.length - 1];
  if (last === undefined) {
    this.loadStaticStr("");
    return Typ.StaticStr;
  }
  if (args.length === 1) {
    return this.compileExpr(last);
  }

  let accTyp = this.compileAs(last, "cow");
  const padded = this.padFor(0);

  for (const arg of args.slice(0, -1).reverse()) {
    this.push("rdx");
    this.reserve(8);
    this.push("rdx");
    this.push("rax");
    const leftTyp = this.compileAs(arg, "cow");
    this.emit("add [rsp+24], rdx");
    this.push("rdx");
    this.push("rax");
    this.emit("mov rdi, [rsp+40]");
    this.alignedCall("malloc");
    this.emit("mov [rsp+32], rax", "mov rdi, rax", "mov rsi, [rsp]", "mov rdx, [rsp+8]");
    this.alignedCall("memcpy");
    this.emit("mov rdi, rax", "add rdi, [rsp+8]", "mov rsi, [rsp+16]", "mov rdx, [rsp+24]");
    this.alignedCall("memcpy");
    popCow(this, leftTyp);
    popCow(this, accTyp);
    this.pop("rax");
    this.pop("rdx");
    accTyp = Typ.OwnedString;
  }

  this.unpad(padded);
  return Typ.OwnedString;
}

export function compileStrLength(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  const text = argument(args, 0);
  if (text.kind === "lit") {
    return this.compileLiteral(codePointLength(valueToText(text.value)));
  }

  const typ = this.compileAs(text, "cow");
  if (typ === Typ.StaticStr) {
    this.emit("mov rdi, rax", "mov rsi, rdx");
    this.alignedCall("str_length");
    this.emit("mov rdi, rax");
    this.alignedCall("usize_to_double");
    return Typ.Double;
  }

  const padded = this.padFor(3);
  this.reserve(8);
  this.push("rdx");
  this.push("rax");
  this.emit("mov rdi, rax", "mov rsi, rdx");
  this.alignedCall("str_length");
  this.emit("mov rdi, rax");
  this.alignedCall("usize_to_double");
  this.emit("movsd [rsp+16], xmm0");
  this.callPopping("drop_pop_cow");
  this.emit("movsd xmm0, [rsp]");
  this.release(8);
  this.unpad(padded);
  return Typ.Double;
}

/** `(char-at text index)` with a 1-based index; out of range gives "". */
export function compileCharAt(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  const typ = this.compileAs(argument(args, 0), "cow");

  if (typ === Typ.StaticStr) {
    this.push("rdx");
    this.push("rax");
    this.compileAs(argument(args, 1), "double");
    this.alignedCall("double_to_usize");
    this.emit("mov rdx, rax");
    this.pop("rdi");
    this.pop("rsi");
    this.alignedCall("char_at");
    return Typ.OwnedString;
  }

  const padded = this.padFor(4);
  this.reserve(16);
  this.push("rdx");
  this.push("rax");
  this.compileAs(argument(args, 1), "double");
  this.alignedCall("double_to_usize");
  this.emit("mov rdx, rax", "mov rdi, [rsp]", "mov rsi, [rsp+8]");
  this.alignedCall("char_at");
  this.emit("mov [rsp+16], rax", "mov [rsp+24], rdx");
  this.callPopping("drop_pop_cow");
  this.pop("rax");
  this.pop("rdx");
  this.unpad(padded);
  return Typ.OwnedString;
}
