/**
 * Emission primitives for AsmEmitter: text, labels, stack bookkeeping and
 * storage lookup. Extracted from asm-emitter.ts for modularity.
 *
 * Every instruction that moves rsp goes through push/pop/reserve/release so
 * `stackAligned` always says whether a `call` may be emitted right now.
 */

import { CompileError } from "../errors/index.ts";
import type { Span } from "../lexer/token.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { callTarget, type LibcFunction, type RuntimeHelper, stackWordsConsumed } from "./runtime.ts";

/** Memory operands of a 16-byte Any slot. */
export interface AnySlot {
  discriminant: string;
  payload: string;
}

// ─── Text ─────────────────────────────────────────────────────────────────

export function emit(this: AsmEmitter, ...instructions: string[]): void {
  for (const instruction of instructions) {
    this.text.push(`    ${instruction}`);
  }
}

export function emitLabel(this: AsmEmitter, label: string): void {
  this.text.push(`${label}:`);
}

export function freshId(this: AsmEmitter): number {
  return this.nextId++;
}

/** A NASM local label, scoped to the procedure being emitted. */
export function localLabel(this: AsmEmitter): string {
  return `.L${this.freshId()}`;
}

// ─── Stack ────────────────────────────────────────────────────────────────

export function push(this: AsmEmitter, operand: string): void {
  this.emit(`push ${operand}`);
  this.stackAligned = !this.stackAligned;
}

export function pop(this: AsmEmitter, operand: string): void {
  this.emit(`pop ${operand}`);
  this.stackAligned = !this.stackAligned;
}

/** `sub rsp, bytes` for a multiple of 8. */
export function reserve(this: AsmEmitter, bytes: number): void {
  this.emit(`sub rsp, ${bytes}`);
  if ((bytes / 8) % 2 === 1) this.stackAligned = !this.stackAligned;
}

export function release(this: AsmEmitter, bytes: number): void {
  this.emit(`add rsp, ${bytes}`);
  if ((bytes / 8) % 2 === 1) this.stackAligned = !this.stackAligned;
}

/**
 * Pads the stack when needed so that it is aligned once `words` more words
 * are pushed. Returns whether a pad was reserved; pass it to {@link unpad}.
 */
export function padFor(this: AsmEmitter, words: number): boolean {
  const alignedAfter = this.stackAligned === (words % 2 === 0);
  if (alignedAfter) return false;
  this.reserve(8);
  return true;
}

export function unpad(this: AsmEmitter, padded: boolean): void {
  if (padded) this.release(8);
}

// ─── Calls ────────────────────────────────────────────────────────────────

/** Calls a helper or library function that takes no stack arguments, padding around it if needed. */
export function alignedCall(this: AsmEmitter, target: RuntimeHelper | LibcFunction): void {
  if (stackWordsConsumed(target) > 0) {
    throw new Error(`${target} pops stack arguments and must be called through callPopping`);
  }
  if (this.stackAligned) {
    this.emit(`call ${callTarget(target)}`);
    return;
  }
  this.emit("sub rsp, 8", `call ${callTarget(target)}`, "add rsp, 8");
}

/**
 * Calls a helper that pops its arguments off the stack. The caller arranges
 * alignment beforehand with {@link padFor}, since a pad cannot sit between
 * the arguments and the return address.
 */
export function callPopping(this: AsmEmitter, helper: RuntimeHelper): void {
  this.assertAligned(helper);
  this.emit(`call ${callTarget(helper)}`);
  if (stackWordsConsumed(helper) % 2 === 1) this.stackAligned = !this.stackAligned;
}

export function assertAligned(this: AsmEmitter, callee: string): void {
  if (!this.stackAligned) {
    throw new Error(`stack is not 16-byte aligned at the call to ${callee}`);
  }
}

// ─── Static text ──────────────────────────────────────────────────────────

const encoder = new TextEncoder();

export function byteLength(text: string): number {
  return encoder.encode(text).length;
}

/** Label of read-only data holding `text`, interned on first use. */
export function internString(this: AsmEmitter, text: string): string {
  if (text === "") return "str_empty";
  const existing = this.staticStrings.get(text);
  if (existing !== undefined) return existing;
  const label = `lit_${this.freshId()}`;
  this.staticStrings.set(text, label);
  return label;
}

/** rax:rdx = the interned text (StaticStr). */
export function loadStaticStr(this: AsmEmitter, text: string): void {
  const label = this.internString(text);
  const length = byteLength(text);
  this.emit(`lea rax, [${label}]`, length === 0 ? "xor edx, edx" : `mov edx, ${length}`);
}

// ─── Storage ──────────────────────────────────────────────────────────────

function storageKey(owner: string, name: string): string {
  return `${owner}\u0000${name}`;
}

/**
 * Where a variable or parameter lives. Parameters come first, then the
 * sprite's variables, then the stage's.
 */
export function variableSlot(this: AsmEmitter, name: string, span: Span): AnySlot {
  const paramIndex = this.params.indexOf(name);
  if (paramIndex !== -1) {
    const offset = 16 * (this.params.length - paramIndex);
    return { discriminant: `[rbp+${offset}]`, payload: `[rbp+${offset + 8}]` };
  }

  const owner = this.sprite.variables.includes(name)
    ? this.sprite.name
    : this.program.stage.variables.includes(name)
      ? this.program.stage.name
      : null;
  if (owner === null) {
    throw new CompileError("UnknownVarOrList", `unknown variable '${name}'`, span);
  }

  const key = storageKey(owner, name);
  let label = this.variableLabels.get(key);
  if (label === undefined) {
    label = `var_${this.freshId()}`;
    this.variableLabels.set(key, label);
  }
  return { discriminant: `[${label}]`, payload: `[${label}+8]` };
}

/** Label of a list's `{items, length, capacity}` record. */
export function listLabel(this: AsmEmitter, name: string, span: Span): string {
  const owner = this.sprite.lists.includes(name)
    ? this.sprite.name
    : this.program.stage.lists.includes(name)
      ? this.program.stage.name
      : null;
  if (owner === null) {
    throw new CompileError("UnknownVarOrList", `unknown list '${name}'`, span);
  }

  const key = storageKey(owner, name);
  let label = this.listLabels.get(key);
  if (label === undefined) {
    label = `list_${this.freshId()}`;
    this.listLabels.set(key, label);
  }
  return label;
}
