/**
 * Expression code generation for AsmEmitter: dispatch, literals, variable
 * reads and coercions. Extracted from asm-emitter.ts for modularity.
 *
 * Each method leaves its result in the registers its returned {@link Typ}
 * names and restores `stackAligned` to its value on entry.
 */

import { CompileError } from "../errors/index.ts";
import { FUNCTION_ARITY, type IrExpr, type IrFuncCall, type IrSym, type Value } from "../ir/ir-types.ts";
import { valueToBool, valueToNumber, valueToText } from "../ir/value.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { COERCIONS, coercedTyp, type Demand, resultRegisters, Typ } from "./representation.ts";
import { type Register, RUNTIME_HELPERS } from "./runtime.ts";

/** `0x…` immediate holding the IEEE-754 bits of `value`. */
export function doubleBits(value: number): string {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return `0x${view.getBigUint64(0).toString(16).toUpperCase().padStart(16, "0")}`;
}

// ─── Dispatch ─────────────────────────────────────────────────────────────

export function compileExpr(this: AsmEmitter, expr: IrExpr): Typ {
  switch (expr.kind) {
    case "lit":
      return this.compileLiteral(expr.value);
    case "sym":
      return this.compileVariableRead(expr);
    case "func_call":
      return this.compileFuncCall(expr);
    case "add_sub":
      return this.compileAddSub(expr.positives, expr.negatives);
    case "mul_div":
      return this.compileMulDiv(expr.numerators, expr.denominators);
  }
}

/**
 * Compiles `expr` and coerces the result for `demand`. Literals are converted
 * while compiling instead.
 */
export function compileAs(this: AsmEmitter, expr: IrExpr, demand: Demand): Typ {
  if (expr.kind === "lit") {
    return this.compileLiteralAs(expr.value, demand);
  }
  return this.coerce(this.compileExpr(expr), demand);
}

export function compileFuncCall(this: AsmEmitter, call: IrFuncCall): Typ {
  const arity = FUNCTION_ARITY[call.func];
  if (arity !== null && call.args.length !== arity) {
    const noun = arity === 1 ? "argument" : "arguments";
    throw new CompileError(
      "FunctionWrongArgCount",
      `'${call.func}' takes ${arity} ${noun}, found ${call.args.length}`,
      call.span
    );
  }

  switch (call.func) {
    case "++":
      return this.compileConcat(call.args);
    case "and":
    case "or":
      return this.compileShortCircuit(call.func, call.args);
    case "not":
      return this.compileNot(call.args);
    case "=":
    case "<":
    case ">":
      return this.compileComparison(call.func, call.args, call.span);
    case "length":
      return this.compileListLength(call.args);
    case "!!":
      return this.compileListItem(call.args);
    case "str-length":
      return this.compileStrLength(call.args);
    case "char-at":
      return this.compileCharAt(call.args);
    case "mod":
      return this.compileMod(call.args);
    case "abs":
    case "floor":
    case "ceil":
    case "sqrt":
      return this.compileInlineMath(call.func, call.args);
    case "ln":
    case "log":
    case "e^":
    case "ten^":
    case "sin":
    case "cos":
    case "tan":
    case "asin":
    case "acos":
    case "atan":
      return this.compileLibmCall(call.func, call.args);
    case "to-num":
      return this.compileAs(argument(call.args, 0), "double");
  }
}

/** The `index`th argument of a call whose arity is already checked. */
export function argument(args: readonly IrExpr[], index: number): IrExpr {
  const arg = args[index];
  if (arg === undefined) {
    throw new Error(`missing argument ${index} after the arity check`);
  }
  return arg;
}

// ─── Literals ─────────────────────────────────────────────────────────────

export function compileLiteral(this: AsmEmitter, value: Value): Typ {
  if (typeof value === "number") {
    this.emit(`mov rax, ${doubleBits(value)}`, "movq xmm0, rax");
    return Typ.Double;
  }
  if (typeof value === "boolean") {
    this.emit(value ? "mov eax, 1" : "xor eax, eax");
    return Typ.Bool;
  }
  this.loadStaticStr(value);
  return Typ.StaticStr;
}

/** A literal converted at compile time, so no runtime coercion is needed. */
export function compileLiteralAs(this: AsmEmitter, value: Value, demand: Demand): Typ {
  switch (demand) {
    case "double":
      return this.compileLiteral(valueToNumber(value));
    case "bool":
      return this.compileLiteral(valueToBool(value));
    case "cow":
      return this.compileLiteral(valueToText(value));
    case "any":
      if (typeof value === "number") {
        this.emit(`mov rdx, ${doubleBits(value)}`, "mov eax, 2");
        return Typ.Any;
      }
      return this.compileLiteral(value);
  }
}

// ─── Variables ────────────────────────────────────────────────────────────

/** Reads clone the stored Any, so the binding keeps its value. */
export function compileVariableRead(this: AsmEmitter, sym: IrSym): Typ {
  const slot = this.variableSlot(sym.name, sym.span);
  this.emit(`mov rdi, ${slot.discriminant}`, `mov rsi, ${slot.payload}`);
  this.alignedCall("clone_any");
  return Typ.Any;
}

// ─── Coercions ────────────────────────────────────────────────────────────

export function coerce(this: AsmEmitter, typ: Typ, demand: Demand): Typ {
  const coercion = COERCIONS[typ][demand];
  switch (coercion.kind) {
    case "identity":
      break;
    case "inline":
      this.emit(...coercion.instructions);
      break;
    case "helper":
      this.moveArguments(resultRegisters(typ), RUNTIME_HELPERS[coercion.helper].params);
      this.alignedCall(coercion.helper);
      break;
  }
  return coercedTyp(typ, demand);
}

/** Copies result registers into argument registers, pairwise. */
export function moveArguments(this: AsmEmitter, from: readonly Register[], to: readonly Register[]): void {
  from.forEach((source, idx) => {
    const target = to[idx];
    if (target !== undefined && target !== source) {
      this.emit(`mov ${target}, ${source}`);
    }
  });
}
