/**
 * Arithmetic for AsmEmitter: add/sub and mul/div groups, inline math and
 * libm calls. Extracted from asm-emitter.ts for modularity.
 *
 * Groups accumulate into an 8-byte stack slot so nested operands may call
 * helpers freely.
 */

import type { IrExpr } from "../ir/ir-types.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { argument, doubleBits } from "./asm-expr.ts";
import { Typ } from "./representation.ts";
import { LIBM_FUNCTIONS } from "./runtime.ts";

const SIGN_BIT = "0x8000000000000000";
const ABS_MASK = "0x7FFFFFFFFFFFFFFF";

type AccumulatorOp = "add" | "mul";

const OPERATIONS: Readonly<Record<AccumulatorOp, { combine: string; invert: string; identity: number }>> = {
  add: { combine: "addsd", invert: "subsd", identity: 0 },
  mul: { combine: "mulsd", invert: "divsd", identity: 1 },
};

/**
 * Shared shape of add/sub and mul/div:
 *   ([], [])          → the identity
 *   ([x], [])         → x as a number
 *   (terms, inverses) → accumulate left to right
 *   ([], inverses)    → negated sum / reciprocal product of the inverses
 */
function compileAccumulation(
  emitter: AsmEmitter,
  op: AccumulatorOp,
  terms: readonly IrExpr[],
  inverses: readonly IrExpr[]
): Typ {
  const { combine, invert, identity } = OPERATIONS[op];
  const [first, ...rest] = terms.length > 0 ? terms : inverses;

  if (first === undefined) {
    if (identity === 0) {
      emitter.emit("xorpd xmm0, xmm0");
      return Typ.Double;
    }
    return emitter.compileLiteral(identity);
  }
  if (terms.length === 1 && inverses.length === 0) {
    return emitter.compileAs(first, "double");
  }

  emitter.compileAs(first, "double");
  emitter.reserve(8);
  emitter.emit("movsd [rsp], xmm0");

  for (const term of rest) {
    emitter.compileAs(term, "double");
    emitter.emit(`${combine} xmm0, [rsp]`, "movsd [rsp], xmm0");
  }

  if (terms.length > 0) {
    for (const inverse of inverses) {
      emitter.compileAs(inverse, "double");
      emitter.emit("movsd xmm1, [rsp]", `${invert} xmm1, xmm0`, "movsd [rsp], xmm1");
    }
    emitter.emit("movsd xmm0, [rsp]");
  } else if (op === "add") {
    emitter.emit(`mov rax, ${SIGN_BIT}`, "xor [rsp], rax", "movsd xmm0, [rsp]");
  } else {
    emitter.emit(`mov rax, ${doubleBits(1)}`, "movq xmm0, rax", "divsd xmm0, [rsp]");
  }

  emitter.release(8);
  return Typ.Double;
}

export function compileAddSub(this: AsmEmitter, positives: readonly IrExpr[], negatives: readonly IrExpr[]): Typ {
  return compileAccumulation(this, "add", positives, negatives);
}

export function compileMulDiv(this: AsmEmitter, numerators: readonly IrExpr[], denominators: readonly IrExpr[]): Typ {
  return compileAccumulation(this, "mul", numerators, denominators);
}

// ─── Unary math ───────────────────────────────────────────────────────────

export function compileInlineMath(
  this: AsmEmitter,
  func: "abs" | "floor" | "ceil" | "sqrt",
  args: readonly IrExpr[]
): Typ {
  this.compileAs(argument(args, 0), "double");
  switch (func) {
    case "abs":
      this.emit(`mov rax, ${ABS_MASK}`, "movq xmm1, rax", "andpd xmm0, xmm1");
      break;
    case "floor":
      this.emit("roundsd xmm0, xmm0, 1");
      break;
    case "ceil":
      this.emit("roundsd xmm0, xmm0, 2");
      break;
    case "sqrt":
      this.emit("sqrtsd xmm0, xmm0");
      break;
  }
  return Typ.Double;
}

export function compileLibmCall(
  this: AsmEmitter,
  func: Exclude<keyof typeof LIBM_FUNCTIONS, "mod">,
  args: readonly IrExpr[]
): Typ {
  this.compileAs(argument(args, 0), "double");
  this.alignedCall(LIBM_FUNCTIONS[func]);
  return Typ.Double;
}

/** Floating remainder with the sign of the dividend, as C `fmod`. */
export function compileMod(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  this.compileAs(argument(args, 0), "double");
  this.reserve(8);
  this.emit("movsd [rsp], xmm0");
  this.compileAs(argument(args, 1), "double");
  this.emit("movapd xmm1, xmm0", "movsd xmm0, [rsp]");
  this.alignedCall(LIBM_FUNCTIONS.mod);
  this.release(8);
  return Typ.Double;
}
