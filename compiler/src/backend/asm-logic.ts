/**
 * Boolean operators and comparisons for AsmEmitter.
 * Extracted from asm-emitter.ts for modularity.
 */

import { CompileError } from "../errors/index.ts";
import type { IrExpr } from "../ir/ir-types.ts";
import type { Span } from "../lexer/token.ts";
import type { AsmEmitter } from "./asm-emitter.ts";
import { argument } from "./asm-expr.ts";
import { Typ } from "./representation.ts";

/**
 * `and` / `or`: every operand but the last is tested as a Bool and may jump
 * straight to the end, leaving 0 (and) or 1 (or) in rax. One operand passes
 * through untouched; none is the identity.
 */
export function compileShortCircuit(this: AsmEmitter, op: "and" | "or", args: readonly IrExpr[]): Typ {
  const last = args[args.length - 1];
  if (last === undefined) {
    return this.compileLiteral(op === "and");
  }
  if (args.length === 1) {
    return this.compileExpr(last);
  }

  const end = this.localLabel();
  const jump = op === "and" ? "jz" : "jnz";
  for (const arg of args.slice(0, -1)) {
    this.compileAs(arg, "bool");
    this.emit("test rax, rax", `${jump} ${end}`);
  }
  this.compileAs(last, "bool");
  this.emitLabel(end);
  return Typ.Bool;
}

export function compileNot(this: AsmEmitter, args: readonly IrExpr[]): Typ {
  this.compileAs(argument(args, 0), "bool");
  this.emit("xor rax, 1");
  return Typ.Bool;
}

function unsupported(op: string, lhs: Typ, rhs: Typ | null, span: Span): CompileError {
  const operands = rhs === null ? `${lhs}` : `${lhs} and ${rhs}`;
  return new CompileError("UnsupportedOperands", `'${op}' is not supported for ${operands} operands`, span);
}

/**
 * `<`, `=`, `>` on two numbers; `>` swaps its operands and compiles as `<`.
 * A number compared for equality with a Bool is false. Other operand kinds
 * are rejected.
 */
export function compileComparison(
  this: AsmEmitter,
  op: "=" | "<" | ">",
  args: readonly IrExpr[],
  span: Span
): Typ {
  let lhs = argument(args, 0);
  let rhs = argument(args, 1);
  if (op === ">") {
    [lhs, rhs] = [rhs, lhs];
  }
  const equality = op === "=";

  const lhsTyp = this.compileExpr(lhs);
  if (lhsTyp !== Typ.Double) {
    throw unsupported(op, lhsTyp, null, span);
  }

  this.reserve(8);
  this.emit("movsd [rsp], xmm0");
  const rhsTyp = this.compileExpr(rhs);

  if (rhsTyp === Typ.Double) {
    this.emit("movsd xmm1, [rsp]", "xor eax, eax");
    if (equality) {
      // Unordered operands set ZF as well, so PF must be clear too.
      this.emit("ucomisd xmm1, xmm0", "sete al", "setnp cl", "and al, cl");
    } else {
      this.emit("ucomisd xmm0, xmm1", "seta al");
    }
  } else if (rhsTyp === Typ.Bool && equality) {
    this.emit("xor eax, eax");
  } else {
    throw unsupported(op, lhsTyp, rhsTyp, span);
  }

  this.release(8);
  return Typ.Bool;
}
