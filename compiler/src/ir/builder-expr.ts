/**
 * AST → IR lowering for expressions.
 * Extracted from builder.ts for modularity.
 */

import type { Form, SExpr } from "../ast/nodes.ts";
import { CompileError } from "../errors/index.ts";
import { type IrExpr, isBuiltinFunction } from "./ir-types.ts";

export function buildExpr(sexpr: SExpr): IrExpr {
  switch (sexpr.kind) {
    case "NumberLit":
    case "BoolLit":
    case "StringLit":
      return { kind: "lit", value: sexpr.value, span: sexpr.span };
    case "Symbol":
      return { kind: "sym", name: sexpr.name, span: sexpr.span };
    case "Form":
      return buildCall(sexpr);
  }
}

function buildCall(form: Form): IrExpr {
  if (form.head.kind !== "Symbol") {
    throw new CompileError("InvalidForm", "expected a function name at the head of the form", form.head.span);
  }

  const name = form.head.name;
  const args = form.args.map(buildExpr);
  const span = form.span;

  switch (name) {
    case "+":
      return { kind: "add_sub", positives: args, negatives: [], span };
    case "-": {
      const [first, ...rest] = args;
      if (first === undefined) return { kind: "add_sub", positives: [], negatives: [], span };
      if (rest.length === 0) return { kind: "add_sub", positives: [], negatives: [first], span };
      return { kind: "add_sub", positives: [first], negatives: rest, span };
    }
    case "*":
      return { kind: "mul_div", numerators: args, denominators: [], span };
    case "/": {
      const [first, ...rest] = args;
      if (first === undefined) return { kind: "mul_div", numerators: [], denominators: [], span };
      if (rest.length === 0) return { kind: "mul_div", numerators: [], denominators: [first], span };
      return { kind: "mul_div", numerators: [first], denominators: rest, span };
    }
  }

  if (!isBuiltinFunction(name)) {
    throw new CompileError("UnknownFunction", `unknown function '${name}'`, form.head.span);
  }
  return { kind: "func_call", func: name, args, span };
}
