/**
 * AST → IR lowering for statements.
 * Extracted from builder.ts for modularity.
 */

import type { Form, SExpr } from "../ast/nodes.ts";
import { CompileError } from "../errors/index.ts";
import type { Span } from "../lexer/token.ts";
import { buildExpr } from "./builder-expr.ts";
import type { IrExpr, IrStmt } from "./ir-types.ts";

/** `(do …)` over the given statements. */
export function buildBlock(body: readonly SExpr[], span: Span): IrStmt {
  return { kind: "do", body: body.map(buildStmt), span };
}

export function buildStmt(sexpr: SExpr): IrStmt {
  if (sexpr.kind !== "Form" || sexpr.head.kind !== "Symbol") {
    throw new CompileError("InvalidForm", "expected a statement form such as (print …)", sexpr.span);
  }

  const form = sexpr;
  const name = sexpr.head.name;
  const args = form.args;
  const span = form.span;

  switch (name) {
    case "do":
      return buildBlock(args, span);

    case "if": {
      expectArgs(form, name, 2, 3);
      const [condition, consequent, alternate] = args;
      return {
        kind: "if_else",
        condition: buildExpr(required(condition, span)),
        consequent: buildStmt(required(consequent, span)),
        alternate: alternate === undefined ? { kind: "do", body: [], span } : buildStmt(alternate),
        span,
      };
    }

    case "repeat": {
      expectArgs(form, name, 1, Infinity);
      const [times, ...body] = args;
      return { kind: "repeat", times: buildExpr(required(times, span)), body: buildBlock(body, span), span };
    }

    case "forever":
      return { kind: "forever", body: buildBlock(args, span), span };

    case "until":
    case "while": {
      expectArgs(form, name, 1, Infinity);
      const [condition, ...body] = args;
      const loop = { condition: buildExpr(required(condition, span)), body: buildBlock(body, span), span };
      return name === "until" ? { kind: "until", ...loop } : { kind: "while", ...loop };
    }

    case "for": {
      expectArgs(form, name, 2, Infinity);
      const [counter, times, ...body] = args;
      return {
        kind: "for",
        counter: expectName(required(counter, span), "a counter variable"),
        times: buildExpr(required(times, span)),
        body: buildBlock(body, span),
        span,
      };
    }

    case "print":
      expectArgs(form, name, 1, 1);
      return { kind: "print", value: buildExpr(required(args[0], span)), span };

    case ":=":
    case "+=": {
      expectArgs(form, name, 2, 2);
      const target = required(args[0], span);
      const variable = expectName(target, "a variable");
      let value: IrExpr = buildExpr(required(args[1], span));
      if (name === "+=") {
        const current: IrExpr = { kind: "sym", name: variable, span: target.span };
        value = { kind: "add_sub", positives: [current, value], negatives: [], span };
      }
      return { kind: "set_var", name: variable, value, span };
    }

    case "append":
      expectArgs(form, name, 2, 2);
      return { kind: "list_append", list: expectListName(args[0], span), value: buildExpr(required(args[1], span)), span };

    case "delete":
      expectArgs(form, name, 2, 2);
      return { kind: "list_delete", list: expectListName(args[0], span), index: buildExpr(required(args[1], span)), span };

    case "delete-all":
      expectArgs(form, name, 1, 1);
      return { kind: "list_delete_all", list: expectListName(args[0], span), span };

    case "replace":
      expectArgs(form, name, 3, 3);
      return {
        kind: "list_replace",
        list: expectListName(args[0], span),
        index: buildExpr(required(args[1], span)),
        value: buildExpr(required(args[2], span)),
        span,
      };

    default:
      return { kind: "proc_call", name, args: args.map(buildExpr), span };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function expectArgs(form: Form, name: string, min: number, max: number): void {
  const found = form.args.length;
  if (found >= min && found <= max) return;
  const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
  const noun = min === 1 && (max === 1 || max === Infinity) ? "argument" : "arguments";
  throw new CompileError("InvalidForm", `'${name}' takes ${expected} ${noun}, found ${found}`, form.span);
}

/** Narrows an argument that `expectArgs` has already shown to exist. */
function required(sexpr: SExpr | undefined, span: Span): SExpr {
  if (sexpr === undefined) {
    throw new CompileError("InvalidForm", "missing argument", span);
  }
  return sexpr;
}

export function expectName(sexpr: SExpr, what: string): string {
  if (sexpr.kind !== "Symbol") {
    throw new CompileError("InvalidForm", `expected ${what} name`, sexpr.span);
  }
  return sexpr.name;
}

function expectListName(sexpr: SExpr | undefined, span: Span): string {
  const list = required(sexpr, span);
  if (list.kind !== "Symbol") {
    throw new CompileError("ExpectedListName", "expected a list name", list.span);
  }
  return list.name;
}
