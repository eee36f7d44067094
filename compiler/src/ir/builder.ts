/**
 * AST → IR builder.
 *
 * Walks the top-level `(stage …)` and `(sprite "Name" …)` forms, collecting
 * variable and list declarations and procedures. Statement and expression
 * lowering live in builder-stmt.ts and builder-expr.ts. The first malformed
 * form raises a {@link CompileError}.
 */

import type { Form, Program, SExpr } from "../ast/nodes.ts";
import { CompileError } from "../errors/index.ts";
import type { Span } from "../lexer/token.ts";
import { buildBlock, expectName } from "./builder-stmt.ts";
import type { IrProcedure, IrProgram, IrSprite } from "./ir-types.ts";

export { buildExpr } from "./builder-expr.ts";
export { buildStmt } from "./builder-stmt.ts";

export const STAGE_NAME = "Stage";

export function buildProgram(program: Program): IrProgram {
  let stage: IrSprite | null = null;
  const sprites: IrSprite[] = [];

  for (const form of program.forms) {
    const head = form.kind === "Form" && form.head.kind === "Symbol" ? form.head.name : null;

    if (form.kind === "Form" && head === "stage") {
      if (stage !== null) {
        throw new CompileError("InvalidForm", "the stage is defined more than once", form.span);
      }
      stage = buildSprite(STAGE_NAME, form.args, form.span);
      continue;
    }

    if (form.kind === "Form" && head === "sprite") {
      const [nameForm, ...items] = form.args;
      const name = spriteName(nameForm, form);
      if (name === STAGE_NAME || sprites.some((s) => s.name === name)) {
        throw new CompileError("InvalidForm", `sprite '${name}' is defined more than once`, form.span);
      }
      sprites.push(buildSprite(name, items, form.span));
      continue;
    }

    throw new CompileError("InvalidForm", "expected (stage …) or (sprite \"Name\" …) at top level", form.span);
  }

  return {
    stage: stage ?? { name: STAGE_NAME, variables: [], lists: [], procedures: [], span: program.span },
    sprites,
  };
}

function spriteName(nameForm: SExpr | undefined, form: Form): string {
  if (nameForm?.kind === "StringLit") return nameForm.value;
  if (nameForm?.kind === "Symbol") return nameForm.name;
  throw new CompileError("InvalidForm", "expected a sprite name after 'sprite'", nameForm?.span ?? form.span);
}

// ─── Sprites ─────────────────────────────────────────────────────────────────

function buildSprite(name: string, items: readonly SExpr[], span: Span): IrSprite {
  const sprite: IrSprite = { name, variables: [], lists: [], procedures: [], span };

  for (const item of items) {
    const head = item.kind === "Form" && item.head.kind === "Symbol" ? item.head.name : null;
    if (item.kind !== "Form" || head === null) {
      throw new CompileError("InvalidForm", "expected (variables …), (lists …) or (proc …)", item.span);
    }

    switch (head) {
      case "variables":
        declareNames(sprite.variables, item.args, "a variable");
        break;
      case "lists":
        declareNames(sprite.lists, item.args, "a list");
        break;
      case "proc":
        sprite.procedures.push(buildProcedure(item));
        break;
      default:
        throw new CompileError("InvalidForm", `unknown sprite item '${head}'`, item.head.span);
    }
  }

  return sprite;
}

function declareNames(into: string[], names: readonly SExpr[], what: string): void {
  for (const sexpr of names) {
    const name = expectName(sexpr, what);
    if (!into.includes(name)) into.push(name);
  }
}

// ─── Procedures ──────────────────────────────────────────────────────────────

/** `(proc (name params…) body…)` */
function buildProcedure(form: Form): IrProcedure {
  const [signature, ...body] = form.args;
  if (signature?.kind !== "Form") {
    throw new CompileError("InvalidForm", "expected (name params…) after 'proc'", signature?.span ?? form.span);
  }

  const name = expectName(signature.head, "a procedure");
  const params = signature.args.map((param) => expectName(param, "a parameter"));
  return { name, params, body: buildBlock(body, form.span), span: form.span };
}
