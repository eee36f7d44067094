/**
 * IR text format printer: human-readable debug output for `--ir`.
 */

import type { IrExpr, IrProcedure, IrProgram, IrSprite, IrStmt } from "./ir-types.ts";
import { formatValue } from "./value.ts";

export function printIr(program: IrProgram): string {
  const lines: string[] = [];
  for (const sprite of [program.stage, ...program.sprites]) {
    if (lines.length > 0) lines.push("");
    printSprite(sprite, lines);
  }
  return `${lines.join("\n")}\n`;
}

function printSprite(sprite: IrSprite, lines: string[]): void {
  lines.push(`sprite ${JSON.stringify(sprite.name)}`);
  if (sprite.variables.length > 0) lines.push(`  variables ${sprite.variables.join(" ")}`);
  if (sprite.lists.length > 0) lines.push(`  lists ${sprite.lists.join(" ")}`);
  for (const proc of sprite.procedures) {
    printProcedure(proc, lines);
  }
}

function printProcedure(proc: IrProcedure, lines: string[]): void {
  const params = proc.params.length > 0 ? ` ${proc.params.join(" ")}` : "";
  lines.push(`  proc (${proc.name}${params})`);
  printStmt(proc.body, 2, lines);
}

function printStmt(stmt: IrStmt, depth: number, lines: string[]): void {
  const pad = "  ".repeat(depth);
  switch (stmt.kind) {
    case "do":
      lines.push(`${pad}do`);
      for (const inner of stmt.body) printStmt(inner, depth + 1, lines);
      return;
    case "if_else":
      lines.push(`${pad}if ${printExpr(stmt.condition)}`);
      printStmt(stmt.consequent, depth + 1, lines);
      lines.push(`${pad}else`);
      printStmt(stmt.alternate, depth + 1, lines);
      return;
    case "repeat":
      lines.push(`${pad}repeat ${printExpr(stmt.times)}`);
      printStmt(stmt.body, depth + 1, lines);
      return;
    case "forever":
      lines.push(`${pad}forever`);
      printStmt(stmt.body, depth + 1, lines);
      return;
    case "until":
    case "while":
      lines.push(`${pad}${stmt.kind} ${printExpr(stmt.condition)}`);
      printStmt(stmt.body, depth + 1, lines);
      return;
    case "for":
      lines.push(`${pad}for ${stmt.counter} ${printExpr(stmt.times)}`);
      printStmt(stmt.body, depth + 1, lines);
      return;
    case "proc_call":
      lines.push(`${pad}call ${[stmt.name, ...stmt.args.map(printExpr)].join(" ")}`);
      return;
    case "print":
      lines.push(`${pad}print ${printExpr(stmt.value)}`);
      return;
    case "set_var":
      lines.push(`${pad}set ${stmt.name} ${printExpr(stmt.value)}`);
      return;
    case "list_append":
      lines.push(`${pad}append ${stmt.list} ${printExpr(stmt.value)}`);
      return;
    case "list_delete":
      lines.push(`${pad}delete ${stmt.list} ${printExpr(stmt.index)}`);
      return;
    case "list_delete_all":
      lines.push(`${pad}delete-all ${stmt.list}`);
      return;
    case "list_replace":
      lines.push(`${pad}replace ${stmt.list} ${printExpr(stmt.index)} ${printExpr(stmt.value)}`);
      return;
  }
}

export function printExpr(expr: IrExpr): string {
  switch (expr.kind) {
    case "lit":
      return formatValue(expr.value);
    case "sym":
      return expr.name;
    case "func_call":
      return `(${[expr.func, ...expr.args.map(printExpr)].join(" ")})`;
    case "add_sub":
      return `(add-sub [${expr.positives.map(printExpr).join(" ")}] [${expr.negatives.map(printExpr).join(" ")}])`;
    case "mul_div":
      return `(mul-div [${expr.numerators.map(printExpr).join(" ")}] [${expr.denominators.map(printExpr).join(" ")}])`;
  }
}
