/**
 * IR node types: the closed, name-resolved program the backend consumes.
 * Uses discriminated unions with a `kind` field, matching AST conventions.
 *
 * Function names are resolved to {@link BuiltinFunction} once, by the
 * builder; arithmetic is already folded into add/sub and mul/div groups.
 */

import type { Span } from "../lexer/token.ts";

// ─── Values ──────────────────────────────────────────────────────────────────

/** Compile-time value of a literal. */
export type Value = number | boolean | string;

// ─── Built-in functions ──────────────────────────────────────────────────────

export const BUILTIN_FUNCTIONS = [
  "!!",
  "++",
  "and",
  "or",
  "not",
  "=",
  "<",
  ">",
  "length",
  "str-length",
  "char-at",
  "mod",
  "abs",
  "floor",
  "ceil",
  "sqrt",
  "ln",
  "log",
  "e^",
  "ten^",
  "sin",
  "cos",
  "tan",
  "asin",
  "acos",
  "atan",
  "to-num",
] as const;

export type BuiltinFunction = (typeof BUILTIN_FUNCTIONS)[number];

/** Fixed argument count per function; `null` means any number. */
export const FUNCTION_ARITY: Readonly<Record<BuiltinFunction, number | null>> = {
  "!!": 2,
  "++": null,
  and: null,
  or: null,
  not: 1,
  "=": 2,
  "<": 2,
  ">": 2,
  length: 1,
  "str-length": 1,
  "char-at": 2,
  mod: 2,
  abs: 1,
  floor: 1,
  ceil: 1,
  sqrt: 1,
  ln: 1,
  log: 1,
  "e^": 1,
  "ten^": 1,
  sin: 1,
  cos: 1,
  tan: 1,
  asin: 1,
  acos: 1,
  atan: 1,
  "to-num": 1,
};

const BUILTIN_SET: ReadonlySet<string> = new Set(BUILTIN_FUNCTIONS);

export function isBuiltinFunction(name: string): name is BuiltinFunction {
  return BUILTIN_SET.has(name);
}

// ─── Expressions ─────────────────────────────────────────────────────────────

export interface IrLit {
  kind: "lit";
  value: Value;
  span: Span;
}

/** A variable or procedure parameter read (or a list name, where one is expected). */
export interface IrSym {
  kind: "sym";
  name: string;
  span: Span;
}

export interface IrFuncCall {
  kind: "func_call";
  func: BuiltinFunction;
  args: IrExpr[];
  span: Span;
}

/** Sum of `positives` minus the sum of `negatives`. */
export interface IrAddSub {
  kind: "add_sub";
  positives: IrExpr[];
  negatives: IrExpr[];
  span: Span;
}

/** Product of `numerators` divided by the product of `denominators`. */
export interface IrMulDiv {
  kind: "mul_div";
  numerators: IrExpr[];
  denominators: IrExpr[];
  span: Span;
}

export type IrExpr = IrLit | IrSym | IrFuncCall | IrAddSub | IrMulDiv;

// ─── Statements ──────────────────────────────────────────────────────────────

/** Call of a user-defined procedure of the current sprite. */
export interface IrProcCall {
  kind: "proc_call";
  name: string;
  args: IrExpr[];
  span: Span;
}

export interface IrPrint {
  kind: "print";
  value: IrExpr;
  span: Span;
}

export interface IrSetVar {
  kind: "set_var";
  name: string;
  value: IrExpr;
  span: Span;
}

export interface IrListAppend {
  kind: "list_append";
  list: string;
  value: IrExpr;
  span: Span;
}

export interface IrListDelete {
  kind: "list_delete";
  list: string;
  index: IrExpr;
  span: Span;
}

export interface IrListDeleteAll {
  kind: "list_delete_all";
  list: string;
  span: Span;
}

export interface IrListReplace {
  kind: "list_replace";
  list: string;
  index: IrExpr;
  value: IrExpr;
  span: Span;
}

export interface IrDo {
  kind: "do";
  body: IrStmt[];
  span: Span;
}

export interface IrIfElse {
  kind: "if_else";
  condition: IrExpr;
  consequent: IrStmt;
  alternate: IrStmt;
  span: Span;
}

export interface IrRepeat {
  kind: "repeat";
  times: IrExpr;
  body: IrStmt;
  span: Span;
}

export interface IrForever {
  kind: "forever";
  body: IrStmt;
  span: Span;
}

/** Runs `body` until `condition` holds. */
export interface IrUntil {
  kind: "until";
  condition: IrExpr;
  body: IrStmt;
  span: Span;
}

/** Runs `body` while `condition` holds. */
export interface IrWhile {
  kind: "while";
  condition: IrExpr;
  body: IrStmt;
  span: Span;
}

/** Sets `counter` to 1, 2, … `times` before each run of `body`. */
export interface IrFor {
  kind: "for";
  counter: string;
  times: IrExpr;
  body: IrStmt;
  span: Span;
}

export type IrStmt =
  | IrProcCall
  | IrPrint
  | IrSetVar
  | IrListAppend
  | IrListDelete
  | IrListDeleteAll
  | IrListReplace
  | IrDo
  | IrIfElse
  | IrRepeat
  | IrForever
  | IrUntil
  | IrWhile
  | IrFor;

// ─── Program structure ───────────────────────────────────────────────────────

/** Procedures named this run when the program starts. */
export const ENTRY_PROCEDURE = "when-flag-clicked";

export interface IrProcedure {
  name: string;
  params: string[];
  body: IrStmt;
  span: Span;
}

export interface IrSprite {
  name: string;
  variables: string[];
  lists: string[];
  procedures: IrProcedure[];
  span: Span;
}

/** The stage's variables and lists are visible from every sprite. */
export interface IrProgram {
  stage: IrSprite;
  sprites: IrSprite[];
}
