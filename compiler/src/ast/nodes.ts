/**
 * AST node types for scrawl source: parenthesised forms over literals and
 * symbols. Uses discriminated unions with a `kind` field.
 */

import type { Span } from "../lexer/token.ts";

// ─── Base ────────────────────────────────────────────────────────────────────

/** Common fields shared by all AST nodes. */
export interface BaseNode {
  kind: string;
  span: Span;
}

// ─── Expressions ─────────────────────────────────────────────────────────────

export enum SExprKind {
  Number = "NumberLit",
  Bool = "BoolLit",
  String = "StringLit",
  Symbol = "Symbol",
  Form = "Form",
}

export interface NumberLit extends BaseNode {
  kind: "NumberLit";
  value: number;
}

export interface BoolLit extends BaseNode {
  kind: "BoolLit";
  value: boolean;
}

/** String literal with escapes already decoded. */
export interface StringLit extends BaseNode {
  kind: "StringLit";
  value: string;
}

export interface SymbolExpr extends BaseNode {
  kind: "Symbol";
  name: string;
}

/** `(head args…)`; never empty. */
export interface Form extends BaseNode {
  kind: "Form";
  head: SExpr;
  args: SExpr[];
}

export type SExpr = NumberLit | BoolLit | StringLit | SymbolExpr | Form;

// ─── Program ─────────────────────────────────────────────────────────────────

export interface Program extends BaseNode {
  kind: "Program";
  forms: SExpr[];
}
