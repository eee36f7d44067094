/**
 * Fatal errors raised while building the IR or generating assembly.
 * The first one aborts the unit; the pipeline turns it into a Diagnostic.
 */

import type { Span } from "../lexer/token.ts";
import type { SourceFile } from "../utils/source.ts";
import { type Diagnostic, Severity } from "./diagnostic.ts";

export type CompileErrorKind =
  | "UnknownVarOrList"
  | "ExpectedListName"
  | "UnknownFunction"
  | "FunctionWrongArgCount"
  | "UnsupportedOperands"
  | "UnknownProcedure"
  | "ProcedureWrongArgCount"
  | "DuplicateProcedure"
  | "InvalidEntrySignature"
  | "InvalidForm";

export class CompileError extends Error {
  readonly kind: CompileErrorKind;
  readonly span: Span;

  constructor(kind: CompileErrorKind, message: string, span: Span) {
    super(message);
    this.name = "CompileError";
    this.kind = kind;
    this.span = span;
  }

  toDiagnostic(source: SourceFile): Diagnostic {
    return {
      severity: Severity.Error,
      message: this.message,
      location: source.location(this.span.start),
    };
  }
}
