import type { SourceFile } from "../utils/source.ts";

export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  offset: number;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: SourceLocation;
}

/** Render `file:line:col: severity: message`, plus the source line and a caret when available. */
export function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const loc = diag.location;
  const file = loc.file || "<unknown>";
  const header = `${file}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`;

  if (!source) return header;

  const srcLine = source.lineText(loc.line);
  if (srcLine === null) return header;

  const caret = `${" ".repeat(Math.max(loc.column - 1, 0))}^`;
  return `${header}\n  ${srcLine}\n  ${caret}`;
}

export function countErrors(diagnostics: readonly Diagnostic[]): number {
  return diagnostics.filter((d) => d.severity === Severity.Error).length;
}
