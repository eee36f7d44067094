export { CompileError } from "./compile-error.ts";
export type { CompileErrorKind } from "./compile-error.ts";
export { Severity, countErrors, formatDiagnostic } from "./diagnostic.ts";
export type { Diagnostic, SourceLocation } from "./diagnostic.ts";
