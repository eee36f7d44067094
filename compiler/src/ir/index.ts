export { buildExpr, buildProgram, buildStmt, STAGE_NAME } from "./builder.ts";
export * from "./ir-types.ts";
export { printExpr, printIr } from "./printer.ts";
export { numberToText, textToBool, textToNumber, valueToBool, valueToNumber, valueToText } from "./value.ts";
