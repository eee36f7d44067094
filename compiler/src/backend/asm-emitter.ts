/**
 * IR → x86-64 assembly (NASM, Linux) emitter.
 *
 * Walks the stage and then each sprite, emitting one routine per procedure,
 * and renders them after the runtime prelude together with the data they use.
 *
 * Method implementations are split across:
 *   - asm-utils.ts    (text, stack bookkeeping, storage lookup)
 *   - asm-expr.ts     (expression dispatch, literals, variables, coercions)
 *   - asm-logic.ts    (and / or / not, comparisons)
 *   - asm-math.ts     (arithmetic and math functions)
 *   - asm-strings.ts  (text functions)
 *   - asm-lists.ts    (list expressions and statements)
 *   - asm-stmt.ts     (statements and control flow)
 *   - asm-proc.ts     (procedures and calls)
 */

import type { IrProgram, IrSprite } from "../ir/ir-types.ts";
import * as exprMethods from "./asm-expr.ts";
import * as listMethods from "./asm-lists.ts";
import * as logicMethods from "./asm-logic.ts";
import * as mathMethods from "./asm-math.ts";
import * as procMethods from "./asm-proc.ts";
import type { ProcedureInfo } from "./asm-proc.ts";
import * as stmtMethods from "./asm-stmt.ts";
import * as stringMethods from "./asm-strings.ts";
import * as utilMethods from "./asm-utils.ts";
import { loadPrelude } from "./runtime.ts";

const SYS_EXIT = 60;

const encoder = new TextEncoder();

/** NASM `db` operands for `text`: printable ASCII quoted, other bytes numeric. */
export function dataBytes(text: string): string {
  const parts: string[] = [];
  let run = "";
  for (const byte of encoder.encode(text)) {
    if (byte >= 0x20 && byte < 0x7f && byte !== 0x22) {
      run += String.fromCharCode(byte);
      continue;
    }
    if (run !== "") {
      parts.push(`"${run}"`);
      run = "";
    }
    parts.push(String(byte));
  }
  if (run !== "") parts.push(`"${run}"`);
  return parts.join(", ");
}

// ─── Emitter ─────────────────────────────────────────────────────────────────

export class AsmEmitter {
  program: IrProgram;

  // Output
  text: string[] = [];
  /** Labels of the `when-flag-clicked` procedures, called in order by main. */
  entryPoints: string[] = [];

  // Data, interned on first use
  staticStrings: Map<string, string> = new Map();
  variableLabels: Map<string, string> = new Map();
  listLabels: Map<string, string> = new Map();

  /** Shared counter for every generated label. */
  nextId = 0;

  // Current procedure state
  /** Whether rsp is 16-byte aligned, i.e. a `call` may be emitted as is. */
  stackAligned = true;
  sprite: IrSprite;
  procedures: Map<string, ProcedureInfo> = new Map();
  params: readonly string[] = [];

  constructor(program: IrProgram) {
    this.program = program;
    this.sprite = program.stage;
  }

  emitProgram(): string {
    for (const sprite of [this.program.stage, ...this.program.sprites]) {
      this.generateSprite(sprite);
    }
    return this.render();
  }

  private render(): string {
    const lines: string[] = [loadPrelude().trimEnd(), "", "section .text", "", "main:", "    push rbp"];
    for (const entry of this.entryPoints) {
      lines.push(`    call ${entry}`);
    }
    lines.push(`    mov eax, ${SYS_EXIT}`, "    xor edi, edi", "    syscall");
    lines.push(...this.text);

    lines.push("", "section .data");
    // A fresh variable holds the number 0.
    for (const label of this.variableLabels.values()) {
      lines.push(`${label}: dq 2, 0`);
    }
    for (const label of this.listLabels.values()) {
      lines.push(`${label}: dq 0, 0, 0`);
    }

    if (this.staticStrings.size > 0) lines.push("");
    for (const [text, label] of this.staticStrings) {
      lines.push(`staticstr ${label}, db ${dataBytes(text)}`);
    }

    return `${lines.join("\n")}\n`;
  }

  // ─── Utility methods (from asm-utils.ts) ──────────────────────────────────
  declare emit: typeof utilMethods.emit;
  declare emitLabel: typeof utilMethods.emitLabel;
  declare freshId: typeof utilMethods.freshId;
  declare localLabel: typeof utilMethods.localLabel;
  declare push: typeof utilMethods.push;
  declare pop: typeof utilMethods.pop;
  declare reserve: typeof utilMethods.reserve;
  declare release: typeof utilMethods.release;
  declare padFor: typeof utilMethods.padFor;
  declare unpad: typeof utilMethods.unpad;
  declare alignedCall: typeof utilMethods.alignedCall;
  declare callPopping: typeof utilMethods.callPopping;
  declare assertAligned: typeof utilMethods.assertAligned;
  declare internString: typeof utilMethods.internString;
  declare loadStaticStr: typeof utilMethods.loadStaticStr;
  declare variableSlot: typeof utilMethods.variableSlot;
  declare listLabel: typeof utilMethods.listLabel;

  // ─── Expression methods (from asm-expr.ts) ────────────────────────────────
  declare compileExpr: typeof exprMethods.compileExpr;
  declare compileAs: typeof exprMethods.compileAs;
  declare compileFuncCall: typeof exprMethods.compileFuncCall;
  declare compileLiteral: typeof exprMethods.compileLiteral;
  declare compileLiteralAs: typeof exprMethods.compileLiteralAs;
  declare compileVariableRead: typeof exprMethods.compileVariableRead;
  declare coerce: typeof exprMethods.coerce;
  declare moveArguments: typeof exprMethods.moveArguments;

  // ─── Logic methods (from asm-logic.ts) ────────────────────────────────────
  declare compileShortCircuit: typeof logicMethods.compileShortCircuit;
  declare compileNot: typeof logicMethods.compileNot;
  declare compileComparison: typeof logicMethods.compileComparison;

  // ─── Math methods (from asm-math.ts) ──────────────────────────────────────
  declare compileAddSub: typeof mathMethods.compileAddSub;
  declare compileMulDiv: typeof mathMethods.compileMulDiv;
  declare compileInlineMath: typeof mathMethods.compileInlineMath;
  declare compileLibmCall: typeof mathMethods.compileLibmCall;
  declare compileMod: typeof mathMethods.compileMod;

  // ─── Text methods (from asm-strings.ts) ───────────────────────────────────
  declare compileConcat: typeof stringMethods.compileConcat;
  declare compileStrLength: typeof stringMethods.compileStrLength;
  declare compileCharAt: typeof stringMethods.compileCharAt;

  // ─── List methods (from asm-lists.ts) ─────────────────────────────────────
  declare compileListLength: typeof listMethods.compileListLength;
  declare compileListItem: typeof listMethods.compileListItem;
  declare generateListAppend: typeof listMethods.generateListAppend;
  declare generateListDelete: typeof listMethods.generateListDelete;
  declare generateListDeleteAll: typeof listMethods.generateListDeleteAll;
  declare generateListReplace: typeof listMethods.generateListReplace;

  // ─── Statement methods (from asm-stmt.ts) ─────────────────────────────────
  declare generateStmt: typeof stmtMethods.generateStmt;
  declare generatePrint: typeof stmtMethods.generatePrint;
  declare generateSetVar: typeof stmtMethods.generateSetVar;
  declare storeAny: typeof stmtMethods.storeAny;
  declare generateIfElse: typeof stmtMethods.generateIfElse;
  declare generateRepeat: typeof stmtMethods.generateRepeat;
  declare generateConditionLoop: typeof stmtMethods.generateConditionLoop;
  declare generateFor: typeof stmtMethods.generateFor;

  // ─── Procedure methods (from asm-proc.ts) ─────────────────────────────────
  declare registerProcedures: typeof procMethods.registerProcedures;
  declare generateSprite: typeof procMethods.generateSprite;
  declare generateProcedure: typeof procMethods.generateProcedure;
  declare generateProcCall: typeof procMethods.generateProcCall;
}

// ─── Attach extracted methods to AsmEmitter prototype ────────────────────────

// Utility methods
AsmEmitter.prototype.emit = utilMethods.emit;
AsmEmitter.prototype.emitLabel = utilMethods.emitLabel;
AsmEmitter.prototype.freshId = utilMethods.freshId;
AsmEmitter.prototype.localLabel = utilMethods.localLabel;
AsmEmitter.prototype.push = utilMethods.push;
AsmEmitter.prototype.pop = utilMethods.pop;
AsmEmitter.prototype.reserve = utilMethods.reserve;
AsmEmitter.prototype.release = utilMethods.release;
AsmEmitter.prototype.padFor = utilMethods.padFor;
AsmEmitter.prototype.unpad = utilMethods.unpad;
AsmEmitter.prototype.alignedCall = utilMethods.alignedCall;
AsmEmitter.prototype.callPopping = utilMethods.callPopping;
AsmEmitter.prototype.assertAligned = utilMethods.assertAligned;
AsmEmitter.prototype.internString = utilMethods.internString;
AsmEmitter.prototype.loadStaticStr = utilMethods.loadStaticStr;
AsmEmitter.prototype.variableSlot = utilMethods.variableSlot;
AsmEmitter.prototype.listLabel = utilMethods.listLabel;

// Expression methods
AsmEmitter.prototype.compileExpr = exprMethods.compileExpr;
AsmEmitter.prototype.compileAs = exprMethods.compileAs;
AsmEmitter.prototype.compileFuncCall = exprMethods.compileFuncCall;
AsmEmitter.prototype.compileLiteral = exprMethods.compileLiteral;
AsmEmitter.prototype.compileLiteralAs = exprMethods.compileLiteralAs;
AsmEmitter.prototype.compileVariableRead = exprMethods.compileVariableRead;
AsmEmitter.prototype.coerce = exprMethods.coerce;
AsmEmitter.prototype.moveArguments = exprMethods.moveArguments;

// Logic methods
AsmEmitter.prototype.compileShortCircuit = logicMethods.compileShortCircuit;
AsmEmitter.prototype.compileNot = logicMethods.compileNot;
AsmEmitter.prototype.compileComparison = logicMethods.compileComparison;

// Math methods
AsmEmitter.prototype.compileAddSub = mathMethods.compileAddSub;
AsmEmitter.prototype.compileMulDiv = mathMethods.compileMulDiv;
AsmEmitter.prototype.compileInlineMath = mathMethods.compileInlineMath;
AsmEmitter.prototype.compileLibmCall = mathMethods.compileLibmCall;
AsmEmitter.prototype.compileMod = mathMethods.compileMod;

// Text methods
AsmEmitter.prototype.compileConcat = stringMethods.compileConcat;
AsmEmitter.prototype.compileStrLength = stringMethods.compileStrLength;
AsmEmitter.prototype.compileCharAt = stringMethods.compileCharAt;

// List methods
AsmEmitter.prototype.compileListLength = listMethods.compileListLength;
AsmEmitter.prototype.compileListItem = listMethods.compileListItem;
AsmEmitter.prototype.generateListAppend = listMethods.generateListAppend;
AsmEmitter.prototype.generateListDelete = listMethods.generateListDelete;
AsmEmitter.prototype.generateListDeleteAll = listMethods.generateListDeleteAll;
AsmEmitter.prototype.generateListReplace = listMethods.generateListReplace;

// Statement methods
AsmEmitter.prototype.generateStmt = stmtMethods.generateStmt;
AsmEmitter.prototype.generatePrint = stmtMethods.generatePrint;
AsmEmitter.prototype.generateSetVar = stmtMethods.generateSetVar;
AsmEmitter.prototype.storeAny = stmtMethods.storeAny;
AsmEmitter.prototype.generateIfElse = stmtMethods.generateIfElse;
AsmEmitter.prototype.generateRepeat = stmtMethods.generateRepeat;
AsmEmitter.prototype.generateConditionLoop = stmtMethods.generateConditionLoop;
AsmEmitter.prototype.generateFor = stmtMethods.generateFor;

// Procedure methods
AsmEmitter.prototype.registerProcedures = procMethods.registerProcedures;
AsmEmitter.prototype.generateSprite = procMethods.generateSprite;
AsmEmitter.prototype.generateProcedure = procMethods.generateProcedure;
AsmEmitter.prototype.generateProcCall = procMethods.generateProcCall;

/** Assembly text for a whole program. */
export function emitAsm(program: IrProgram): string {
  return new AsmEmitter(program).emitProgram();
}
