import { describe, expect, test } from "vitest";
import { dataBytes } from "../../src/backend/asm-emitter.ts";
import { loadPrelude } from "../../src/backend/runtime.ts";
import { compileProgram, routine, simulateStack } from "./helpers.ts";

describe("dataBytes", () => {
  test("printable ASCII is quoted", () => {
    expect(dataBytes("hello")).toBe('"hello"');
  });

  test("control characters and quotes are numeric", () => {
    expect(dataBytes("a\n")).toBe('"a", 10');
    expect(dataBytes('say "hi"')).toBe('"say ", 34, "hi", 34');
  });

  test("non-ASCII text is written as UTF-8 bytes", () => {
    expect(dataBytes("é")).toBe("195, 169");
  });
});

describe("program layout", () => {
  test("an empty program just exits", () => {
    const asm = compileProgram("");
    expect(asm.startsWith(loadPrelude().trimEnd())).toBe(true);
    expect(asm.endsWith("section .text\n\nmain:\n    push rbp\n    mov eax, 60\n    xor edi, edi\n    syscall\n\nsection .data\n")).toBe(
      true
    );
  });

  test("main calls every entry procedure in order", () => {
    const asm = compileProgram(
      '(stage (proc (when-flag-clicked) (print "a"))) (sprite "Cat" (proc (when-flag-clicked) (print "b")))'
    );
    expect(routine(asm, "main")).toEqual([
      "push rbp",
      "call proc_0",
      "call proc_2",
      "mov eax, 60",
      "xor edi, edi",
      "syscall",
    ]);
    expect(simulateStack(routine(asm, "main"), false).misaligned).toEqual([]);
  });

  test("sections come in order", () => {
    const asm = compileProgram('(stage (proc (when-flag-clicked) (print "a")))');
    const main = asm.indexOf("\nmain:");
    const proc = asm.indexOf("\nproc_0:");
    const data = asm.lastIndexOf("\nsection .data");
    expect(main).toBeGreaterThan(asm.lastIndexOf("section .text"));
    expect(proc).toBeGreaterThan(main);
    expect(data).toBeGreaterThan(proc);
  });

  test("data holds variables, lists and literals", () => {
    const asm = compileProgram(
      '(stage (variables score) (lists items) (proc (when-flag-clicked) (:= score 5) (append items "a")))'
    );
    const data = asm.slice(asm.lastIndexOf("section .data")).split("\n");
    expect(data).toEqual([
      "section .data",
      "var_1: dq 2, 0",
      "list_2: dq 0, 0, 0",
      "",
      'staticstr lit_3, db "a"',
      "",
    ]);
  });

  test("unused declarations take no storage", () => {
    const asm = compileProgram("(stage (variables unused) (lists spare))");
    expect(asm.endsWith("section .data\n")).toBe(true);
  });

  test("sprite variables are separate from stage variables of the same name", () => {
    const asm = compileProgram(
      '(stage (variables x) (proc (when-flag-clicked) (:= x 1))) (sprite "Cat" (variables x) (proc (when-flag-clicked) (:= x 2)))'
    );
    expect(routine(asm, "proc_0")).toContain("mov [var_1], rax");
    expect(routine(asm, "proc_2")).toContain("mov [var_3], rax");
  });

  test("sprites see stage variables", () => {
    const asm = compileProgram('(stage (variables g)) (sprite "Cat" (proc (when-flag-clicked) (:= g 1)))');
    expect(routine(asm, "proc_0")).toContain("mov [var_1], rax");
  });

  test("equal literals share one label", () => {
    const asm = compileProgram('(stage (proc (when-flag-clicked) (print "hey") (print "hey")))');
    const data = asm.slice(asm.lastIndexOf("section .data")).split("\n");
    expect(data.filter((line) => line.startsWith("staticstr"))).toEqual(['staticstr lit_1, db "hey"']);
  });

  test("output is deterministic", () => {
    const source = '(stage (variables a b) (proc (when-flag-clicked) (:= a "x") (:= b (++ a "y")) (print b)))';
    expect(compileProgram(source)).toBe(compileProgram(source));
  });
});
