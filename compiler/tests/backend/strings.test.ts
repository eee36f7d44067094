import { describe, expect, test } from "vitest";
import { codePointLength } from "../../src/backend/asm-strings.ts";
import { Typ } from "../../src/backend/representation.ts";
import { compileExpr, count } from "./helpers.ts";

const READ_X = ["mov rdi, [var_0]", "mov rsi, [var_0+8]", "call clone_any"];

describe("codePointLength", () => {
  test("counts code points, not UTF-16 units", () => {
    expect(codePointLength("héllo")).toBe(5);
    expect(codePointLength("😀")).toBe(1);
    expect(codePointLength("")).toBe(0);
  });
});

describe("++", () => {
  test("no operands is the empty text", () => {
    expect(compileExpr("(++)")).toMatchObject({ typ: Typ.StaticStr, lines: ["lea rax, [str_empty]", "xor edx, edx"] });
  });

  test("one operand passes through", () => {
    const { typ, lines } = compileExpr("(++ x)");
    expect(typ).toBe(Typ.Any);
    expect(lines).toEqual(READ_X);
  });

  test("two literals", () => {
    const { typ, lines, emitter } = compileExpr('(++ "ab" "cd")');
    expect(typ).toBe(Typ.OwnedString);
    expect(emitter.staticStrings.get("cd")).toBe("lit_0");
    expect(emitter.staticStrings.get("ab")).toBe("lit_1");
    expect(lines).toEqual([
      "lea rax, [lit_0]",
      "mov edx, 2",
      "push rdx",
      "sub rsp, 8",
      "push rdx",
      "push rax",
      "lea rax, [lit_1]",
      "mov edx, 2",
      "add [rsp+24], rdx",
      "push rdx",
      "push rax",
      "mov rdi, [rsp+40]",
      "call malloc wrt ..plt",
      "mov [rsp+32], rax",
      "mov rdi, rax",
      "mov rsi, [rsp]",
      "mov rdx, [rsp+8]",
      "call memcpy wrt ..plt",
      "mov rdi, rax",
      "add rdi, [rsp+8]",
      "mov rsi, [rsp+16]",
      "mov rdx, [rsp+24]",
      "call memcpy wrt ..plt",
      "add rsp, 16",
      "add rsp, 16",
      "pop rax",
      "pop rdx",
    ]);
  });

  test("each extra operand adds one allocation", () => {
    const { lines } = compileExpr('(++ "a" "b" "c")');
    expect(count(lines, "call malloc wrt ..plt")).toBe(2);
    expect(count(lines, "call memcpy wrt ..plt")).toBe(4);
    expect(count(lines, "add rsp, 16")).toBe(3);
    expect(count(lines, "call drop_pop_cow")).toBe(1);
  });

  test("owned operands are released once copied", () => {
    const { lines } = compileExpr("(++ x y)");
    expect(count(lines, "call drop_pop_cow")).toBe(2);
    expect(count(lines, "add rsp, 16")).toBe(0);
  });

  test("only the owned side of a mixed pair is released", () => {
    const { lines } = compileExpr('(++ "a" x)');
    expect(lines.slice(-4)).toEqual(["add rsp, 16", "call drop_pop_cow", "pop rax", "pop rdx"]);
  });

  test("numbers are formatted while compiling", () => {
    const { emitter } = compileExpr('(++ "n=" 1.5)');
    expect(emitter.staticStrings.get("1.5")).toBe("lit_0");
  });
});

describe("str-length", () => {
  test("literal lengths are folded", () => {
    expect(compileExpr('(str-length "héllo")').lines).toEqual(["mov rax, 0x4014000000000000", "movq xmm0, rax"]);
  });

  test("read-only text is not released", () => {
    expect(compileExpr("(str-length (not x))").lines).not.toContain("call drop_pop_cow");
  });

  test("owned text is released after measuring", () => {
    const { typ, lines } = compileExpr("(str-length x)");
    expect(typ).toBe(Typ.Double);
    expect(lines).toEqual([
      ...READ_X,
      "mov rdi, rax",
      "mov rsi, rdx",
      "call any_to_cow",
      "sub rsp, 8",
      "sub rsp, 8",
      "push rdx",
      "push rax",
      "mov rdi, rax",
      "mov rsi, rdx",
      "call str_length",
      "mov rdi, rax",
      "call usize_to_double",
      "movsd [rsp+16], xmm0",
      "call drop_pop_cow",
      "movsd xmm0, [rsp]",
      "add rsp, 8",
      "add rsp, 8",
    ]);
  });
});

describe("char-at", () => {
  test("read-only text", () => {
    const { typ, lines } = compileExpr('(char-at "abc" 2)');
    expect(typ).toBe(Typ.OwnedString);
    expect(lines).toEqual([
      "lea rax, [lit_0]",
      "mov edx, 3",
      "push rdx",
      "push rax",
      "mov rax, 0x4000000000000000",
      "movq xmm0, rax",
      "call double_to_usize",
      "mov rdx, rax",
      "pop rdi",
      "pop rsi",
      "call char_at",
    ]);
  });

  test("owned text is kept until the character is copied", () => {
    expect(compileExpr("(char-at x 1)").lines).toEqual([
      ...READ_X,
      "mov rdi, rax",
      "mov rsi, rdx",
      "call any_to_cow",
      "sub rsp, 16",
      "push rdx",
      "push rax",
      "mov rax, 0x3FF0000000000000",
      "movq xmm0, rax",
      "call double_to_usize",
      "mov rdx, rax",
      "mov rdi, [rsp]",
      "mov rsi, [rsp+8]",
      "call char_at",
      "mov [rsp+16], rax",
      "mov [rsp+24], rdx",
      "call drop_pop_cow",
      "pop rax",
      "pop rdx",
    ]);
  });
});
