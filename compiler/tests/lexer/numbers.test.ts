import { describe, expect, test } from "vitest";
import { TokenKind } from "../../src/lexer/index.ts";
import { tokenize } from "./helpers.ts";

function firstNumber(input: string): number | string | boolean | undefined {
  const { tokens } = tokenize(input);
  expect(tokens[0]?.kind).toBe(TokenKind.NumberLiteral);
  return tokens[0]?.value;
}

describe("decimal numbers", () => {
  test("integer", () => {
    expect(firstNumber("42")).toBe(42);
  });

  test("fraction and exponent", () => {
    expect(firstNumber("1.5e3")).toBe(1500);
    expect(firstNumber("2E-2")).toBe(0.02);
  });

  test("leading dot", () => {
    expect(firstNumber(".5")).toBe(0.5);
  });

  test("signs", () => {
    expect(firstNumber("-3")).toBe(-3);
    expect(firstNumber("+.25")).toBe(0.25);
  });

  test("trailing dot", () => {
    expect(firstNumber("7.")).toBe(7);
  });
});

describe("radix prefixes", () => {
  test("hex", () => {
    expect(firstNumber("0x1F")).toBe(31);
  });

  test("binary with a sign", () => {
    expect(firstNumber("-0b101")).toBe(-5);
  });

  test("octal", () => {
    expect(firstNumber("0o17")).toBe(15);
  });

  test("missing digits", () => {
    const { tokens, diagnostics } = tokenize("0x");
    expect(tokens[0]?.kind).toBe(TokenKind.Error);
    expect(diagnostics[0]?.message).toBe("Expected digits after '0x'");
  });
});

describe("numbers next to symbol characters", () => {
  test("a lone sign is a symbol", () => {
    const { tokens } = tokenize("- +");
    expect(tokens[0]?.kind).toBe(TokenKind.Symbol);
    expect(tokens[1]?.kind).toBe(TokenKind.Symbol);
  });

  test("signed forms that continue as a symbol are re-read as one", () => {
    const { tokens, diagnostics } = tokenize("-5a");
    expect(tokens[0]?.kind).toBe(TokenKind.Symbol);
    expect(tokens[0]?.lexeme).toBe("-5a");
    expect(diagnostics).toHaveLength(0);
  });

  test("a digit-led word is an invalid number", () => {
    const { tokens, diagnostics } = tokenize("5a");
    expect(tokens[0]?.kind).toBe(TokenKind.Error);
    expect(diagnostics[0]?.message).toBe("Invalid number literal '5a'");
  });

  test("an incomplete exponent is not consumed", () => {
    const { diagnostics } = tokenize("1e");
    expect(diagnostics[0]?.message).toBe("Invalid number literal '1e'");
  });

  test("a closing paren ends a number", () => {
    const { tokens } = tokenize("(f 3)");
    expect(tokens[2]?.value).toBe(3);
    expect(tokens[3]?.kind).toBe(TokenKind.RightParen);
  });
});
