import { describe, expect, test } from "vitest";
import { parse, show } from "./helpers.ts";

describe("parser errors", () => {
  test("empty form", () => {
    const { diagnostics } = parse("()");
    expect(diagnostics.map((d) => d.message)).toEqual(["Empty form '()'"]);
  });

  test("unclosed form names where it was opened", () => {
    const { program, diagnostics } = parse("(a (b)");
    expect(program.forms).toHaveLength(0);
    expect(diagnostics.map((d) => d.message)).toEqual(["Expected ')' to close the form opened at 1:1"]);
  });

  test("stray closing paren", () => {
    const { diagnostics } = parse(")");
    expect(diagnostics[0]?.message).toBe("Unexpected ')'");
    expect(diagnostics[0]?.location.column).toBe(1);
  });

  test("recovers at the next top-level form", () => {
    const { program, diagnostics } = parse(") (ok 1)");
    expect(diagnostics).toHaveLength(1);
    expect(program.forms.map(show)).toEqual(["(ok 1)"]);
  });

  test("an error inside a form skips the rest of that form", () => {
    const { program, diagnostics } = parse("(a () (b c)) (d)");
    expect(diagnostics.map((d) => d.message)).toEqual(["Empty form '()'"]);
    expect(program.forms.map(show)).toEqual(["(d)"]);
  });

  test("lexer errors become parse failures without a second message", () => {
    const { program, diagnostics } = parse("(print 5a) (ok)");
    expect(diagnostics.map((d) => d.message)).toEqual(["Invalid number literal '5a'"]);
    expect(program.forms.map(show)).toEqual(["(ok)"]);
  });

  test("diagnostics carry the file name", () => {
    const { diagnostics } = parse("\n  ()");
    expect(diagnostics[0]?.location).toEqual({ file: "test.scrawl", line: 2, column: 3, offset: 3 });
  });
});
