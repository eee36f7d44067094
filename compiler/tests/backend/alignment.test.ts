import { describe, expect, test } from "vitest";
import { compileExpr, compileStmt, simulateStack } from "./helpers.ts";

const EXPRESSIONS = [
  "x",
  "(to-num x)",
  "(+ x y 1)",
  "(- x)",
  "(/ x)",
  "(* x (- y 2) 3)",
  "(mod x y)",
  "(sin (mod x 2))",
  "(abs (floor x))",
  "(and x (or y x) (not y))",
  "(< (to-num x) (+ y 1))",
  "(= (to-num x) (not y))",
  "(++ x y)",
  '(++ "a" x (+ y 1) (not x))',
  "(str-length x)",
  "(str-length (++ x y))",
  "(char-at x (str-length y))",
  '(char-at "abc" x)',
  "(length items)",
  "(!! items (length items))",
  "(++ (!! items 1) (char-at x 2))",
];

const STATEMENTS = [
  "(print x)",
  "(print (+ x 1))",
  "(print (not x))",
  "(:= x (++ x y))",
  "(+= y (str-length x))",
  '(if (< (to-num x) 2) (print x) (print "no"))',
  "(repeat x (print y))",
  "(repeat 2 (repeat y (print (mod x 3))))",
  "(while x (:= x (!! items 1)))",
  "(until y (append items (++ x y)))",
  "(forever (print x))",
  "(for x 3 (replace items x (char-at y x)))",
  "(for x y (for y x (delete items (+ x y))))",
  "(do (delete-all items) (append items 1))",
];

describe("stack alignment", () => {
  for (const aligned of [true, false]) {
    const parity = aligned ? "aligned" : "misaligned";

    test.each(EXPRESSIONS)(`expression %s starting ${parity}`, (input) => {
      const { lines, emitter } = compileExpr(input, { aligned });
      expect(simulateStack(lines, aligned)).toEqual({ misaligned: [], depth: 0 });
      expect(emitter.stackAligned).toBe(aligned);
    });

    test.each(STATEMENTS)(`statement %s starting ${parity}`, (input) => {
      const { lines, emitter } = compileStmt(input, { aligned });
      expect(simulateStack(lines, aligned)).toEqual({ misaligned: [], depth: 0 });
      expect(emitter.stackAligned).toBe(aligned);
    });
  }
});
