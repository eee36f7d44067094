import { describe, expect, test } from "vitest";
import {
  callTarget,
  LIBC_FUNCTIONS,
  LIBM_FUNCTIONS,
  loadPrelude,
  RUNTIME_HELPERS,
  stackWordsConsumed,
} from "../../src/backend/runtime.ts";
import { emitterFor, routine, simulateStack } from "./helpers.ts";

describe("prelude", () => {
  const prelude = loadPrelude();
  const labels = new Set(
    prelude
      .split("\n")
      .map((line) => /^(\w+):/.exec(line)?.[1])
      .filter((label): label is string => label !== undefined)
  );
  const externs = new Set(
    prelude
      .split("\n")
      .filter((line) => line.startsWith("extern "))
      .flatMap((line) => line.slice("extern ".length).split(/,\s*/))
  );

  test("defines every runtime helper", () => {
    for (const helper of Object.keys(RUNTIME_HELPERS)) {
      expect(labels.has(helper), helper).toBe(true);
    }
  });

  test("declares every library function it may call", () => {
    for (const fn of [...LIBC_FUNCTIONS, ...Object.values(LIBM_FUNCTIONS)]) {
      expect(externs.has(fn), fn).toBe(true);
    }
  });

  test("routines keep the stack aligned at every call they make", () => {
    const routines = prelude
      .split("\n")
      .map((line) => /^(\w+):$/.exec(line)?.[1])
      .filter((label): label is string => label !== undefined);
    const callers = routines.filter((label) => routine(prelude, label).some((line) => line.startsWith("call ")));
    expect(callers).toEqual(expect.arrayContaining(["clone_any", "char_at", "str_to_double", "list_index"]));
    for (const label of callers) {
      expect(simulateStack(routine(prelude, label), false).misaligned, label).toEqual([]);
    }
  });

  test("exports main and the static strings the generator refers to", () => {
    expect(prelude).toContain("global main");
    expect(prelude).toContain("staticstr str_empty, db 0");
    expect(prelude).toContain("%macro staticstr 2+");
  });
});

describe("call targets", () => {
  test("library functions go through the PLT", () => {
    expect(callTarget("malloc")).toBe("malloc wrt ..plt");
    expect(callTarget("log10")).toBe("log10 wrt ..plt");
    expect(callTarget("clone_any")).toBe("clone_any");
  });

  test("only the popping helpers consume stack words", () => {
    expect(stackWordsConsumed("drop_pop_cow")).toBe(2);
    expect(stackWordsConsumed("drop_pop_any")).toBe(2);
    expect(stackWordsConsumed("drop_any")).toBe(0);
    expect(stackWordsConsumed("memcpy")).toBe(0);
  });
});

describe("stack bookkeeping", () => {
  test("an aligned call is emitted as is", () => {
    const emitter = emitterFor();
    emitter.alignedCall("free");
    expect(emitter.text).toEqual(["    call free wrt ..plt"]);
  });

  test("a misaligned call is padded", () => {
    const emitter = emitterFor();
    emitter.push("rax");
    emitter.alignedCall("drop_any");
    expect(emitter.text).toEqual(["    push rax", "    sub rsp, 8", "    call drop_any", "    add rsp, 8"]);
    expect(emitter.stackAligned).toBe(false);
  });

  test("popping helpers must go through callPopping", () => {
    const emitter = emitterFor();
    expect(() => emitter.alignedCall("drop_pop_cow")).toThrow(
      "drop_pop_cow pops stack arguments and must be called through callPopping"
    );
  });

  test("callPopping refuses a misaligned stack", () => {
    const emitter = emitterFor();
    emitter.reserve(8);
    expect(() => emitter.callPopping("drop_pop_any")).toThrow(
      "stack is not 16-byte aligned at the call to drop_pop_any"
    );
  });

  test("padFor pads only when the pushes would leave the stack misaligned", () => {
    const emitter = emitterFor();
    expect(emitter.padFor(2)).toBe(false);
    expect(emitter.padFor(3)).toBe(true);
    expect(emitter.stackAligned).toBe(false);
    emitter.unpad(true);
    expect(emitter.stackAligned).toBe(true);
    expect(emitter.text).toEqual(["    sub rsp, 8", "    add rsp, 8"]);
  });

  test("reserving two words keeps parity", () => {
    const emitter = emitterFor();
    emitter.reserve(16);
    expect(emitter.stackAligned).toBe(true);
  });
});

describe("storage", () => {
  test("labels are assigned on first use and reused", () => {
    const emitter = emitterFor();
    expect(emitter.variableSlot("y", { start: 0, end: 1 })).toEqual({ discriminant: "[var_0]", payload: "[var_0+8]" });
    expect(emitter.listLabel("items", { start: 0, end: 1 })).toBe("list_1");
    expect(emitter.variableSlot("y", { start: 0, end: 1 }).discriminant).toBe("[var_0]");
  });

  test("parameters sit above the frame pointer, last one lowest", () => {
    const emitter = emitterFor();
    emitter.params = ["a", "b", "x"];
    expect(emitter.variableSlot("a", { start: 0, end: 1 })).toEqual({ discriminant: "[rbp+48]", payload: "[rbp+56]" });
    expect(emitter.variableSlot("x", { start: 0, end: 1 })).toEqual({ discriminant: "[rbp+16]", payload: "[rbp+24]" });
  });

  test("sprite variables shadow the stage's", () => {
    const emitter = emitterFor("(stage (variables x)) (sprite Cat (variables x))");
    const stageSlot = emitter.variableSlot("x", { start: 0, end: 1 });
    const [cat] = emitter.program.sprites;
    if (cat === undefined) throw new Error("missing sprite");
    emitter.sprite = cat;
    expect(emitter.variableSlot("x", { start: 0, end: 1 })).not.toEqual(stageSlot);
  });

  test("unknown names", () => {
    const emitter = emitterFor();
    expect(() => emitter.variableSlot("nope", { start: 0, end: 4 })).toThrow("unknown variable 'nope'");
    expect(() => emitter.listLabel("x", { start: 0, end: 1 })).toThrow("unknown list 'x'");
  });

  test("text is interned once, the empty string not at all", () => {
    const emitter = emitterFor();
    expect(emitter.internString("hi")).toBe("lit_0");
    expect(emitter.internString("hi")).toBe("lit_0");
    expect(emitter.internString("")).toBe("str_empty");
    expect(emitter.internString("ho")).toBe("lit_1");
  });

  test("static text lengths count UTF-8 bytes", () => {
    const emitter = emitterFor();
    emitter.loadStaticStr("é!");
    emitter.loadStaticStr("");
    expect(emitter.text).toEqual([
      "    lea rax, [lit_0]",
      "    mov edx, 3",
      "    lea rax, [str_empty]",
      "    xor edx, edx",
    ]);
  });
});
