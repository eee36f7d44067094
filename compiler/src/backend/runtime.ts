/**
 * Runtime support contract: the helpers prelude.asm defines and the libc/libm
 * functions it links against, with the registers each one takes.
 */

import { readFileSync } from "node:fs";

export type Register = "rax" | "rdx" | "rdi" | "rsi" | "rcx" | "r8" | "xmm0" | "xmm1";

export interface HelperSignature {
  /** Argument registers in order. */
  params: readonly Register[];
  /** Where the result is left. */
  result: readonly Register[];
  /** Words the helper pops from the caller's stack. */
  stackWords: number;
  doc: string;
}

function helper(params: readonly Register[], result: readonly Register[], doc: string, stackWords = 0): HelperSignature {
  return { params, result, stackWords, doc };
}

const PAIR: readonly Register[] = ["rdi", "rsi"];
const RESULT_PAIR: readonly Register[] = ["rax", "rdx"];

export const RUNTIME_HELPERS = {
  // Reference management
  clone_any: helper(PAIR, RESULT_PAIR, "copy of an Any; owned strings are duplicated"),
  drop_any: helper(PAIR, [], "release an Any"),
  drop_pop_any: helper([], [], "pop an Any (discriminant on top) and release it", 2),
  drop_pop_cow: helper([], [], "pop a cow string (pointer on top) and release it", 2),

  // Coercions
  any_to_cow: helper(PAIR, RESULT_PAIR, "text form of an Any; consumes it"),
  any_to_bool: helper(PAIR, ["rax"], "truthiness of an Any; consumes it"),
  any_to_double: helper(PAIR, ["xmm0"], "number value of an Any; consumes it"),
  double_to_cow: helper(["xmm0"], RESULT_PAIR, "text form of a number"),
  double_to_bool: helper(["xmm0"], ["rax"], "false for 0 and NaN"),
  bool_to_double: helper(["rdi"], ["xmm0"], "0 or 1"),
  bool_to_static_str: helper(["rdi"], RESULT_PAIR, "\"true\" or \"false\""),
  static_str_to_bool: helper(PAIR, ["rax"], "truthiness of read-only text"),
  owned_string_to_bool: helper(PAIR, ["rax"], "truthiness of heap text; frees it"),
  static_str_to_double: helper(PAIR, ["xmm0"], "number value of read-only text"),
  owned_string_to_double: helper(PAIR, ["xmm0"], "number value of heap text; frees it"),

  // Numbers and text
  usize_to_double: helper(["rdi"], ["xmm0"], "unsigned integer to number"),
  double_to_usize: helper(["xmm0"], ["rax"], "truncating, saturating number to unsigned integer"),
  str_length: helper(PAIR, ["rax"], "UTF-8 code points in text"),
  char_at: helper(["rdi", "rsi", "rdx"], RESULT_PAIR, "1-based character of text as new text"),

  // Lists
  list_get: helper(["rdi", "rsi", "rdx"], RESULT_PAIR, "clone of the item at an Any index of the list at rdx"),
  list_append: helper(["rdi", "rsi", "rdx"], [], "move the Any in rsi/rdx onto the end of the list at rdi"),
  list_delete: helper(["rdi", "rsi", "rdx"], [], "remove the item at an Any index of the list at rdx"),
  list_delete_all: helper(["rdi"], [], "release every item of the list at rdi"),
  list_replace: helper(["rdi", "rsi", "rdx", "rcx", "r8"], [], "store the Any in rdx/rcx at an Any index of the list at r8"),
} as const satisfies Record<string, HelperSignature>;

export type RuntimeHelper = keyof typeof RUNTIME_HELPERS;

export const LIBC_FUNCTIONS = ["malloc", "free", "memcpy", "memmove", "realloc", "asprintf", "strtod"] as const;

/** Math functions by the operator that calls them. */
export const LIBM_FUNCTIONS = {
  ln: "log",
  log: "log10",
  "e^": "exp",
  "ten^": "exp10",
  sin: "sin",
  cos: "cos",
  tan: "tan",
  asin: "asin",
  acos: "acos",
  atan: "atan",
  mod: "fmod",
} as const;

export type LibcFunction = (typeof LIBC_FUNCTIONS)[number] | (typeof LIBM_FUNCTIONS)[keyof typeof LIBM_FUNCTIONS];

const EXTERNAL: ReadonlySet<string> = new Set<string>([...LIBC_FUNCTIONS, ...Object.values(LIBM_FUNCTIONS)]);

export function isRuntimeHelper(name: string): name is RuntimeHelper {
  return Object.hasOwn(RUNTIME_HELPERS, name);
}

/** Operand of a `call`: shared-library functions go through the PLT. */
export function callTarget(name: RuntimeHelper | LibcFunction): string {
  return EXTERNAL.has(name) ? `${name} wrt ..plt` : name;
}

/** Words a callee pops from the stack before returning. */
export function stackWordsConsumed(name: RuntimeHelper | LibcFunction): number {
  return isRuntimeHelper(name) ? RUNTIME_HELPERS[name].stackWords : 0;
}

// ─── Prelude ─────────────────────────────────────────────────────────────────

let preludeText: string | null = null;

/** Assembly text of prelude.asm, emitted verbatim at the top of every program. */
export function loadPrelude(): string {
  if (preludeText === null) {
    preludeText = readFileSync(new URL("./prelude.asm", import.meta.url), "utf8");
  }
  return preludeText;
}
