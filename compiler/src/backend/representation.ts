/**
 * Physical value representations and the total coercion table between them.
 */

import type { Register, RuntimeHelper } from "./runtime.ts";

/** Where an expression's result lives once its code has run. */
export enum Typ {
  /** IEEE-754 double in xmm0. */
  Double = "Double",
  /** rax = 0 or 1. */
  Bool = "Bool",
  /** rax = pointer to read-only text (odd address), rdx = byte length. */
  StaticStr = "StaticStr",
  /** rax = heap pointer (even address), rdx = byte length; released exactly once. */
  OwnedString = "OwnedString",
  /** rax = discriminant, rdx = payload. */
  Any = "Any",
}

export type Demand = "double" | "bool" | "cow" | "any";

export const DEMANDS: readonly Demand[] = ["double", "bool", "cow", "any"];

export type Coercion =
  | { kind: "identity" }
  | { kind: "inline"; instructions: readonly string[]; result: Typ }
  | { kind: "helper"; helper: RuntimeHelper; result: Typ };

const IDENTITY: Coercion = { kind: "identity" };

function call(helper: RuntimeHelper, result: Typ): Coercion {
  return { kind: "helper", helper, result };
}

/** How to turn each representation into what a consumer demands. */
export const COERCIONS: Readonly<Record<Typ, Readonly<Record<Demand, Coercion>>>> = {
  [Typ.Double]: {
    double: IDENTITY,
    bool: call("double_to_bool", Typ.Bool),
    cow: call("double_to_cow", Typ.OwnedString),
    any: { kind: "inline", instructions: ["movq rdx, xmm0", "mov eax, 2"], result: Typ.Any },
  },
  [Typ.Bool]: {
    double: call("bool_to_double", Typ.Double),
    bool: IDENTITY,
    cow: call("bool_to_static_str", Typ.StaticStr),
    any: IDENTITY,
  },
  [Typ.StaticStr]: {
    double: call("static_str_to_double", Typ.Double),
    bool: call("static_str_to_bool", Typ.Bool),
    cow: IDENTITY,
    any: IDENTITY,
  },
  [Typ.OwnedString]: {
    double: call("owned_string_to_double", Typ.Double),
    bool: call("owned_string_to_bool", Typ.Bool),
    cow: IDENTITY,
    any: IDENTITY,
  },
  [Typ.Any]: {
    double: call("any_to_double", Typ.Double),
    bool: call("any_to_bool", Typ.Bool),
    cow: call("any_to_cow", Typ.OwnedString),
    any: IDENTITY,
  },
};

/** Representation left after coercing `typ` for `demand`. */
export function coercedTyp(typ: Typ, demand: Demand): Typ {
  const coercion = COERCIONS[typ][demand];
  return coercion.kind === "identity" ? typ : coercion.result;
}

export function resultRegisters(typ: Typ): readonly Register[] {
  switch (typ) {
    case Typ.Double:
      return ["xmm0"];
    case Typ.Bool:
      return ["rax"];
    case Typ.StaticStr:
    case Typ.OwnedString:
    case Typ.Any:
      return ["rax", "rdx"];
  }
}
