/**
 * Conversions between compile-time values. These state the same semantics
 * the runtime helpers implement, so a coercion of a literal can be folded
 * while compiling.
 */

import type { Value } from "./ir-types.ts";

/** Significant digits used when numbers become text (C `%.15g`). */
export const NUMBER_TEXT_PRECISION = 15;

// ─── Number → text ───────────────────────────────────────────────────────────

function stripTrailingZeros(digits: string): string {
  if (!digits.includes(".")) return digits;
  return digits.replace(/0+$/, "").replace(/\.$/, "");
}

/** `|n| = mantissa * 2^exponent`, exactly. */
function decompose(n: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, Math.abs(n));
  const bits = view.getBigUint64(0);
  const biased = Number(bits >> 52n);
  const fraction = bits & ((1n << 52n) - 1n);
  if (biased === 0) return { mantissa: fraction, exponent: -1074 };
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * The leading `precision` decimal digits of |n| and the power of ten of the
 * first one. Rounds the exact binary value half to even, as glibc does.
 */
function significantDigits(n: number, precision: number): { digits: string; exponent: number } {
  const { mantissa, exponent } = decompose(n);
  const numerator = exponent >= 0 ? mantissa << BigInt(exponent) : mantissa;
  const denominator = exponent >= 0 ? 1n : 1n << BigInt(-exponent);
  const lower = 10n ** BigInt(precision - 1);
  const upper = lower * 10n;

  // log10 only estimates the exponent; the loop corrects it by one step.
  let decimalExponent = Math.floor(Math.log10(Math.abs(n)));
  for (;;) {
    const shift = precision - 1 - decimalExponent;
    const scaled = shift >= 0 ? numerator * 10n ** BigInt(shift) : numerator;
    const divisor = shift >= 0 ? denominator : denominator * 10n ** BigInt(-shift);

    let digits = scaled / divisor;
    const twiceRemainder = (scaled % divisor) * 2n;
    if (twiceRemainder > divisor || (twiceRemainder === divisor && digits % 2n === 1n)) {
      digits += 1n;
    }

    if (digits < lower) {
      decimalExponent--;
    } else if (digits > upper) {
      decimalExponent++;
    } else if (digits === upper) {
      return { digits: String(lower), exponent: decimalExponent + 1 };
    } else {
      return { digits: String(digits), exponent: decimalExponent };
    }
  }
}

/** printf `%.{precision}g` for a finite, non-zero number. */
function formatGeneral(n: number, precision: number): string {
  const { digits, exponent } = significantDigits(n, precision);
  const sign = n < 0 ? "-" : "";
  if (exponent < -4 || exponent >= precision) {
    const mantissa = stripTrailingZeros(`${digits.slice(0, 1)}.${digits.slice(1)}`);
    const exponentSign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${mantissa}e${exponentSign}${magnitude}`;
  }
  const fixed =
    exponent >= 0
      ? `${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`
      : `0.${"0".repeat(-exponent - 1)}${digits}`;
  return `${sign}${stripTrailingZeros(fixed)}`;
}

export function numberToText(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === 0) return "0";
  if (n === Infinity) return "Infinity";
  if (n === -Infinity) return "-Infinity";
  return formatGeneral(n, NUMBER_TEXT_PRECISION);
}

// ─── Text → number / truthiness ──────────────────────────────────────────────

const LEADING_SPACE = /^[ \t\n\v\f\r]+/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const HEX = /^([+-]?)0x([0-9a-f]+)$/i;
const INFINITY = /^([+-]?)inf(inity)?$/i;

/**
 * Whole-text numeric parse as `strtod` sees it after leading whitespace.
 * Text that is not entirely a number, and NaN, convert to 0.
 */
export function textToNumber(text: string): number {
  const trimmed = text.replace(LEADING_SPACE, "");
  if (DECIMAL.test(trimmed)) return Number(trimmed);

  const hex = HEX.exec(trimmed);
  if (hex) {
    const magnitude = Number.parseInt(hex[2] ?? "0", 16);
    return hex[1] === "-" ? -magnitude : magnitude;
  }

  const infinity = INFINITY.exec(trimmed);
  if (infinity) return infinity[1] === "-" ? -Infinity : Infinity;

  return 0;
}

/** `""`, `"0"` and `"false"` in any letter case are false. */
export function textToBool(text: string): boolean {
  return text !== "" && text !== "0" && text.toLowerCase() !== "false";
}

// ─── Value conversions ───────────────────────────────────────────────────────

export function valueToNumber(value: Value): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return textToNumber(value);
}

export function valueToBool(value: Value): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  return textToBool(value);
}

export function valueToText(value: Value): string {
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return value ? "true" : "false";
  return numberToText(value);
}

/** Source-like rendering used by the IR printer. */
export function formatValue(value: Value): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}
