import * as math from "mathjs";
import type { NumberKind } from "./types.js";

export interface NumericResult {
  readonly kind: NumberKind;
  readonly value: math.Complex;
}

export function real(x: number): NumericResult {
  return { kind: "real", value: math.complex(x, 0) };
}

export function complex(re: number, im: number): NumericResult {
  return { kind: "complex", value: math.complex(re, im) };
}

export function undefinedResult(): NumericResult {
  return real(Number.NaN);
}

export function isUndefined(result: NumericResult): boolean {
  return Number.isNaN(result.value.re) || Number.isNaN(result.value.im);
}

export function isComplexResult(result: NumericResult): boolean {
  return result.kind === "complex";
}

export function equalResults(a: NumericResult, b: NumericResult): boolean {
  return a.kind === b.kind && Object.is(a.value.re, b.value.re) && Object.is(a.value.im, b.value.im);
}

/**
 * Narrows a mathjs return value to a complex pair. mathjs may hand back a
 * plain number for real-valued inputs.
 */
export function toComplex(value: unknown): math.Complex {
  if (math.isComplex(value)) return value;
  if (typeof value === "number") return math.complex(value, 0);
  return math.complex(Number.NaN, Number.NaN);
}

export function fromComplex(value: unknown): NumericResult {
  const z = toComplex(value);
  return complex(z.re, z.im);
}

function promote(a: NumericResult, b: NumericResult): NumberKind {
  return a.kind === "complex" || b.kind === "complex" ? "complex" : "real";
}

// ── Arithmetic ─────────────────────────────────────────────────────

export function add(a: NumericResult, b: NumericResult): NumericResult {
  if (promote(a, b) === "real") return real(a.value.re + b.value.re);
  return fromComplex(math.add(a.value, b.value));
}

export function subtract(a: NumericResult, b: NumericResult): NumericResult {
  if (promote(a, b) === "real") return real(a.value.re - b.value.re);
  return fromComplex(math.subtract(a.value, b.value));
}

export function multiply(a: NumericResult, b: NumericResult): NumericResult {
  if (promote(a, b) === "real") return real(a.value.re * b.value.re);
  return fromComplex(math.multiply(a.value, b.value));
}

export function divide(a: NumericResult, b: NumericResult): NumericResult {
  if (promote(a, b) === "real") return real(a.value.re / b.value.re);
  return fromComplex(math.divide(a.value, b.value));
}

/** Integer remainder; fractional or complex operands have no result. */
export function modulo(a: NumericResult, b: NumericResult): NumericResult {
  if (promote(a, b) === "complex") return undefinedResult();
  const x = a.value.re;
  const y = b.value.re;
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefinedResult();
  return real(Math.trunc(x) % Math.trunc(y));
}

export function power(base: NumericResult, exponent: NumericResult): NumericResult {
  if (promote(base, exponent) === "real") return real(Math.pow(base.value.re, exponent.value.re));
  const logBase = toComplex(math.log(base.value));
  return fromComplex(math.exp(toComplex(math.multiply(logBase, exponent.value))));
}

export function negate(a: NumericResult): NumericResult {
  if (a.kind === "real") return real(-a.value.re);
  return complex(-a.value.re, -a.value.im);
}
