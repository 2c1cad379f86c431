import { Decimal } from "decimal.js";
import type { NumericResult } from "../engine/numeric.js";

type Dec = InstanceType<typeof Decimal>;

export const FormatDecimal = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_HALF_UP });

export type DisplayRadix = "dec" | "bin" | "oct" | "hex" | "exp";

export const DISPLAY_RADIXES: readonly DisplayRadix[] = ["dec", "bin", "oct", "hex", "exp"];

export interface DisplaySettings {
  radix: DisplayRadix;
  /** Fraction digits shown after the radix point. */
  precision: number;
}

export const DEFAULT_DISPLAY: DisplaySettings = { radix: "dec", precision: 10 };
export const MAX_PRECISION = 64;

const RADIX_BASE = { bin: 2, oct: 8, hex: 16 } as const;
const RADIX_PREFIX = { bin: "0b", oct: "0o", hex: "0x" } as const;

export function isDisplayRadix(value: unknown): value is DisplayRadix {
  return typeof value === "string" && DISPLAY_RADIXES.some((r) => r === value);
}

export function isValidPrecision(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_PRECISION;
}

function integerDigits(int: Dec, radix: "bin" | "oct" | "hex"): string {
  const text = radix === "bin" ? int.toBinary() : radix === "oct" ? int.toOctal() : int.toHexadecimal();
  return text.slice(2);
}

function formatRadix(x: number, radix: "bin" | "oct" | "hex", precision: number): string {
  const value = new FormatDecimal(x);
  const sign = value.isNegative() && !value.isZero() ? "-" : "";
  const abs = value.abs();
  const int = abs.trunc();
  const base = RADIX_BASE[radix];

  let fraction = abs.minus(int);
  let digits = "";
  for (let k = 0; k < precision && !fraction.isZero(); k++) {
    fraction = fraction.times(base);
    const digit = fraction.trunc();
    digits += digit.toNumber().toString(base);
    fraction = fraction.minus(digit);
  }

  const fractionPart = digits.length > 0 ? `.${digits}` : "";
  return `${sign}${RADIX_PREFIX[radix]}${integerDigits(int, radix)}${fractionPart}`;
}

function formatExponential(x: number, precision: number): string {
  const [mantissa = "", exponent = ""] = new FormatDecimal(x).toExponential(precision).split("e");
  const trimmed = mantissa.includes(".") ? mantissa.replace(/0+$/, "").replace(/\.$/, "") : mantissa;
  return `${trimmed}e${exponent}`;
}

export function formatReal(x: number, settings: DisplaySettings = DEFAULT_DISPLAY): string {
  if (Number.isNaN(x)) return "NaN";
  if (x === Infinity) return "Infinity";
  if (x === -Infinity) return "-Infinity";

  switch (settings.radix) {
    case "dec":
      return new FormatDecimal(x).toDecimalPlaces(settings.precision).toString();
    case "exp":
      return formatExponential(x, settings.precision);
    default:
      return formatRadix(x, settings.radix, settings.precision);
  }
}

/** Renders a result as `a`, or `a+bi` / `a-bi` when it is complex. */
export function formatResult(result: NumericResult, settings: DisplaySettings = DEFAULT_DISPLAY): string {
  const { re, im } = result.value;
  if (result.kind === "real") return formatReal(re, settings);
  if (Number.isNaN(re) || Number.isNaN(im)) return "NaN";

  const sign = im < 0 ? "-" : "+";
  return `${formatReal(re, settings)}${sign}${formatReal(Math.abs(im), settings)}i`;
}

export function describeDisplay(settings: DisplaySettings): string {
  return `${settings.radix} (precision ${settings.precision})`;
}
