import * as math from "mathjs";
import {
  complex,
  divide,
  fromComplex,
  power,
  real,
  toComplex,
  undefinedResult,
  type NumericResult,
} from "./numeric.js";
import type { FunctionKind } from "./types.js";

export interface BuiltinFunction {
  arity: number;
  fn: (args: NumericResult[]) => NumericResult;
}

// --- Constants ---

export const BUILTIN_CONSTANTS: Record<string, NumericResult> = {
  pi: real(Math.PI),
  e: real(Math.E),
  i: complex(0, 1),
};

// --- Names ---

export const FUNCTION_NAMES: Record<string, FunctionKind> = {
  cos: "cos",
  sin: "sin",
  tan: "tan",
  cot: "cot",
  cosh: "cosh",
  sinh: "sinh",
  tanh: "tanh",
  coth: "coth",
  arccos: "arccos",
  acos: "arccos",
  arcsin: "arcsin",
  asin: "arcsin",
  arctan: "arctan",
  atan: "arctan",
  arccot: "arccot",
  acot: "arccot",
  arccosh: "arccosh",
  acosh: "arccosh",
  arcsinh: "arcsinh",
  asinh: "arcsinh",
  arctanh: "arctanh",
  atanh: "arctanh",
  arccoth: "arccoth",
  acoth: "arccoth",
  exp: "exp",
  ln: "ln",
  sqrt: "sqrt",
  re: "re",
  im: "im",
  pow: "pow",
  root: "root",
};

// --- Helpers ---

/**
 * Builds an arity-1 function. A real argument inside `inDomain` stays on the
 * real line; anything else goes through the complex implementation.
 */
function unary(
  realFn: (x: number) => number,
  complexFn: (z: math.Complex) => unknown,
  inDomain: (x: number) => boolean = () => true,
): BuiltinFunction {
  return {
    arity: 1,
    fn: ([x]) => {
      if (!x) return undefinedResult();
      if (x.kind === "real" && inDomain(x.value.re)) {
        return real(realFn(x.value.re));
      }
      return fromComplex(complexFn(x.value));
    },
  };
}

function reciprocal(value: unknown): math.Complex {
  return toComplex(math.divide(math.complex(1, 0), toComplex(value)));
}

function complexArccot(z: math.Complex): math.Complex {
  return toComplex(math.subtract(math.complex(Math.PI / 2, 0), toComplex(math.atan(z))));
}

function realArccoth(x: number): number {
  return 0.5 * Math.log((x + 1) / (x - 1));
}

// --- Functions ---

export const FUNCTIONS: Record<FunctionKind, BuiltinFunction> = {
  cos: unary(Math.cos, (z) => math.cos(z)),
  sin: unary(Math.sin, (z) => math.sin(z)),
  tan: unary(Math.tan, (z) => math.tan(z)),
  cot: unary((x) => 1 / Math.tan(x), (z) => reciprocal(math.tan(z))),
  cosh: unary(Math.cosh, (z) => math.cosh(z)),
  sinh: unary(Math.sinh, (z) => math.sinh(z)),
  tanh: unary(Math.tanh, (z) => math.tanh(z)),
  coth: unary((x) => 1 / Math.tanh(x), (z) => reciprocal(math.tanh(z))),

  arccos: unary(Math.acos, (z) => math.acos(z), (x) => x >= -1 && x <= 1),
  arcsin: unary(Math.asin, (z) => math.asin(z), (x) => x >= -1 && x <= 1),
  arctan: unary(Math.atan, (z) => math.atan(z)),
  arccot: unary((x) => Math.PI / 2 - Math.atan(x), complexArccot),
  arccosh: unary(Math.acosh, (z) => math.acosh(z), (x) => x >= 1),
  arcsinh: unary(Math.asinh, (z) => math.asinh(z)),
  arctanh: unary(Math.atanh, (z) => math.atanh(z), (x) => Math.abs(x) <= 1),
  arccoth: unary(realArccoth, (z) => math.atanh(reciprocal(z)), (x) => Math.abs(x) > 1),

  exp: unary(Math.exp, (z) => math.exp(z)),
  ln: unary(Math.log, (z) => math.log(z), (x) => x >= 0),
  sqrt: unary(Math.sqrt, (z) => math.sqrt(z), (x) => x >= 0),

  re: {
    arity: 1,
    fn: ([x]) => (x ? real(x.value.re) : undefinedResult()),
  },
  im: {
    arity: 1,
    fn: ([x]) => (x ? real(x.value.im) : undefinedResult()),
  },

  pow: {
    arity: 2,
    fn: ([base, exponent]) => (base && exponent ? power(base, exponent) : undefinedResult()),
  },
  root: {
    arity: 2,
    fn: ([radicand, degree]) => {
      if (!radicand || !degree) return undefinedResult();
      return power(radicand, divide(real(1), degree));
    },
  },
};

export function applyFunction(kind: FunctionKind, args: NumericResult[]): NumericResult {
  const def = FUNCTIONS[kind];
  if (args.length !== def.arity) return undefinedResult();
  return def.fn(args);
}
