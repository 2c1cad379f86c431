import { describe, expect, it } from "vitest";
import {
  add,
  complex,
  divide,
  equalResults,
  fromComplex,
  isUndefined,
  modulo,
  multiply,
  negate,
  power,
  real,
  subtract,
  toComplex,
} from "../../src/engine/numeric.js";

describe("numeric results", () => {
  it("keeps real arithmetic real", () => {
    expect(add(real(2), real(3))).toMatchObject({ kind: "real" });
    expect(add(real(2), real(3)).value.re).toBe(5);
    expect(subtract(real(2), real(3)).value.re).toBe(-1);
    expect(multiply(real(2), real(3)).value.re).toBe(6);
    expect(divide(real(3), real(2)).value.re).toBe(1.5);
  });

  it("promotes to complex when either side is complex", () => {
    const sum = add(real(1), complex(0, 2));
    expect(sum.kind).toBe("complex");
    expect(sum.value.re).toBe(1);
    expect(sum.value.im).toBe(2);

    const product = multiply(complex(1, 1), complex(1, -1));
    expect(product.kind).toBe("complex");
    expect(product.value.re).toBe(2);
    expect(product.value.im).toBe(0);
  });

  it("divides complex numbers", () => {
    const q = divide(complex(1, 0), complex(0, 1));
    expect(q.value.re).toBeCloseTo(0, 12);
    expect(q.value.im).toBeCloseTo(-1, 12);
  });

  it("raises real bases with Math.pow semantics", () => {
    expect(power(real(2), real(10)).value.re).toBe(1024);
    expect(isUndefined(power(real(-8), real(1 / 3)))).toBe(true);
  });

  it("raises complex bases through exp and log", () => {
    const z = power(complex(0, 1), real(2));
    expect(z.kind).toBe("complex");
    expect(z.value.re).toBeCloseTo(-1, 12);
    expect(z.value.im).toBeCloseTo(0, 12);
  });

  it("takes truncated integer remainders", () => {
    expect(modulo(real(7), real(3)).value.re).toBe(1);
    expect(modulo(real(-7), real(3)).value.re).toBe(-1);
    expect(isUndefined(modulo(real(7.5), real(2)))).toBe(true);
    expect(isUndefined(modulo(complex(0, 1), real(2)))).toBe(true);
  });

  it("negates both parts", () => {
    expect(negate(real(4)).value.re).toBe(-4);
    const z = negate(complex(1, -2));
    expect(z.kind).toBe("complex");
    expect(z.value.re).toBe(-1);
    expect(z.value.im).toBe(2);
  });

  it("compares NaN results as equal", () => {
    expect(equalResults(real(Number.NaN), real(Number.NaN))).toBe(true);
    expect(equalResults(real(1), complex(1, 0))).toBe(false);
  });

  it("narrows plain numbers and unknown values", () => {
    expect(toComplex(3).re).toBe(3);
    expect(toComplex(3).im).toBe(0);
    expect(Number.isNaN(toComplex("3").re)).toBe(true);
    expect(fromComplex(2).kind).toBe("complex");
  });
});
