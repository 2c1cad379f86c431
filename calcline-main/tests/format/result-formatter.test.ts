import { describe, expect, it } from "vitest";
import { complex, real } from "../../src/engine/numeric.js";
import {
  DEFAULT_DISPLAY,
  describeDisplay,
  formatReal,
  formatResult,
  isDisplayRadix,
  isValidPrecision,
  type DisplaySettings,
} from "../../src/format/result-formatter.js";

const hex: DisplaySettings = { radix: "hex", precision: 10 };
const bin: DisplaySettings = { radix: "bin", precision: 10 };
const oct: DisplaySettings = { radix: "oct", precision: 10 };

describe("formatReal", () => {
  describe("decimal", () => {
    it("prints integers without a fraction", () => {
      expect(formatReal(2)).toBe("2");
      expect(formatReal(-7)).toBe("-7");
    });

    it("rounds to the configured number of places", () => {
      expect(formatReal(0.04)).toBe("0.04");
      expect(formatReal(Math.sqrt(3))).toBe("1.7320508076");
      expect(formatReal(3.14159, { radix: "dec", precision: 2 })).toBe("3.14");
    });

    it("hides binary floating point noise", () => {
      expect(formatReal(0.1 + 0.2)).toBe("0.3");
    });

    it("prints non-finite values by name", () => {
      expect(formatReal(Number.NaN)).toBe("NaN");
      expect(formatReal(Infinity)).toBe("Infinity");
      expect(formatReal(-Infinity, hex)).toBe("-Infinity");
    });
  });

  describe("radix", () => {
    it("prints prefixed integers", () => {
      expect(formatReal(255, hex)).toBe("0xff");
      expect(formatReal(-10, bin)).toBe("-0b1010");
      expect(formatReal(8, oct)).toBe("0o10");
      expect(formatReal(0, hex)).toBe("0x0");
    });

    it("prints fraction digits in the target base", () => {
      expect(formatReal(2.5, bin)).toBe("0b10.1");
      expect(formatReal(0.75, oct)).toBe("0o0.6");
      expect(formatReal(10.0625, hex)).toBe("0xa.1");
    });

    it("truncates fraction digits at the precision", () => {
      expect(formatReal(0.1, { radix: "bin", precision: 4 })).toBe("0b0.0001");
      expect(formatReal(2.5, { radix: "bin", precision: 0 })).toBe("0b10");
    });
  });

  describe("exponential", () => {
    it("rounds the mantissa", () => {
      expect(formatReal(1234.5, { radix: "exp", precision: 3 })).toBe("1.235e+3");
    });

    it("drops trailing zeros from the mantissa", () => {
      expect(formatReal(1000, { radix: "exp", precision: 4 })).toBe("1e+3");
      expect(formatReal(0.0025, { radix: "exp", precision: 4 })).toBe("2.5e-3");
    });
  });
});

describe("formatResult", () => {
  it("prints real results alone", () => {
    expect(formatResult(real(42))).toBe("42");
  });

  it("prints complex results with a signed imaginary part", () => {
    expect(formatResult(complex(0, 1))).toBe("0+1i");
    expect(formatResult(complex(1, -2))).toBe("1-2i");
    expect(formatResult(complex(255, -1), hex)).toBe("0xff-0x1i");
  });

  it("prints NaN for an undefined complex result", () => {
    expect(formatResult(complex(Number.NaN, 1))).toBe("NaN");
  });
});

describe("display settings", () => {
  it("defaults to ten decimal places", () => {
    expect(describeDisplay(DEFAULT_DISPLAY)).toBe("dec (precision 10)");
  });

  it("accepts known radixes and bounded integer precisions", () => {
    expect(isDisplayRadix("hex")).toBe(true);
    expect(isDisplayRadix("base64")).toBe(false);
    expect(isDisplayRadix(undefined)).toBe(false);
    expect(isValidPrecision(0)).toBe(true);
    expect(isValidPrecision(64)).toBe(true);
    expect(isValidPrecision(65)).toBe(false);
    expect(isValidPrecision(2.5)).toBe(false);
    expect(isValidPrecision("4")).toBe(false);
  });
});
