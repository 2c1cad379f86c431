import { describe, expect, it } from "vitest";
import { CalcSession } from "calcline-main";
import { runCallMode } from "../src/call-mode.js";

function session(radix: "dec" | "hex" = "dec"): CalcSession {
  return new CalcSession({ contextFile: "/tmp/calcline-test/context.json", display: { radix, precision: 10 }, debug: false });
}

describe("runCallMode", () => {
  it("joins value results and skips definitions", () => {
    expect(runCallMode(["1+1", "x = 2", "x*3"], session())).toEqual({ stdout: "2; 6", stderr: "", exitCode: 0 });
  });

  it("formats results with the session display", () => {
    expect(runCallMode(["255", "sqrt(-1)"], session("hex"))).toEqual({
      stdout: "0xff; 0x0+0x1i",
      stderr: "",
      exitCode: 0,
    });
  });

  it("stops at the first error and keeps earlier results", () => {
    expect(runCallMode(["1", "2", "2 3", "4"], session())).toEqual({
      stdout: "1; 2",
      stderr: 'Error: Expected end of input.\n2 3\n  ^~~~ Found: "3"',
      exitCode: 1,
    });
  });

  it("refuses meta-commands", () => {
    expect(runCallMode(["1", " save "], session())).toEqual({
      stdout: "1",
      stderr: 'Error: Commands are not available in call mode: "save".',
      exitCode: 1,
    });
  });

  it("prints only the diagnostic when the first expression fails", () => {
    expect(runCallMode(["2 +"], session())).toEqual({
      stdout: "",
      stderr: "Error: Expected operand (number, constant, function call) or an unary operation.\n2 +\n   ^~~~ Found: end of input",
      exitCode: 1,
    });
  });

  it("prints nothing for no expressions", () => {
    expect(runCallMode([], session())).toEqual({ stdout: "", stderr: "", exitCode: 0 });
  });
});
