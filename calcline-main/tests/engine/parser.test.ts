import { describe, expect, it } from "vitest";
import { MathContext } from "../../src/engine/math-context.js";
import { parse, type ExpressionNode } from "../../src/engine/parser.js";
import { CalcError } from "../../src/engine/types.js";

function show(node: ExpressionNode): string {
  if (node.isLeaf) return node.value.value;
  return `(${node.value.value} ${node.successors.map(show).join(" ")})`;
}

function p(input: string): string {
  return show(parse(input, new MathContext()));
}

function parseError(input: string): CalcError {
  try {
    parse(input, new MathContext());
  } catch (e) {
    if (e instanceof CalcError) return e;
    throw e;
  }
  throw new Error(`expected "${input}" to fail`);
}

describe("parser", () => {
  describe("precedence and associativity", () => {
    it("parses a single number", () => {
      expect(p("42")).toBe("42");
    });

    it("binds * tighter than +", () => {
      expect(p("1+2*3")).toBe("(+ 1 (* 2 3))");
      expect(p("2*3+4")).toBe("(+ (* 2 3) 4)");
    });

    it("binds ^ tighter than * / %", () => {
      expect(p("2*3^2")).toBe("(* 2 (^ 3 2))");
      expect(p("8%3^2")).toBe("(% 8 (^ 3 2))");
    });

    it("folds equal precedence left to right", () => {
      expect(p("2-3-4")).toBe("(- (- 2 3) 4)");
      expect(p("12/4/3")).toBe("(/ (/ 12 4) 3)");
      expect(p("2^3^2")).toBe("(^ (^ 2 3) 2)");
    });

    it("folds a long chain of one precedence level", () => {
      const tree = parse(Array(20000).fill("1").join("+"), new MathContext());
      expect(tree.value.value).toBe("+");
      expect(tree.successors[1]?.value.value).toBe("1");
      expect(tree.successors[0]?.value.value).toBe("+");
    });

    it("keeps precedence inside a long mixed chain", () => {
      expect(p("1+2*3-4*5^2+6")).toBe("(+ (- (+ 1 (* 2 3)) (* 4 (^ 5 2))) 6)");
    });

    it("respects parentheses", () => {
      expect(p("(1+2)*3")).toBe("(* (+ 1 2) 3)");
      expect(p("((4))")).toBe("4");
    });

    it("gives = the lowest precedence", () => {
      expect(p("c = e + pi")).toBe("(= c (+ e pi))");
    });
  });

  describe("unary chains", () => {
    it("folds stacked prefix operators onto their operand", () => {
      expect(p("6*--2")).toBe("(* 6 (- (- 2)))");
    });

    it("folds a leading unary chain before binary parsing", () => {
      expect(p("+15.7^+--+-0.5")).toBe("(^ (+ 15.7) (+ (- (- (+ (- 0.5))))))");
    });

    it("binds unary tighter than any binary operator", () => {
      expect(p("-2^2")).toBe("(^ (- 2) 2)");
    });

    it("accepts a unary operand after a binary operator", () => {
      expect(p("pi - 9 / 2 ^- 0.7")).toBe("(- pi (/ 9 (^ 2 (- 0.7))))");
    });
  });

  describe("function calls", () => {
    it("parses one and two argument calls", () => {
      expect(p("sin(0)")).toBe("(sin 0)");
      expect(p("pow(2, 3+1)")).toBe("(pow 2 (+ 3 1))");
    });

    it("parses nested calls", () => {
      expect(p("exp(ln(3))")).toBe("(exp (ln 3))");
    });

    it("parses a definition head as a call", () => {
      expect(p("f(x, y) = x + y")).toBe("(= (f x y) (+ x y))");
    });

    it("accepts an empty argument list", () => {
      const tree = parse("g()", new MathContext());
      expect(tree.value.value).toBe("g");
      expect(tree.successors).toEqual([]);
    });
  });

  describe("errors", () => {
    it("reports a missing closing parenthesis", () => {
      const err = parseError("2*(5-3");
      expect(err.code).toBe("UNEXPECTED_END");
      expect(err.message).toBe('Error: Expected symbol ")".\n2*(5-3\n      ^~~~ Found: end of input');
    });

    it("reports an operand expected after a trailing operator", () => {
      const err = parseError("3+");
      expect(err.code).toBe("UNEXPECTED_END");
      expect(err.pos).toBe(2);
      expect(err.message).toBe(
        "Error: Expected operand (number, constant, function call) or an unary operation.\n3+\n  ^~~~ Found: end of input",
      );
    });

    it("reports a non-unary operator in a unary chain", () => {
      const err = parseError("5+--*2.7");
      expect(err.pos).toBe(4);
      expect(err.message).toBe('Error: Expected unary operation.\n5+--*2.7\n    ^~~~ Found: non-unary operation "*"');
    });

    it("reports a leading non-unary operator", () => {
      expect(parseError("*2").pos).toBe(0);
    });

    it("reports an unexpected closing parenthesis", () => {
      const err = parseError("3-)");
      expect(err.message).toBe(
        'Error: Expected operand (number, constant, function call) or an unary operation.\n3-)\n  ^~~~ Found: unexpected symbol ")"',
      );
    });

    it("reports an unfinished argument list", () => {
      expect(parseError("pow(5,").message).toBe('Error: Expected symbol ")".\npow(5,\n      ^~~~ Found: end of input');
    });

    it("reports a missing argument after a comma", () => {
      expect(parseError("pow(5,)").message).toBe('Error: Expected an argument.\npow(5,)\n      ^~~~ Found: symbol ")"');
    });

    it("reports a missing separator between arguments", () => {
      expect(parseError("pow(5 3)").message).toBe('Error: Expected "," or ")".\npow(5 3)\n      ^~~~ Found: "3"');
    });

    it("reports trailing input", () => {
      const err = parseError("2 3");
      expect(err.code).toBe("TRAILING_INPUT");
      expect(err.message).toBe('Error: Expected end of input.\n2 3\n  ^~~~ Found: "3"');
    });

    it("reports invalid number literals", () => {
      const err = parseError("5h+1");
      expect(err.code).toBe("INVALID_NUMBER");
      expect(err.message).toBe('Error: Expected literal number.\n5h+1\n ^~~~ Found: invalid literal symbol(s) "5h"');
    });

    it("passes lexer errors through unchanged", () => {
      const err = parseError("5+|");
      expect(err.code).toBe("UNKNOWN_TOKEN");
      expect(err.message).toBe('Error: Unknown token found: "|".\n5+|\n  ^~~~');
    });

    it("reports empty input", () => {
      expect(parseError("").code).toBe("UNEXPECTED_END");
    });

    it("carries the expected and found parts separately", () => {
      const err = parseError("3-)");
      expect(err.expected).toBe("operand (number, constant, function call) or an unary operation");
      expect(err.found).toBe('unexpected symbol ")"');
    });
  });
});
