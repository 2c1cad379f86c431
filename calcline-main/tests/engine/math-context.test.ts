import { describe, expect, it } from "vitest";
import { MathContext } from "../../src/engine/math-context.js";
import { real } from "../../src/engine/numeric.js";
import { parse, type ExpressionNode } from "../../src/engine/parser.js";

function show(node: ExpressionNode): string {
  if (node.isLeaf) return node.value.value;
  return `(${node.value.value} ${node.successors.map(show).join(" ")})`;
}

function withSquarePlusSelf(): MathContext {
  const ctx = new MathContext();
  ctx.addUserFunction("f", {
    body: parse("x * (x + 1)", ctx),
    params: ["x"],
    text: "f(x) = x * (x + 1)",
  });
  return ctx;
}

describe("MathContext", () => {
  describe("character classes", () => {
    it("classifies digits, literals and punctuation", () => {
      const ctx = new MathContext();
      expect(ctx.isNumberSymbol("7")).toBe(true);
      expect(ctx.isNumberSymbol("a")).toBe(false);
      expect(ctx.isLiteralSymbol("a")).toBe(true);
      expect(ctx.isLiteralSymbol("Z")).toBe(true);
      expect(ctx.isLiteralSymbol("_")).toBe(true);
      expect(ctx.isLiteralSymbol("1")).toBe(false);
      expect(ctx.isPunctuationSymbol("(")).toBe(true);
      expect(ctx.isPunctuationSymbol(",")).toBe(true);
      expect(ctx.isPunctuationSymbol("+")).toBe(false);
    });
  });

  describe("operations", () => {
    it("knows all seven operators and their precedence", () => {
      const ctx = new MathContext();
      expect(["+", "-", "*", "/", "%", "^", "="].every((op) => ctx.isOperation(op))).toBe(true);
      expect(ctx.isOperation("!")).toBe(false);
      expect(ctx.operationPrecedence("=")).toBe(1);
      expect(ctx.operationPrecedence("+")).toBe(2);
      expect(ctx.operationPrecedence("%")).toBe(3);
      expect(ctx.operationPrecedence("^")).toBe(4);
      expect(ctx.operationKind("%")).toBe("mod");
      expect(ctx.operationKind("=")).toBe("assign");
    });

    it("treats only + and - as unary", () => {
      const ctx = new MathContext();
      expect(ctx.isUnaryOperation("+")).toBe(true);
      expect(ctx.isUnaryOperation("-")).toBe(true);
      expect(ctx.isUnaryOperation("*")).toBe(false);
      expect(ctx.isUnaryOperation("=")).toBe(false);
    });
  });

  describe("functions", () => {
    it("maps aliases onto one function kind", () => {
      const ctx = new MathContext();
      expect(ctx.functionKind("acos")).toBe("arccos");
      expect(ctx.functionKind("arccos")).toBe("arccos");
      expect(ctx.functionKind("nope")).toBeUndefined();
    });

    it("reports built-in and user arity", () => {
      const ctx = withSquarePlusSelf();
      expect(ctx.functionArity("sin")).toBe(1);
      expect(ctx.functionArity("root")).toBe(2);
      expect(ctx.functionArity("f")).toBe(1);
      expect(ctx.functionArity("g")).toBeUndefined();
      expect(ctx.isFunction("f")).toBe(true);
      expect(ctx.isBuiltInFunction("f")).toBe(false);
      expect(ctx.isUserFunction("f")).toBe(true);
    });

    it("removes user functions", () => {
      const ctx = withSquarePlusSelf();
      expect(ctx.removeUserFunction("f")).toBe(true);
      expect(ctx.removeUserFunction("f")).toBe(false);
      expect(ctx.isFunction("f")).toBe(false);
    });
  });

  describe("constants", () => {
    it("looks up built-in constants before user constants", () => {
      const ctx = new MathContext();
      ctx.addUserConstant("pi", real(3));
      expect(ctx.constantValue("pi")?.value.re).toBe(Math.PI);
      expect(ctx.constantValue("e")?.value.re).toBe(Math.E);
      expect(ctx.constantValue("i")?.kind).toBe("complex");
      expect(ctx.constantValue("i")?.value.im).toBe(1);
    });

    it("adds and removes user constants", () => {
      const ctx = new MathContext();
      ctx.addUserConstant("x", real(2));
      expect(ctx.isConstant("x")).toBe(true);
      expect(ctx.isBuiltInConstant("x")).toBe(false);
      expect(ctx.constantValue("x")?.value.re).toBe(2);
      expect(ctx.removeUserConstant("x")).toBe(true);
      expect(ctx.constantValue("x")).toBeUndefined();
    });

    it("keeps one user meaning per name", () => {
      const ctx = withSquarePlusSelf();
      ctx.addUserConstant("f", real(1));
      expect(ctx.isUserFunction("f")).toBe(false);

      ctx.addUserFunction("f", { body: parse("x", ctx), params: ["x"], text: "f(x) = x" });
      expect(ctx.isUserConstant("f")).toBe(false);
    });

    it("lists user symbols sorted by name", () => {
      const ctx = new MathContext();
      ctx.addUserConstant("b", real(2));
      ctx.addUserConstant("a", real(1));
      expect(ctx.userConstants().map(([name]) => name)).toEqual(["a", "b"]);
    });
  });

  describe("substituteUserFunctionTree", () => {
    it("replaces every parameter leaf with a copy of the argument", () => {
      const ctx = withSquarePlusSelf();
      const result = ctx.substituteUserFunctionTree("f", [parse("2+y", ctx)]);
      expect(result && show(result)).toBe("(* (+ 2 y) (+ (+ 2 y) 1))");
    });

    it("leaves the stored definition untouched", () => {
      const ctx = withSquarePlusSelf();
      ctx.substituteUserFunctionTree("f", [parse("5", ctx)]);
      const stored = ctx.userFunction("f");
      expect(stored && show(stored.body)).toBe("(* x (+ x 1))");
    });

    it("returns independent trees on each call", () => {
      const ctx = withSquarePlusSelf();
      const first = ctx.substituteUserFunctionTree("f", [parse("1", ctx)]);
      const second = ctx.substituteUserFunctionTree("f", [parse("1", ctx)]);
      expect(first).not.toBe(second);
      expect(first?.successors[0]).not.toBe(second?.successors[0]);
    });

    it("fails for unknown names and wrong argument counts", () => {
      const ctx = withSquarePlusSelf();
      expect(ctx.substituteUserFunctionTree("g", [parse("1", ctx)])).toBeUndefined();
      expect(ctx.substituteUserFunctionTree("f", [])).toBeUndefined();
      expect(ctx.substituteUserFunctionTree("f", [parse("1", ctx), parse("2", ctx)])).toBeUndefined();
    });
  });
});
