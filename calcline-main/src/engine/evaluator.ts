import { applyFunction } from "./functions.js";
import type { MathContext } from "./math-context.js";
import {
  add,
  divide,
  modulo,
  multiply,
  negate,
  power,
  subtract,
  undefinedResult,
  type NumericResult,
} from "./numeric.js";
import type { ExpressionNode } from "./parser.js";
import { literalValue } from "./tokenizer.js";
import type { OperationKind } from "./types.js";

/** Limit on nested user function calls. */
export const MAX_EVALUATION_DEPTH = 512;

type BinaryOperation = (a: NumericResult, b: NumericResult) => NumericResult;

const BINARY: Record<Exclude<OperationKind, "assign">, BinaryOperation> = {
  add,
  sub: subtract,
  mul: multiply,
  div: divide,
  mod: modulo,
  pow: power,
};

/**
 * Evaluates a parsed tree. Never throws: anything that cannot be computed
 * comes out as NaN.
 */
export function evaluate(tree: ExpressionNode, context: MathContext): NumericResult {
  return evaluateNode(tree, context, 0);
}

function evaluateNode(node: ExpressionNode, context: MathContext, depth: number): NumericResult {
  if (depth > MAX_EVALUATION_DEPTH) return undefinedResult();
  const token = node.value;

  switch (token.type) {
    case "NUMBER":
      return literalValue(token) ?? undefinedResult();

    case "CONSTANT":
    case "USER_CONSTANT":
    case "UNKNOWN_CONSTANT":
      return context.constantValue(token.value) ?? undefinedResult();

    case "OPERATION":
      return evaluateOperation(node, context, depth);

    case "FUNCTION": {
      const kind = context.functionKind(token.value);
      if (!kind) return undefinedResult();
      const args = node.successors.map((arg) => evaluateNode(arg, context, depth));
      return applyFunction(kind, args);
    }

    case "USER_FUNCTION":
    case "UNKNOWN_FUNCTION": {
      const body = context.substituteUserFunctionTree(token.value, node.successors);
      if (!body) return undefinedResult();
      return evaluateNode(body, context, depth + 1);
    }

    case "PUNCTUATION":
      return undefinedResult();
  }
}

function evaluateOperation(node: ExpressionNode, context: MathContext, depth: number): NumericResult {
  const kind = context.operationKind(node.value.value);
  if (!kind || kind === "assign") return undefinedResult();

  const [first, second] = node.successors;

  if (node.successors.length === 1 && first) {
    const operand = evaluateNode(first, context, depth);
    if (kind === "add") return operand;
    if (kind === "sub") return negate(operand);
    return undefinedResult();
  }

  if (node.successors.length === 2 && first && second) {
    const left = evaluateNode(first, context, depth);
    const right = evaluateNode(second, context, depth);
    return BINARY[kind](left, right);
  }

  return undefinedResult();
}
