import { expectedError } from "./diagnostics.js";
import { evaluate } from "./evaluator.js";
import type { MathContext } from "./math-context.js";
import type { NumericResult } from "./numeric.js";
import type { ExpressionNode } from "./parser.js";
import { validateExpression } from "./resolver.js";

export interface ConstantDefinition {
  kind: "constant";
  name: string;
  body: ExpressionNode;
}

export interface FunctionDefinition {
  kind: "function";
  name: string;
  params: string[];
  body: ExpressionNode;
}

export type Definition = ConstantDefinition | FunctionDefinition;

/** User constant that always holds the last computed value. */
export const ANSWER_CONSTANT = "ans";

const NAME_EXPECTED = "new constant name or function name";

export function isAssignment(tree: ExpressionNode, context: MathContext): boolean {
  return tree.value.type === "OPERATION" && context.operationKind(tree.value.value) === "assign";
}

function isNameLeaf(node: ExpressionNode): boolean {
  return node.isLeaf && (node.value.type === "UNKNOWN_CONSTANT" || node.value.type === "USER_CONSTANT");
}

/** Reads the left side of `name = ...` or `name(a, b) = ...` and checks the body. */
export function analyzeDefinition(tree: ExpressionNode, context: MathContext, input: string): Definition {
  const [target, body] = tree.successors;
  if (!target || !body) {
    throw expectedError(input, tree.value.endPos, "INVALID_DEFINITION", "assignment with a name and a value");
  }

  const head = target.value;

  if (head.type === "CONSTANT" || head.type === "FUNCTION") {
    throw expectedError(input, head.endPos, "INVALID_DEFINITION", NAME_EXPECTED, `built-in expression "${head.value}"`);
  }

  if (isNameLeaf(target)) {
    validateExpression(body, context, input, { params: new Set() });
    return { kind: "constant", name: head.value, body };
  }

  if (head.type !== "UNKNOWN_FUNCTION" && head.type !== "USER_FUNCTION") {
    throw expectedError(input, head.endPos, "INVALID_DEFINITION", NAME_EXPECTED, `unexpected symbol "${head.value}"`);
  }

  if (head.value === ANSWER_CONSTANT) {
    throw expectedError(input, head.endPos, "INVALID_DEFINITION", NAME_EXPECTED, `reserved name "${head.value}"`);
  }

  const params: string[] = [];
  for (const arg of target.successors) {
    if (!isNameLeaf(arg)) {
      throw expectedError(input, arg.value.endPos, "INVALID_DEFINITION", "argument name", `"${arg.value.value}"`);
    }
    params.push(arg.value.value);
  }

  if (new Set(params).size !== params.length) {
    throw expectedError(
      input,
      0,
      "INVALID_DEFINITION",
      "distinct arguments",
      "function definition with partly equal arguments",
    );
  }

  validateExpression(body, context, input, { params: new Set(params), defining: head.value });
  return { kind: "function", name: head.value, params, body };
}

/**
 * Registers a checked definition. Constants are evaluated once, here;
 * function bodies are stored and evaluated on each call.
 */
export function applyDefinition(
  definition: Definition,
  context: MathContext,
  input: string,
): NumericResult | undefined {
  if (definition.kind === "constant") {
    const value = evaluate(definition.body, context);
    context.addUserConstant(definition.name, value);
    return value;
  }

  context.addUserFunction(definition.name, {
    body: definition.body,
    params: definition.params,
    text: input.trim(),
  });
  return undefined;
}
