import { expectedError } from "./diagnostics.js";
import type { MathContext } from "./math-context.js";
import type { ExpressionNode } from "./parser.js";

/** Names a definition body may use besides registered symbols. */
export interface DefinitionScope {
  params: ReadonlySet<string>;
  /** Function being defined; calls back into it are rejected. */
  defining?: string;
}

/** True if user function `name` reaches `target` through its stored body. */
export function callsTransitively(
  name: string,
  target: string,
  context: MathContext,
  visited: Set<string> = new Set(),
): boolean {
  if (visited.has(name)) return false;
  visited.add(name);

  const fn = context.userFunction(name);
  if (!fn) return false;

  for (const node of fn.body.walk()) {
    if (node.value.type !== "USER_FUNCTION") continue;
    if (node.value.value === target) return true;
    if (callsTransitively(node.value.value, target, context, visited)) return true;
  }
  return false;
}

/**
 * Checks that every symbol in `tree` resolves and every call has the right
 * number of arguments. Inside a definition (`scope` given) unknown symbols
 * are only allowed when they name a parameter.
 */
export function validateExpression(
  tree: ExpressionNode,
  context: MathContext,
  input: string,
  scope?: DefinitionScope,
): void {
  const token = tree.value;

  switch (token.type) {
    case "OPERATION":
      if (context.operationKind(token.value) === "assign") {
        throw expectedError(
          input,
          token.endPos,
          "INVALID_DEFINITION",
          "assignment only as the outermost operation",
          `nested assignment "${token.value}"`,
        );
      }
      break;

    case "UNKNOWN_CONSTANT":
      if (scope?.params.has(token.value)) break;
      if (scope) {
        throw expectedError(input, token.endPos, "INVALID_DEFINITION", "non-symbolic expression", `symbolic expression "${token.value}"`);
      }
      throw expectedError(
        input,
        token.endPos,
        "UNKNOWN_CONSTANT",
        "built-in or user defined constant",
        `unknown constant "${token.value}"`,
      );

    case "UNKNOWN_FUNCTION":
      if (scope) {
        throw expectedError(input, token.endPos, "INVALID_DEFINITION", "non-symbolic expression", `symbolic expression "${token.value}"`);
      }
      throw expectedError(
        input,
        token.endPos,
        "UNKNOWN_FUNCTION",
        "built-in or user defined function",
        `unknown function "${token.value}(...)"`,
      );

    case "USER_FUNCTION":
      if (scope?.defining !== undefined) {
        const target = scope.defining;
        if (token.value === target || callsTransitively(token.value, target, context)) {
          throw expectedError(input, token.endPos, "INVALID_DEFINITION", "non-recursive expression", `recursive call "${token.value}"`);
        }
      }
      checkArity(tree, context, input);
      break;

    case "FUNCTION":
      checkArity(tree, context, input);
      break;

    default:
      break;
  }

  for (const child of tree.successors) {
    validateExpression(child, context, input, scope);
  }
}

function checkArity(call: ExpressionNode, context: MathContext, input: string): void {
  const token = call.value;
  const arity = context.functionArity(token.value);
  if (arity === undefined || arity === call.successors.length) return;
  throw expectedError(
    input,
    token.endPos,
    "WRONG_ARITY",
    `${arity} argument(s)`,
    `${call.successors.length} argument(s)`,
  );
}
