import { expectedError } from "./diagnostics.js";
import { analyzeDefinition, ANSWER_CONSTANT, applyDefinition, isAssignment } from "./definitions.js";
import { logDefinition, logEvaluated, logParsed, logParseFailure } from "./engine-logger.js";
import { evaluate } from "./evaluator.js";
import type { MathContext } from "./math-context.js";
import type { NumericResult } from "./numeric.js";
import { parse } from "./parser.js";
import { validateExpression } from "./resolver.js";
import { CalcError } from "./types.js";

export { ANSWER_CONSTANT };

export type InputOutcome =
  | { ok: true; kind: "value"; result: NumericResult }
  | { ok: true; kind: "definition"; name: string; definition: "constant" | "function" }
  | { ok: false; error: CalcError };

/**
 * Runs one line through tokenizer, parser and evaluator against `context`.
 * Definitions update the context; plain expressions also update `ans`.
 */
export function evaluateInput(text: string, context: MathContext): InputOutcome {
  try {
    const tree = parse(text, context);
    logParsed(text, [...tree.walk()].length, tree.depth());

    if (isAssignment(tree, context)) {
      const definition = analyzeDefinition(tree, context, text);
      applyDefinition(definition, context, text);
      logDefinition(definition.kind, definition.name, definition.kind === "function" ? definition.params : undefined);
      return { ok: true, kind: "definition", name: definition.name, definition: definition.kind };
    }

    validateExpression(tree, context, text);
    const result = evaluate(tree, context);
    context.addUserConstant(ANSWER_CONSTANT, result);
    logEvaluated(text, result.kind, result.value.re, result.value.im);
    return { ok: true, kind: "value", result };
  } catch (err) {
    const error = err instanceof RangeError ? nestingError(text) : err;
    if (error instanceof CalcError) {
      logParseFailure(text, error.code, error.pos);
      return { ok: false, error };
    }
    throw err;
  }
}

/** Input nested deeper than the call stack can walk. */
function nestingError(text: string): CalcError {
  return expectedError(text, Array.from(text).length, "NESTING_TOO_DEEP", "less deeply nested expression");
}
