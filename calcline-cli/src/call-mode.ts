import type { CalcSession } from "calcline-main";

export interface CallModeOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Evaluates each argument in order against one session. Value results are
 * joined with "; "; definitions print nothing. The first failure stops the
 * run with exit code 1, keeping the results printed before it.
 */
export function runCallMode(expressions: string[], session: CalcSession): CallModeOutput {
  const results: string[] = [];

  for (const expression of expressions) {
    if (session.isCommand(expression)) {
      return {
        stdout: results.join("; "),
        stderr: `Error: Commands are not available in call mode: "${expression.trim()}".`,
        exitCode: 1,
      };
    }

    const reply = session.evaluate(expression);
    if (reply.kind === "error") {
      return { stdout: results.join("; "), stderr: reply.text, exitCode: 1 };
    }
    if (reply.kind === "result") {
      results.push(session.format(reply.result));
    }
  }

  return { stdout: results.join("; "), stderr: "", exitCode: 0 };
}
