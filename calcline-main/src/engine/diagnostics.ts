import { CalcError, type CalcErrorCode } from "./types.js";

export const CARET = "^~~~";
export const END_OF_INPUT = "end of input";

/** Renders the source line with a caret marker under column `pos`. */
export function markPosition(input: string, pos: number): string {
  return `${input}\n${" ".repeat(Math.max(0, pos))}${CARET}`;
}

export function expectedError(
  input: string,
  pos: number,
  code: CalcErrorCode,
  expected: string,
  found?: string,
): CalcError {
  const marked = markPosition(input, pos);
  const message = found === undefined
    ? `Error: Expected ${expected}.\n${marked}`
    : `Error: Expected ${expected}.\n${marked} Found: ${found}`;
  return new CalcError(message, pos, code, { expected, found });
}

export function unknownTokenError(input: string, pos: number, symbol: string): CalcError {
  return new CalcError(
    `Error: Unknown token found: "${symbol}".\n${markPosition(input, pos)}`,
    pos,
    "UNKNOWN_TOKEN",
    { found: `"${symbol}"` },
  );
}
