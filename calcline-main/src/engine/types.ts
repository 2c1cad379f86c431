export type TokenType =
  | "NUMBER"
  | "CONSTANT"
  | "USER_CONSTANT"
  | "FUNCTION"
  | "USER_FUNCTION"
  | "OPERATION"
  | "PUNCTUATION"
  | "UNKNOWN_CONSTANT"
  | "UNKNOWN_FUNCTION";

export type NumberKind = "real" | "complex";

interface TokenBase {
  readonly value: string;
  /** Index of the token's last character in the source line. */
  readonly endPos: number;
}

export interface NumberToken extends TokenBase {
  readonly type: "NUMBER";
  readonly numberKind: NumberKind;
}

export interface SymbolToken extends TokenBase {
  readonly type: Exclude<TokenType, "NUMBER">;
}

export type Token = NumberToken | SymbolToken;

export type OperationKind = "add" | "sub" | "mul" | "div" | "mod" | "pow" | "assign";

export type FunctionKind =
  | "cos"
  | "sin"
  | "tan"
  | "cot"
  | "cosh"
  | "sinh"
  | "tanh"
  | "coth"
  | "arccos"
  | "arcsin"
  | "arctan"
  | "arccot"
  | "arccosh"
  | "arcsinh"
  | "arctanh"
  | "arccoth"
  | "exp"
  | "ln"
  | "sqrt"
  | "re"
  | "im"
  | "pow"
  | "root";

export type CalcErrorCode =
  | "UNKNOWN_TOKEN"
  | "UNKNOWN_CONSTANT"
  | "UNKNOWN_FUNCTION"
  | "END_OF_STREAM"
  | "UNEXPECTED_TOKEN"
  | "UNEXPECTED_END"
  | "INVALID_NUMBER"
  | "WRONG_ARITY"
  | "INVALID_DEFINITION"
  | "TRAILING_INPUT"
  | "NESTING_TOO_DEEP";

export type CalcErrorCategory = "lex" | "parse" | "definition";

export interface CalcErrorDetail {
  expected?: string;
  found?: string;
}

export class CalcError extends Error {
  readonly expected: string | undefined;
  readonly found: string | undefined;

  constructor(
    message: string,
    public pos: number,
    public code: CalcErrorCode,
    detail: CalcErrorDetail = {},
  ) {
    super(message);
    this.name = "CalcError";
    this.expected = detail.expected;
    this.found = detail.found;
  }
}

export function errorCategory(code: CalcErrorCode): CalcErrorCategory {
  switch (code) {
    case "UNKNOWN_TOKEN":
    case "UNKNOWN_CONSTANT":
    case "UNKNOWN_FUNCTION":
    case "END_OF_STREAM":
      return "lex";
    case "INVALID_DEFINITION":
      return "definition";
    default:
      return "parse";
  }
}

export function isNumberToken(token: Token): token is NumberToken {
  return token.type === "NUMBER";
}
