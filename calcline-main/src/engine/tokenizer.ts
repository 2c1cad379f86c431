import { END_OF_INPUT, expectedError, markPosition, unknownTokenError } from "./diagnostics.js";
import { InputStream } from "./input-stream.js";
import type { MathContext } from "./math-context.js";
import { complex, real, type NumericResult } from "./numeric.js";
import { CalcError, type NumberKind, type NumberToken, type Token, type TokenType } from "./types.js";

const RADIX_MARKERS = new Set(["x", "o", "b"]);

const DECIMAL_LITERAL = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const RADIX_LITERALS: RegExp[] = [/^0x[0-9a-f]+$/i, /^0o[0-7]+$/i, /^0b[01]+$/i];

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/** Numeric value of a number token, or undefined when the literal is malformed. */
export function literalValue(token: NumberToken): NumericResult | undefined {
  let text = token.value;
  if (token.numberKind === "complex") {
    if (!text.endsWith("i")) return undefined;
    text = text.slice(0, -1);
  }

  const valid = DECIMAL_LITERAL.test(text) || RADIX_LITERALS.some((re) => re.test(text));
  if (!valid) return undefined;

  const n = Number(text);
  if (Number.isNaN(n)) return undefined;
  return token.numberKind === "complex" ? complex(0, n) : real(n);
}

/**
 * Lazy single-pass tokenizer. One token is always read ahead; a lex error
 * found while reading ahead is held back and raised by the next `peek()`
 * or `next()`.
 */
export class Tokenizer {
  private readonly stream: InputStream;
  private current: Token | CalcError | undefined;

  constructor(
    readonly input: string,
    private readonly context: MathContext,
  ) {
    this.stream = new InputStream(input);
    this.current = this.read();
  }

  peek(): Token | undefined {
    if (this.current instanceof CalcError) throw this.current;
    return this.current;
  }

  next(): Token {
    const token = this.peek();
    if (!token) {
      throw expectedError(this.input, this.endOfInputPosition(), "END_OF_STREAM", "another token", END_OF_INPUT);
    }
    this.current = this.read();
    return token;
  }

  eof(): boolean {
    return this.current === undefined;
  }

  /** Index of the last character read, which includes the lookahead token. */
  position(): number {
    return this.stream.position() - 1;
  }

  /** Caret column used when the input ran out. */
  endOfInputPosition(): number {
    return this.stream.position();
  }

  markPosition(pos: number, message?: string): string {
    const marked = markPosition(this.input, pos);
    return message ? `${marked} ${message}` : marked;
  }

  // ── Reading ──────────────────────────────────────────────────────

  private read(): Token | CalcError | undefined {
    this.skipWhitespace();
    const ch = this.stream.peek();
    if (ch === undefined) return undefined;

    if (this.context.isLiteralSymbol(ch)) return this.readSymbol();
    if (this.context.isNumberSymbol(ch) || ch === ".") return this.readNumber();
    if (this.context.isOperation(ch)) return this.readSingle("OPERATION");
    if (this.context.isPunctuationSymbol(ch)) return this.readSingle("PUNCTUATION");

    return unknownTokenError(this.input, this.stream.position(), ch);
  }

  private skipWhitespace(): void {
    let ch = this.stream.peek();
    while (ch !== undefined && isWhitespace(ch)) {
      this.stream.next();
      ch = this.stream.peek();
    }
  }

  private readSingle(type: "OPERATION" | "PUNCTUATION"): Token {
    const value = this.stream.next() ?? "";
    return { type, value, endPos: this.position() };
  }

  private readWhile(accept: (ch: string) => boolean): string {
    let text = "";
    let ch = this.stream.peek();
    while (ch !== undefined && accept(ch)) {
      text += ch;
      this.stream.next();
      ch = this.stream.peek();
    }
    return text;
  }

  private isWordSymbol(ch: string): boolean {
    return this.context.isLiteralSymbol(ch) || this.context.isNumberSymbol(ch);
  }

  private readSymbol(): Token {
    const name = this.readWhile((ch) => this.isWordSymbol(ch));
    const endPos = this.position();
    return { type: this.classifySymbol(name, this.stream.peek() === "("), value: name, endPos };
  }

  private classifySymbol(name: string, callFollows: boolean): Exclude<TokenType, "NUMBER"> {
    if (!callFollows && this.context.isBuiltInConstant(name)) return "CONSTANT";
    if (!callFollows && this.context.isUserConstant(name)) return "USER_CONSTANT";
    if (callFollows && this.context.isBuiltInFunction(name)) return "FUNCTION";
    if (callFollows && this.context.isUserFunction(name)) return "USER_FUNCTION";
    return callFollows ? "UNKNOWN_FUNCTION" : "UNKNOWN_CONSTANT";
  }

  private readNumber(): NumberToken {
    const first = this.stream.peek();
    const marker = this.stream.peek(1)?.toLowerCase();

    if (first === "0" && marker !== undefined && RADIX_MARKERS.has(marker)) {
      this.stream.next();
      this.stream.next();
      const digits = this.readWhile((ch) => this.isWordSymbol(ch) || ch === ".");
      return { type: "NUMBER", numberKind: "real", value: `0${marker}${digits}`, endPos: this.position() };
    }

    let text = first === "." ? "0" : "";
    text += this.readWhile((ch) => this.context.isNumberSymbol(ch) || ch === ".");

    const e = this.stream.peek();
    if (e === "e" || e === "E") {
      text += this.stream.next() ?? "";
      const sign = this.stream.peek();
      if (sign === "+" || sign === "-") text += this.stream.next() ?? "";
      text += this.readWhile((ch) => this.context.isNumberSymbol(ch));
    }

    let numberKind: NumberKind = "real";
    if (this.stream.peek() === "i") {
      text += this.stream.next() ?? "";
      numberKind = "complex";
    }

    // Trailing letters belong to the literal so they are reported as part of it.
    text += this.readWhile((ch) => this.isWordSymbol(ch) || ch === ".");
    return { type: "NUMBER", numberKind, value: text, endPos: this.position() };
  }
}
