import { END_OF_INPUT, expectedError } from "./diagnostics.js";
import type { MathContext } from "./math-context.js";
import { literalValue, Tokenizer } from "./tokenizer.js";
import { TreeNode } from "./tree.js";
import type { Token } from "./types.js";

const OPERAND_EXPECTED = "operand (number, constant, function call) or an unary operation";

export type ExpressionNode = TreeNode<Token>;

/** An operation token that has not been given its operand yet. */
function isPendingUnary(node: ExpressionNode): boolean {
  return node.value.type === "OPERATION" && node.isLeaf;
}

/**
 * Precedence-climbing parser. Operators that may be unary (`+`, `-`) are
 * recognized inline: an operation token in operand position becomes a
 * pending placeholder that is folded with the operand that follows it.
 */
export class Parser {
  private readonly tokenizer: Tokenizer;

  constructor(
    readonly input: string,
    private readonly context: MathContext,
  ) {
    this.tokenizer = new Tokenizer(input, context);
  }

  parseToplevel(): ExpressionNode {
    const tree = this.parseExpression();
    const trailing = this.tokenizer.peek();
    if (trailing) {
      throw expectedError(this.input, trailing.endPos, "TRAILING_INPUT", "end of input", `"${trailing.value}"`);
    }
    return tree;
  }

  // ── Helpers ──────────────────────────────────────────────────────

  private isPunc(symbol: string): boolean {
    const token = this.tokenizer.peek();
    return token !== undefined && token.type === "PUNCTUATION" && token.value === symbol;
  }

  private skipPunc(symbol: string): void {
    const token = this.tokenizer.peek();
    if (!token) {
      throw expectedError(
        this.input,
        this.tokenizer.endOfInputPosition(),
        "UNEXPECTED_END",
        `symbol "${symbol}"`,
        END_OF_INPUT,
      );
    }
    if (token.type !== "PUNCTUATION" || token.value !== symbol) {
      throw expectedError(this.input, token.endPos, "UNEXPECTED_TOKEN", `symbol "${symbol}"`, `"${token.value}"`);
    }
    this.tokenizer.next();
  }

  private nextOperand(): Token {
    if (this.tokenizer.eof()) {
      throw expectedError(
        this.input,
        this.tokenizer.endOfInputPosition(),
        "UNEXPECTED_END",
        OPERAND_EXPECTED,
        END_OF_INPUT,
      );
    }
    return this.tokenizer.next();
  }

  // ── Grammar ──────────────────────────────────────────────────────

  private parseExpression(): ExpressionNode {
    return this.parseOperation();
  }

  private parseElement(): ExpressionNode {
    if (this.isPunc("(")) {
      this.tokenizer.next();
      const inner = this.parseExpression();
      this.skipPunc(")");
      return inner;
    }

    const token = this.nextOperand();
    switch (token.type) {
      case "NUMBER":
        if (!literalValue(token)) {
          throw expectedError(
            this.input,
            token.endPos,
            "INVALID_NUMBER",
            "literal number",
            `invalid literal symbol(s) "${token.value}"`,
          );
        }
        return new TreeNode(token);

      case "CONSTANT":
      case "USER_CONSTANT":
      case "UNKNOWN_CONSTANT":
        return new TreeNode(token);

      case "FUNCTION":
      case "USER_FUNCTION":
      case "UNKNOWN_FUNCTION":
        return this.parseCall(token);

      case "OPERATION":
        if (this.context.isUnaryOperation(token.value)) return new TreeNode(token);
        throw expectedError(
          this.input,
          token.endPos,
          "UNEXPECTED_TOKEN",
          "unary operation",
          `non-unary operation "${token.value}"`,
        );

      case "PUNCTUATION":
        throw expectedError(
          this.input,
          token.endPos,
          "UNEXPECTED_TOKEN",
          OPERAND_EXPECTED,
          `unexpected symbol "${token.value}"`,
        );
    }
  }

  private parseCall(name: Token): ExpressionNode {
    this.skipPunc("(");
    const args = this.parseArgumentList();
    this.skipPunc(")");
    return new TreeNode(name, args);
  }

  private parseArgumentList(): ExpressionNode[] {
    const args: ExpressionNode[] = [];
    if (this.isPunc(")")) return args;

    while (!this.tokenizer.eof()) {
      args.push(this.parseExpression());

      if (this.isPunc(",")) {
        this.tokenizer.next();
        const after = this.tokenizer.peek();
        if (after && after.type === "PUNCTUATION" && after.value === ")") {
          throw expectedError(this.input, after.endPos, "UNEXPECTED_TOKEN", "an argument", `symbol "${after.value}"`);
        }
        continue;
      }

      const peeked = this.tokenizer.peek();
      if (peeked && !this.isPunc(")")) {
        throw expectedError(this.input, peeked.endPos, "UNEXPECTED_TOKEN", "\",\" or \")\"", `"${peeked.value}"`);
      }
      break;
    }
    return args;
  }

  private parseOperation(): ExpressionNode {
    const element = this.parseElement();
    const operand = isPendingUnary(element) ? this.parseUnary(element) : element;
    if (this.tokenizer.eof()) return operand;
    return this.parseBinary(operand, 0);
  }

  /** Folds a run of prefix operators onto the operand that ends it. */
  private parseUnary(op: ExpressionNode): ExpressionNode {
    const element = this.parseElement();
    const operand = isPendingUnary(element) ? this.parseUnary(element) : element;
    return new TreeNode(op.value, [operand]);
  }

  /** Folds operators left to right; only tighter-binding right sides recurse. */
  private parseBinary(left: ExpressionNode, minPrecedence: number): ExpressionNode {
    let tree = left;

    while (this.bindingPower(this.tokenizer.peek()) > minPrecedence) {
      const token = this.tokenizer.next();
      const element = this.parseElement();
      const operand = isPendingUnary(element) ? this.parseUnary(element) : element;
      const right = this.parseBinary(operand, this.bindingPower(token));
      tree = new TreeNode(token, [tree, right]);
    }

    return tree;
  }

  private bindingPower(token: Token | undefined): number {
    if (!token || token.type !== "OPERATION") return 0;
    return this.context.operationPrecedence(token.value) ?? 0;
  }
}

export function parse(input: string, context: MathContext): ExpressionNode {
  return new Parser(input, context).parseToplevel();
}
