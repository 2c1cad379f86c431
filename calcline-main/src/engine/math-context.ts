import { BUILTIN_CONSTANTS, FUNCTION_NAMES, FUNCTIONS } from "./functions.js";
import type { NumericResult } from "./numeric.js";
import { TreeNode } from "./tree.js";
import type { FunctionKind, OperationKind, Token } from "./types.js";

export interface OperationInfo {
  kind: OperationKind;
  precedence: number;
}

export interface UserFunction {
  body: TreeNode<Token>;
  params: string[];
  /** Definition line as typed, used for persistence and listings. */
  text: string;
}

const OPERATIONS: Record<string, OperationInfo> = {
  "=": { kind: "assign", precedence: 1 },
  "+": { kind: "add", precedence: 2 },
  "-": { kind: "sub", precedence: 2 },
  "*": { kind: "mul", precedence: 3 },
  "/": { kind: "div", precedence: 3 },
  "%": { kind: "mod", precedence: 3 },
  "^": { kind: "pow", precedence: 4 },
};

const UNARY_KINDS: ReadonlySet<OperationKind> = new Set(["add", "sub"]);

const DIGITS = "0123456789";
const LITERALS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ_";
const PUNCTUATION = "(),";

interface FixedTables {
  operations: ReadonlyMap<string, OperationInfo>;
  functions: ReadonlyMap<string, FunctionKind>;
  constants: ReadonlyMap<string, NumericResult>;
  digits: ReadonlySet<string>;
  literals: ReadonlySet<string>;
  punctuation: ReadonlySet<string>;
}

function buildFixedTables(): FixedTables {
  return {
    operations: new Map(Object.entries(OPERATIONS)),
    functions: new Map(Object.entries(FUNCTION_NAMES)),
    constants: new Map(Object.entries(BUILTIN_CONSTANTS)),
    digits: new Set(DIGITS),
    literals: new Set(LITERALS),
    punctuation: new Set(PUNCTUATION),
  };
}

function isConstantLeaf(node: TreeNode<Token>): boolean {
  return node.isLeaf && (node.value.type === "USER_CONSTANT" || node.value.type === "UNKNOWN_CONSTANT");
}

/**
 * Registry of operators, functions and constants consulted by every stage of
 * the pipeline. The fixed tables are derived on construction; only the user
 * tables are mutable.
 */
export class MathContext {
  private readonly fixed: FixedTables = buildFixedTables();
  private readonly constants = new Map<string, NumericResult>();
  private readonly functions = new Map<string, UserFunction>();

  // ── Character classes ────────────────────────────────────────────

  isNumberSymbol(ch: string): boolean {
    return this.fixed.digits.has(ch);
  }

  isLiteralSymbol(ch: string): boolean {
    return this.fixed.literals.has(ch);
  }

  isPunctuationSymbol(ch: string): boolean {
    return this.fixed.punctuation.has(ch);
  }

  // ── Operations ───────────────────────────────────────────────────

  isOperation(symbol: string): boolean {
    return this.fixed.operations.has(symbol);
  }

  isUnaryOperation(symbol: string): boolean {
    const info = this.fixed.operations.get(symbol);
    return info !== undefined && UNARY_KINDS.has(info.kind);
  }

  operationKind(symbol: string): OperationKind | undefined {
    return this.fixed.operations.get(symbol)?.kind;
  }

  operationPrecedence(symbol: string): number | undefined {
    return this.fixed.operations.get(symbol)?.precedence;
  }

  // ── Functions ────────────────────────────────────────────────────

  isFunction(name: string): boolean {
    return this.isBuiltInFunction(name) || this.isUserFunction(name);
  }

  isBuiltInFunction(name: string): boolean {
    return this.fixed.functions.has(name);
  }

  isUserFunction(name: string): boolean {
    return this.functions.has(name);
  }

  functionKind(name: string): FunctionKind | undefined {
    return this.fixed.functions.get(name);
  }

  /** Built-in arity, or the parameter count of a user function. */
  functionArity(name: string): number | undefined {
    const kind = this.fixed.functions.get(name);
    if (kind) return FUNCTIONS[kind].arity;
    return this.functions.get(name)?.params.length;
  }

  userFunction(name: string): UserFunction | undefined {
    return this.functions.get(name);
  }

  userFunctions(): [string, UserFunction][] {
    return [...this.functions.entries()].sort(([a], [b]) => a.localeCompare(b));
  }

  addUserFunction(name: string, fn: UserFunction): void {
    this.constants.delete(name);
    this.functions.set(name, fn);
  }

  removeUserFunction(name: string): boolean {
    return this.functions.delete(name);
  }

  // ── Constants ────────────────────────────────────────────────────

  isConstant(name: string): boolean {
    return this.isBuiltInConstant(name) || this.isUserConstant(name);
  }

  isBuiltInConstant(name: string): boolean {
    return this.fixed.constants.has(name);
  }

  isUserConstant(name: string): boolean {
    return this.constants.has(name);
  }

  constantValue(name: string): NumericResult | undefined {
    return this.fixed.constants.get(name) ?? this.constants.get(name);
  }

  userConstants(): [string, NumericResult][] {
    return [...this.constants.entries()].sort(([a], [b]) => a.localeCompare(b));
  }

  addUserConstant(name: string, value: NumericResult): void {
    this.functions.delete(name);
    this.constants.set(name, value);
  }

  removeUserConstant(name: string): boolean {
    return this.constants.delete(name);
  }

  isBuiltIn(name: string): boolean {
    return this.isBuiltInConstant(name) || this.isBuiltInFunction(name);
  }

  // ── Substitution ─────────────────────────────────────────────────

  /**
   * Copy of the stored body of `name` with each parameter leaf replaced by a
   * clone of the matching argument. The stored definition is left untouched.
   */
  substituteUserFunctionTree(name: string, args: TreeNode<Token>[]): TreeNode<Token> | undefined {
    const fn = this.functions.get(name);
    if (!fn || fn.params.length !== args.length) return undefined;

    return fn.body.cloneWith((node) => {
      if (!isConstantLeaf(node)) return undefined;
      const index = fn.params.indexOf(node.value.value);
      if (index === -1) return undefined;
      return args[index]?.clone();
    });
  }
}
