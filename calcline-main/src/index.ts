export { MathContext, type UserFunction, type OperationInfo } from "./engine/math-context.js";
export { evaluateInput, ANSWER_CONSTANT, type InputOutcome } from "./engine/calculate.js";
export { evaluate } from "./engine/evaluator.js";
export { parse, Parser, type ExpressionNode } from "./engine/parser.js";
export { Tokenizer } from "./engine/tokenizer.js";
export { TreeNode } from "./engine/tree.js";
export { CalcError, errorCategory } from "./engine/types.js";
export type { Token, TokenType, CalcErrorCode, CalcErrorCategory, NumberKind } from "./engine/types.js";
export { real, complex, isUndefined, type NumericResult } from "./engine/numeric.js";
export {
  formatResult,
  formatReal,
  describeDisplay,
  DEFAULT_DISPLAY,
  type DisplayRadix,
  type DisplaySettings,
} from "./format/result-formatter.js";
export { loadContext, saveContext, serializeContext, restoreContext } from "./persistence/context-store.js";
export { parseCommand, runCommand, type CommandResult } from "./commands/command-processor.js";
export { loadSettings, getSettings, type CalcSettings } from "./config/settings.js";
export { CalcSession, RESULT_PREFIX, type SessionReply } from "./session/calc-session.js";
export { setDebugEnabled } from "./shared/index.js";
