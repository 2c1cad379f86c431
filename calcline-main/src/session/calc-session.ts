import { parseCommand, runCommand, type CommandTarget } from "../commands/command-processor.js";
import { getSettings, type CalcSettings } from "../config/settings.js";
import { evaluateInput } from "../engine/calculate.js";
import { MathContext } from "../engine/math-context.js";
import type { NumericResult } from "../engine/numeric.js";
import { formatResult, type DisplaySettings } from "../format/result-formatter.js";

export const RESULT_PREFIX = "ans: ";

export type SessionReply =
  | { kind: "result"; text: string; result: NumericResult }
  | { kind: "defined"; text: string }
  | { kind: "error"; text: string }
  | { kind: "info"; text: string }
  | { kind: "exit" }
  | { kind: "none" };

/**
 * One calculator session: a MathContext, the display settings and the
 * routing between meta-commands and expressions. Inputs are handled one at
 * a time; callers await `submit` before sending the next line.
 */
export class CalcSession implements CommandTarget {
  private currentContext = new MathContext();
  private currentDisplay: DisplaySettings;
  readonly contextFile: string;

  constructor(settings: CalcSettings = getSettings()) {
    this.currentDisplay = { ...settings.display };
    this.contextFile = settings.contextFile;
  }

  get context(): MathContext {
    return this.currentContext;
  }

  get display(): DisplaySettings {
    return this.currentDisplay;
  }

  replaceContext(context: MathContext): void {
    this.currentContext = context;
  }

  setDisplay(display: DisplaySettings): void {
    this.currentDisplay = { ...display };
  }

  isCommand(line: string): boolean {
    return parseCommand(line) !== undefined;
  }

  async submit(line: string): Promise<SessionReply> {
    const command = parseCommand(line);
    if (!command) return this.evaluate(line);

    const result = await runCommand(command, this);
    switch (result.type) {
      case "exit":
        return { kind: "exit" };
      case "message":
        return { kind: "info", text: result.text };
      case "error":
        return { kind: "error", text: result.text };
    }
  }

  /** Evaluates an expression or definition, never a command. */
  evaluate(line: string): SessionReply {
    if (line.trim().length === 0) return { kind: "none" };

    const outcome = evaluateInput(line, this.currentContext);
    if (!outcome.ok) return { kind: "error", text: outcome.error.message };

    if (outcome.kind === "value") {
      return {
        kind: "result",
        text: `${RESULT_PREFIX}${formatResult(outcome.result, this.currentDisplay)}`,
        result: outcome.result,
      };
    }

    if (outcome.definition === "constant") {
      const value = this.currentContext.constantValue(outcome.name);
      const shown = value ? formatResult(value, this.currentDisplay) : "NaN";
      return { kind: "defined", text: `${outcome.name} = ${shown}` };
    }

    const params = this.currentContext.userFunction(outcome.name)?.params ?? [];
    return { kind: "defined", text: `${outcome.name}(${params.join(", ")}) defined` };
  }

  format(result: NumericResult): string {
    return formatResult(result, this.currentDisplay);
  }
}
