import { logRemoved } from "../engine/engine-logger.js";
import type { MathContext } from "../engine/math-context.js";
import {
  describeDisplay,
  DISPLAY_RADIXES,
  formatResult,
  isDisplayRadix,
  isValidPrecision,
  MAX_PRECISION,
  type DisplaySettings,
} from "../format/result-formatter.js";
import { ContextStoreError, loadContext, saveContext } from "../persistence/context-store.js";

export type CommandName = "exit" | "quit" | "save" | "load" | "format" | "info" | "delete";

export interface ParsedCommand {
  name: CommandName;
  args: string[];
}

export type CommandResult =
  | { type: "exit" }
  | { type: "message"; text: string }
  | { type: "error"; text: string };

/** The session state a command may read or replace. */
export interface CommandTarget {
  readonly context: MathContext;
  readonly display: DisplaySettings;
  readonly contextFile: string;
  replaceContext(context: MathContext): void;
  setDisplay(display: DisplaySettings): void;
}

const COMMAND_PATTERN = /^(exit|quit|save|load|format|info|delete)(?:\s+(.*))?$/;

function isCommandName(value: string): value is CommandName {
  return ["exit", "quit", "save", "load", "format", "info", "delete"].includes(value);
}

/** Recognizes a meta-command line; anything else is left for the calculator. */
export function parseCommand(line: string): ParsedCommand | undefined {
  const match = COMMAND_PATTERN.exec(line.trim());
  if (!match) return undefined;

  const name = match[1] ?? "";
  if (!isCommandName(name)) return undefined;

  const rest = match[2]?.trim() ?? "";
  return { name, args: rest.length > 0 ? rest.split(/\s+/) : [] };
}

function error(text: string): CommandResult {
  return { type: "error", text: `Error: ${text}` };
}

function message(text: string): CommandResult {
  return { type: "message", text };
}

// ── Commands ───────────────────────────────────────────────────────

async function save(args: string[], target: CommandTarget): Promise<CommandResult> {
  const path = args.join(" ") || target.contextFile;
  try {
    await saveContext(target.context, path);
    return message(`Context saved to ${path}.`);
  } catch (err) {
    if (err instanceof ContextStoreError) return error(`${err.message}.`);
    throw err;
  }
}

async function load(args: string[], target: CommandTarget): Promise<CommandResult> {
  const path = args.join(" ") || target.contextFile;
  try {
    const { context, skipped } = await loadContext(path);
    target.replaceContext(context);

    const summary =
      `Context loaded from ${path}: ${context.userConstants().length} constant(s), ` +
      `${context.userFunctions().length} function(s).`;
    return message(skipped.length > 0 ? `${summary} Skipped: ${skipped.join(", ")}.` : summary);
  } catch (err) {
    if (err instanceof ContextStoreError) return error(`${err.message}.`);
    throw err;
  }
}

function format(args: string[], target: CommandTarget): CommandResult {
  const [radix, precisionArg, ...extra] = args;
  if (!isDisplayRadix(radix) || extra.length > 0) {
    const names = DISPLAY_RADIXES.map((r) => `"${r}"`).join(", ");
    return error(`Expected format ${names} optionally followed by a precision.`);
  }

  let precision = target.display.precision;
  if (precisionArg !== undefined) {
    const n = Number(precisionArg);
    if (!isValidPrecision(n)) {
      return error(`Expected precision between 0 and ${MAX_PRECISION}.`);
    }
    precision = n;
  }

  const display = { radix, precision };
  target.setDisplay(display);
  return message(`Format set to ${describeDisplay(display)}.`);
}

function info(target: CommandTarget): CommandResult {
  const lines = [`Format: ${describeDisplay(target.display)}`];

  const constants = target.context.userConstants();
  lines.push(constants.length > 0 ? "Constants:" : "Constants: none");
  for (const [name, value] of constants) {
    lines.push(`  ${name} = ${formatResult(value, target.display)}`);
  }

  const functions = target.context.userFunctions();
  lines.push(functions.length > 0 ? "Functions:" : "Functions: none");
  for (const [, fn] of functions) {
    lines.push(`  ${fn.text}`);
  }

  return message(lines.join("\n"));
}

function remove(args: string[], target: CommandTarget): CommandResult {
  const [name, ...extra] = args;
  if (name === undefined || extra.length > 0) return error("Expected a single name to delete.");

  const removed = target.context.removeUserConstant(name) || target.context.removeUserFunction(name);
  if (!removed) return error(`No user constant or function named "${name}".`);

  logRemoved(name);
  return message(`Removed "${name}".`);
}

export async function runCommand(command: ParsedCommand, target: CommandTarget): Promise<CommandResult> {
  switch (command.name) {
    case "exit":
    case "quit":
      return { type: "exit" };
    case "save":
      return save(command.args, target);
    case "load":
      return load(command.args, target);
    case "format":
      return format(command.args, target);
    case "info":
      if (command.args.length > 0) return error(`"info" takes no arguments.`);
      return info(target);
    case "delete":
      return remove(command.args, target);
  }
}
