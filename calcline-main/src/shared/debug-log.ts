/**
 * Color-coded debug logger.
 *
 * All calls use a [DEBUG] prefix printed in bright magenta so they stand
 * out in the terminal. Output is off unless CALCLINE_DEBUG is set or
 * `setDebugEnabled(true)` is called, so the interactive UI stays clean.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

let debugEnabled = parseDebugFlag(process.env["CALCLINE_DEBUG"]);

export function parseDebugFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  return raw === "1" || raw.toLowerCase() === "true";
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function devLog(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.log(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.log(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
