/**
 * Calculator engine debug logger.
 *
 * Every line prints a bright blue [CALC] prefix so you can filter with:
 *   grep "\[CALC\]"
 *
 * Categories:
 *   PARSE   tokens read and trees built
 *   EVAL    evaluation results
 *   DEFINE  user constants and functions registered
 *   STORE   context saved to or loaded from disk
 */

import { isDebugEnabled } from "../shared/index.js";

const R = "\x1b[0m";
const BLUE = "\x1b[34m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const GREEN = "\x1b[32m";
const WHITE = "\x1b[37m";

type Category = "PARSE" | "EVAL" | "DEFINE" | "STORE";

const CATEGORY_COLORS: Record<Category, string> = {
  PARSE: CYAN,
  EVAL: GREEN,
  DEFINE: YELLOW,
  STORE: WHITE,
};

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${R}`;
  if (typeof v === "string") {
    if (v.length > 80) return `"${v.slice(0, 77)}..."`;
    return `"${v}"`;
  }
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
}

function calcLog(category: Category, message: string, detail?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;

  const prefix = `${BLUE}${BOLD}[CALC]${R}`;
  const cat = `${CATEGORY_COLORS[category]}${category.padEnd(6)}${R}`;
  const time = `${DIM}${ts()}${R}`;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${R}${formatValue(v)}`)
      .join(" ");
    console.log(`${prefix} ${time} ${cat} ${message}  ${parts}`);
  } else {
    console.log(`${prefix} ${time} ${cat} ${message}`);
  }
}

// ── Public API ─────────────────────────────────────────────

export function logParsed(input: string, nodes: number, depth: number): void {
  calcLog("PARSE", "Parsed input", { input, nodes, depth });
}

export function logParseFailure(input: string, code: string, pos: number): void {
  calcLog("PARSE", "✗ Parse FAILED", { input, code, pos });
}

export function logEvaluated(input: string, kind: string, re: number, im: number): void {
  calcLog("EVAL", "= Evaluated", { input, kind, re, im });
}

export function logDefinition(kind: "constant" | "function", name: string, params?: string[]): void {
  calcLog("DEFINE", `+ User ${kind} DEFINED`, { name, params: params?.join(", ") });
}

export function logRemoved(name: string): void {
  calcLog("DEFINE", "- User symbol REMOVED", { name });
}

export function logContextSaved(path: string, constants: number, functions: number): void {
  calcLog("STORE", "💾 Context SAVED", { path, constants, functions });
}

export function logContextLoaded(path: string, constants: number, functions: number, skipped: number): void {
  calcLog("STORE", "↻ Context LOADED", { path, constants, functions, skipped });
}
