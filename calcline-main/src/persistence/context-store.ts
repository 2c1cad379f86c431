import { analyzeDefinition, applyDefinition, isAssignment } from "../engine/definitions.js";
import { logContextLoaded, logContextSaved } from "../engine/engine-logger.js";
import { MathContext } from "../engine/math-context.js";
import { complex, real, type NumericResult } from "../engine/numeric.js";
import { parse } from "../engine/parser.js";
import { CalcError, type NumberKind } from "../engine/types.js";
import { devWarn } from "../shared/index.js";
import { isRecord, readJsonFile, writeJsonFileAtomic } from "./io.js";

export const CONTEXT_FORMAT_VERSION = 1;

/** JSON has no NaN or Infinity, so those are kept as strings. */
export type StoredNumber = number | "NaN" | "Infinity" | "-Infinity";

export interface StoredConstant {
  tag: NumberKind;
  re: StoredNumber;
  im: StoredNumber;
}

export interface StoredFunction {
  text: string;
  params: string[];
}

export interface StoredContext {
  version: number;
  constants: Record<string, StoredConstant>;
  functions: Record<string, StoredFunction>;
}

export interface RestoredContext {
  context: MathContext;
  /** Functions whose definition text no longer parses. */
  skipped: string[];
}

export class ContextStoreError extends Error {
  constructor(
    message: string,
    public path: string,
  ) {
    super(message);
    this.name = "ContextStoreError";
  }
}

// ── Encoding ───────────────────────────────────────────────────────

function encodeNumber(x: number): StoredNumber {
  if (Number.isNaN(x)) return "NaN";
  if (x === Infinity) return "Infinity";
  if (x === -Infinity) return "-Infinity";
  return x;
}

function decodeNumber(x: StoredNumber): number {
  return typeof x === "number" ? x : Number(x);
}

function encodeConstant(value: NumericResult): StoredConstant {
  return { tag: value.kind, re: encodeNumber(value.value.re), im: encodeNumber(value.value.im) };
}

function decodeConstant(stored: StoredConstant): NumericResult {
  const re = decodeNumber(stored.re);
  return stored.tag === "complex" ? complex(re, decodeNumber(stored.im)) : real(re);
}

/** Names such as `__proto__` are legal, so records are built as own data properties. */
export function serializeContext(context: MathContext): StoredContext {
  const constants: Record<string, StoredConstant> = Object.fromEntries(
    context.userConstants().map(([name, value]): [string, StoredConstant] => [name, encodeConstant(value)]),
  );
  const functions: Record<string, StoredFunction> = Object.fromEntries(
    context.userFunctions().map(([name, fn]): [string, StoredFunction] => [name, { text: fn.text, params: [...fn.params] }]),
  );

  return { version: CONTEXT_FORMAT_VERSION, constants, functions };
}

// ── Type guards ────────────────────────────────────────────────────

function isStoredNumber(value: unknown): value is StoredNumber {
  return typeof value === "number" || value === "NaN" || value === "Infinity" || value === "-Infinity";
}

function isStoredConstant(value: unknown): value is StoredConstant {
  if (!isRecord(value)) return false;
  if (value["tag"] !== "real" && value["tag"] !== "complex") return false;
  return isStoredNumber(value["re"]) && isStoredNumber(value["im"]);
}

function isStoredFunction(value: unknown): value is StoredFunction {
  if (!isRecord(value)) return false;
  if (typeof value["text"] !== "string") return false;
  const params = value["params"];
  return Array.isArray(params) && params.every((p) => typeof p === "string");
}

export function isStoredContext(value: unknown): value is StoredContext {
  if (!isRecord(value)) return false;
  if (value["version"] !== CONTEXT_FORMAT_VERSION) return false;

  const constants = value["constants"];
  const functions = value["functions"];
  if (!isRecord(constants) || !isRecord(functions)) return false;

  return Object.values(constants).every(isStoredConstant) && Object.values(functions).every(isStoredFunction);
}

// ── Restoring ──────────────────────────────────────────────────────

function restoreFunction(name: string, stored: StoredFunction, context: MathContext): boolean {
  try {
    const tree = parse(stored.text, context);
    if (!isAssignment(tree, context)) return false;

    const definition = analyzeDefinition(tree, context, stored.text);
    if (definition.kind !== "function" || definition.name !== name) return false;
    if (definition.params.join(",") !== stored.params.join(",")) return false;

    applyDefinition(definition, context, stored.text);
    return true;
  } catch (err) {
    if (err instanceof CalcError || err instanceof RangeError) return false;
    throw err;
  }
}

/**
 * Rebuilds a context from its stored form. The fixed tables come from a new
 * MathContext; functions are re-parsed from their text, in repeated passes
 * so that one function may refer to another stored after it.
 */
export function restoreContext(stored: StoredContext): RestoredContext {
  const context = new MathContext();

  for (const [name, constant] of Object.entries(stored.constants)) {
    context.addUserConstant(name, decodeConstant(constant));
  }

  let pending = Object.entries(stored.functions);
  let progress = true;
  while (pending.length > 0 && progress) {
    const remaining = pending.filter(([name, fn]) => !restoreFunction(name, fn, context));
    progress = remaining.length < pending.length;
    pending = remaining;
  }

  const skipped = pending.map(([name]) => name);
  for (const name of skipped) {
    devWarn(`Stored function could not be restored, skipping: ${name}`);
  }
  return { context, skipped };
}

// ── Files ──────────────────────────────────────────────────────────

export async function saveContext(context: MathContext, path: string): Promise<void> {
  const stored = serializeContext(context);
  try {
    await writeJsonFileAtomic(path, stored);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContextStoreError(`Could not save context to ${path}: ${reason}`, path);
  }
  logContextSaved(path, Object.keys(stored.constants).length, Object.keys(stored.functions).length);
}

export async function loadContext(path: string): Promise<RestoredContext> {
  const raw = await readJsonFile(path, path);
  if (raw === undefined) {
    throw new ContextStoreError(`Could not read a context file at ${path}`, path);
  }
  if (!isStoredContext(raw)) {
    throw new ContextStoreError(`File at ${path} is not a saved context`, path);
  }

  const restored = restoreContext(raw);
  logContextLoaded(
    path,
    restored.context.userConstants().length,
    restored.context.userFunctions().length,
    restored.skipped.length,
  );
  return restored;
}
