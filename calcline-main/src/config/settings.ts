import { homedir } from "node:os";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_DISPLAY,
  isDisplayRadix,
  isValidPrecision,
  type DisplayRadix,
  type DisplaySettings,
} from "../format/result-formatter.js";
import { isRecord, readJsonFile } from "../persistence/io.js";
import { devLog, devWarn, parseDebugFlag, setDebugEnabled } from "../shared/index.js";

// ── Types ──────────────────────────────────────────────────────────

export interface CalcSettings {
  /** Default target of `save` and `load`. */
  contextFile: string;
  display: DisplaySettings;
  debug: boolean;
}

interface SettingsFile {
  contextFile?: string;
  display?: { radix?: DisplayRadix; precision?: number };
  debug?: boolean;
}

// ── Paths ──────────────────────────────────────────────────────────

const thisDir = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH = resolve(thisDir, "..", "..", "context", "calcline.json");
export const DEFAULT_CONTEXT_FILE = resolve(homedir(), ".calcline", "context.json");

// ── Singleton state ────────────────────────────────────────────────

function defaultSettings(): CalcSettings {
  return { contextFile: DEFAULT_CONTEXT_FILE, display: { ...DEFAULT_DISPLAY }, debug: false };
}

let currentSettings: CalcSettings = defaultSettings();

// ── Env-var parsing helpers ────────────────────────────────────────

export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return parseDebugFlag(raw);
}

export function parseNumber(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number(raw);
  return isValidPrecision(n) ? n : fallback;
}

function parseRadix(raw: string | undefined): DisplayRadix {
  return isDisplayRadix(raw) ? raw : DEFAULT_DISPLAY.radix;
}

// ── Env-var fallback ───────────────────────────────────────────────

export function buildSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): CalcSettings {
  const contextFile = env["CALCLINE_CONTEXT_FILE"];
  return {
    contextFile: contextFile && contextFile.trim().length > 0 ? resolve(contextFile) : DEFAULT_CONTEXT_FILE,
    display: {
      radix: parseRadix(env["CALCLINE_RADIX"]),
      precision: parseNumber(env["CALCLINE_PRECISION"], DEFAULT_DISPLAY.precision),
    },
    debug: parseBool(env["CALCLINE_DEBUG"], false),
  };
}

// ── Type guard ─────────────────────────────────────────────────────

function isSettingsFile(value: unknown): value is SettingsFile {
  if (!isRecord(value)) return false;

  if (value["contextFile"] !== undefined && typeof value["contextFile"] !== "string") return false;
  if (value["debug"] !== undefined && typeof value["debug"] !== "boolean") return false;

  const display = value["display"];
  if (display === undefined) return true;
  if (!isRecord(display)) return false;
  if (display["radix"] !== undefined && !isDisplayRadix(display["radix"])) return false;
  if (display["precision"] !== undefined && !isValidPrecision(display["precision"])) return false;

  return true;
}

function mergeSettings(base: CalcSettings, file: SettingsFile, configPath: string): CalcSettings {
  return {
    contextFile: file.contextFile ? resolve(dirname(configPath), file.contextFile) : base.contextFile,
    display: {
      radix: file.display?.radix ?? base.display.radix,
      precision: file.display?.precision ?? base.display.precision,
    },
    debug: file.debug ?? base.debug,
  };
}

// ── Public getters ─────────────────────────────────────────────────

export function getSettings(): CalcSettings {
  return currentSettings;
}

// ── Loader ─────────────────────────────────────────────────────────

export async function loadSettings(
  configPath: string = process.env["CALCLINE_CONFIG"] ?? DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CalcSettings> {
  const fromEnv = buildSettingsFromEnv(env);
  const raw = await readJsonFile(configPath, "calcline.json");

  if (raw === undefined) {
    devWarn("calcline.json not found, falling back to env vars.");
    currentSettings = fromEnv;
  } else if (!isSettingsFile(raw)) {
    devWarn("calcline.json has invalid shape, falling back to env vars.");
    currentSettings = fromEnv;
  } else {
    currentSettings = mergeSettings(fromEnv, raw, configPath);
    devLog("Loaded settings from calcline.json");
  }

  setDebugEnabled(currentSettings.debug);
  return currentSettings;
}

// ── Testing helpers ────────────────────────────────────────────────

export function _setSettingsForTesting(settings: CalcSettings): void {
  currentSettings = settings;
}

export function _resetSettingsToDefault(): void {
  currentSettings = defaultSettings();
}
