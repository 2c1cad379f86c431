import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { devWarn } from "../shared/index.js";

export async function readTextFile(filePath: string, fileName: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch {
    devWarn(`File not found or unreadable, skipping: ${fileName}`);
    return undefined;
  }
}

export async function readJsonFile(filePath: string, fileName: string): Promise<unknown | undefined> {
  const raw = await readTextFile(filePath, fileName);
  if (raw === undefined) return undefined;

  try {
    return JSON.parse(raw);
  } catch {
    devWarn(`File has invalid JSON, skipping: ${fileName}`);
    return undefined;
  }
}

export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  await rename(tmpPath, filePath);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
