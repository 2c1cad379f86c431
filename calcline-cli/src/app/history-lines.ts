import type { SessionReply } from "calcline-main";
import type { HistoryEntry, HistoryTone } from "./types.js";

export const PROMPT = ">>> ";

export type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "red" | "yellow";
  readonly bold?: boolean;
};

const TONE_COLORS: Record<HistoryTone, DisplayLine["color"]> = {
  result: "cyan",
  defined: "yellow",
  error: "red",
  info: undefined,
};

export function wrapSegment(segment: string, width: number): string[] {
  if (segment.length === 0) {
    return [""];
  }

  const lines: string[] = [];
  for (let index = 0; index < segment.length; index += width) {
    lines.push(segment.slice(index, index + width));
  }
  return lines;
}

/**
 * Hard-wraps every line of `content` at `width`. Whitespace is kept as is,
 * since diagnostics rely on column alignment for their caret marker.
 */
export function wrapContent(content: string, width: number): string[] {
  const safeWidth = Math.max(1, width);
  const rawLines = content.split(/\r?\n/);
  const wrapped: string[] = [];

  for (const rawLine of rawLines) {
    wrapped.push(...wrapSegment(rawLine, safeWidth));
  }

  return wrapped;
}

export function toDisplayLines(entries: HistoryEntry[], width: number): DisplayLine[] {
  const contentWidth = Math.max(1, width);
  const lines: DisplayLine[] = [];

  for (const entry of entries) {
    for (const line of wrapContent(`${PROMPT}${entry.input}`, contentWidth)) {
      lines.push({ text: line, bold: true, color: "green" });
    }

    const color = TONE_COLORS[entry.tone];
    for (const line of wrapContent(entry.output, contentWidth)) {
      lines.push(color ? { text: line, color } : { text: line });
    }
  }

  return lines;
}

let nextId = 1;

export function createEntry(input: string, output: string, tone: HistoryTone): HistoryEntry {
  return {
    id: String(nextId++),
    input,
    output,
    tone,
    timestamp: Date.now(),
  };
}

/** History entry for a session reply; exits and empty lines leave none. */
export function toHistoryEntry(input: string, reply: SessionReply): HistoryEntry | undefined {
  switch (reply.kind) {
    case "result":
    case "defined":
    case "error":
    case "info":
      return createEntry(input, reply.text, reply.kind);
    default:
      return undefined;
  }
}
