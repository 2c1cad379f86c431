export type HistoryTone = "result" | "defined" | "error" | "info";

export type HistoryEntry = {
  id: string;
  input: string;
  output: string;
  tone: HistoryTone;
  timestamp: number;
};
