import React, { useState, useCallback, useEffect } from "react";
import { Box, useApp, useInput } from "ink";
import { describeDisplay, type CalcSession } from "calcline-main";
import { Header } from "./components/header.js";
import { HistoryList } from "./components/history-list.js";
import { ExpressionInput } from "./components/expression-input.js";
import { StatusBar } from "./components/status-bar.js";
import { useInputHistory } from "./hooks/use-input-history.js";
import { createEntry, toHistoryEntry } from "./history-lines.js";
import type { HistoryEntry } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_HISTORY_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;

type Props = {
  readonly session: CalcSession;
};

export function App({ session }: Props): React.JSX.Element {
  const { exit } = useApp();
  const [entries, setEntries] = useState<HistoryEntry[]>([]);
  const [inputValue, setInputValue] = useState("");
  const [isBusy, setIsBusy] = useState(false);
  const [displayLabel, setDisplayLabel] = useState(describeDisplay(session.display));
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );
  const history = useInputHistory();

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(
        Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
      );
    };

    process.stdout.on("resize", handleResize);

    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  useInput((_, key) => {
    if (isBusy) return;

    if (key.upArrow) {
      const value = history.previous();
      if (value !== undefined) setInputValue(value);
      return;
    }

    if (key.downArrow) {
      const value = history.next();
      if (value !== undefined) setInputValue(value);
    }
  });

  const handleSubmit = useCallback(
    (value: string) => {
      const line = value.trim();
      if (!line || isBusy) return;

      setInputValue("");
      history.record(line);
      setIsBusy(true);

      void session
        .submit(line)
        .then((reply) => {
          if (reply.kind === "exit") {
            exit();
            return;
          }
          const entry = toHistoryEntry(line, reply);
          if (entry) setEntries((prev) => [...prev, entry]);
          setDisplayLabel(describeDisplay(session.display));
        })
        .catch((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          setEntries((prev) => [...prev, createEntry(line, `Error: ${message}`, "error")]);
        })
        .finally(() => {
          setIsBusy(false);
        });
    },
    [exit, history, isBusy, session],
  );

  const historyViewportHeight = Math.max(
    MIN_HISTORY_ROWS,
    terminalRows - RESERVED_ROWS,
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header />
      <HistoryList
        entries={entries}
        height={historyViewportHeight}
        width={terminalColumns - 2}
      />
      <StatusBar isBusy={isBusy} displayLabel={displayLabel} />
      <ExpressionInput
        value={inputValue}
        onChange={setInputValue}
        onSubmit={handleSubmit}
        isBusy={isBusy}
      />
    </Box>
  );
}
