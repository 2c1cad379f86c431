import { useCallback, useState } from "react";

export type InputHistoryState = {
  entries: string[];
  /** Position while browsing; equal to entries.length when not browsing. */
  cursor: number;
};

type UseInputHistoryReturn = {
  record: (line: string) => void;
  previous: () => string | undefined;
  next: () => string | undefined;
};

export function recordEntry(state: InputHistoryState, line: string): InputHistoryState {
  const last = state.entries[state.entries.length - 1];
  const entries = last === line ? state.entries : [...state.entries, line];
  return { entries, cursor: entries.length };
}

export function stepHistory(
  state: InputHistoryState,
  direction: -1 | 1,
): { state: InputHistoryState; value: string | undefined } {
  const cursor = Math.max(0, Math.min(state.entries.length, state.cursor + direction));
  return { state: { ...state, cursor }, value: cursor === state.entries.length ? "" : state.entries[cursor] };
}

export function useInputHistory(): UseInputHistoryReturn {
  const [state, setState] = useState<InputHistoryState>({ entries: [], cursor: 0 });

  const record = useCallback((line: string) => {
    setState((prev) => recordEntry(prev, line));
  }, []);

  const move = useCallback(
    (direction: -1 | 1) => {
      const stepped = stepHistory(state, direction);
      setState(stepped.state);
      return stepped.value;
    },
    [state],
  );

  const previous = useCallback(() => move(-1), [move]);
  const next = useCallback(() => move(1), [move]);

  return { record, previous, next };
}
