import React, { useEffect, useMemo, useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import { toDisplayLines } from "../history-lines.js";
import type { HistoryEntry } from "../types.js";

type Props = {
  readonly entries: HistoryEntry[];
  readonly height: number;
  readonly width: number;
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function HistoryList({ entries, height, width }: Props): React.JSX.Element {
  const [scrollTop, setScrollTop] = useState(0);

  const lines = useMemo(() => toDisplayLines(entries, width), [entries, width]);

  const viewportHeight = Math.max(1, height);
  const maxScrollTop = Math.max(0, lines.length - viewportHeight);
  const previousMaxRef = useRef(0);

  useEffect(() => {
    const previousMax = previousMaxRef.current;
    const wasAtBottom = scrollTop >= previousMax;

    if (wasAtBottom) {
      if (scrollTop !== maxScrollTop) {
        setScrollTop(maxScrollTop);
      }
    } else if (scrollTop > maxScrollTop) {
      setScrollTop(maxScrollTop);
    }

    previousMaxRef.current = maxScrollTop;
  }, [maxScrollTop, scrollTop]);

  useInput((_, key) => {
    if (lines.length === 0) {
      return;
    }

    if (key.pageUp) {
      setScrollTop((value) => clamp(value - viewportHeight, 0, maxScrollTop));
      return;
    }

    if (key.pageDown) {
      setScrollTop((value) => clamp(value + viewportHeight, 0, maxScrollTop));
    }
  });

  if (entries.length === 0) {
    return (
      <Box justifyContent="center" alignItems="center" height={viewportHeight}>
        <Text dimColor>Type an expression such as 1+cos(pi)*8 and press Enter.</Text>
      </Box>
    );
  }

  const start = clamp(scrollTop, 0, maxScrollTop);
  const visibleLines = lines.slice(start, start + viewportHeight);

  return (
    <Box flexDirection="column" paddingX={1} height={viewportHeight}>
      {visibleLines.map((line, index) => (
        <Text key={`${start}-${index}`} color={line.color} bold={line.bold}>
          {line.text.length > 0 ? line.text : " "}
        </Text>
      ))}
    </Box>
  );
}
