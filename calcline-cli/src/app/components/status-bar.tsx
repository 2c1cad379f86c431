import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

type Props = {
  readonly isBusy: boolean;
  readonly displayLabel: string;
};

export function StatusBar({ isBusy, displayLabel }: Props): React.JSX.Element {
  return (
    <Box paddingX={1} height={1}>
      {isBusy ? (
        <Text color="yellow">
          <Spinner type="dots" /> Working...
        </Text>
      ) : (
        <Text dimColor>
          Format: {displayLabel} | Up/Down: history | PgUp/PgDn: scroll | exit or Ctrl+C: quit
        </Text>
      )}
    </Box>
  );
}
