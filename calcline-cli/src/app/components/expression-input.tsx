import React from "react";
import { Box, Text } from "ink";
import TextInput from "ink-text-input";
import { PROMPT } from "../history-lines.js";

type Props = {
  readonly value: string;
  readonly onChange: (value: string) => void;
  readonly onSubmit: (value: string) => void;
  readonly isBusy: boolean;
};

export function ExpressionInput({
  value,
  onChange,
  onSubmit,
  isBusy,
}: Props): React.JSX.Element {
  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Text color="green" bold>
        {PROMPT}
      </Text>
      <TextInput
        value={value}
        onChange={onChange}
        onSubmit={onSubmit}
        placeholder="Type an expression, a definition or a command"
        focus={!isBusy}
        showCursor
      />
    </Box>
  );
}
