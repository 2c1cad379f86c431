import React from "react";
import { Box, Text } from "ink";

export function Header(): React.JSX.Element {
  return (
    <Box
      borderStyle="single"
      borderColor="cyan"
      paddingX={1}
      justifyContent="center"
    >
      <Text bold color="cyan">
        calcline
      </Text>
      <Text dimColor> v0.1.0</Text>
    </Box>
  );
}
