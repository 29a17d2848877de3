import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  boardSize: number;
  scoresPath: string;
}

export function StatusBar({ boardSize, scoresPath }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        REVERSI v0.1.0
      </Text>
      <Text color={colors.dimmed}>
        {boardSize}x{boardSize} | scores: {scoresPath}
      </Text>
    </Box>
  );
}
