import React from 'react';
import { Box, Text } from 'ink';
import type { DropMode } from '../types.js';

interface HeaderProps {
  mode: DropMode;
}

export const Header: React.FC<HeaderProps> = ({ mode }) => {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={mode === 'execute' ? 'red' : 'cyan'} paddingX={2}>
      <Text bold color="cyan">
        Table Dropper
      </Text>
      {mode === 'execute' ? (
        <Text bold color="red">EXECUTE mode: selected tables will be dropped</Text>
      ) : (
        <Text dimColor>Dry run: statements are printed, nothing is dropped</Text>
      )}
    </Box>
  );
};
