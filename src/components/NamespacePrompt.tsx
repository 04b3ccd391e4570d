import React from 'react';
import { Box, Text } from 'ink';

interface NamespacePromptProps {
  value: string;
}

export const NamespacePrompt: React.FC<NamespacePromptProps> = ({ value }) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Box>
        <Text bold>Catalog.Schema: </Text>
        <Text color="cyan">{value}</Text>
        <Text inverse> </Text>
      </Box>
      <Box marginTop={1}>
        <Text dimColor>Enter to load tables · Esc to quit</Text>
      </Box>
    </Box>
  );
};
