import React from 'react';
import { Box, Text } from 'ink';

interface ProgressProps {
  done: number;
  total: number;
  failed: number;
}

export const Progress: React.FC<ProgressProps> = ({ done, total, failed }) => {
  const percent = total > 0 ? Math.round((done / total) * 100) : 0;

  const barWidth = 30;
  const filled = total > 0 ? Math.round((done / total) * barWidth) : 0;
  const bar = '█'.repeat(filled) + '░'.repeat(barWidth - filled);

  return (
    <Box marginTop={1} gap={2}>
      <Text>
        <Text>Dropping: </Text>
        <Text color="green">{bar}</Text>
        <Text> {percent}%</Text>
      </Text>
      <Text>
        <Text dimColor>Tables:</Text> {done}/{total}
      </Text>
      {failed > 0 && (
        <Text>
          <Text color="red">Failed:</Text> {failed}
        </Text>
      )}
    </Box>
  );
};
