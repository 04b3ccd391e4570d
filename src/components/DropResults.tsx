import React from 'react';
import { Box, Text } from 'ink';
import { formatOutcome, formatReportHeader, summarizeReport } from '../report.js';
import type { DropMode, DropOutcomeEntry, DropReport } from '../types.js';

interface DropResultsProps {
  mode: DropMode;
  total: number;
  entries: DropOutcomeEntry[];
  report: DropReport | null;
}

const statusColors = {
  dropped: 'green',
  skipped: 'yellow',
  failed: 'red',
} as const;

export const DropResults: React.FC<DropResultsProps> = ({ mode, total, entries, report }) => {
  if (report?.signal === 'no-selection') {
    return (
      <Box marginTop={1} flexDirection="column">
        <Text color="yellow">No tables selected.</Text>
        <Text dimColor>N new namespace · R reload · Q quit</Text>
      </Box>
    );
  }

  const summary = report ? summarizeReport(report) : null;

  return (
    <Box flexDirection="column" marginTop={1}>
      {formatReportHeader(mode, total).map((line) => (
        <Text key={line} bold color={mode === 'execute' ? 'red' : 'yellow'}>
          {line}
        </Text>
      ))}

      <Box marginLeft={2} flexDirection="column">
        {entries.map((entry) => (
          <Text
            key={entry.tableName}
            color={entry.status.kind === 'dropped' && entry.status.preview ? undefined : statusColors[entry.status.kind]}
          >
            {formatOutcome(entry)}
          </Text>
        ))}
      </Box>

      {summary && (
        <Box marginTop={1} flexDirection="column">
          <Text bold color="green">
            Done.
          </Text>
          <Box gap={2}>
            {mode === 'execute' ? (
              <Text>
                <Text color="green">Dropped:</Text> {summary.dropped}
              </Text>
            ) : (
              <Text>
                <Text dimColor>Previewed:</Text> {summary.previewed}
              </Text>
            )}
            <Text>
              <Text color="red">Failed:</Text> {summary.failed}
            </Text>
            <Text>
              <Text color="yellow">Skipped:</Text> {summary.skipped}
            </Text>
          </Box>
          <Text dimColor>R reload · N new namespace · Q quit</Text>
        </Box>
      )}
    </Box>
  );
};
