import React from 'react';
import { Box, Text } from 'ink';
import { describeTable } from '../report.js';
import type { SelectionRow } from '../types.js';

interface TableListProps {
  namespace: string;
  rows: SelectionRow[];
  cursor: number;
  notice: string | null;
}

const VISIBLE_ROWS = 15;

function visibleWindow(total: number, cursor: number): [number, number] {
  if (total <= VISIBLE_ROWS) return [0, total];
  const start = Math.min(Math.max(cursor - Math.floor(VISIBLE_ROWS / 2), 0), total - VISIBLE_ROWS);
  return [start, start + VISIBLE_ROWS];
}

export const TableList: React.FC<TableListProps> = ({ namespace, rows, cursor, notice }) => {
  const selectedCount = rows.filter((row) => row.selected).length;
  const allSelected = rows.length > 0 && selectedCount === rows.length;
  const [start, end] = visibleWindow(rows.length, cursor);

  return (
    <Box flexDirection="column" marginTop={1}>
      <Box gap={2}>
        <Text bold>{namespace}</Text>
        {notice ? <Text color="green">{notice}</Text> : null}
        <Text dimColor>
          {selectedCount}/{rows.length} selected
        </Text>
      </Box>

      {rows.length > 0 && (
        <Box marginTop={1} flexDirection="column">
          <Text bold>{allSelected ? '[x]' : '[ ]'} Select All</Text>
          {start > 0 && <Text dimColor>  ... {start} more above</Text>}
          {rows.slice(start, end).map((row, offset) => {
            const index = start + offset;
            const active = index === cursor;
            return (
              <Text key={row.table.name} color={active ? 'cyan' : undefined}>
                {active ? '›' : ' '} {row.selected ? '[x]' : '[ ]'} {describeTable(row.table)}
              </Text>
            );
          })}
          {end < rows.length && <Text dimColor>  ... {rows.length - end} more below</Text>}
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>
          ↑/↓ move · Space toggle · A select all · D dry run on/off · Enter drop · N new namespace · Q quit
        </Text>
      </Box>
    </Box>
  );
};
