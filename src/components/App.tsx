import React, { useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { DropMode, DropOutcomeEntry, DropReport, SelectionRow } from '../types.js';
import { Header } from './Header.js';
import { NamespacePrompt } from './NamespacePrompt.js';
import { TableList } from './TableList.js';
import { Progress } from './Progress.js';
import { DropResults } from './DropResults.js';

export type AppPhase = 'namespace' | 'loading' | 'selecting' | 'dropping' | 'complete' | 'error';

export interface AppProps {
  appPhase: AppPhase;
  defaultNamespace: string;
  namespace: string | null;
  rows: SelectionRow[];
  mode: DropMode;
  notice: string | null;
  entries: DropOutcomeEntry[];
  total: number;
  report: DropReport | null;
  error: string | null;
  onLoad: (rawNamespace: string) => void;
  onReload: () => void;
  onToggle: (name: string, value: boolean) => void;
  onSelectAll: (value: boolean) => void;
  onModeChange: (mode: DropMode) => void;
  onDrop: () => void;
  onNewNamespace: () => void;
  onDismissError: () => void;
}

export const App: React.FC<AppProps> = ({
  appPhase,
  defaultNamespace,
  namespace,
  rows,
  mode,
  notice,
  entries,
  total,
  report,
  error,
  onLoad,
  onReload,
  onToggle,
  onSelectAll,
  onModeChange,
  onDrop,
  onNewNamespace,
  onDismissError,
}) => {
  const { exit } = useApp();
  const [input, setInput] = useState(defaultNamespace);
  const [cursor, setCursor] = useState(0);

  useInput((char, key) => {
    // A running batch always finishes, so quitting waits for it
    if (appPhase === 'dropping') return;

    if (key.escape || (key.ctrl && char === 'c')) {
      exit();
      return;
    }

    if (appPhase === 'namespace') {
      if (key.return) {
        setCursor(0);
        onLoad(input);
      } else if (key.backspace || key.delete) {
        setInput((value) => value.slice(0, -1));
      } else if (char && !key.ctrl && !key.meta) {
        setInput((value) => value + char);
      }
      return;
    }

    if (appPhase === 'error') {
      onDismissError();
      return;
    }

    if (appPhase === 'selecting') {
      const current = rows[cursor];
      if (key.upArrow) {
        setCursor((value) => Math.max(value - 1, 0));
      } else if (key.downArrow) {
        setCursor((value) => Math.min(value + 1, Math.max(rows.length - 1, 0)));
      } else if (char === ' ' && current) {
        onToggle(current.table.name, !current.selected);
      } else if (char.toLowerCase() === 'a') {
        onSelectAll(!rows.every((row) => row.selected));
      } else if (char.toLowerCase() === 'd') {
        onModeChange(mode === 'preview' ? 'execute' : 'preview');
      } else if (key.return) {
        onDrop();
      } else if (char.toLowerCase() === 'n') {
        onNewNamespace();
      } else if (char.toLowerCase() === 'q') {
        exit();
      }
      return;
    }

    if (appPhase === 'complete') {
      if (char.toLowerCase() === 'r') {
        setCursor(0);
        onReload();
      } else if (char.toLowerCase() === 'n') {
        onNewNamespace();
      } else if (char.toLowerCase() === 'q') {
        exit();
      }
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Header mode={mode} />

      {appPhase === 'namespace' && <NamespacePrompt value={input} />}

      {appPhase === 'loading' && (
        <Box marginTop={1}>
          <Text color="yellow">Loading tables from {input}...</Text>
        </Box>
      )}

      {appPhase === 'selecting' && namespace && (
        <TableList namespace={namespace} rows={rows} cursor={cursor} notice={notice} />
      )}

      {appPhase === 'dropping' && (
        <>
          <Progress
            done={entries.length}
            total={total}
            failed={entries.filter((entry) => entry.status.kind === 'failed').length}
          />
          <DropResults mode={mode} total={total} entries={entries} report={null} />
        </>
      )}

      {appPhase === 'complete' && (
        <DropResults mode={mode} total={total} entries={entries} report={report} />
      )}

      {appPhase === 'error' && (
        <Box marginTop={1} flexDirection="column">
          <Text color="red">Error: {error}</Text>
          <Text dimColor>Press any key to continue</Text>
        </Box>
      )}
    </Box>
  );
};
