#!/usr/bin/env node
import React, { useState, useCallback, useRef } from 'react';
import { render } from 'ink';
import { App, type AppPhase } from './components/App.js';
import { config } from './config.js';
import { createExecutor, disconnect } from './db.js';
import { TableDropper } from './engine.js';
import { errorMessage } from './errors.js';
import { formatInventorySummary } from './report.js';
import type { DropMode, DropOutcomeEntry, DropReport, SelectionRow } from './types.js';

const Main: React.FC = () => {
  const dropperRef = useRef<TableDropper | null>(null);
  const [appPhase, setAppPhase] = useState<AppPhase>('namespace');
  const [namespace, setNamespace] = useState<string | null>(null);
  const [rows, setRows] = useState<SelectionRow[]>([]);
  const [mode, setMode] = useState<DropMode>(config.defaults.mode);
  const [notice, setNotice] = useState<string | null>(null);
  const [entries, setEntries] = useState<DropOutcomeEntry[]>([]);
  const [total, setTotal] = useState(0);
  const [report, setReport] = useState<DropReport | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [errorReturnPhase, setErrorReturnPhase] = useState<AppPhase>('namespace');

  const getDropper = useCallback(async (): Promise<TableDropper> => {
    if (!dropperRef.current) {
      dropperRef.current = new TableDropper(await createExecutor());
    }
    return dropperRef.current;
  }, []);

  const fail = useCallback((err: unknown, returnTo: AppPhase) => {
    setError(errorMessage(err));
    setErrorReturnPhase(returnTo);
    setAppPhase('error');
  }, []);

  const showInventory = useCallback((dropper: TableDropper) => {
    setNamespace(dropper.namespace?.qualified ?? null);
    setRows(dropper.selection.rows());
    setNotice(formatInventorySummary(dropper.inventory));
    setEntries([]);
    setReport(null);
    setAppPhase('selecting');
  }, []);

  const handleLoad = useCallback(async (rawNamespace: string) => {
    setAppPhase('loading');
    try {
      const dropper = await getDropper();
      await dropper.load(rawNamespace);
      showInventory(dropper);
    } catch (err) {
      fail(err, 'namespace');
    }
  }, [getDropper, showInventory, fail]);

  const handleReload = useCallback(async () => {
    setAppPhase('loading');
    try {
      const dropper = await getDropper();
      await dropper.reload();
      showInventory(dropper);
    } catch (err) {
      fail(err, 'complete');
    }
  }, [getDropper, showInventory, fail]);

  const handleToggle = useCallback((name: string, value: boolean) => {
    const dropper = dropperRef.current;
    if (!dropper) return;
    try {
      dropper.toggle(name, value);
      setRows(dropper.selection.rows());
    } catch (err) {
      fail(err, 'namespace');
    }
  }, [fail]);

  const handleSelectAll = useCallback((value: boolean) => {
    const dropper = dropperRef.current;
    if (!dropper) return;
    dropper.selectAll(value);
    setRows(dropper.selection.rows());
  }, []);

  const handleDrop = useCallback(async () => {
    const dropper = dropperRef.current;
    if (!dropper) return;

    const live: DropOutcomeEntry[] = [];
    setEntries([]);
    setReport(null);
    setTotal(dropper.selection.selectedNames().length);
    setAppPhase('dropping');

    try {
      const result = await dropper.drop(mode, {
        onOutcome: (entry) => {
          live.push(entry);
          setEntries([...live]);
        },
      });
      setReport(result);
      setAppPhase('complete');
    } catch (err) {
      fail(err, 'namespace');
    }
  }, [mode, fail]);

  const handleDismissError = useCallback(() => {
    setError(null);
    setAppPhase(errorReturnPhase);
  }, [errorReturnPhase]);

  return (
    <App
      appPhase={appPhase}
      defaultNamespace={config.defaults.namespace}
      namespace={namespace}
      rows={rows}
      mode={mode}
      notice={notice}
      entries={entries}
      total={total}
      report={report}
      error={error}
      onLoad={(raw) => void handleLoad(raw)}
      onReload={() => void handleReload()}
      onToggle={handleToggle}
      onSelectAll={handleSelectAll}
      onModeChange={setMode}
      onDrop={() => void handleDrop()}
      onNewNamespace={() => setAppPhase('namespace')}
      onDismissError={handleDismissError}
    />
  );
};

const { waitUntilExit } = render(<Main />, { exitOnCtrlC: false });
waitUntilExit()
  .catch((err: unknown) => {
    console.error('Fatal error:', errorMessage(err));
    process.exitCode = 1;
  })
  .then(() => disconnect())
  .catch((err: unknown) => {
    console.error('Failed to disconnect:', errorMessage(err));
  });
