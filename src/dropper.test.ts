import { describe, it, expect, vi } from 'vitest';
import { buildDropStatement, executeDrop } from './dropper.js';
import { resolveNamespace } from './namespace.js';
import { InconsistentSelectionError } from './errors.js';
import type { DropOutcomeEntry, RowSet } from './types.js';

const namespace = resolveNamespace('my_catalog.my_schema');

function recordingExecutor() {
  return { execute: vi.fn(async (_statement: string): Promise<RowSet> => []) };
}

describe('buildDropStatement', () => {
  it('builds a conditional drop', () => {
    expect(buildDropStatement('c.s.t')).toBe('DROP TABLE IF EXISTS c.s.t');
  });
});

describe('executeDrop', () => {
  it('never calls the executor in preview mode', async () => {
    const executor = recordingExecutor();

    const report = await executeDrop(executor, {
      namespace,
      tableNames: ['t1', 't2'],
      mode: 'preview',
    });

    expect(executor.execute).not.toHaveBeenCalled();
    expect(report.signal).toBe('complete');
    expect(report.entries).toEqual([
      {
        tableName: 't1',
        qualifiedName: 'my_catalog.my_schema.t1',
        statement: 'DROP TABLE IF EXISTS my_catalog.my_schema.t1',
        status: { kind: 'dropped', preview: true },
      },
      {
        tableName: 't2',
        qualifiedName: 'my_catalog.my_schema.t2',
        statement: 'DROP TABLE IF EXISTS my_catalog.my_schema.t2',
        status: { kind: 'dropped', preview: true },
      },
    ]);
  });

  it('keeps going after a failed drop', async () => {
    const executor = recordingExecutor();
    executor.execute.mockRejectedValueOnce(new Error('PERMISSION_DENIED'));

    const report = await executeDrop(executor, {
      namespace,
      tableNames: ['t1', 't2'],
      mode: 'execute',
    });

    expect(executor.execute).toHaveBeenCalledTimes(2);
    expect(executor.execute.mock.calls.map(([statement]) => statement)).toEqual([
      'DROP TABLE IF EXISTS my_catalog.my_schema.t1',
      'DROP TABLE IF EXISTS my_catalog.my_schema.t2',
    ]);
    expect(report.entries.map((entry) => entry.status)).toEqual([
      { kind: 'failed', detail: 'PERMISSION_DENIED' },
      { kind: 'dropped', preview: false },
    ]);
    expect(report.signal).toBe('complete');
  });

  it('signals an empty selection without touching the executor', async () => {
    const executor = recordingExecutor();

    const report = await executeDrop(executor, { namespace, tableNames: [], mode: 'execute' });

    expect(report).toEqual({ mode: 'execute', entries: [], signal: 'no-selection' });
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('rejects a table selected twice before sending anything', async () => {
    const executor = recordingExecutor();

    await expect(
      executeDrop(executor, { namespace, tableNames: ['t1', 't2', 't1'], mode: 'execute' })
    ).rejects.toThrow(InconsistentSelectionError);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('skips names that cannot be used as plain identifiers', async () => {
    const executor = recordingExecutor();

    const report = await executeDrop(executor, {
      namespace,
      tableNames: ['t1; DROP SCHEMA x', 't2'],
      mode: 'execute',
    });

    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(executor.execute).toHaveBeenCalledWith('DROP TABLE IF EXISTS my_catalog.my_schema.t2');
    expect(report.entries[0]).toEqual({
      tableName: 't1; DROP SCHEMA x',
      qualifiedName: 'my_catalog.my_schema.t1; DROP SCHEMA x',
      statement: null,
      status: { kind: 'skipped', reason: 'name cannot be used as an unquoted identifier' },
    });
  });

  it('skips unsafe names in preview too, with no statement to show', async () => {
    const executor = recordingExecutor();

    const report = await executeDrop(executor, {
      namespace,
      tableNames: ['bad name', 't2'],
      mode: 'preview',
    });

    expect(executor.execute).not.toHaveBeenCalled();
    expect(report.entries.map((entry) => [entry.statement, entry.status])).toEqual([
      [null, { kind: 'skipped', reason: 'name cannot be used as an unquoted identifier' }],
      ['DROP TABLE IF EXISTS my_catalog.my_schema.t2', { kind: 'dropped', preview: true }],
    ]);
  });

  it('reports each outcome as it happens', async () => {
    const executor = recordingExecutor();
    const seen: Array<[string, number, number]> = [];

    await executeDrop(
      executor,
      { namespace, tableNames: ['t1', 't2', 't3'], mode: 'execute' },
      {
        onOutcome: (entry: DropOutcomeEntry, index: number, total: number) => {
          seen.push([entry.tableName, index, total]);
        },
      }
    );

    expect(seen).toEqual([
      ['t1', 0, 3],
      ['t2', 1, 3],
      ['t3', 2, 3],
    ]);
  });
});
