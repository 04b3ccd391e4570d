import { describe, it, expect, vi } from 'vitest';
import { MssqlExecutor, passThrough } from './db.js';
import { config } from './config.js';
import { TableDropper } from './engine.js';
import { MissingLinkedServerError } from './errors.js';

function fakePool(recordset?: Record<string, unknown>[]) {
  const query = vi.fn(async (_command: string) => ({ recordset }));
  return { query, pool: { request: () => ({ query }) } };
}

describe('passThrough', () => {
  it('doubles quotes inside the forwarded statement', () => {
    expect(passThrough("SELECT 'a'", 'DATABRICKS')).toBe("EXEC ('SELECT ''a''') AT [DATABRICKS]");
  });

  it('escapes brackets in the linked server name', () => {
    expect(passThrough('SELECT 1', 'odd]name')).toBe("EXEC ('SELECT 1') AT [odd]]name]");
  });
});

describe('MssqlExecutor', () => {
  it('refuses to run without a linked server', () => {
    const { pool } = fakePool();

    expect(() => new MssqlExecutor(pool, '')).toThrow(MissingLinkedServerError);
    expect(() => new MssqlExecutor(pool, '  ')).toThrow(MissingLinkedServerError);
  });

  it('defaults to the configured linked server', async () => {
    const { query, pool } = fakePool([]);

    await new MssqlExecutor(pool).execute('SELECT 1');

    expect(query).toHaveBeenCalledWith(`EXEC ('SELECT 1') AT [${config.sql.linkedServer}]`);
  });

  it('keeps a quote in the schema inside the forwarded literal', async () => {
    const { query, pool } = fakePool([]);
    const dropper = new TableDropper(new MssqlExecutor(pool, 'LAKE'));

    await dropper.load("main.x'; DROP TABLE victims; --");

    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0][0]).toBe(
      "EXEC ('SELECT table_name, created\n" +
        'FROM main.information_schema.tables\n' +
        "WHERE table_schema = ''x\\''; DROP TABLE victims; --''\n" +
        "ORDER BY created ASC') AT [LAKE]"
    );
  });

  it('returns the rows of a forwarded query', async () => {
    const { query, pool } = fakePool([{ table_name: 't1' }]);
    const executor = new MssqlExecutor(pool, 'LAKE');

    const rows = await executor.execute('SELECT table_name FROM x');

    expect(query).toHaveBeenCalledWith("EXEC ('SELECT table_name FROM x') AT [LAKE]");
    expect(rows).toEqual([{ table_name: 't1' }]);
  });

  it('forwards statements through the linked server', async () => {
    const { query, pool } = fakePool();
    const executor = new MssqlExecutor(pool, 'LAKE');

    const rows = await executor.execute('DROP TABLE IF EXISTS c.s.t1');

    expect(query).toHaveBeenCalledWith("EXEC ('DROP TABLE IF EXISTS c.s.t1') AT [LAKE]");
    expect(rows).toEqual([]);
  });

  it('propagates driver errors', async () => {
    const { query, pool } = fakePool();
    query.mockRejectedValueOnce(new Error('Login failed'));

    await expect(new MssqlExecutor(pool, 'LAKE').execute('SELECT 1')).rejects.toThrow('Login failed');
  });
});
