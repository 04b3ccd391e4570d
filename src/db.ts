import sql from 'mssql';
import { config } from './config.js';
import { MissingLinkedServerError } from './errors.js';
import type { RowSet, SqlExecutor } from './types.js';

let pool: sql.ConnectionPool | null = null;

export async function connect(): Promise<sql.ConnectionPool> {
  if (pool) return pool;

  pool = await sql.connect({
    server: config.sql.host,
    port: config.sql.port,
    database: config.sql.database,
    user: config.sql.user,
    password: config.sql.password,
    options: config.sql.options,
    requestTimeout: config.sql.requestTimeoutMs,
    connectionTimeout: config.sql.connectionTimeoutMs,
  });

  return pool;
}

export async function disconnect(): Promise<void> {
  if (pool) {
    await pool.close();
    pool = null;
  }
}

/** The slice of a connection pool the executor needs. */
export interface SqlRequester {
  request(): {
    query(command: string): Promise<{ recordset?: Record<string, unknown>[] }>;
  };
}

/**
 * Wraps a statement for pass-through execution on a linked server, so the
 * remote platform parses it in its own dialect.
 */
export function passThrough(statement: string, linkedServer: string): string {
  const quoted = statement.replace(/'/g, "''");
  const server = linkedServer.replace(/]/g, ']]');
  return `EXEC ('${quoted}') AT [${server}]`;
}

export class MssqlExecutor implements SqlExecutor {
  private readonly requester: SqlRequester;
  private readonly linkedServer: string;

  constructor(requester: SqlRequester, linkedServer: string = config.sql.linkedServer) {
    if (!linkedServer.trim()) {
      throw new MissingLinkedServerError();
    }
    this.requester = requester;
    this.linkedServer = linkedServer;
  }

  // Statements are written in the platform's dialect, never run as T-SQL
  async execute(statement: string): Promise<RowSet> {
    const result = await this.requester.request().query(passThrough(statement, this.linkedServer));
    // DDL returns no recordset
    return result.recordset ?? [];
  }
}

export async function createExecutor(): Promise<MssqlExecutor> {
  if (!config.sql.linkedServer.trim()) {
    throw new MissingLinkedServerError();
  }
  const conn = await connect();
  return new MssqlExecutor(conn);
}
