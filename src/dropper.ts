import { InconsistentSelectionError, errorMessage } from './errors.js';
import type {
  DropHooks,
  DropOutcomeEntry,
  DropReport,
  DropRequest,
  SqlExecutor,
} from './types.js';

// Characters that would change the meaning of an unquoted identifier
const UNSAFE_IDENTIFIER = /[\s;'"`.\\]/;

export function buildDropStatement(qualifiedName: string): string {
  return `DROP TABLE IF EXISTS ${qualifiedName}`;
}

function unsafeReason(tableName: string): string | null {
  if (tableName.length === 0) return 'empty table name';
  if (UNSAFE_IDENTIFIER.test(tableName)) {
    return 'name cannot be used as an unquoted identifier';
  }
  return null;
}

function assertUnique(tableNames: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of tableNames) {
    if (seen.has(name)) {
      throw new InconsistentSelectionError(`'${name}' is selected more than once`);
    }
    seen.add(name);
  }
}

async function dropOne(
  executor: SqlExecutor,
  request: DropRequest,
  tableName: string
): Promise<DropOutcomeEntry> {
  const qualifiedName = `${request.namespace.qualified}.${tableName}`;

  const reason = unsafeReason(tableName);
  if (reason) {
    return { tableName, qualifiedName, statement: null, status: { kind: 'skipped', reason } };
  }

  const statement = buildDropStatement(qualifiedName);
  if (request.mode === 'preview') {
    return { tableName, qualifiedName, statement, status: { kind: 'dropped', preview: true } };
  }

  try {
    await executor.execute(statement);
    return { tableName, qualifiedName, statement, status: { kind: 'dropped', preview: false } };
  } catch (err) {
    return {
      tableName,
      qualifiedName,
      statement,
      status: { kind: 'failed', detail: errorMessage(err) },
    };
  }
}

/**
 * Drops the requested tables one statement at a time, in request order.
 * Preview mode never reaches the executor. A failed drop is recorded and
 * the batch moves on; the batch always runs to the end.
 */
export async function executeDrop(
  executor: SqlExecutor,
  request: DropRequest,
  hooks: DropHooks = {}
): Promise<DropReport> {
  if (request.tableNames.length === 0) {
    return { mode: request.mode, entries: [], signal: 'no-selection' };
  }

  assertUnique(request.tableNames);

  const entries: DropOutcomeEntry[] = [];
  const total = request.tableNames.length;

  for (const tableName of request.tableNames) {
    const entry = await dropOne(executor, request, tableName);
    entries.push(entry);
    hooks.onOutcome?.(entry, entries.length - 1, total);
  }

  return { mode: request.mode, entries, signal: 'complete' };
}
