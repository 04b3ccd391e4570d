import { QueryExecutionError, errorMessage } from './errors.js';
import { escapeStringLiteral } from './namespace.js';
import type { Inventory, NamespaceId, SqlExecutor, TableRecord } from './types.js';

export function buildInventoryQuery(namespace: NamespaceId): string {
  const schema = escapeStringLiteral(namespace.schema);
  return [
    'SELECT table_name, created',
    `FROM ${namespace.catalog}.information_schema.tables`,
    `WHERE table_schema = '${schema}'`,
    'ORDER BY created ASC',
  ].join('\n');
}

function toTableRecord(row: Record<string, unknown>): TableRecord {
  const name = row.table_name;
  if (typeof name !== 'string') {
    throw new QueryExecutionError('Unexpected inventory row: missing table_name');
  }

  const created = row.created;
  return {
    name,
    created: created instanceof Date ? created : String(created ?? ''),
  };
}

/**
 * Lists the tables of a namespace, oldest first. Order comes from the
 * statement itself; rows are kept in the order the executor returns them.
 * An empty namespace yields an empty inventory.
 */
export async function fetchInventory(
  executor: SqlExecutor,
  namespace: NamespaceId
): Promise<Inventory> {
  let rows: Record<string, unknown>[];
  try {
    rows = await executor.execute(buildInventoryQuery(namespace));
  } catch (err) {
    throw new QueryExecutionError(errorMessage(err));
  }

  return Object.freeze(rows.map(toTableRecord));
}
