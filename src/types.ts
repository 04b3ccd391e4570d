export type RowSet = Record<string, unknown>[];

/**
 * Anything that can run one SQL statement at a time. The engine issues
 * only two statement shapes: the namespace inventory read and a
 * single-table `DROP TABLE IF EXISTS`.
 */
export interface SqlExecutor {
  execute(statement: string): Promise<RowSet>;
}

export interface NamespaceId {
  catalog: string;
  schema: string;
  /** `catalog.schema` */
  qualified: string;
}

export interface TableRecord {
  readonly name: string;
  readonly created: Date | string;
}

export type Inventory = readonly TableRecord[];

export type DropMode = 'preview' | 'execute';

export interface DropRequest {
  namespace: NamespaceId;
  tableNames: readonly string[];
  mode: DropMode;
}

export type DropStatus =
  | { kind: 'dropped'; preview: boolean }
  | { kind: 'skipped'; reason: string }
  | { kind: 'failed'; detail: string };

export interface DropOutcomeEntry {
  tableName: string;
  qualifiedName: string;
  /** Statement sent, or that would be sent in preview; null when skipped */
  statement: string | null;
  status: DropStatus;
}

export type DropSignal = 'no-selection' | 'complete';

export interface DropReport {
  mode: DropMode;
  entries: DropOutcomeEntry[];
  signal: DropSignal;
}

export interface SelectionRow {
  table: TableRecord;
  selected: boolean;
}

export interface DropHooks {
  onOutcome?: (entry: DropOutcomeEntry, index: number, total: number) => void;
}
