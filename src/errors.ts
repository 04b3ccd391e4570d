export type TableDropperErrorCode =
  | 'INVALID_NAMESPACE_FORMAT'
  | 'QUERY_EXECUTION_ERROR'
  | 'UNKNOWN_TABLE'
  | 'INCONSISTENT_SELECTION'
  | 'MISSING_LINKED_SERVER';

export class TableDropperError extends Error {
  readonly code: TableDropperErrorCode;

  constructor(code: TableDropperErrorCode, message: string) {
    super(message);
    this.name = 'TableDropperError';
    this.code = code;
  }
}

export class InvalidNamespaceFormatError extends TableDropperError {
  readonly raw: string;

  constructor(raw: string) {
    super('INVALID_NAMESPACE_FORMAT', `Expected 'catalog.schema', got '${raw}'`);
    this.name = 'InvalidNamespaceFormatError';
    this.raw = raw;
  }
}

export class QueryExecutionError extends TableDropperError {
  readonly detail: string;

  constructor(detail: string) {
    super('QUERY_EXECUTION_ERROR', `Error listing tables: ${detail}`);
    this.name = 'QueryExecutionError';
    this.detail = detail;
  }
}

export class UnknownTableError extends TableDropperError {
  readonly tableName: string;

  constructor(tableName: string) {
    super('UNKNOWN_TABLE', `Unknown table '${tableName}'. Please reload tables.`);
    this.name = 'UnknownTableError';
    this.tableName = tableName;
  }
}

export class InconsistentSelectionError extends TableDropperError {
  constructor(reason: string) {
    super('INCONSISTENT_SELECTION', `Selection is out of sync with the loaded tables (${reason}). Please reload tables.`);
    this.name = 'InconsistentSelectionError';
  }
}

export class MissingLinkedServerError extends TableDropperError {
  constructor() {
    super('MISSING_LINKED_SERVER', 'DROPPER_LINKED_SERVER must name the linked server that forwards statements to the data platform');
    this.name = 'MissingLinkedServerError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
