import type { DropMode, DropOutcomeEntry, DropReport, Inventory, TableRecord } from './types.js';

export interface ReportSummary {
  dropped: number;
  previewed: number;
  skipped: number;
  failed: number;
}

export function formatCreated(created: Date | string): string {
  return created instanceof Date ? created.toISOString() : created;
}

export function describeTable(table: TableRecord): string {
  return `${table.name} (${formatCreated(table.created)})`;
}

export function formatInventorySummary(inventory: Inventory): string {
  if (inventory.length === 0) return 'No tables found.';
  return `Found ${inventory.length} ${inventory.length === 1 ? 'table' : 'tables'}.`;
}

export function formatOutcome(entry: DropOutcomeEntry): string {
  switch (entry.status.kind) {
    case 'dropped':
      return entry.status.preview
        ? `[Dry Run] ${entry.statement};`
        : `Dropped: ${entry.qualifiedName}`;
    case 'skipped':
      return `Skipped ${entry.qualifiedName}: ${entry.status.reason}`;
    case 'failed':
      return `Failed to drop ${entry.qualifiedName}: ${entry.status.detail}`;
  }
}

export function formatReportHeader(mode: DropMode, count: number): string[] {
  if (mode === 'preview') {
    return [
      '--- DRY RUN MODE ---',
      `The following ${count} ${count === 1 ? 'table' : 'tables'} would be DROPPED:`,
    ];
  }
  return ['--- EXECUTING DROP ---'];
}

export function summarizeReport(report: DropReport): ReportSummary {
  const summary: ReportSummary = { dropped: 0, previewed: 0, skipped: 0, failed: 0 };
  for (const { status } of report.entries) {
    if (status.kind === 'dropped') {
      if (status.preview) summary.previewed++;
      else summary.dropped++;
    } else if (status.kind === 'skipped') {
      summary.skipped++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}
