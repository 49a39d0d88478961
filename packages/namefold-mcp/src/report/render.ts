import { stringify } from "csv-stringify/sync";

import { isDryRunPreview, isFailure, type PathChange, type PathChangeKind, type PathChangeRecord } from "../types.js";

export type JsonReportOptions = {
  onlyErrors: boolean;
  pretty: boolean;
};

export type CsvReportOptions = {
  onlyErrors: boolean;
};

export type ReportSummary = Record<PathChangeKind, number> & {
  total: number;
  dry_run: number;
};

const CSV_COLUMNS = ["path", "modified", "error"];

export function toRecord(change: PathChange): PathChangeRecord {
  switch (change.kind) {
    case "unchanged":
      return { path: change.path, modified: null, error: null };
    case "changed":
      return { path: change.path, modified: change.modified, error: null };
    case "error_rename":
      return { path: change.path, modified: change.modified, error: change.error };
    case "error":
      return { path: change.path, modified: null, error: change.error };
  }
}

export function renderText(changes: readonly PathChange[]): string {
  const lines: string[] = [];
  for (const change of changes) {
    switch (change.kind) {
      case "unchanged":
        break;
      case "changed":
        lines.push(`${change.path} -> ${change.modified}`);
        break;
      case "error":
        lines.push(`${change.path} : ${change.error}`);
        break;
      case "error_rename":
        lines.push(`${change.path} -> ${change.modified} : ${change.error}`);
        break;
    }
  }
  const count = changes.length;
  lines.push(count === 1 ? `${count} file checked` : `${count} files checked`);
  return lines.join("\n");
}

export function renderJson(changes: readonly PathChange[], options: JsonReportOptions): string {
  const selected = options.onlyErrors ? changes.filter(isFailure) : changes;
  const records = selected.map(toRecord);
  return options.pretty ? JSON.stringify(records, null, 2) : JSON.stringify(records);
}

export function renderCsv(changes: readonly PathChange[], options: CsvReportOptions = { onlyErrors: false }): string {
  const selected = options.onlyErrors ? changes.filter(isFailure) : changes;
  return stringify(selected.map(toRecord), { header: true, columns: CSV_COLUMNS });
}

export function summarize(changes: readonly PathChange[]): ReportSummary {
  const summary: ReportSummary = { total: 0, dry_run: 0, unchanged: 0, changed: 0, error_rename: 0, error: 0 };
  for (const change of changes) {
    summary.total += 1;
    summary[change.kind] += 1;
    if (isDryRunPreview(change)) {
      summary.dry_run += 1;
    }
  }
  return summary;
}
