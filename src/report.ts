import type { ColumnStats, IssueKind, Row, ValidationIssue, ValidationReport } from "./types.js";
import { ownValue } from "./sanitize.js";

/**
 * Module: Validation Reporter
 * Purpose: Fold the issues and row counters of one submission into a report.
 */
export interface RowCounters {
  attempted: number;
  accepted: number;
  rejected: number;
  skipped: number;
}

const SAMPLE_SIZE = 3;
const SAMPLE_LENGTH = 50;

/**
 * Null counts and a few sample values per column over accepted rows.
 */
export function columnStats(rows: readonly Row[], columns: readonly string[]): ColumnStats[] {
  return columns.map((column) => {
    let nullCount = 0;
    const sampleValues: string[] = [];
    for (const row of rows) {
      const value = ownValue(row, column) ?? null;
      if (value === null) nullCount++;
      else if (sampleValues.length < SAMPLE_SIZE) sampleValues.push(String(value).slice(0, SAMPLE_LENGTH));
    }
    const nullPercentage = rows.length ? Math.round((10_000 * nullCount) / rows.length) / 100 : 0;
    return { column, nullCount, nullPercentage, sampleValues };
  });
}

export function buildReport(
  issues: readonly ValidationIssue[],
  counts: RowCounters,
  versionFailed = false,
  stats: ColumnStats[] = []
): ValidationReport {
  const grouped = new Map<string, { kind: IssueKind; column: string | null; count: number }>();
  let warnings = 0;
  let errors = 0;
  let fatal = 0;

  for (const issue of issues) {
    if (issue.severity === "warn") warnings++;
    else if (issue.severity === "error") errors++;
    else fatal++;
    const id = `${issue.kind}\u0000${issue.column ?? ""}`;
    const entry = grouped.get(id);
    if (entry) entry.count++;
    else grouped.set(id, { kind: issue.kind, column: issue.column, count: 1 });
  }

  return {
    rowsAttempted: counts.attempted,
    rowsAccepted: counts.accepted,
    rowsRejected: counts.rejected,
    rowsSkipped: counts.skipped,
    issueCounts: [...grouped.values()],
    warnings,
    errors,
    fatal,
    failed: versionFailed || fatal > 0,
    columnStats: stats,
  };
}

/**
 * One line per issue kind and column, for logs and CLI output.
 */
export function summarizeReport(report: ValidationReport): string {
  const head = `${report.rowsAccepted}/${report.rowsAttempted} rows accepted`;
  const parts = report.issueCounts.map((c) => `${c.kind}${c.column ? `(${c.column})` : ""}: ${c.count}`);
  return parts.length ? `${head}; ${parts.join(", ")}` : head;
}
