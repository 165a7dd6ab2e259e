import type {
  CellValue,
  DataSourceConfig,
  DerivedColumnRule,
  Row,
  RowReference,
  ValidationIssue,
} from "./types.js";
import { applySpecialValues, coerceValue, ownValue, readCell } from "./sanitize.js";

/**
 * Module: Row Transformer
 * Purpose: Turn one raw record into a typed, validated canonical row.
 * Steps per column, in order: extract cell, apply special-value rules, coerce to the
 * declared type. Then derived columns, then required non-null enforcement.
 * A derived column whose source column failed coercion is skipped and flagged,
 * never computed from the uncoerced text.
 */
export interface TransformedRow {
  row: Row | null;
  issues: ValidationIssue[];
}

export interface LocatedRow {
  line: number;
  row: Row;
}

export interface TransformedRecords {
  rows: LocatedRow[];
  issues: ValidationIssue[];
  attempted: number;
  rejected: number;
  skipped: number;
}

const issue = (
  ref: RowReference,
  column: string | null,
  kind: ValidationIssue["kind"],
  severity: ValidationIssue["severity"],
  message: string
): ValidationIssue => ({ ref, column, kind, severity, message });

/**
 * Serialize a row's unique-key tuple; nulls compare equal to each other.
 */
export function keyOf(row: Row, uniqueKey: readonly string[]): string {
  return JSON.stringify(uniqueKey.map((k) => row[k] ?? null));
}

export function transformRow(
  rawRecord: readonly unknown[],
  mapping: Readonly<Record<string, number>>,
  config: DataSourceConfig,
  ref: RowReference
): TransformedRow {
  const issues: ValidationIssue[] = [];
  const row: Row = {};
  const failed = new Set<string>();
  const keyColumns = new Set(config.uniqueKey);

  for (const col of config.columns) {
    const idx = ownValue(mapping, col.name);
    const cell = idx === undefined ? null : readCell(rawRecord[idx], config.nullTokens);
    const special = applySpecialValues(cell, ownValue(config.specialValues, col.name));
    if (special.resolved !== undefined) {
      row[col.name] = special.resolved;
      continue;
    }
    const coerced = coerceValue(special.raw, col.type);
    if (coerced.error !== undefined) {
      failed.add(col.name);
      row[col.name] = null;
      const isKey = keyColumns.has(col.name);
      issues.push(
        issue(
          ref,
          col.name,
          isKey ? "key_type_error" : "type_error",
          "error",
          `${col.name}: ${coerced.error}${isKey ? " (unique key column)" : ""}`
        )
      );
      continue;
    }
    row[col.name] = coerced.value;
  }

  for (const rule of config.derived) {
    const sources = rule.kind === "concat" ? rule.from : [rule.from];
    const broken = sources.filter((s) => failed.has(s));
    if (broken.length) {
      issues.push(
        issue(ref, rule.column, "derived_skipped", "warn", `${rule.column} not derived: ${broken.join(", ")} failed type coercion`)
      );
      continue;
    }
    const target = config.columns.find((c) => c.name === rule.column);
    if (!target) continue;
    const derived = computeDerived(rule, row);
    if (derived === undefined) continue;
    const coerced = coerceValue(derived, target.type);
    if (coerced.error !== undefined) {
      issues.push(issue(ref, rule.column, "derived_skipped", "warn", `${rule.column} not derived: ${coerced.error}`));
      continue;
    }
    if (rule.kind === "extract" && rule.allowed && !rule.allowed.some((a) => String(a) === String(coerced.value))) {
      row[rule.column] = null;
      continue;
    }
    row[rule.column] = coerced.value;
  }

  for (const col of config.columns) {
    if (col.required && col.nullable !== true && !failed.has(col.name) && row[col.name] === null) {
      issues.push(issue(ref, col.name, "missing_required", "error", `${col.name} is required`));
    }
  }

  const dropped = issues.some((i) => i.severity !== "warn");
  return { row: dropped ? null : row, issues };
}

// undefined = leave the target untouched, null = derived value is absent
function computeDerived(rule: DerivedColumnRule, row: Row): string | null | undefined {
  const current: CellValue = row[rule.column] ?? null;
  if (rule.kind === "concat") {
    if (rule.onlyIfNull && current !== null) return undefined;
    const parts = rule.from.map((c) => row[c] ?? null);
    if (parts.some((p) => p === null)) return current === null ? null : undefined;
    return parts.map(String).join(rule.separator ?? "");
  }
  if (current !== null) return undefined;
  const src = row[rule.from];
  if (src === null || src === undefined) return null;
  const m = new RegExp(rule.pattern).exec(String(src));
  if (!m) return null;
  return m[rule.group ?? 1] ?? m[0];
}

const isBlankRecord = (record: readonly unknown[]): boolean =>
  record.every((v) => v === null || v === undefined || String(v).trim() === "");

/**
 * Transform every data row below the header row.
 * Fully blank rows are skipped; a unique key seen twice in the same file drops the later row.
 * `lines` gives the file line of each matrix row; without it the row position is used.
 */
export function transformRecords(
  matrix: readonly (readonly unknown[])[],
  headerRowIndex: number,
  mapping: Readonly<Record<string, number>>,
  config: DataSourceConfig,
  fileName: string,
  partIndex?: number,
  lines?: readonly number[]
): TransformedRecords {
  const rows: LocatedRow[] = [];
  const issues: ValidationIssue[] = [];
  const seen = new Map<string, number>();
  let attempted = 0;
  let rejected = 0;
  let skipped = 0;

  for (let i = headerRowIndex + 1; i < matrix.length; i++) {
    const record = matrix[i];
    if (isBlankRecord(record)) {
      skipped++;
      continue;
    }
    attempted++;
    const ref: RowReference = { fileName, line: lines?.[i] ?? i + 1, partIndex };
    const res = transformRow(record, mapping, config, ref);
    issues.push(...res.issues);
    if (!res.row) {
      rejected++;
      continue;
    }
    const key = keyOf(res.row, config.uniqueKey);
    const firstLine = seen.get(key);
    if (firstLine !== undefined) {
      rejected++;
      issues.push(
        issue(ref, null, "duplicate_key", "error", `Duplicate unique key ${key} (first seen on line ${firstLine})`)
      );
      continue;
    }
    seen.set(key, ref.line);
    rows.push({ line: ref.line, row: res.row });
  }

  return { rows, issues, attempted, rejected, skipped };
}
