import type { DataSourceConfig } from "./types.js";
import { ownValue } from "./sanitize.js";

/**
 * Module: Header Resolution
 * Purpose: Map raw file headers onto a source's canonical columns through its alias
 * table, and locate the header row below any title or notice rows.
 * Matching is exact on the normalized form; header variants are enumerated per source.
 */
export interface DuplicateHeader {
  header: string;
  column: string;
  // Raw index of the header the column was already read from
  firstIndex: number;
}

export interface HeaderResolution {
  // canonical column -> raw column index
  mapping: Record<string, number>;
  unmatched: string[];
  duplicates: DuplicateHeader[];
  missing: string[];
}

export interface HeaderRowDetection extends HeaderResolution {
  headerRowIndex: number;
  found: boolean;
}

export const normalizeHeader = (s: unknown): string =>
  String(s ?? "")
    .replace(/\u00A0/g, " ")
    .trim()
    .replace(/\s+/g, " ")
    .toUpperCase();

/**
 * Build the normalized alias -> canonical column lookup for a source.
 * The canonical name itself is accepted as a header for every column.
 */
export function buildAliasIndex(config: DataSourceConfig): Map<string, string> {
  const index = new Map<string, string>();
  for (const col of config.columns) {
    for (const alias of ownValue(config.aliases, col.name) ?? []) {
      const key = normalizeHeader(alias);
      if (!index.has(key)) index.set(key, col.name);
    }
  }
  for (const col of config.columns) {
    const key = normalizeHeader(col.name);
    if (!index.has(key)) index.set(key, col.name);
  }
  return index;
}

export function resolveHeaders(rawHeaders: readonly unknown[], config: DataSourceConfig): HeaderResolution {
  const index = buildAliasIndex(config);
  const mapping: Record<string, number> = {};
  const unmatched: string[] = [];
  const duplicates: DuplicateHeader[] = [];

  rawHeaders.forEach((raw, idx) => {
    const norm = normalizeHeader(raw);
    if (!norm) return;
    const canonical = index.get(norm);
    if (canonical === undefined) {
      unmatched.push(String(raw).trim());
      return;
    }
    // First raw column wins
    const firstIndex = ownValue(mapping, canonical);
    if (firstIndex !== undefined) {
      duplicates.push({ header: String(raw).trim(), column: canonical, firstIndex });
      return;
    }
    mapping[canonical] = idx;
  });

  const derivedTargets = new Set(config.derived.map((d) => d.column));
  const missing = config.columns
    .filter((c) => c.required && !Object.hasOwn(mapping, c.name) && !derivedTargets.has(c.name))
    .map((c) => c.name);

  return { mapping, unmatched, duplicates, missing };
}

/**
 * Scan the first `maxScanRows` rows for the first one that resolves every required column.
 * When none does, row 0 is returned with `found: false` and its missing columns.
 */
export function detectHeaderRow(
  rows: readonly (readonly unknown[])[],
  config: DataSourceConfig,
  maxScanRows = 15
): HeaderRowDetection {
  const limit = Math.min(maxScanRows, rows.length);
  for (let i = 0; i < limit; i++) {
    const res = resolveHeaders(rows[i], config);
    if (res.missing.length === 0 && Object.keys(res.mapping).length > 0) {
      return { ...res, headerRowIndex: i, found: true };
    }
  }
  const first = resolveHeaders(rows[0] ?? [], config);
  const missing = first.missing.length
    ? first.missing
    : config.columns.filter((c) => c.required).map((c) => c.name);
  return { ...first, missing, headerRowIndex: 0, found: false };
}
