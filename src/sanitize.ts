import type { CellValue, SemanticType, SpecialValueRule } from "./types.js";

/**
 * Module: Cell Sanitizers & Type Coercion
 * Purpose: Turn raw cell text into typed values.
 * Features:
 * - Blank and configured null tokens read as null; numeric 0 stays 0.
 * - Integers and decimals with thousands separators.
 * - Dates from YYYYMMDD, MM/DD/YYYY, M/D/YY, YYYY-MM-DD, YYYY/MM/DD, MM-DD-YYYY into ISO.
 * - Declarative special-value rules applied before coercion.
 */
export type Sanitized = { value: CellValue; error?: string };

/**
 * Own-property lookup for records keyed by column name, so a column such as
 * `constructor` never resolves to an `Object.prototype` member.
 */
export const ownValue = <T>(record: Readonly<Record<string, T>>, key: string): T | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined;

const collapseWS = (s: string): string => s.replace(/\s+/g, " ").trim();

export function readCell(raw: unknown, nullTokens: readonly string[]): string | null {
  if (raw === undefined || raw === null) return null;
  const s = String(raw).replace(/\u00A0/g, " ").trim();
  if (!s) return null;
  const upper = s.toUpperCase();
  if (nullTokens.some((t) => t.toUpperCase() === upper)) return null;
  return s;
}

export interface SpecialValueOutcome {
  raw: string | null;
  // Set when a rule produced the final typed value and coercion must be skipped
  resolved?: CellValue;
}

export function applySpecialValues(raw: string | null, rules: readonly SpecialValueRule[] | undefined): SpecialValueOutcome {
  let current = raw;
  for (const rule of rules ?? []) {
    switch (rule.kind) {
      case "null_token":
        if (current === rule.token) current = null;
        break;
      case "flag_token":
        return { raw: current, resolved: current === rule.token };
      case "pattern": {
        if (current === null) break;
        const m = new RegExp(rule.pattern).exec(current);
        if (m) current = m[rule.group ?? 1] ?? m[0];
        break;
      }
      case "uppercase":
        if (current !== null) current = current.toUpperCase();
        break;
    }
  }
  return { raw: current };
}

const NUMERIC_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

export function sanitizeNumber(s: string): Sanitized {
  const cleaned = s.replace(/,/g, "").replace(/^\$/, "").trim();
  if (!NUMERIC_RE.test(cleaned)) return { value: null, error: `not a number: "${s}"` };
  const n = Number(cleaned);
  if (!Number.isFinite(n)) return { value: null, error: `not a finite number: "${s}"` };
  return { value: n };
}

export function sanitizeInteger(s: string): Sanitized {
  const res = sanitizeNumber(s);
  if (res.error !== undefined || typeof res.value !== "number") return { value: null, error: res.error ?? `not an integer: "${s}"` };
  if (!Number.isInteger(res.value)) return { value: null, error: `not an integer: "${s}"` };
  return { value: res.value };
}

export function sanitizeBoolean(s: string): Sanitized {
  const v = s.trim().toLowerCase();
  if (["1", "true", "t", "yes", "y"].includes(v)) return { value: true };
  if (["0", "false", "f", "no", "n"].includes(v)) return { value: false };
  return { value: null, error: `not a boolean: "${s}"` };
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

const toIsoDate = (y: number, m: number, d: number): string | undefined => {
  if (m < 1 || m > 12 || d < 1) return undefined;
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  if (d > daysInMonth) return undefined;
  return `${String(y).padStart(4, "0")}-${pad2(m)}-${pad2(d)}`;
};

/**
 * Parse published date layouts into deterministic ISO dates (YYYY-MM-DD).
 * Two-digit years map into 2000-2099.
 */
export function parseDateFlexible(value: string): string | undefined {
  const s = value.trim();
  let m = /^(\d{4})(\d{2})(\d{2})$/.exec(s);
  if (m) return toIsoDate(+m[1], +m[2], +m[3]);
  m = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/.exec(s);
  if (m) return toIsoDate(+m[1], +m[2], +m[3]);
  m = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})$/.exec(s);
  if (m) {
    const year = m[3].length === 2 ? 2000 + Number(m[3]) : Number(m[3]);
    return toIsoDate(year, +m[1], +m[2]);
  }
  return undefined;
}

export function sanitizeDate(s: string): Sanitized {
  const iso = parseDateFlexible(s);
  return iso ? { value: iso } : { value: null, error: `unparseable date: "${s}"` };
}

export function sanitizeText(s: string): Sanitized {
  return { value: collapseWS(s) };
}

export function coerceValue(raw: string | null, type: SemanticType): Sanitized {
  if (raw === null) return { value: null };
  switch (type) {
    case "integer":
      return sanitizeInteger(raw);
    case "numeric":
      return sanitizeNumber(raw);
    case "date":
      return sanitizeDate(raw);
    case "boolean":
      return sanitizeBoolean(raw);
    case "text":
      return sanitizeText(raw);
  }
}
